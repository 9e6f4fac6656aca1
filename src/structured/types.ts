import { EventConsumer } from "../events/event";
import { EventCursor } from "./cursor";

/**
 * Maps a host type `T` to and from the plist event stream.
 */
export interface PlistType<T> {
  /** used as `expected` in {@link TypeMismatchError} */
  readonly name: string;
  /** set on types made with `t.optional`: the struct field may be absent */
  readonly isOptional?: boolean;

  deserialize(cursor: EventCursor, path: string): T;
  serialize(value: T, consumer: EventConsumer): void;
}

export interface OptionalPlistType<T> extends PlistType<T | undefined> {
  readonly isOptional: true;
}

/**
 * Infer the TypeScript type from a plist type.
 */
export type Infer<C> = C extends PlistType<infer T> ? T : never;

export type StructFields = { readonly [field: string]: PlistType<unknown> };

type OptionalKeys<F extends StructFields> = {
  [K in keyof F]: F[K] extends OptionalPlistType<unknown> ? K : never;
}[keyof F];

type Simplify<T> = { [K in keyof T]: T[K] } & {};

export type StructValue<F extends StructFields> = Simplify<
  & { [K in Exclude<keyof F, OptionalKeys<F>>]: Infer<F[K]> }
  & { [K in OptionalKeys<F>]?: Infer<F[K]> }
>;
