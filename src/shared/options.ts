import { buildLeveledLogger, defaultLogConfig, ILogConfig, ILogger } from "./logger";

export interface IUnstableFeatures {
  /**
   * Accept integers in the full signed 128-bit range instead of the union of
   * the signed and unsigned 64-bit ranges. May change in a minor release.
   */
  readonly wideIntegers?: boolean;
}

export interface PlistOptions {
  readonly log?: ILogConfig;
  readonly unstable?: IUnstableFeatures;
}

export interface ResolvedPlistOptions {
  readonly logger: ILogger;
  readonly wideIntegers: boolean;
}

export function resolveOptions(options: PlistOptions = {}): ResolvedPlistOptions {
  return {
    logger: buildLeveledLogger(options.log ?? defaultLogConfig),
    wideIntegers: options.unstable?.wideIntegers ?? false,
  };
}
