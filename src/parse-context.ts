/**
 * Where in the input a parse step is happening; attached to every {@link ParseError}.
 */
export interface IParseContext {
  /** absolute offset into the input buffer */
  readonly byteOffset?: number;
  /** index into the offset table of the object being read */
  readonly objRef?: number;
  /** element name, for the XML format */
  readonly element?: string;
}
