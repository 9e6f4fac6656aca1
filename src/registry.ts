import { decodeBinary, encodeBinary, hasBinaryHeader } from "./bplist";
import { ParseError, ParseErrorKind } from "./errors/parse-error";
import { PlistOptions } from "./shared/options";
import { PlistValue } from "./value/value";
import { decodeXml, encodeXml } from "./xml";

/**
 * One on-disk encoding of a property list.
 */
export interface PlistFormat {
  readonly name: string;
  /** lower-case, without the leading dot */
  readonly extensions: readonly string[];
  /** true when `bytes` look like this format; only the leading bytes are inspected */
  detect(bytes: Uint8Array): boolean;
  decode(bytes: Uint8Array, options?: PlistOptions): PlistValue;
  encode(value: PlistValue, options?: PlistOptions): Uint8Array;
}

export class UnknownFormatError extends Error {
  readonly name = 'UnknownFormatError';

  constructor(readonly format: string) {
    super(`no plist format named ${JSON.stringify(format)} is registered`);
  }
}

export const binaryFormat: PlistFormat = {
  name: 'binary',
  extensions: ['bplist'],
  detect: hasBinaryHeader,
  decode: decodeBinary,
  encode: encodeBinary,
};

const utf8Bom = [0xEF, 0xBB, 0xBF];

export const xmlFormat: PlistFormat = {
  name: 'xml',
  extensions: ['plist', 'xml'],
  detect(bytes) {
    let offset = utf8Bom.every((byte, idx) => bytes[idx] === byte) ? utf8Bom.length : 0;
    while (offset < bytes.length && /\s/.test(String.fromCharCode(bytes[offset]))) {
      ++offset;
    }
    return bytes[offset] === 0x3C; // '<'
  },
  decode: decodeXml,
  encode: (value, options) => new TextEncoder().encode(encodeXml(value, options)),
};

/**
 * A set of formats, looked up by name, by file extension or by sniffing the content.
 * Detection tries formats in registration order.
 */
export class FormatRegistry {
  private readonly _formats = new Map<string, PlistFormat>();

  get formats(): readonly PlistFormat[] {
    return [...this._formats.values()];
  }

  /** adds `format`, replacing any format registered under the same name */
  register(format: PlistFormat) {
    this._formats.set(format.name, format);
    return this;
  }

  get(name: string) {
    return this._formats.get(name);
  }

  forExtension(extension: string) {
    const normalized = extension.replace(/^\./, '').toLowerCase();
    return this.formats.find(format => format.extensions.includes(normalized));
  }

  detect(bytes: Uint8Array) {
    return this.formats.find(format => format.detect(bytes));
  }
}

export function createDefaultRegistry() {
  return new FormatRegistry()
    .register(binaryFormat)
    .register(xmlFormat);
}

export interface ReadPlistOptions extends PlistOptions {
  readonly registry?: FormatRegistry;
}

/**
 * Decodes `bytes` with whichever registered format recognizes them.
 */
export function readPlist(bytes: Uint8Array, options: ReadPlistOptions = {}): PlistValue {
  const { registry = createDefaultRegistry(), ...plistOptions } = options;
  const format = registry.detect(bytes);
  if (format === undefined) {
    throw new ParseError(ParseErrorKind.MalformedHeader, 'content matches no registered plist format', { byteOffset: 0 });
  }
  return format.decode(bytes, plistOptions);
}
