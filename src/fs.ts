import { readFileSync, writeFileSync } from "node:fs";
import { extname } from "node:path";
import { createDefaultRegistry, readPlist, ReadPlistOptions, UnknownFormatError, xmlFormat } from "./registry";
import { PlistValue } from "./value/value";

export function readPlistFile(path: string, options?: ReadPlistOptions): PlistValue {
  return readPlist(readFileSync(path), options);
}

export interface WritePlistFileOptions extends ReadPlistOptions {
  /** a registered format name; by default the format is chosen from the file extension, falling back to XML */
  readonly format?: string;
}

export function writePlistFile(path: string, value: PlistValue, options: WritePlistFileOptions = {}) {
  const { registry = createDefaultRegistry(), format: formatName, ...plistOptions } = options;

  let format = registry.forExtension(extname(path)) ?? xmlFormat;
  if (formatName !== undefined) {
    const named = registry.get(formatName);
    if (named === undefined) {
      throw new UnknownFormatError(formatName);
    }
    format = named;
  }

  writeFileSync(path, format.encode(value, plistOptions));
}
