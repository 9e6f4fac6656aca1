import { pipeEvents } from '../events/event';
import { buildValue } from '../events/value-builder';
import { valueToEvents } from '../events/value-events';
import { PlistOptions } from '../shared/options';
import { PlistValue } from '../value/value';
import { BinaryReader } from './reader';
import { BinaryWriter } from './writer';

export { BinaryReader, hasBinaryHeader } from './reader';
export { BinaryWriter } from './writer';

export function decodeBinary(input: Uint8Array | ArrayBuffer, options?: PlistOptions): PlistValue {
  return buildValue(new BinaryReader(input, options));
}

export function encodeBinary(value: PlistValue, options?: PlistOptions): Uint8Array {
  const writer = new BinaryWriter(options);
  pipeEvents(valueToEvents(value), writer);
  return writer.finish();
}
