import { pipeEvents } from '../events/event';
import { buildValue } from '../events/value-builder';
import { valueToEvents } from '../events/value-events';
import { PlistOptions } from '../shared/options';
import { PlistValue } from '../value/value';
import { XmlReader } from './reader';
import { XmlWriteOptions, XmlWriter } from './writer';

export { XmlReader } from './reader';
export { XmlWriter, formatReal } from './writer';
export type { XmlWriteOptions } from './writer';

export function decodeXml(input: string | Uint8Array, options?: PlistOptions): PlistValue {
  return buildValue(new XmlReader(input, options));
}

export function encodeXml(value: PlistValue, options?: XmlWriteOptions): string {
  const writer = new XmlWriter(options);
  pipeEvents(valueToEvents(value), writer);
  return writer.finish();
}
