import { XMLBuilder } from "fast-xml-parser";
import { assert } from "../assert";
import { EncodeError, EncodeErrorKind } from "../errors/encode-error";
import { EventConsumer, PlistEvent, ScalarEvent } from "../events/event";
import { EventStreamValidator } from "../events/stream-validator";
import { ILogger } from "../shared/logger";
import { PlistOptions, resolveOptions } from "../shared/options";
import { PlistDate } from "../value/plist-date";
import { plistDoctype, plistVersion, textNodeName, xmlDeclaration } from "./constants";

export interface XmlWriteOptions extends PlistOptions {
  /** wrap the value in the XML declaration, DOCTYPE and `<plist>` element; defaults to true */
  readonly rootElement?: boolean;
  /** defaults to a tab */
  readonly indent?: string;
}

/** an element or text node in fast-xml-parser's `preserveOrder` shape */
type BuilderNode = Record<string, unknown>;

function element(name: string, children: BuilderNode[] = []): BuilderNode {
  return { [name]: children };
}

// characters XML 1.0 cannot carry, escaped or not
const nonXmlCharacter = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

function textElement(name: string, text: string): BuilderNode {
  const invalid = nonXmlCharacter.exec(text);
  if (invalid !== null) {
    throw new EncodeError(EncodeErrorKind.InvalidValue, `U+${invalid[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')} at index ${invalid.index} of a <${name}> cannot be written as XML`);
  }
  return element(name, text === '' ? [] : [{ [textNodeName]: text }]);
}

/** only years 0000 through 9999 have the four-digit form readers accept */
function formatDate(date: PlistDate) {
  const year = date.toDate().getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new EncodeError(EncodeErrorKind.InvalidValue, `${date} falls outside years 0000-9999`);
  }
  return date.toISOString();
}

export function formatReal(value: number) {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (value === Infinity) {
    return '+infinity';
  }
  if (value === -Infinity) {
    return '-infinity';
  }
  return Object.is(value, -0) ? '-0' : String(value);
}

function scalarElement(event: ScalarEvent): BuilderNode {
  switch (event.type) {
    case 'string':
      return textElement('string', event.value);
    case 'boolean':
      return element(event.value ? 'true' : 'false');
    case 'integer':
      return textElement('integer', event.value.toString());
    case 'real':
      return textElement('real', formatReal(event.value));
    case 'date':
      return textElement('date', formatDate(event.value));
    case 'data':
      return textElement('data', Buffer.from(event.value.buffer, event.value.byteOffset, event.value.byteLength).toString('base64'));
    case 'uid':
      throw new EncodeError(EncodeErrorKind.UidNotSupportedInXml, `${event.value} has no XML representation`);
  }
}

/**
 * Consumer that renders one value as an XML property list.
 */
export class XmlWriter implements EventConsumer {
  private readonly _validator = new EventStreamValidator();
  private readonly _stack: BuilderNode[][] = [];
  private _root: BuilderNode | undefined;

  private readonly _builder: XMLBuilder;
  private readonly _rootElement: boolean;
  private readonly _logger: ILogger;

  constructor(options: XmlWriteOptions = {}) {
    this._logger = resolveOptions(options).logger;
    this._rootElement = options.rootElement ?? true;
    this._builder = new XMLBuilder({
      preserveOrder: true,
      format: true,
      indentBy: options.indent ?? '\t',
      suppressEmptyNode: true,
    });
  }

  write(event: PlistEvent) {
    const keyPosition = this._validator.isExpectingKey;
    this._validator.accept(event);

    if (keyPosition && event.type === 'string') {
      this._append(textElement('key', event.value));
      return;
    }

    switch (event.type) {
      case 'startArray':
      case 'startDictionary': {
        const children: BuilderNode[] = [];
        this._append(element(event.type === 'startArray' ? 'array' : 'dict', children));
        this._stack.push(children);
        return;
      }
      case 'endCollection':
        this._stack.pop();
        return;
      default:
        this._append(scalarElement(event));
    }
  }

  finish(): string {
    this._validator.finish();
    assert(this._root !== undefined, 'completed event stream produced no element');

    // the builder starts every element on a new line, the first one included
    const body = String(this._builder.build([this._root])).trimStart();
    this._logger.debug('DBG: rendered %d characters of XML', body.length);

    // <plist> is added by hand so the value is not indented under it
    return this._rootElement
      ? [xmlDeclaration, plistDoctype, `<plist version="${plistVersion}">`, body, '</plist>', ''].join('\n')
      : `${body}\n`;
  }

  private _append(node: BuilderNode) {
    const top = this._stack.at(-1);
    if (top === undefined) {
      this._root = node;
    }
    else {
      top.push(node);
    }
  }
}
