import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError, ParseErrorKind } from "../errors/parse-error";
import { EventProducer, PlistEvent } from "../events/event";
import { ILogger } from "../shared/logger";
import { PlistOptions, resolveOptions } from "../shared/options";
import { IntegerRange, integerRangeFor, isIntegerInRange } from "../value/integer";
import { PlistDate } from "../value/plist-date";
import { attributesNodeName, cdataNodeName, textNodeName } from "./constants";

interface XmlElement {
  readonly kind: 'element';
  readonly name: string;
  readonly children: readonly XmlNode[];
}

interface XmlText {
  readonly kind: 'text';
  readonly text: string;
}

type XmlNode = XmlElement | XmlText;

type Frame = {
  readonly isDict: boolean;
  readonly items: readonly XmlElement[];
  index: number;
};

const decimalIntegerPattern = /^[+-]?\d+$/;
const hexIntegerPattern = /^0x[\da-f]+$/i;
const realPattern = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const datePattern = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;
const base64Pattern = /^[A-Za-z\d+/]*={0,2}$/;

const predefinedEntities: { readonly [name: string]: string } = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

// entities are decoded here rather than by the parser, which leaves character references alone
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: false,
  processEntities: false,
  cdataPropName: cdataNodeName,
});

/**
 * Replaces the predefined entities and decimal or hexadecimal character references in one pass,
 * so `&amp;#65;` stays `&#65;`. Other entity names are left as written.
 */
function decodeEntities(text: string) {
  return text.replace(/&(?:#x([\da-fA-F]+)|#(\d+)|(amp|lt|gt|quot|apos));/g, (reference, hex: string | undefined, decimal: string | undefined, name: string | undefined) => {
    if (name !== undefined) {
      return predefinedEntities[name];
    }
    const codePoint = hex !== undefined ? Number.parseInt(hex, 16) : Number(decimal);
    if (codePoint > 0x10FFFF) {
      throw new ParseError(ParseErrorKind.InvalidXmlSyntax, `${reference} is not a Unicode code point`);
    }
    return String.fromCodePoint(codePoint);
  });
}

/** the text of a CDATA section, which `preserveOrder` nests as `[{ '#text': ... }]` */
function cdataText(raw: unknown) {
  return toXmlNodes(raw, false).map(node => node.kind === 'text' ? node.text : '').join('');
}

/**
 * Turns fast-xml-parser's `preserveOrder` output (an array of single-key objects) into typed nodes.
 */
function toXmlNodes(raw: unknown, decode = true): XmlNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const nodes: XmlNode[] = [];
  raw.forEach((item: unknown) => {
    if (typeof item !== 'object' || item === null) {
      return;
    }
    const entries: [string, unknown][] = Object.entries(item);
    for (const [key, value] of entries) {
      if (key === attributesNodeName) {
        continue;
      }
      if (key === textNodeName) {
        const text = String(value);
        nodes.push({ kind: 'text', text: decode ? decodeEntities(text) : text });
      }
      else if (key === cdataNodeName) {
        nodes.push({ kind: 'text', text: cdataText(value) });
      }
      else {
        nodes.push({ kind: 'element', name: key, children: toXmlNodes(value) });
      }
    }
  });
  return nodes;
}

/** element children, with whitespace between them dropped */
function childElements(nodes: readonly XmlNode[], parent: string | undefined): XmlElement[] {
  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (node.kind === 'element') {
      elements.push(node);
    }
    else if (node.text.trim() !== '') {
      throw new ParseError(ParseErrorKind.UnexpectedXmlElement, `unexpected text ${JSON.stringify(node.text.trim())} where an element was expected`, { element: parent });
    }
  }
  return elements;
}

function textContent(element: XmlElement) {
  return element.children.map(child => {
    if (child.kind === 'element') {
      throw new ParseError(ParseErrorKind.UnexpectedXmlElement, `<${child.name}> is not allowed inside <${element.name}>`, { element: element.name });
    }
    return child.text;
  }).join('');
}

function parseReal(text: string, element: string) {
  const trimmed = text.trim();
  switch (trimmed.toLowerCase()) {
    case 'nan':
      return NaN;
    case 'inf':
    case '+inf':
    case 'infinity':
    case '+infinity':
      return Infinity;
    case '-inf':
    case '-infinity':
      return -Infinity;
  }
  if (!realPattern.test(trimmed)) {
    throw new ParseError(ParseErrorKind.InvalidRealString, `${JSON.stringify(text)} is not a real`, { element });
  }
  return Number(trimmed);
}

function parseDate(text: string, element: string) {
  const trimmed = text.trim();
  const date = datePattern.test(trimmed) ? PlistDate.fromISOString(trimmed) : undefined;
  if (date === undefined) {
    throw new ParseError(ParseErrorKind.InvalidDateString, `${JSON.stringify(text)} is not an ISO 8601 UTC date`, { element });
  }
  return date;
}

function parseData(text: string, element: string) {
  const encoded = text.replace(/\s+/g, '');
  if (encoded.length % 4 !== 0 || !base64Pattern.test(encoded)) {
    throw new ParseError(ParseErrorKind.InvalidDataString, 'data is not valid base64', { element });
  }
  return Uint8Array.from(Buffer.from(encoded, 'base64'));
}

/**
 * Producer for XML property lists. Accepts a `<plist>` document or a bare value element.
 *
 * The document is validated and parsed on construction; element contents are checked while iterating.
 */
export class XmlReader implements EventProducer {
  private readonly _root: XmlElement;
  private readonly _logger: ILogger;
  private readonly _integerRange: IntegerRange;

  constructor(input: string | Uint8Array, options?: PlistOptions) {
    const { logger, wideIntegers } = resolveOptions(options);
    this._logger = logger;
    this._integerRange = integerRangeFor(wideIntegers);

    const text = typeof input === 'string' ? input : new TextDecoder().decode(input);
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new ParseError(ParseErrorKind.InvalidXmlSyntax, `${msg} (line ${line}, column ${col})`);
    }

    const documentElements = childElements(toXmlNodes(parser.parse(text)), undefined);
    const top = onlyElement(documentElements, undefined);
    this._root = top.name === 'plist'
      ? onlyElement(childElements(top.children, top.name), top.name)
      : top;
    this._logger.debug('DBG: XML root value is <%s>', this._root.name);
  }

  [Symbol.iterator]() {
    return this.events();
  }

  *events(): Generator<PlistEvent, void, undefined> {
    const stack: Frame[] = [];

    const enter = (element: XmlElement, asKey: boolean): PlistEvent => {
      const { name } = element;
      if (asKey) {
        return { type: 'string', value: textContent(element) };
      }

      switch (name) {
        case 'array': {
          const items = childElements(element.children, name);
          stack.push({ isDict: false, items, index: 0 });
          return { type: 'startArray', size: items.length };
        }
        case 'dict': {
          const items = childElements(element.children, name);
          checkDictionaryItems(items);
          stack.push({ isDict: true, items, index: 0 });
          return { type: 'startDictionary', size: items.length / 2 };
        }
        case 'string':
          return { type: 'string', value: textContent(element) };
        case 'integer':
          return { type: 'integer', value: this._parseInteger(textContent(element)) };
        case 'real':
          return { type: 'real', value: parseReal(textContent(element), name) };
        case 'true':
        case 'false':
          textContent(element);
          return { type: 'boolean', value: name === 'true' };
        case 'date':
          return { type: 'date', value: parseDate(textContent(element), name) };
        case 'data':
          return { type: 'data', value: parseData(textContent(element), name) };
      }

      throw new ParseError(ParseErrorKind.UnexpectedXmlElement, `<${name}> is not a plist value`, { element: name });
    };

    yield enter(this._root, false);

    while (stack.length) {
      const top = stack[stack.length - 1];
      if (top.index < top.items.length) {
        const asKey = top.isDict && top.index % 2 === 0;
        yield enter(top.items[top.index++], asKey);
        continue;
      }
      stack.pop();
      yield { type: 'endCollection' };
    }
  }

  /**
   * Decimal integers may be signed; `0x` hexadecimal ones are always unsigned.
   */
  private _parseInteger(text: string) {
    const trimmed = text.trim();
    if (!decimalIntegerPattern.test(trimmed) && !hexIntegerPattern.test(trimmed)) {
      throw new ParseError(ParseErrorKind.InvalidIntegerString, `${JSON.stringify(text)} is not an integer`, { element: 'integer' });
    }
    const value = BigInt(trimmed.startsWith('+') ? trimmed.slice(1) : trimmed);
    if (!isIntegerInRange(value, this._integerRange)) {
      throw new ParseError(ParseErrorKind.IntegerOverflow, `integer ${value} is outside the accepted range`, { element: 'integer' });
    }
    return value;
  }
}

function onlyElement(elements: readonly XmlElement[], parent: string | undefined) {
  if (elements.length === 0) {
    throw new ParseError(ParseErrorKind.UnclosedXmlElement, 'document holds no plist value', { element: parent });
  }
  if (elements.length > 1) {
    throw new ParseError(ParseErrorKind.UnexpectedXmlElement, `expected one value but found <${elements[1].name}> after <${elements[0].name}>`, { element: parent });
  }
  return elements[0];
}

function checkDictionaryItems(items: readonly XmlElement[]) {
  for (let i = 0; i < items.length; i += 2) {
    if (items[i].name !== 'key') {
      throw new ParseError(ParseErrorKind.UnexpectedXmlElement, `expected <key> but found <${items[i].name}>`, { element: 'dict' });
    }
    const value = items.at(i + 1);
    if (value === undefined || value.name === 'key') {
      throw new ParseError(ParseErrorKind.UnclosedXmlElement, `key ${JSON.stringify(textContent(items[i]))} has no value`, { element: 'dict' });
    }
  }
}
