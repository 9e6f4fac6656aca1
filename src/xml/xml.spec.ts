import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { EncodeError, EncodeErrorKind } from '../errors/encode-error';
import { ParseError, ParseErrorKind } from '../errors/parse-error';
import { PlistEvent } from '../events/event';
import { plistValueArbitrary, xmlValueOptions } from '../testing/arbitraries';
import { captureError } from '../testing/capture-error';
import { PlistDate } from '../value/plist-date';
import { Uid } from '../value/uid';
import { PlistValue, valuesEqual } from '../value/value';
import { decodeXml, encodeXml, XmlReader } from './index';

const prologue = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
];

function plistDocument(...body: string[]) {
  return [...prologue, '<plist version="1.0">', ...body, '</plist>', ''].join('\n');
}

function expectParseError(fn: () => unknown, kind: ParseErrorKind) {
  const error = captureError(fn);
  expect(error).toBeInstanceOf(ParseError);
  expect(error).toMatchObject({ kind });
}

describe('XmlReader', () => {
  it('reads a hand-written document', () => {
    const text = plistDocument(
      '<dict>',
      '\t<key>Name</key>',
      '\t<string>Test Fixture &amp; Co</string>',
      '\t<key>Count</key>',
      '\t<integer>42</integer>',
      '\t<key>Ratio</key>',
      '\t<real>0.5</real>',
      '\t<key>Enabled</key>',
      '\t<true/>',
      '\t<key>Created</key>',
      '\t<date>2001-01-01T00:01:00Z</date>',
      '\t<key>Blob</key>',
      '\t<data>',
      '\tAQID',
      '\t</data>',
      '\t<key>Tags</key>',
      '\t<array>',
      '\t\t<string>x</string>',
      '\t\t<integer>0x10</integer>',
      '\t\t<real>-infinity</real>',
      '\t\t<string></string>',
      '\t</array>',
      '</dict>',
    );

    expect(decodeXml(text)).toEqual(new Map<string, PlistValue>([
      ['Name', 'Test Fixture & Co'],
      ['Count', 42n],
      ['Ratio', 0.5],
      ['Enabled', true],
      ['Created', new PlistDate(60)],
      ['Blob', Uint8Array.from([1, 2, 3])],
      ['Tags', ['x', 16n, -Infinity, '']],
    ]));
  });

  it('produces events with collection sizes', () => {
    const events = [...new XmlReader(plistDocument('<array>', '\t<false/>', '</array>'))];

    expect(events).toEqual<PlistEvent[]>([
      { type: 'startArray', size: 1 },
      { type: 'boolean', value: false },
      { type: 'endCollection' },
    ]);
  });

  it('accepts a bare value element and bytes', () => {
    expect(decodeXml('<string>hi</string>')).toBe('hi');
    expect(decodeXml(new TextEncoder().encode('<integer>-7</integer>'))).toBe(-7n);
  });

  it.each<[string, number]>([
    ['nan', NaN],
    ['inf', Infinity],
    ['+infinity', Infinity],
    ['-inf', -Infinity],
    ['1e3', 1000],
    ['-0', -0],
  ])('reads the real %s', (text, expected) => {
    expect(decodeXml(`<real>${text}</real>`)).toBe(expected);
  });

  it.each<[string, string]>([
    ['A&#x42;C&#67;', 'ABCC'],
    ['&#x1F600;', '\u{1F600}'],
    ['&lt;&amp;&gt;&quot;&apos;', `<&>"'`],
    ['&amp;#65;', '&#65;'],
    ['<![CDATA[a &amp; <b>]]>', 'a &amp; <b>'],
  ])('decodes references in %s', (text, expected) => {
    expect(decodeXml(`<string>${text}</string>`)).toBe(expected);
  });

  it('decodes references in keys', () => {
    expect(decodeXml('<dict><key>&#97;</key><true/></dict>')).toEqual(new Map([['a', true]]));
  });

  it('rejects references beyond Unicode', () => {
    expectParseError(() => decodeXml('<string>&#x110000;</string>'), ParseErrorKind.InvalidXmlSyntax);
  });

  it('applies the integer range', () => {
    expect(decodeXml('<integer>18446744073709551615</integer>')).toBe(2n ** 64n - 1n);
    expectParseError(() => decodeXml('<integer>18446744073709551616</integer>'), ParseErrorKind.IntegerOverflow);
    expect(decodeXml('<integer>18446744073709551616</integer>', { unstable: { wideIntegers: true } })).toBe(2n ** 64n);
  });

  it.each<[string, string, ParseErrorKind]>([
    ['malformed XML', '<plist><dict></plist>', ParseErrorKind.InvalidXmlSyntax],
    ['unknown elements', '<plist><foo/></plist>', ParseErrorKind.UnexpectedXmlElement],
    ['a key without a value', '<plist><dict><key>a</key></dict></plist>', ParseErrorKind.UnclosedXmlElement],
    ['a value without a key', '<plist><dict><string>a</string></dict></plist>', ParseErrorKind.UnexpectedXmlElement],
    ['a key outside a dictionary', '<plist><array><key>a</key></array></plist>', ParseErrorKind.UnexpectedXmlElement],
    ['two root values', '<plist><true/><false/></plist>', ParseErrorKind.UnexpectedXmlElement],
    ['an empty plist', '<plist></plist>', ParseErrorKind.UnclosedXmlElement],
    ['stray text', '<plist><array>oops</array></plist>', ParseErrorKind.UnexpectedXmlElement],
    ['elements inside a string', '<plist><string><true/></string></plist>', ParseErrorKind.UnexpectedXmlElement],
    ['a bad integer', '<plist><integer>4x</integer></plist>', ParseErrorKind.InvalidIntegerString],
    ['a bad real', '<plist><real>one</real></plist>', ParseErrorKind.InvalidRealString],
    ['a bad date', '<plist><date>yesterday</date></plist>', ParseErrorKind.InvalidDateString],
    ['bad base64', '<plist><data>A$</data></plist>', ParseErrorKind.InvalidDataString],
  ])('rejects %s', (_, text, kind) => {
    expectParseError(() => decodeXml(text), kind);
  });
});

describe('XmlWriter', () => {
  it('renders a dictionary with tab indentation', () => {
    const text = encodeXml(new Map<string, PlistValue>([['a', 1n], ['b', [true]]]));

    expect(text).toBe(plistDocument(
      '<dict>',
      '\t<key>a</key>',
      '\t<integer>1</integer>',
      '\t<key>b</key>',
      '\t<array>',
      '\t\t<true/>',
      '\t</array>',
      '</dict>',
    ));
  });

  it('omits the document wrapper when asked', () => {
    expect(encodeXml('x < y', { rootElement: false })).toBe('<string>x &lt; y</string>\n');
  });

  it('uses the given indent', () => {
    expect(encodeXml([0.5], { rootElement: false, indent: '  ' })).toBe('<array>\n  <real>0.5</real>\n</array>\n');
  });

  it.each<[PlistValue, string]>([
    [NaN, '<real>nan</real>\n'],
    [-Infinity, '<real>-infinity</real>\n'],
    [new PlistDate(60), '<date>2001-01-01T00:01:00Z</date>\n'],
    [Uint8Array.from([1, 2, 3]), '<data>AQID</data>\n'],
    ['', '<string/>\n'],
    [new Map(), '<dict/>\n'],
  ])('renders %s', (value, expected) => {
    expect(encodeXml(value, { rootElement: false })).toBe(expected);
  });

  it('has no representation for UIDs', () => {
    const error = captureError(() => encodeXml([new Uid(1n)]));
    expect(error).toBeInstanceOf(EncodeError);
    expect(error).toMatchObject({ kind: EncodeErrorKind.UidNotSupportedInXml });
  });

  it.each<[string, PlistDate]>([
    ['after 9999', new PlistDate(3e11)],
    ['before year 0', new PlistDate(-7e10)],
  ])('rejects dates %s', (_, date) => {
    const error = captureError(() => encodeXml(date));
    expect(error).toBeInstanceOf(EncodeError);
    expect(error).toMatchObject({ kind: EncodeErrorKind.InvalidValue });
  });

  it.each<[string, PlistValue]>([
    ['strings', 'a\u0001b'],
    ['keys', new Map([['\u0000', true]])],
  ])('rejects control characters in %s', (_, value) => {
    expect(captureError(() => encodeXml(value))).toMatchObject({ name: 'EncodeError', kind: EncodeErrorKind.InvalidValue });
  });

  it('writes tabs and line breaks as they are', () => {
    expect(encodeXml('a\tb\nc', { rootElement: false })).toBe('<string>a\tb\nc</string>\n');
  });

  it('round-trips arbitrary values', () => {
    fc.assert(
      fc.property(plistValueArbitrary(xmlValueOptions), value => {
        expect(valuesEqual(decodeXml(encodeXml(value)), value)).toBe(true);
      }),
      { numRuns: 200 },
    );
  });
});
