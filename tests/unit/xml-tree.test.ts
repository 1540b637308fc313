import { describe, expect, it } from 'vitest';
import {
  XmlParseError,
  attribute,
  childOf,
  find,
  findAll,
  inNamespace,
  parseXml,
  plain,
  text,
} from '../../src/xml/tree.js';

const NS = 'urn:test:main';
const NUTS = 'urn:test:nuts';

const xml = `<?xml version="1.0" encoding="UTF-8"?>
<ROOT xmlns="${NS}" xmlns:n="${NUTS}" ID="r1">
  <A><B LG="CY">cy</B><B LG="EN">  en  </B></A>
  <A><B LG="EN">second</B></A>
  <n:NUTS CODE="UKM"/>
  <C>before <I>inner</I> after</C>
  <EMPTY/>
  <AMP>Fish &amp; Chips</AMP>
  <REFS>Caf&#233; &#x2019;s &amp; co &#163;5</REFS>
  <LOCAL xmlns=""><D>plain</D></LOCAL>
</ROOT>`;

describe('parseXml', () => {
  const root = parseXml(xml);
  const ns = inNamespace(NS);

  it('resolves the default namespace on the root', () => {
    expect(root.localName).toBe('ROOT');
    expect(root.namespace).toBe(NS);
    expect(attribute(root, 'ID')).toBe('r1');
  });

  it('resolves prefixed elements', () => {
    const nuts = find(root, inNamespace(NUTS)('NUTS'));
    expect(nuts?.name).toBe('n:NUTS');
    expect(attribute(nuts, 'CODE')).toBe('UKM');
  });

  it('does not match an element in another namespace', () => {
    expect(find(root, ns('NUTS'))).toBeNull();
    expect(find(root, plain('A'))).toBeNull();
  });

  it('lets xmlns="" drop back to no namespace', () => {
    expect(text(find(root, plain('LOCAL'), plain('D')))).toBe('plain');
  });

  it('collects matches in document order', () => {
    expect(findAll(root, ns('A'), ns('B')).map((el) => text(el))).toEqual(['cy', 'en', 'second']);
  });

  it('filters on attribute predicates', () => {
    expect(text(find(root, ns('A'), ns('B', { LG: 'EN' })))).toBe('en');
  });

  it('joins direct text segments and skips child text', () => {
    expect(text(find(root, ns('C')))).toBe('before after');
    expect(text(childOf(find(root, ns('C')), ns('I')))).toBe('inner');
  });

  it('decodes entities', () => {
    expect(text(find(root, ns('AMP')))).toBe('Fish & Chips');
  });

  it('decodes numeric character references', () => {
    expect(text(find(root, ns('REFS')))).toBe('Café \u2019s & co £5');
  });

  it('returns null for missing nodes, text and attributes', () => {
    expect(text(find(root, ns('EMPTY')))).toBeNull();
    expect(text(null)).toBeNull();
    expect(attribute(null, 'CODE')).toBeNull();
    expect(attribute(root, 'MISSING')).toBeNull();
  });

  it('keeps numeric-looking values as strings', () => {
    const doc = parseXml('<R><CPV>04500000</CPV></R>');
    expect(text(find(doc, plain('CPV')))).toBe('04500000');
  });
});

describe('parseXml errors', () => {
  it('rejects unclosed tags', () => {
    expect(() => parseXml('<R><A></R>')).toThrow(XmlParseError);
  });

  it('rejects unbound prefixes', () => {
    expect(() => parseXml('<R><x:A/></R>')).toThrow('unbound namespace prefix "x" on <x:A>');
  });

  it('rejects more than one top-level element', () => {
    expect(() => parseXml('<a/><b/>')).toThrow('junk after document element');
  });

  it('rejects attribute names the parser reserves', () => {
    expect(() => parseXml('<a constructor="x"/>')).toThrow(XmlParseError);
    expect(() => parseXml('<a constructor="x"/>')).toThrow(/constructor/);
  });

  it('rejects input without a root element', () => {
    expect(() => parseXml('')).toThrow(XmlParseError);
  });
});
