/**
 * XML helpers shared by the envelope builder, the response interpreter and
 * the WSDL parser.
 *
 * Parsed documents follow fast-xml-parser conventions: attributes under
 * `@_name`, mixed text under `#text`, repeated siblings as arrays. Tag and
 * attribute values are kept as strings.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

/**
 * Node of a parsed document
 */
export interface XmlNode {
  [key: string]: XmlValue;
}

export type XmlValue = string | XmlNode | XmlValue[];

export const ATTRIBUTE_PREFIX = '@_';
export const TEXT_KEY = '#text';

/**
 * Create a parser. With `stripNamespaces` element and attribute prefixes are
 * removed and xmlns declarations dropped.
 */
export function createXmlParser(stripNamespaces: boolean): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    removeNSPrefix: stripNamespaces,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
  });
}

/**
 * Returns undefined when the document is well-formed, otherwise the reason.
 */
export function checkWellFormed(xml: string): string | undefined {
  const result = XMLValidator.validate(xml);
  if (result === true) {
    return undefined;
  }
  return `${result.err.msg} (line ${result.err.line}, column ${result.err.col})`;
}

/**
 * Parse a well-formed document into typed nodes. Callers check
 * well-formedness first; the parser itself is lenient.
 */
export function parseXmlDocument(xml: string, stripNamespaces: boolean): XmlNode {
  const parsed: unknown = createXmlParser(stripNamespaces).parse(xml);
  const value = toXmlValue(parsed);
  return isXmlNode(value) ? value : {};
}

/**
 * Narrow parser output into XmlValue. Numbers and booleans only appear when
 * value parsing is enabled and are stringified here. Text is kept as written,
 * except whitespace-only text beside child elements.
 */
export function toXmlValue(raw: unknown): XmlValue {
  if (Array.isArray(raw)) {
    return raw.map((item) => toXmlValue(item));
  }
  if (raw !== null && typeof raw === 'object') {
    const entries = Object.entries(raw);
    const hasChildren = entries.some(([key]) => key !== TEXT_KEY && !key.startsWith(ATTRIBUTE_PREFIX));
    const node: XmlNode = {};
    for (const [key, value] of entries) {
      // indentation between child elements
      if (key === TEXT_KEY && hasChildren && typeof value === 'string' && value.trim() === '') {
        continue;
      }
      node[key] = toXmlValue(value);
    }
    return node;
  }
  if (raw === null || raw === undefined) {
    return '';
  }
  return String(raw);
}

export function isXmlNode(value: XmlValue | undefined): value is XmlNode {
  return value !== undefined && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Text content of a value: the string itself, or the `#text` of a node that
 * also carries attributes. Arrays yield their first item's text.
 */
export function textOf(value: XmlValue | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return textOf(value[0]);
  }
  const text = value[TEXT_KEY];
  return typeof text === 'string' ? text : undefined;
}

/**
 * Local part of a qualified name
 */
export function localName(qualified: string): string {
  const colon = qualified.indexOf(':');
  return colon === -1 ? qualified : qualified.slice(colon + 1);
}

/**
 * Find a child by local name, whatever prefix the document used.
 */
export function childByLocalName(node: XmlNode, name: string): XmlValue | undefined {
  for (const [key, value] of Object.entries(node)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_KEY && localName(key) === name) {
      return value;
    }
  }
  return undefined;
}

/**
 * Escape XML special characters
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
