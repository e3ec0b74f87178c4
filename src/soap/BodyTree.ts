/**
 * Structured SOAP body trees
 *
 * A body tree maps element names to scalars, nested trees or sequences.
 * Rendering follows the same conventions the parser uses, so a rendered tree
 * of string scalars parses back into an equal tree, whitespace included:
 * - keys are emitted in insertion order
 * - arrays become repeated sibling elements with the same tag
 * - `null` becomes an empty element
 * - keys starting with `@_` are attributes of the enclosing element; one
 *   namespace prefix is allowed (`@_xsi:type`)
 * - the `#text` key is the element's text content
 *
 * XML cannot tell some trees apart, so these do not survive a round trip:
 * a one-element array comes back as its single item, `null` as `''`, and
 * prefixed attributes lose their prefix.
 */

import { EnvelopeError } from '../errors.js';
import {
  ATTRIBUTE_PREFIX,
  TEXT_KEY,
  checkWellFormed,
  escapeXml,
  isXmlNode,
  parseXmlDocument,
  type XmlValue,
} from './xml.js';

export type BodyScalar = string | number | boolean | null;

export interface BodyTree {
  [key: string]: BodyValue;
}

export type BodyValue = BodyScalar | BodyTree | BodyValue[];

export interface RenderOptions {
  /** Target namespace declared on the root element */
  namespace?: string;
  /** Qualify every element with this prefix */
  namespacePrefix?: string;
}

const NAME_PATTERN = /^[A-Za-z_][\w.-]*$/;
// attributes may carry one prefix, e.g. xsi:type
const ATTRIBUTE_NAME_PATTERN = /^(?:[A-Za-z_][\w.-]*:)?[A-Za-z_][\w.-]*$/;

function isTree(value: BodyValue): value is BodyTree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function assertName(name: string, what: string, pattern = NAME_PATTERN): void {
  if (!pattern.test(name)) {
    throw new EnvelopeError(`Invalid ${what} name: '${name}'`);
  }
}

function scalarText(value: Exclude<BodyScalar, null>): string {
  return escapeXml(String(value));
}

class TreeRenderer {
  constructor(private readonly prefix: string | undefined) {}

  qualify(name: string): string {
    return this.prefix ? `${this.prefix}:${name}` : name;
  }

  element(name: string, value: BodyValue, rootAttrs = ''): string {
    assertName(name, 'element');
    const tag = this.qualify(name);

    if (value === null) {
      return `<${tag}${rootAttrs}/>`;
    }
    if (!isTree(value)) {
      if (Array.isArray(value)) {
        return value.map((item) => this.element(name, item)).join('');
      }
      return `<${tag}${rootAttrs}>${scalarText(value)}</${tag}>`;
    }

    let attrs = rootAttrs;
    let text = '';
    const children: string[] = [];

    for (const [key, child] of Object.entries(value)) {
      if (key.startsWith(ATTRIBUTE_PREFIX)) {
        const attrName = key.slice(ATTRIBUTE_PREFIX.length);
        assertName(attrName, 'attribute', ATTRIBUTE_NAME_PATTERN);
        if (child !== null && typeof child === 'object') {
          throw new EnvelopeError(`Attribute '${attrName}' must have a scalar value`);
        }
        attrs += ` ${attrName}="${child === null ? '' : scalarText(child)}"`;
      } else if (key === TEXT_KEY) {
        if (child !== null && typeof child === 'object') {
          throw new EnvelopeError(`Text content of '${name}' must be a scalar`);
        }
        text = child === null ? '' : scalarText(child);
      } else {
        children.push(this.element(key, child));
      }
    }

    if (children.length === 0 && text === '') {
      return `<${tag}${attrs}/>`;
    }
    return `<${tag}${attrs}>${text}${children.join('')}</${tag}>`;
  }
}

/**
 * Render a body tree under the given root element.
 */
export function renderBodyTree(rootTag: string, tree: BodyTree, options: RenderOptions = {}): string {
  if (!rootTag || rootTag.trim() === '') {
    throw new EnvelopeError('Body root tag must not be empty');
  }
  if (Object.keys(tree).length === 0) {
    throw new EnvelopeError('Body tree must not be empty');
  }
  if (options.namespacePrefix !== undefined) {
    assertName(options.namespacePrefix, 'namespace prefix');
  }

  const prefix = options.namespacePrefix || undefined;
  let rootAttrs = '';
  if (options.namespace) {
    const nsAttr = prefix ? `xmlns:${prefix}` : 'xmlns';
    rootAttrs = ` ${nsAttr}="${escapeXml(options.namespace)}"`;
  }

  return new TreeRenderer(prefix).element(rootTag, tree, rootAttrs);
}

/**
 * Render each entry of a tree as a sibling element, without a wrapping root.
 */
export function renderBodyElements(tree: BodyTree, options: RenderOptions = {}): string {
  const renderer = new TreeRenderer(options.namespacePrefix || undefined);
  return Object.entries(tree)
    .map(([name, value]) => renderer.element(name, value))
    .join('');
}

/**
 * Convert a parsed XML value into a body value.
 */
export function toBodyValue(value: XmlValue): BodyValue {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toBodyValue(item));
  }
  const tree: BodyTree = {};
  for (const [key, child] of Object.entries(value)) {
    tree[key] = toBodyValue(child);
  }
  return tree;
}

/**
 * Parse an XML fragment back into its root tag and body tree. Scalars come
 * back as strings and namespace prefixes are removed.
 */
export function parseBodyTree(xml: string): { rootTag: string; tree: BodyTree } {
  const problem = checkWellFormed(xml);
  if (problem) {
    throw new EnvelopeError(`Body is not well-formed XML: ${problem}`);
  }

  const doc = parseXmlDocument(xml, true);
  const root = Object.entries(doc)[0];
  if (!root) {
    throw new EnvelopeError('Body has no root element');
  }

  const [rootTag, rootValue] = root;
  const value = toBodyValue(rootValue);
  return { rootTag, tree: isXmlNode(rootValue) && isTree(value) ? value : {} };
}
