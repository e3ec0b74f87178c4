/**
 * SOAP Envelope Builder
 *
 * Purpose: Build SOAP 1.1 and SOAP 1.2 envelopes around a raw XML fragment or
 * a structured body tree.
 *
 * Key behaviors:
 * - The envelope declares the `soap` prefix once; body and header fragments
 *   carry their own namespace declarations
 * - Raw fragments are embedded verbatim after their XML declaration is
 *   stripped; only well-formedness is checked
 * - Protocol HTTP headers depend on the version: SOAPAction for 1.1, an
 *   `action` Content-Type parameter for 1.2
 */

import { EnvelopeError } from '../errors.js';
import {
  renderBodyElements,
  renderBodyTree,
  toBodyValue,
  type BodyTree,
  type BodyValue,
} from './BodyTree.js';
import { checkWellFormed, childByLocalName, escapeXml, isXmlNode, parseXmlDocument } from './xml.js';

/**
 * SOAP version enumeration
 */
export enum SoapVersion {
  SOAP_1_1 = '1.1',
  SOAP_1_2 = '1.2',
}

/**
 * SOAP namespaces
 */
export const SOAP_NAMESPACES = {
  SOAP_1_1_ENVELOPE: 'http://schemas.xmlsoap.org/soap/envelope/',
  SOAP_1_2_ENVELOPE: 'http://www.w3.org/2003/05/soap-envelope',
  XSI: 'http://www.w3.org/2001/XMLSchema-instance',
  XSD: 'http://www.w3.org/2001/XMLSchema',
} as const;

const ENVELOPE_PREFIX = 'soap';

/**
 * Structured SOAP header entry
 */
export interface SoapHeaderBlock {
  /** Namespace URI */
  namespace?: string;
  /** Namespace prefix, defaults to `h` when a namespace is given */
  prefix?: string;
  /** Local name of the header element */
  localName: string;
  /** Text content, or a body tree rendered as child elements */
  content: string | BodyTree;
  mustUnderstand?: boolean;
  /** actor (1.1) or role (1.2) attribute */
  actor?: string;
}

/**
 * A header is either a raw XML fragment or a structured block.
 */
export type SoapHeaderInput = string | SoapHeaderBlock;

/**
 * Body input: exactly one of `body` or `bodyTree` (with `bodyRootTag`).
 */
export interface EnvelopeBody {
  body?: string;
  bodyTree?: BodyTree;
  bodyRootTag?: string;
  namespace?: string;
  namespacePrefix?: string;
}

export interface EnvelopeOptions {
  soapAction?: string;
  headers?: readonly SoapHeaderInput[];
}

export interface SoapEnvelope {
  readonly version: SoapVersion;
  /** Prefix to URI map of the envelope's own declarations */
  readonly namespaces: Readonly<Record<string, string>>;
  readonly headerXml?: string;
  readonly bodyXml: string;
  readonly xml: string;
  readonly contentType: string;
  /** Quoted SOAPAction header value, SOAP 1.1 only */
  readonly soapActionHeader?: string;
}

export function getEnvelopeNamespace(version: SoapVersion): string {
  return version === SoapVersion.SOAP_1_1
    ? SOAP_NAMESPACES.SOAP_1_1_ENVELOPE
    : SOAP_NAMESPACES.SOAP_1_2_ENVELOPE;
}

/**
 * Remove a leading XML declaration from a fragment
 */
export function stripXmlDeclaration(xml: string): string {
  return xml.replace(/^\s*<\?xml[^>]*\?>/, '').trim();
}

/**
 * Check a fragment that may contain several sibling elements.
 */
function assertWellFormedFragment(fragment: string, what: string): void {
  if (!fragment.startsWith('<')) {
    throw new EnvelopeError(`${what} must be an XML element`);
  }
  const problem = checkWellFormed(`<fragment>${fragment}</fragment>`);
  if (problem) {
    throw new EnvelopeError(`${what} is not well-formed XML: ${problem}`);
  }
}

/**
 * Build a SOAP header element
 */
function buildHeaderElement(header: SoapHeaderBlock, version: SoapVersion): string {
  const prefix = header.namespace ? header.prefix || 'h' : undefined;
  const nsAttr = header.namespace && prefix ? ` xmlns:${prefix}="${escapeXml(header.namespace)}"` : '';

  const attrs: string[] = [];

  if (header.mustUnderstand !== undefined) {
    const value =
      version === SoapVersion.SOAP_1_1
        ? header.mustUnderstand
          ? '1'
          : '0'
        : String(header.mustUnderstand);
    attrs.push(`${ENVELOPE_PREFIX}:mustUnderstand="${value}"`);
  }

  if (header.actor) {
    const actorAttr = version === SoapVersion.SOAP_1_1 ? 'actor' : 'role';
    attrs.push(`${ENVELOPE_PREFIX}:${actorAttr}="${escapeXml(header.actor)}"`);
  }

  const attrStr = attrs.length > 0 ? ' ' + attrs.join(' ') : '';
  const tagName = prefix ? `${prefix}:${header.localName}` : header.localName;

  const content =
    typeof header.content === 'string'
      ? escapeXml(header.content)
      : renderBodyElements(header.content, { namespacePrefix: prefix });

  return `<${tagName}${nsAttr}${attrStr}>${content}</${tagName}>`;
}

function buildHeaderSection(headers: readonly SoapHeaderInput[], version: SoapVersion): string | undefined {
  if (headers.length === 0) {
    return undefined;
  }
  return headers
    .map((header) => {
      if (typeof header !== 'string') {
        return buildHeaderElement(header, version);
      }
      const fragment = stripXmlDeclaration(header);
      assertWellFormedFragment(fragment, 'SOAP header');
      return fragment;
    })
    .join('');
}

function buildBodyXml(body: EnvelopeBody): string {
  const hasRaw = body.body !== undefined;
  const hasTree = body.bodyTree !== undefined;

  if (hasRaw && hasTree) {
    throw new EnvelopeError('Provide either a raw body or a body tree, not both');
  }

  if (body.bodyTree !== undefined) {
    return renderBodyTree(body.bodyRootTag ?? '', body.bodyTree, {
      namespace: body.namespace,
      namespacePrefix: body.namespacePrefix,
    });
  }

  if (body.body === undefined) {
    throw new EnvelopeError('A raw body or a body tree is required');
  }

  const fragment = stripXmlDeclaration(body.body);
  if (fragment === '') {
    throw new EnvelopeError('Body must not be empty');
  }
  assertWellFormedFragment(fragment, 'Body');
  return fragment;
}

/**
 * Get SOAP content type for version
 */
export function getSoapContentType(version: SoapVersion, soapAction?: string): string {
  if (version === SoapVersion.SOAP_1_1) {
    // SOAP 1.1 uses text/xml
    return 'text/xml; charset=utf-8';
  }
  // SOAP 1.2 uses application/soap+xml with optional action
  if (soapAction) {
    return `application/soap+xml; charset=utf-8; action="${soapAction}"`;
  }
  return 'application/soap+xml; charset=utf-8';
}

/**
 * Build a SOAP envelope.
 *
 * @throws EnvelopeError when the body input is ambiguous, missing or not
 *   well-formed, or a header fragment is not well-formed
 */
export function buildEnvelope(
  version: SoapVersion,
  body: EnvelopeBody,
  options: EnvelopeOptions = {}
): SoapEnvelope {
  const bodyXml = buildBodyXml(body);
  const headerXml = buildHeaderSection(options.headers ?? [], version);
  const envelopeNs = getEnvelopeNamespace(version);

  const headerSection = headerXml
    ? `
  <${ENVELOPE_PREFIX}:Header>${headerXml}</${ENVELOPE_PREFIX}:Header>`
    : '';

  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<${ENVELOPE_PREFIX}:Envelope xmlns:${ENVELOPE_PREFIX}="${envelopeNs}">${headerSection}
  <${ENVELOPE_PREFIX}:Body>${bodyXml}</${ENVELOPE_PREFIX}:Body>
</${ENVELOPE_PREFIX}:Envelope>`;

  const problem = checkWellFormed(xml);
  if (problem) {
    throw new EnvelopeError(`Envelope is not well-formed XML: ${problem}`);
  }

  const action = options.soapAction ?? '';
  return Object.freeze({
    version,
    namespaces: Object.freeze({ [ENVELOPE_PREFIX]: envelopeNs }),
    headerXml,
    bodyXml,
    xml,
    contentType: getSoapContentType(version, action),
    soapActionHeader: version === SoapVersion.SOAP_1_1 ? `"${action}"` : undefined,
  });
}

/**
 * Protocol HTTP headers for an envelope
 */
export function getSoapHttpHeaders(envelope: SoapEnvelope): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': envelope.contentType };
  if (envelope.soapActionHeader !== undefined) {
    headers['SOAPAction'] = envelope.soapActionHeader;
  }
  return headers;
}

/**
 * Detect SOAP version from envelope
 */
export function detectSoapVersion(envelope: string): SoapVersion {
  if (envelope.includes('2003/05/soap-envelope')) {
    return SoapVersion.SOAP_1_2;
  }
  return SoapVersion.SOAP_1_1;
}

/**
 * Parse the first element of an envelope's Body back into a root tag and
 * body tree.
 */
export function parseEnvelopeBody(envelopeXml: string): { rootTag: string; tree: BodyTree } {
  const problem = checkWellFormed(envelopeXml);
  if (problem) {
    throw new EnvelopeError(`Envelope is not well-formed XML: ${problem}`);
  }

  const doc = parseXmlDocument(envelopeXml, true);
  const envelope = childByLocalName(doc, 'Envelope');
  const soapBody = isXmlNode(envelope) ? childByLocalName(envelope, 'Body') : undefined;
  if (!isXmlNode(soapBody)) {
    throw new EnvelopeError('Envelope has no Body element with content');
  }

  const root = Object.entries(soapBody).find(([key]) => !key.startsWith('@_'));
  if (!root) {
    throw new EnvelopeError('Envelope Body is empty');
  }

  const [rootTag, rootValue] = root;
  const value: BodyValue = toBodyValue(rootValue);
  const tree: BodyTree = value !== null && typeof value === 'object' && !Array.isArray(value) ? value : {};
  return { rootTag, tree };
}
