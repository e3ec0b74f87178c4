/**
 * Response Interpreter
 *
 * Turns an HTTP response into a ResponseResult: XML well-formedness, SOAP
 * Fault detection for both versions, status handling, structured rendering
 * and path extraction.
 */

import {
  AuthError,
  MalformedResponseError,
  SoapFaultError,
  TransportError,
  toErrorDetail,
  type ErrorDetail,
} from '../errors.js';
import type { TransportResponse } from '../transport/types.js';
import { evaluateExtractPath, type CompiledPath } from './ExtractPath.js';
import {
  checkWellFormed,
  childByLocalName,
  isXmlNode,
  localName,
  parseXmlDocument,
  textOf,
  type XmlNode,
  type XmlValue,
} from './xml.js';

export type FaultCategory = 'CLIENT_ERROR' | 'SERVER_ERROR' | 'VERSION_MISMATCH' | 'MUST_UNDERSTAND' | 'UNKNOWN';

export interface SoapFaultDetail {
  /** Fault code without namespace prefix, e.g. `Client` or `Sender` */
  readonly code: string;
  /** SOAP 1.2 subcode without namespace prefix */
  readonly subcode?: string;
  readonly reason: string;
  /** faultactor (1.1) or Role (1.2) */
  readonly actor?: string;
  readonly detail?: XmlValue;
  readonly category: FaultCategory;
  /** Server-side faults may succeed when repeated */
  readonly retriable: boolean;
}

export interface ResponseResult {
  readonly success: boolean;
  /** 0 when no HTTP response was received */
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string>>;
  /** Raw text when requested, otherwise the structured SOAP Body content */
  readonly body?: string | XmlValue;
  /** Original response text, kept when it could not be parsed */
  readonly rawBody?: string;
  readonly extractedData?: XmlValue;
  readonly fault?: SoapFaultDetail;
  readonly error?: ErrorDetail;
  readonly elapsedMs: number;
  readonly attempts: number;
}

export interface InterpretOptions {
  extractPath?: string | CompiledPath;
  returnRaw?: boolean;
  stripNamespaces?: boolean;
}

const FAULT_CATEGORIES: Record<string, FaultCategory> = {
  client: 'CLIENT_ERROR',
  sender: 'CLIENT_ERROR',
  server: 'SERVER_ERROR',
  receiver: 'SERVER_ERROR',
  versionmismatch: 'VERSION_MISMATCH',
  mustunderstand: 'MUST_UNDERSTAND',
};

/**
 * Categorise a fault code. Dotted subcodes (`Client.Authentication`) use
 * their first part.
 */
export function categorizeFault(code: string): FaultCategory {
  const head = (code.split('.')[0] ?? '').toLowerCase();
  return FAULT_CATEGORIES[head] ?? 'UNKNOWN';
}

function stripPrefix(value: string | undefined): string | undefined {
  return value === undefined ? undefined : localName(value.trim());
}

/**
 * Read a Fault element of either SOAP version from a namespace-stripped tree
 */
export function parseFault(fault: XmlNode): SoapFaultDetail {
  const codeElement = childByLocalName(fault, 'Code');
  let code: string;
  let subcode: string | undefined;
  let reason: string;
  let actor: string | undefined;
  let detail: XmlValue | undefined;

  if (isXmlNode(codeElement)) {
    // SOAP 1.2
    code = stripPrefix(textOf(childByLocalName(codeElement, 'Value'))) ?? '';
    const sub = childByLocalName(codeElement, 'Subcode');
    subcode = isXmlNode(sub) ? stripPrefix(textOf(childByLocalName(sub, 'Value'))) : undefined;
    const reasonElement = childByLocalName(fault, 'Reason');
    reason = (isXmlNode(reasonElement) ? textOf(childByLocalName(reasonElement, 'Text')) : undefined) ?? '';
    actor = textOf(childByLocalName(fault, 'Role'));
    detail = childByLocalName(fault, 'Detail');
  } else {
    code = stripPrefix(textOf(childByLocalName(fault, 'faultcode'))) ?? '';
    reason = textOf(childByLocalName(fault, 'faultstring')) ?? '';
    actor = textOf(childByLocalName(fault, 'faultactor'));
    detail = childByLocalName(fault, 'detail');
  }

  const category = categorizeFault(code);
  return {
    code,
    subcode,
    reason,
    actor,
    detail,
    category,
    retriable: category === 'SERVER_ERROR',
  };
}

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function statusError(statusCode: number): ErrorDetail {
  if (statusCode === 401 || statusCode === 403) {
    return new AuthError('AuthenticationFailed', `Authentication failed with HTTP ${statusCode}`).toDetail();
  }
  return new TransportError('UnexpectedStatus', `Unexpected HTTP status ${statusCode}`, { statusCode }).toDetail();
}

function freezeResult(result: ResponseResult): ResponseResult {
  Object.freeze(result.headers);
  return Object.freeze(result);
}

/**
 * Result for a request that failed before a usable response existed.
 */
export function failureResult(
  error: unknown,
  timing: { elapsedMs?: number; attempts?: number } = {}
): ResponseResult {
  return freezeResult({
    success: false,
    statusCode: error instanceof TransportError && error.statusCode !== undefined ? error.statusCode : 0,
    headers: {},
    error: toErrorDetail(error),
    elapsedMs: timing.elapsedMs ?? 0,
    attempts: timing.attempts ?? (error instanceof TransportError ? error.attempts : 0),
  });
}

/**
 * Interpret an HTTP response.
 */
export function interpretResponse(response: TransportResponse, options: InterpretOptions = {}): ResponseResult {
  const base = {
    statusCode: response.statusCode,
    headers: { ...response.headers },
    elapsedMs: response.elapsedMs,
    attempts: response.attempts,
  };
  const raw = response.body;

  if (raw.trim() === '') {
    // One-way operations answer 202/204 without a body
    if (isSuccessStatus(response.statusCode)) {
      return freezeResult({ ...base, success: true, body: options.returnRaw ? raw : '' });
    }
    return freezeResult({ ...base, success: false, body: raw, error: statusError(response.statusCode) });
  }

  const problem = checkWellFormed(raw);
  if (problem) {
    const error =
      response.statusCode === 401 || response.statusCode === 403
        ? statusError(response.statusCode)
        : new MalformedResponseError(`Response is not well-formed XML: ${problem}`).toDetail();
    return freezeResult({ ...base, success: false, rawBody: raw, error });
  }

  const stripped = parseXmlDocument(raw, true);
  const envelope = childByLocalName(stripped, 'Envelope');
  const soapBody = isXmlNode(envelope) ? childByLocalName(envelope, 'Body') : undefined;
  const content: XmlValue = soapBody ?? stripped;
  const body = options.returnRaw ? raw : content;

  const faultElement = isXmlNode(soapBody) ? childByLocalName(soapBody, 'Fault') : undefined;
  if (isXmlNode(faultElement)) {
    const fault = parseFault(faultElement);
    return freezeResult({
      ...base,
      success: false,
      body,
      fault,
      error: new SoapFaultError(fault.code, fault.reason).toDetail(),
    });
  }

  if (!isSuccessStatus(response.statusCode)) {
    return freezeResult({ ...base, success: false, body, error: statusError(response.statusCode) });
  }

  let extractedData: XmlValue | undefined;
  if (options.extractPath !== undefined) {
    const stripNamespaces = options.stripNamespaces ?? false;
    const document = stripNamespaces ? stripped : parseXmlDocument(raw, false);
    extractedData = evaluateExtractPath(document, options.extractPath, { stripNamespaces });
  }

  return freezeResult({
    ...base,
    success: true,
    body,
    ...(extractedData === undefined ? {} : { extractedData }),
  });
}
