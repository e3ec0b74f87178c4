/**
 * Error taxonomy
 *
 * Every failure the engine reports carries a category (which component
 * failed), a machine-readable kind and a human-readable message. Messages
 * never include credentials or key material.
 */

export type ErrorCategory =
  | 'EnvelopeError'
  | 'AuthError'
  | 'TransportError'
  | 'MalformedResponse'
  | 'SoapFault'
  | 'ValidationError'
  | 'CancelledError'
  | 'PreconditionError';

export type TransportErrorKind =
  | 'ConnectionRefused'
  | 'TLSHandshakeFailed'
  | 'Timeout'
  | 'DNSResolutionFailed'
  | 'UnexpectedStatus'
  | 'RequestFailed';

export type AuthErrorKind =
  | 'MissingCredentials'
  | 'CertificateUnreadable'
  | 'HandshakeFailed'
  | 'AuthenticationFailed';

export type ValidationErrorKind =
  | 'InvalidUrl'
  | 'Unreachable'
  | 'TLSError'
  | 'WSDLFetchFailed'
  | 'WSDLParseFailed';

export type ErrorKind =
  | 'EnvelopeError'
  | AuthErrorKind
  | TransportErrorKind
  | 'MalformedResponse'
  | 'SoapFault'
  | ValidationErrorKind
  | 'Cancelled'
  | 'InvalidParameters';

/**
 * Serializable error record placed on results.
 */
export interface ErrorDetail {
  readonly category: ErrorCategory;
  readonly kind: ErrorKind;
  readonly message: string;
}

/**
 * Base class for every error the engine raises.
 */
export abstract class SoapClientError extends Error {
  abstract readonly category: ErrorCategory;
  readonly kind: ErrorKind;

  protected constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.kind = kind;
  }

  toDetail(): ErrorDetail {
    return { category: this.category, kind: this.kind, message: this.message };
  }
}

/**
 * Malformed or ambiguous body input.
 */
export class EnvelopeError extends SoapClientError {
  readonly category = 'EnvelopeError';

  constructor(message: string, cause?: unknown) {
    super('EnvelopeError', message, cause);
    this.name = 'EnvelopeError';
  }
}

export class AuthError extends SoapClientError {
  readonly category = 'AuthError';
  declare readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, cause?: unknown) {
    super(kind, message, cause);
    this.name = 'AuthError';
  }
}

export class TransportError extends SoapClientError {
  readonly category = 'TransportError';
  declare readonly kind: TransportErrorKind;
  /** HTTP status when one was received (UnexpectedStatus only) */
  readonly statusCode?: number;
  /** Attempts made before giving up */
  readonly attempts: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    options: { cause?: unknown; statusCode?: number; attempts?: number } = {}
  ) {
    super(kind, message, options.cause);
    this.name = 'TransportError';
    this.statusCode = options.statusCode;
    this.attempts = options.attempts ?? 1;
  }

  /**
   * Timeouts and refused connections may succeed on a later attempt.
   */
  isTransient(): boolean {
    return this.kind === 'Timeout' || this.kind === 'ConnectionRefused';
  }
}

/**
 * Response body that could not be parsed as XML.
 */
export class MalformedResponseError extends SoapClientError {
  readonly category = 'MalformedResponse';

  constructor(message: string, cause?: unknown) {
    super('MalformedResponse', message, cause);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Well-formed SOAP Fault returned by the remote service.
 */
export class SoapFaultError extends SoapClientError {
  readonly category = 'SoapFault';
  readonly faultCode: string;

  constructor(faultCode: string, faultString: string) {
    super('SoapFault', `SOAP Fault ${faultCode}: ${faultString}`);
    this.name = 'SoapFaultError';
    this.faultCode = faultCode;
  }
}

export class ValidationError extends SoapClientError {
  readonly category = 'ValidationError';
  declare readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string, cause?: unknown) {
    super(kind, message, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Work abandoned because a batch deadline expired or the caller aborted.
 */
export class CancelledError extends SoapClientError {
  readonly category = 'CancelledError';

  constructor(message = 'Cancelled before completion') {
    super('Cancelled', message);
    this.name = 'CancelledError';
  }
}

/**
 * Caller input that violates the parameter contract. Raised before any I/O.
 */
export class PreconditionError extends SoapClientError {
  readonly category = 'PreconditionError';
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super('InvalidParameters', message);
    this.name = 'PreconditionError';
    this.issues = issues;
  }
}

/**
 * Convert anything thrown into an ErrorDetail. Unknown errors become
 * RequestFailed transport errors.
 */
export function toErrorDetail(error: unknown): ErrorDetail {
  if (error instanceof SoapClientError) {
    return error.toDetail();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { category: 'TransportError', kind: 'RequestFailed', message };
}
