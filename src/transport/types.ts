/**
 * Transport value types
 */

import type { AuthDescriptor } from './auth/types.js';

export type HttpMethod = 'GET' | 'POST';

/**
 * One HTTP round trip as seen by authentication handlers
 */
export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface HttpResponse {
  readonly statusCode: number;
  /** Lower-cased header names */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/**
 * Performs exactly one HTTP round trip on the attempt's connection.
 */
export type Exchange = (request: HttpRequest) => Promise<HttpResponse>;

export interface RetryPolicy {
  /** Additional attempts after the first, for transient failures only */
  readonly count: number;
  /** Delay before retry n (0-based) is baseDelayMs * 2^n */
  readonly baseDelayMs: number;
}

export interface ClientCertificate {
  readonly certPath: string;
  readonly keyPath?: string;
  readonly passphrase?: string;
}

export interface TlsPolicy {
  readonly verifySsl: boolean;
  readonly clientCertificate?: ClientCertificate;
}

export interface TransportRequest extends HttpRequest {
  readonly auth: AuthDescriptor;
  readonly tls: TlsPolicy;
  readonly timeoutMs: number;
  readonly retry?: RetryPolicy;
  /** Aborts the request cooperatively, e.g. on a batch deadline */
  readonly signal?: AbortSignal;
}

export interface TransportResponse extends HttpResponse {
  readonly elapsedMs: number;
  readonly attempts: number;
}
