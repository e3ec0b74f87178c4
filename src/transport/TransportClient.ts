/**
 * Transport Client
 *
 * Purpose: Send one HTTP request per SOAP call (or probe) through axios.
 *
 * Key behaviors:
 * - Each attempt gets its own keep-alive agent limited to one socket, so
 *   multi-step authentication handshakes stay on one connection
 * - The timeout covers the whole attempt, handshake round trips included
 * - Timeouts and refused connections are retried with exponential backoff
 * - Non-2xx statuses are returned, not thrown; interpretation happens later
 * - Redirects are followed manually, keeping the method and body (303
 *   switches to GET); credentials are dropped when the origin changes and
 *   never follow a redirect from HTTPS to HTTP
 */

import axios, { type AxiosInstance } from 'axios';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { setTimeout as sleep } from 'timers/promises';
import { getEngineConfig } from '../config/EngineConfig.js';
import {
  AuthError,
  CancelledError,
  SoapClientError,
  TransportError,
  type TransportErrorKind,
} from '../errors.js';
import { getLogger, registerComponent, type Logger } from '../logging/index.js';
import {
  applyAuth,
  assertCredentials,
  describeAuth,
  isHandshakeScheme,
  loadCertificateMaterial,
  resolveClientCertificate,
  type AuthDescriptor,
  type CertificateMaterial,
} from './auth/index.js';
import { NO_AUTH } from './auth/types.js';
import type {
  Exchange,
  HttpRequest,
  HttpResponse,
  TlsPolicy,
  TransportRequest,
  TransportResponse,
} from './types.js';

registerComponent('soap-transport', 'HTTP transport, retries and redirects');
registerComponent('soap-auth', 'Authentication handshakes');

const MAX_REDIRECTS = 5;
const CREDENTIAL_HEADERS = new Set(['authorization', 'proxy-authorization']);

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME', 'EAI_FAIL']);
// ECONNRESET and EPIPE stay RequestFailed: the request may already have been delivered
const REFUSED_CODES = new Set(['ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT']);
const TLS_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'EPROTO',
]);

export interface TransportClientOptions {
  /** axios instance to send through, e.g. one with an in-process adapter */
  http?: AxiosInstance;
  /** Sent when the caller sets no User-Agent */
  userAgent?: string;
  logger?: Logger;
}

export interface GetOptions {
  timeoutMs: number;
  tls: TlsPolicy;
  auth?: AuthDescriptor;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

interface AgentPair {
  http: HttpAgent;
  https: HttpsAgent;
}

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object') {
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }
    if ('cause' in error && error.cause !== error) {
      return errorCode(error.cause);
    }
  }
  return undefined;
}

/**
 * Map a network failure to a transport error kind by its error code.
 */
export function classifyNetworkError(error: unknown): TransportErrorKind {
  const code = errorCode(error);
  if (!code) return 'RequestFailed';
  if (DNS_CODES.has(code)) return 'DNSResolutionFailed';
  if (REFUSED_CODES.has(code)) return 'ConnectionRefused';
  if (TIMEOUT_CODES.has(code)) return 'Timeout';
  if (TLS_CODES.has(code) || code.startsWith('ERR_SSL') || code.startsWith('ERR_TLS') || code.startsWith('CERT_')) {
    return 'TLSHandshakeFailed';
  }
  return 'RequestFailed';
}

/**
 * Merge caller headers with protocol headers. Protocol headers win,
 * compared case-insensitively; the caller's spelling of other names is kept.
 */
export function mergeHeaders(
  callerHeaders: Readonly<Record<string, string>>,
  protocolHeaders: Readonly<Record<string, string>>
): Record<string, string> {
  const reserved = new Set(Object.keys(protocolHeaders).map((name) => name.toLowerCase()));
  const merged: Record<string, string> = {};
  for (const [name, value] of Object.entries(callerHeaders)) {
    if (!reserved.has(name.toLowerCase())) {
      merged[name] = value;
    }
  }
  return { ...merged, ...protocolHeaders };
}

/**
 * Copy of the headers with credentials masked, for logs and check mode
 */
export function redactHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    result[name] = lower === 'authorization' || lower === 'proxy-authorization' ? '***' : value;
  }
  return result;
}

function normalizeHeaders(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    result[name.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
  }
  return result;
}

function toText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data === undefined || data === null) return '';
  return String(data);
}

function isRedirect(statusCode: number): boolean {
  return statusCode === 301 || statusCode === 302 || statusCode === 303 || statusCode === 307 || statusCode === 308;
}

function hasCredentialHeader(headers: Readonly<Record<string, string>>): boolean {
  return Object.keys(headers).some((name) => CREDENTIAL_HEADERS.has(name.toLowerCase()));
}

function withoutCredentials(headers: Readonly<Record<string, string>>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).filter(([name]) => !CREDENTIAL_HEADERS.has(name.toLowerCase()))
  );
}

export class TransportClient {
  private readonly http: AxiosInstance;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly authLogger: Logger;

  constructor(options: TransportClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.userAgent = options.userAgent ?? getEngineConfig().userAgent;
    this.logger = options.logger ?? getLogger('soap-transport');
    this.authLogger = getLogger('soap-auth');
  }

  /**
   * Send a request, retrying transient failures.
   *
   * @throws TransportError, AuthError or CancelledError
   */
  async send(request: TransportRequest): Promise<TransportResponse> {
    assertCredentials(request.auth);
    const certificate = resolveClientCertificate(request.auth, request.tls);
    const material = certificate ? await loadCertificateMaterial(certificate) : undefined;

    if (!request.tls.verifySsl && request.url.toLowerCase().startsWith('https:')) {
      this.logger.warn('TLS certificate verification is disabled', { url: request.url });
    }

    const headers = this.withUserAgent(request.headers);
    const retries = request.retry?.count ?? 0;
    const baseDelayMs = request.retry?.baseDelayMs ?? 0;
    const startedAt = Date.now();

    for (let attempt = 0; ; attempt++) {
      if (request.signal?.aborted) {
        throw new CancelledError();
      }

      this.logger.debug('Sending request', {
        method: request.method,
        url: request.url,
        attempt: attempt + 1,
        auth: describeAuth(request.auth),
      });

      try {
        const response = await this.attempt({ ...request, headers }, material);
        const elapsedMs = Date.now() - startedAt;
        this.logger.debug('Response received', {
          url: request.url,
          statusCode: response.statusCode,
          elapsedMs,
        });
        return { ...response, elapsedMs, attempts: attempt + 1 };
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        if (!error.isTransient() || attempt >= retries) {
          throw new TransportError(error.kind, error.message, {
            cause: error.cause,
            statusCode: error.statusCode,
            attempts: attempt + 1,
          });
        }
        const delayMs = baseDelayMs * 2 ** attempt;
        this.logger.warn('Transient transport failure, retrying', {
          url: request.url,
          kind: error.kind,
          attempt: attempt + 1,
          delayMs,
        });
        try {
          await sleep(delayMs, undefined, { signal: request.signal });
        } catch {
          throw new CancelledError('Cancelled while waiting to retry');
        }
      }
    }
  }

  /**
   * GET a URL, e.g. a reachability probe or a WSDL document. No retries.
   */
  get(url: string, options: GetOptions): Promise<TransportResponse> {
    return this.send({
      method: 'GET',
      url,
      headers: options.headers ?? {},
      auth: options.auth ?? NO_AUTH,
      tls: options.tls,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
  }

  private withUserAgent(headers: Readonly<Record<string, string>>): Record<string, string> {
    const hasUserAgent = Object.keys(headers).some((name) => name.toLowerCase() === 'user-agent');
    return hasUserAgent ? { ...headers } : { ...headers, 'User-Agent': this.userAgent };
  }

  private createAgents(tls: TlsPolicy, material: CertificateMaterial | undefined): AgentPair {
    const options = { keepAlive: true, maxSockets: 1 };
    return {
      http: new HttpAgent(options),
      https: new HttpsAgent({
        ...options,
        rejectUnauthorized: tls.verifySsl,
        cert: material?.cert,
        key: material?.key,
        passphrase: material?.passphrase,
      }),
    };
  }

  /**
   * One attempt: every authentication round trip shares the agents and the
   * timeout.
   */
  private async attempt(request: TransportRequest, material: CertificateMaterial | undefined): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    let exchanges = 0;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const agents = this.createAgents(request.tls, material);
    const credentialed = request.auth.type !== 'none' || hasCredentialHeader(request.headers);
    const exchange: Exchange = (req) => {
      exchanges++;
      return this.exchange(req, agents, controller.signal, credentialed);
    };

    const httpRequest: HttpRequest = {
      method: request.method,
      url: request.url,
      headers: request.headers,
      body: request.body,
    };

    if (request.auth.type !== 'none') {
      this.authLogger.debug('Applying authentication', { url: request.url, auth: describeAuth(request.auth) });
    }

    try {
      return await applyAuth(request.auth, httpRequest, exchange);
    } catch (error) {
      if (timedOut) {
        if (isHandshakeScheme(request.auth) && exchanges > 1) {
          this.authLogger.warn('Handshake timed out', { url: request.url, exchanges });
          throw new AuthError(
            'HandshakeFailed',
            `Authentication handshake did not complete within ${request.timeoutMs}ms`,
            error
          );
        }
        throw new TransportError('Timeout', `Request timed out after ${request.timeoutMs}ms`, { cause: error });
      }
      if (request.signal?.aborted) {
        throw new CancelledError();
      }
      if (error instanceof SoapClientError) {
        throw error;
      }
      const kind = classifyNetworkError(error);
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(kind, `${kind}: ${message}`, { cause: error });
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
      agents.http.destroy();
      agents.https.destroy();
    }
  }

  /**
   * One logical round trip, following redirects. A redirect to another
   * origin loses the credential headers.
   */
  private async exchange(
    request: HttpRequest,
    agents: AgentPair,
    signal: AbortSignal,
    credentialed: boolean
  ): Promise<HttpResponse> {
    let current = request;
    for (let redirects = 0; ; redirects++) {
      const response = await this.roundTrip(current, agents, signal);
      const location = response.headers['location'];
      if (!isRedirect(response.statusCode) || !location || redirects >= MAX_REDIRECTS) {
        return response;
      }

      const from = new URL(current.url);
      const to = new URL(location, from);
      if (credentialed && from.protocol === 'https:' && to.protocol === 'http:') {
        throw new TransportError(
          'RequestFailed',
          `Refusing to follow redirect from ${from.origin} to ${to.origin} with credentials over plain HTTP`,
          { statusCode: response.statusCode }
        );
      }

      const url = to.toString();
      const headers = to.origin === from.origin ? current.headers : withoutCredentials(current.headers);
      this.logger.debug('Following redirect', { statusCode: response.statusCode, location: url });
      current =
        response.statusCode === 303 ? { method: 'GET', url, headers } : { ...current, url, headers };
    }
  }

  private async roundTrip(request: HttpRequest, agents: AgentPair, signal: AbortSignal): Promise<HttpResponse> {
    const response = await this.http.request({
      url: request.url,
      method: request.method,
      headers: { ...request.headers },
      data: request.body,
      httpAgent: agents.http,
      httpsAgent: agents.https,
      signal,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      maxRedirects: 0,
    });

    return {
      statusCode: response.status,
      headers: normalizeHeaders(response.headers),
      body: toText(response.data),
    };
  }
}
