/**
 * Endpoint Validator
 *
 * Checks that an endpoint answers HTTP at all and, optionally, that its WSDL
 * can be fetched and parsed. Any HTTP response counts as reachable; the
 * status is reported but not judged.
 */

import { getEngineConfig } from '../config/EngineConfig.js';
import { SoapClientError, TransportError, ValidationError, type ErrorDetail } from '../errors.js';
import { getLogger, registerComponent, type Logger } from '../logging/index.js';
import type { AuthDescriptor } from '../transport/auth/index.js';
import { TransportClient } from '../transport/TransportClient.js';
import type { TlsPolicy } from '../transport/types.js';
import {
  getOperations,
  parseWsdlContent,
  type ParsedWsdl,
  type WsdlOperation,
  type WsdlService,
} from './WsdlParser.js';

registerComponent('soap-validator', 'Endpoint and WSDL validation');

export interface ValidationRequest {
  readonly endpointUrl: string;
  readonly timeoutMs?: number;
  readonly verifySsl?: boolean;
  readonly fetchWsdl?: boolean;
  /** Explicit WSDL location; otherwise endpoint + suffix */
  readonly wsdlUrl?: string;
  readonly wsdlSuffix?: string;
  readonly auth?: AuthDescriptor;
}

export interface ValidationResult {
  readonly available: boolean;
  readonly statusCode?: number;
  readonly elapsedMs: number;
  readonly operations?: readonly WsdlOperation[];
  readonly services?: readonly WsdlService[];
  readonly warnings: readonly string[];
  readonly error?: ErrorDetail;
}

export interface EndpointValidatorOptions {
  transport?: TransportClient;
  logger?: Logger;
}

/**
 * Append a discovery suffix such as `?wsdl` to an endpoint URL, merging
 * query strings.
 */
export function buildWsdlUrl(endpointUrl: string, suffix: string): string {
  if (suffix.startsWith('?') && endpointUrl.includes('?')) {
    return `${endpointUrl}&${suffix.slice(1)}`;
  }
  return `${endpointUrl}${suffix}`;
}

/**
 * Parse and check an endpoint URL.
 *
 * @throws ValidationError(InvalidUrl)
 */
export function parseEndpointUrl(endpointUrl: string): URL {
  let url: URL;
  try {
    url = new URL(endpointUrl);
  } catch (error) {
    throw new ValidationError('InvalidUrl', `Invalid endpoint URL: ${endpointUrl}`, error);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError('InvalidUrl', `Endpoint URL must use http or https, got ${url.protocol}`);
  }
  return url;
}

export class EndpointValidator {
  private readonly transport: TransportClient;
  private readonly logger: Logger;

  constructor(options: EndpointValidatorOptions = {}) {
    this.transport = options.transport ?? new TransportClient();
    this.logger = options.logger ?? getLogger('soap-validator');
  }

  async validate(request: ValidationRequest): Promise<ValidationResult> {
    const config = getEngineConfig();
    const startedAt = Date.now();
    const warnings: string[] = [];
    const elapsed = (): number => Date.now() - startedAt;

    let url: URL;
    try {
      url = parseEndpointUrl(request.endpointUrl);
    } catch (error) {
      return this.finish({ available: false, elapsedMs: elapsed(), warnings, error: detailOf(error) });
    }

    if (url.protocol === 'http:') {
      warnings.push('Endpoint does not use HTTPS; traffic is not encrypted');
    }

    const timeoutMs = request.timeoutMs ?? config.validateTimeoutMs;
    const tls: TlsPolicy = { verifySsl: request.verifySsl ?? true };

    let statusCode: number;
    try {
      const probe = await this.transport.get(request.endpointUrl, { timeoutMs, tls, auth: request.auth });
      statusCode = probe.statusCode;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const kind = error instanceof TransportError && error.kind === 'TLSHandshakeFailed' ? 'TLSError' : 'Unreachable';
      const failure = new ValidationError(kind, `Endpoint ${request.endpointUrl} is not reachable: ${reason}`, error);
      return this.finish({ available: false, elapsedMs: elapsed(), warnings, error: failure.toDetail() });
    }

    if (!request.fetchWsdl) {
      return this.finish({ available: true, statusCode, elapsedMs: elapsed(), warnings });
    }

    const wsdlUrl = request.wsdlUrl ?? buildWsdlUrl(request.endpointUrl, request.wsdlSuffix ?? config.wsdlSuffix);
    try {
      const wsdl = await this.fetchWsdl(wsdlUrl, timeoutMs, tls, request.auth);
      return this.finish({
        available: true,
        statusCode,
        elapsedMs: elapsed(),
        operations: getOperations(wsdl),
        services: wsdl.services,
        warnings,
      });
    } catch (error) {
      return this.finish({ available: true, statusCode, elapsedMs: elapsed(), warnings, error: detailOf(error) });
    }
  }

  private async fetchWsdl(
    wsdlUrl: string,
    timeoutMs: number,
    tls: TlsPolicy,
    auth?: AuthDescriptor
  ): Promise<ParsedWsdl> {
    let body: string;
    try {
      const response = await this.transport.get(wsdlUrl, { timeoutMs, tls, auth });
      if (response.statusCode < 200 || response.statusCode >= 300) {
        throw new ValidationError('WSDLFetchFailed', `Failed to fetch WSDL from ${wsdlUrl}: HTTP ${response.statusCode}`);
      }
      body = response.body;
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError('WSDLFetchFailed', `Failed to fetch WSDL from ${wsdlUrl}: ${reason}`, error);
    }
    return parseWsdlContent(body);
  }

  private finish(result: ValidationResult): ValidationResult {
    const meta = { available: result.available, statusCode: result.statusCode, elapsedMs: result.elapsedMs };
    if (result.error) {
      this.logger.warn(`Validation reported ${result.error.kind}`, { ...meta, errorMessage: result.error.message });
    } else {
      this.logger.info('Validation completed', meta);
    }
    return Object.freeze(result);
  }
}

function detailOf(error: unknown): ErrorDetail {
  if (error instanceof SoapClientError) {
    return error.toDetail();
  }
  return new ValidationError('WSDLParseFailed', error instanceof Error ? error.message : String(error)).toDetail();
}
