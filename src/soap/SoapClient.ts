/**
 * SOAP Client
 *
 * Purpose: Run one SOAP call end to end.
 *
 *   envelope builder -> authentication -> transport -> response interpreter
 *
 * Every failure, whichever stage raised it, becomes the call's
 * ResponseResult. Nothing is shared between calls except the transport's
 * axios instance.
 */

import { getEngineConfig } from '../config/EngineConfig.js';
import { getLogger, registerComponent, type Logger } from '../logging/index.js';
import { NO_AUTH, describeAuth, type AuthDescriptor } from '../transport/auth/index.js';
import { TransportClient, mergeHeaders } from '../transport/TransportClient.js';
import type { ClientCertificate, RetryPolicy, TransportRequest } from '../transport/types.js';
import type { BodyTree } from './BodyTree.js';
import { compileExtractPath, type CompiledPath } from './ExtractPath.js';
import { failureResult, interpretResponse, type ResponseResult } from './ResponseInterpreter.js';
import {
  buildEnvelope,
  getSoapHttpHeaders,
  SoapVersion,
  type SoapEnvelope,
  type SoapHeaderInput,
} from './SoapBuilder.js';

registerComponent('soap-client', 'SOAP call pipeline');

/**
 * Description of one SOAP call. Exactly one of `body` and `bodyTree` is
 * given.
 */
export interface RequestSpec {
  readonly endpointUrl: string;
  readonly soapAction: string;
  readonly soapVersion?: SoapVersion;
  readonly body?: string;
  readonly bodyTree?: BodyTree;
  readonly bodyRootTag?: string;
  readonly namespace?: string;
  readonly namespacePrefix?: string;
  readonly soapHeaders?: readonly SoapHeaderInput[];
  /** Extra HTTP headers; Content-Type and SOAPAction cannot be overridden */
  readonly httpHeaders?: Readonly<Record<string, string>>;
  readonly auth?: AuthDescriptor;
  readonly verifySsl?: boolean;
  /** Presented during the TLS handshake regardless of the auth scheme */
  readonly clientCertificate?: ClientCertificate;
  readonly timeoutMs?: number;
  readonly retry?: RetryPolicy;
  readonly extractPath?: string;
  readonly stripNamespaces?: boolean;
  readonly returnRaw?: boolean;
}

/**
 * Everything needed to send a call, built without any I/O.
 */
export interface PreparedRequest {
  readonly envelope: SoapEnvelope;
  readonly transportRequest: TransportRequest;
  readonly extractPath?: CompiledPath;
}

export interface SoapClientOptions {
  transport?: TransportClient;
  logger?: Logger;
}

export class SoapClient {
  private readonly transport: TransportClient;
  private readonly logger: Logger;

  constructor(options: SoapClientOptions = {}) {
    this.transport = options.transport ?? new TransportClient();
    this.logger = options.logger ?? getLogger('soap-client');
  }

  /**
   * Build the envelope and transport request.
   *
   * @throws EnvelopeError or PreconditionError (invalid extraction path)
   */
  prepare(spec: RequestSpec, signal?: AbortSignal): PreparedRequest {
    const config = getEngineConfig();
    const envelope = buildEnvelope(
      spec.soapVersion ?? SoapVersion.SOAP_1_2,
      {
        body: spec.body,
        bodyTree: spec.bodyTree,
        bodyRootTag: spec.bodyRootTag,
        namespace: spec.namespace,
        namespacePrefix: spec.namespacePrefix,
      },
      { soapAction: spec.soapAction, headers: spec.soapHeaders }
    );

    const transportRequest: TransportRequest = {
      method: 'POST',
      url: spec.endpointUrl,
      headers: mergeHeaders(spec.httpHeaders ?? {}, getSoapHttpHeaders(envelope)),
      body: envelope.xml,
      auth: spec.auth ?? NO_AUTH,
      tls: { verifySsl: spec.verifySsl ?? true, clientCertificate: spec.clientCertificate },
      timeoutMs: spec.timeoutMs ?? config.defaultTimeoutMs,
      retry: spec.retry ?? { count: config.maxRetries, baseDelayMs: config.retryBaseDelayMs },
      signal,
    };

    return {
      envelope,
      transportRequest,
      extractPath: spec.extractPath === undefined ? undefined : compileExtractPath(spec.extractPath),
    };
  }

  /**
   * Execute one call. Never throws; failures are reported on the result.
   */
  async send(spec: RequestSpec, signal?: AbortSignal): Promise<ResponseResult> {
    const startedAt = Date.now();

    let prepared: PreparedRequest;
    try {
      prepared = this.prepare(spec, signal);
    } catch (error) {
      this.logger.warn('Request rejected before sending', {
        endpoint: spec.endpointUrl,
        reason: error instanceof Error ? error.message : String(error),
      });
      return failureResult(error, { elapsedMs: Date.now() - startedAt });
    }

    if (this.logger.isTraceEnabled()) {
      this.logger.trace('Envelope', { endpoint: spec.endpointUrl, envelope: prepared.envelope.xml });
    }

    let result: ResponseResult;
    try {
      const response = await this.transport.send(prepared.transportRequest);
      result = interpretResponse(response, {
        extractPath: prepared.extractPath,
        returnRaw: spec.returnRaw,
        stripNamespaces: spec.stripNamespaces,
      });
    } catch (error) {
      result = failureResult(error, { elapsedMs: Date.now() - startedAt });
    }

    const meta = {
      endpoint: spec.endpointUrl,
      action: spec.soapAction,
      auth: describeAuth(prepared.transportRequest.auth),
      statusCode: result.statusCode,
      elapsedMs: result.elapsedMs,
      attempts: result.attempts,
    };
    if (result.success) {
      this.logger.info('SOAP call succeeded', meta);
    } else {
      this.logger.warn('SOAP call failed', {
        ...meta,
        errorKind: result.error?.kind,
        errorMessage: result.error?.message,
      });
    }
    return result;
  }
}
