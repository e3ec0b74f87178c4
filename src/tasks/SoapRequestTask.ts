/**
 * soap_request task: one SOAP call from a snake_case parameter set.
 */

import { getEngineConfig } from '../config/EngineConfig.js';
import { SoapClientError, type ErrorKind } from '../errors.js';
import type { ResponseResult, SoapFaultDetail } from '../soap/ResponseInterpreter.js';
import { SoapClient, type PreparedRequest, type RequestSpec } from '../soap/SoapClient.js';
import { SoapVersion } from '../soap/SoapBuilder.js';
import type { XmlValue } from '../soap/xml.js';
import { NO_AUTH, type AuthDescriptor } from '../transport/auth/index.js';
import { redactHeaders } from '../transport/TransportClient.js';
import type { ClientCertificate } from '../transport/types.js';
import { SoapRequestParamsSchema, parseParams, type SoapRequestParams } from './params.js';

export interface TaskOptions {
  /** Build and report what would be sent without any network I/O */
  checkMode?: boolean;
  client?: SoapClient;
}

export interface WouldSend {
  method: 'POST';
  url: string;
  /** Credentials redacted */
  headers: Record<string, string>;
  auth_type: AuthDescriptor['type'];
  envelope: string;
}

export interface SoapRequestOutput {
  success: boolean;
  changed: boolean;
  status_code: number;
  body?: string | XmlValue;
  raw_body?: string;
  headers: Record<string, string>;
  extracted_data?: XmlValue;
  fault?: SoapFaultDetail;
  error_kind?: ErrorKind;
  error_message?: string;
  response_time_ms: number;
  attempts: number;
  check_mode?: boolean;
  would_send?: WouldSend;
}

function toAuthDescriptor(params: SoapRequestParams): AuthDescriptor {
  const username = params.username ?? '';
  const password = params.password ?? '';
  switch (params.auth_type) {
    case 'basic':
    case 'digest':
      return { type: params.auth_type, username, password };
    case 'ntlm':
      return { type: 'ntlm', username, password, domain: params.domain, workstation: params.workstation };
    case 'certificate':
      return {
        type: 'certificate',
        certPath: params.client_cert ?? '',
        keyPath: params.client_key,
        passphrase: params.client_key_passphrase,
      };
    case 'none':
      // A client certificate alone selects certificate authentication
      return params.client_cert
        ? {
            type: 'certificate',
            certPath: params.client_cert,
            keyPath: params.client_key,
            passphrase: params.client_key_passphrase,
          }
        : NO_AUTH;
  }
}

function toClientCertificate(params: SoapRequestParams): ClientCertificate | undefined {
  if (!params.client_cert || params.auth_type === 'none' || params.auth_type === 'certificate') {
    return undefined;
  }
  return { certPath: params.client_cert, keyPath: params.client_key, passphrase: params.client_key_passphrase };
}

/**
 * Map validated parameters onto a RequestSpec.
 */
export function toRequestSpec(params: SoapRequestParams): RequestSpec {
  const config = getEngineConfig();
  const soapHeaders = params.soap_header === undefined ? undefined : [params.soap_header].flat();

  return {
    endpointUrl: params.endpoint_url,
    soapAction: params.soap_action,
    soapVersion: params.soap_version === '1.1' ? SoapVersion.SOAP_1_1 : SoapVersion.SOAP_1_2,
    body: params.body,
    bodyTree: params.body_dict,
    bodyRootTag: params.body_root_tag,
    namespace: params.namespace,
    namespacePrefix: params.namespace_prefix,
    soapHeaders,
    httpHeaders: params.headers,
    auth: toAuthDescriptor(params),
    verifySsl: params.verify_ssl,
    clientCertificate: toClientCertificate(params),
    timeoutMs: params.timeout === undefined ? undefined : Math.round(params.timeout * 1000),
    retry: {
      count: params.max_retries ?? config.maxRetries,
      baseDelayMs: params.retry_delay === undefined ? config.retryBaseDelayMs : Math.round(params.retry_delay * 1000),
    },
    extractPath: params.extract_path,
    stripNamespaces: params.strip_namespaces,
    returnRaw: params.return_raw,
  };
}

/**
 * Map a ResponseResult onto task output keys.
 */
export function toRequestOutput(result: ResponseResult): SoapRequestOutput {
  const output: SoapRequestOutput = {
    success: result.success,
    changed: result.success,
    status_code: result.statusCode,
    headers: { ...result.headers },
    response_time_ms: result.elapsedMs,
    attempts: result.attempts,
  };
  if (result.body !== undefined) output.body = result.body;
  if (result.rawBody !== undefined) output.raw_body = result.rawBody;
  if (result.extractedData !== undefined) output.extracted_data = result.extractedData;
  if (result.fault) output.fault = result.fault;
  if (result.error) {
    output.error_kind = result.error.kind;
    output.error_message = result.error.message;
  }
  return output;
}

/**
 * Check-mode output: the envelope is built, nothing is sent. A request that
 * cannot be built is reported the way a real run reports it.
 */
export function describeRequest(spec: RequestSpec, client: SoapClient): SoapRequestOutput {
  let prepared: PreparedRequest;
  try {
    prepared = client.prepare(spec);
  } catch (error) {
    if (!(error instanceof SoapClientError)) {
      throw error;
    }
    return {
      success: false,
      changed: false,
      status_code: 0,
      headers: {},
      response_time_ms: 0,
      attempts: 0,
      error_kind: error.kind,
      error_message: error.message,
      check_mode: true,
    };
  }
  return {
    success: true,
    changed: false,
    status_code: 0,
    headers: {},
    response_time_ms: 0,
    attempts: 0,
    check_mode: true,
    would_send: {
      method: 'POST',
      url: prepared.transportRequest.url,
      headers: redactHeaders(prepared.transportRequest.headers),
      auth_type: prepared.transportRequest.auth.type,
      envelope: prepared.envelope.xml,
    },
  };
}

/**
 * Run the soap_request task.
 *
 * @throws PreconditionError for an invalid parameter set
 */
export async function runSoapRequest(params: unknown, options: TaskOptions = {}): Promise<SoapRequestOutput> {
  const validated = parseParams(SoapRequestParamsSchema, params, 'soap_request');
  const spec = toRequestSpec(validated);
  const client = options.client ?? new SoapClient();

  if (options.checkMode) {
    return describeRequest(spec, client);
  }

  return toRequestOutput(await client.send(spec));
}
