/**
 * soap_validate task: reachability probe plus optional WSDL discovery.
 * Never changes anything, so `changed` is always false.
 */

import { getEngineConfig } from '../config/EngineConfig.js';
import type { ErrorKind } from '../errors.js';
import { EndpointValidator, buildWsdlUrl, parseEndpointUrl } from '../soap/EndpointValidator.js';
import type { WsdlOperation, WsdlService } from '../soap/WsdlParser.js';
import { SoapValidateParamsSchema, parseParams } from './params.js';

export interface ValidateTaskOptions {
  checkMode?: boolean;
  validator?: EndpointValidator;
}

export interface SoapValidateOutput {
  /** Absent in check mode */
  available?: boolean;
  changed: false;
  status_code?: number;
  response_time_ms: number;
  operations?: WsdlOperation[];
  services?: WsdlService[];
  warnings: string[];
  error_kind?: ErrorKind;
  error_message?: string;
  check_mode?: boolean;
  would_send?: { method: 'GET'; url: string; wsdl_url?: string };
}

/**
 * Run the soap_validate task.
 *
 * @throws PreconditionError for an invalid parameter set
 */
export async function runSoapValidate(params: unknown, options: ValidateTaskOptions = {}): Promise<SoapValidateOutput> {
  const validated = parseParams(SoapValidateParamsSchema, params, 'soap_validate');

  if (options.checkMode) {
    // Only the URL is checked; nothing is sent
    parseEndpointUrl(validated.endpoint_url);
    const wouldSend: NonNullable<SoapValidateOutput['would_send']> = { method: 'GET', url: validated.endpoint_url };
    if (validated.fetch_wsdl) {
      wouldSend.wsdl_url =
        validated.wsdl_url ??
        buildWsdlUrl(validated.endpoint_url, validated.wsdl_suffix ?? getEngineConfig().wsdlSuffix);
    }
    return { changed: false, response_time_ms: 0, warnings: [], check_mode: true, would_send: wouldSend };
  }

  const validator = options.validator ?? new EndpointValidator();
  const result = await validator.validate({
    endpointUrl: validated.endpoint_url,
    timeoutMs: validated.timeout === undefined ? undefined : Math.round(validated.timeout * 1000),
    verifySsl: validated.verify_ssl,
    fetchWsdl: validated.fetch_wsdl,
    wsdlUrl: validated.wsdl_url,
    wsdlSuffix: validated.wsdl_suffix,
  });

  const output: SoapValidateOutput = {
    available: result.available,
    changed: false,
    response_time_ms: result.elapsedMs,
    warnings: [...result.warnings],
  };
  if (result.statusCode !== undefined) output.status_code = result.statusCode;
  if (result.operations) output.operations = [...result.operations];
  if (result.services) output.services = [...result.services];
  if (result.error) {
    output.error_kind = result.error.kind;
    output.error_message = result.error.message;
  }
  return output;
}
