/**
 * SOAP client engine
 *
 * Public surface: the three tasks (soap_request, soap_validate, soap_batch)
 * plus the building blocks they are made of.
 */

export * from './errors.js';
export * from './tasks/index.js';

export { getEngineConfig, resetEngineConfig, DEFAULT_USER_AGENT } from './config/EngineConfig.js';
export type { EngineConfiguration } from './config/EngineConfig.js';

export {
  SoapVersion,
  SOAP_NAMESPACES,
  buildEnvelope,
  detectSoapVersion,
  getSoapContentType,
  getSoapHttpHeaders,
  parseEnvelopeBody,
} from './soap/SoapBuilder.js';
export type { EnvelopeBody, EnvelopeOptions, SoapEnvelope, SoapHeaderBlock, SoapHeaderInput } from './soap/SoapBuilder.js';
export { renderBodyTree, parseBodyTree } from './soap/BodyTree.js';
export type { BodyScalar, BodyTree, BodyValue, RenderOptions } from './soap/BodyTree.js';
export { compileExtractPath, evaluateExtractPath } from './soap/ExtractPath.js';
export type { CompiledPath } from './soap/ExtractPath.js';
export { categorizeFault, interpretResponse } from './soap/ResponseInterpreter.js';
export type { FaultCategory, ResponseResult, SoapFaultDetail } from './soap/ResponseInterpreter.js';
export { SoapClient } from './soap/SoapClient.js';
export type { PreparedRequest, RequestSpec, SoapClientOptions } from './soap/SoapClient.js';
export { BatchExecutor } from './soap/BatchExecutor.js';
export type { BatchMode, BatchResult, BatchSpec, RequestRunner } from './soap/BatchExecutor.js';
export { EndpointValidator, buildWsdlUrl } from './soap/EndpointValidator.js';
export type { ValidationRequest, ValidationResult } from './soap/EndpointValidator.js';
export { getOperations, getSoapAction, getEndpointLocation, parseWsdlContent } from './soap/WsdlParser.js';
export type { ParsedWsdl, WsdlOperation, WsdlService } from './soap/WsdlParser.js';
export type { XmlNode, XmlValue } from './soap/xml.js';

export { TransportClient, redactHeaders } from './transport/TransportClient.js';
export type { TransportClientOptions } from './transport/TransportClient.js';
export type { AuthDescriptor, AuthType } from './transport/auth/index.js';
export type { ClientCertificate, RetryPolicy, TlsPolicy, TransportRequest, TransportResponse } from './transport/types.js';

export { LogLevel, getLogger, initializeLogging, setGlobalLevel, shutdownLogging } from './logging/index.js';
