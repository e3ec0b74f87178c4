/**
 * WSDL Parser
 *
 * Purpose: Parse WSDL 1.1 documents to extract service, port, and operation
 * information
 *
 * Key behaviors:
 * - Element prefixes vary between documents (`wsdl:`, `soap:`, `soap12:` or
 *   none), so elements are matched on local name
 * - Operations come from portTypes, merged with the soapAction of the first
 *   binding operation of the same name
 * - Imports are not followed
 */

import { ValidationError } from '../errors.js';
import {
  ATTRIBUTE_PREFIX,
  checkWellFormed,
  childByLocalName,
  isXmlNode,
  localName,
  parseXmlDocument,
  textOf,
  type XmlNode,
  type XmlValue,
} from './xml.js';

/**
 * WSDL Operation information
 */
export interface WsdlOperation {
  /** Operation name */
  name: string;
  /** SOAP action */
  soapAction?: string;
  /** Input message name */
  input?: string;
  /** Output message name */
  output?: string;
  /** Documentation */
  documentation?: string;
}

/**
 * WSDL Port/Endpoint information
 */
export interface WsdlPort {
  /** Port name */
  name: string;
  /** Binding name */
  binding: string;
  /** Endpoint location URL */
  location: string;
}

/**
 * WSDL Binding information
 */
export interface WsdlBinding {
  /** Binding name */
  name: string;
  /** Port type name */
  portType: string;
  /** SOAP style (document/rpc) */
  style?: string;
  /** Transport (http) */
  transport?: string;
  /** SOAP version implied by the binding extension namespace */
  soapVersion?: '1.1' | '1.2';
  /** Operations */
  operations: WsdlOperation[];
}

export interface WsdlPortType {
  name: string;
  operations: WsdlOperation[];
}

/**
 * WSDL Service information
 */
export interface WsdlService {
  /** Service name */
  name: string;
  /** Ports in this service */
  ports: WsdlPort[];
}

/**
 * Parsed WSDL document
 */
export interface ParsedWsdl {
  /** Target namespace */
  targetNamespace: string;
  /** Services defined in WSDL */
  services: WsdlService[];
  /** Bindings defined in WSDL */
  bindings: WsdlBinding[];
  /** Port types defined in WSDL */
  portTypes: WsdlPortType[];
}

const SOAP_12_BINDING_NS = 'http://schemas.xmlsoap.org/wsdl/soap12/';

function children(node: XmlNode, name: string): XmlValue[] {
  const found: XmlValue[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) || localName(key) !== name) continue;
    if (Array.isArray(value)) {
      found.push(...value);
    } else {
      found.push(value);
    }
  }
  return found;
}

function childNodes(node: XmlNode, name: string): XmlNode[] {
  return children(node, name).filter(isXmlNode);
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[ATTRIBUTE_PREFIX + name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Find the namespace URI bound to a prefix anywhere on the given nodes
 */
function namespaceFor(prefix: string, ...scopes: XmlNode[]): string | undefined {
  for (const scope of scopes) {
    const uri = attr(scope, `xmlns:${prefix}`);
    if (uri) return uri;
  }
  return undefined;
}

/**
 * Parse WSDL content
 *
 * @throws ValidationError with kind WSDLParseFailed
 */
export function parseWsdlContent(wsdlContent: string): ParsedWsdl {
  const problem = checkWellFormed(wsdlContent);
  if (problem) {
    throw new ValidationError('WSDLParseFailed', `WSDL is not well-formed XML: ${problem}`);
  }

  const parsed = parseXmlDocument(wsdlContent, false);

  // Find definitions element (could have various prefixes)
  const definitions = childByLocalName(parsed, 'definitions');
  if (!isXmlNode(definitions)) {
    throw new ValidationError('WSDLParseFailed', 'Invalid WSDL: definitions element not found');
  }

  return {
    targetNamespace: attr(definitions, 'targetNamespace') ?? '',
    services: parseServices(definitions),
    bindings: parseBindings(definitions),
    portTypes: parsePortTypes(definitions),
  };
}

function parseMessageRef(operation: XmlNode, direction: 'input' | 'output'): string | undefined {
  const ref = childNodes(operation, direction)[0];
  const message = ref ? attr(ref, 'message') : undefined;
  return message ? localName(message) : undefined;
}

function parsePortTypes(definitions: XmlNode): WsdlPortType[] {
  const portTypes: WsdlPortType[] = [];

  for (const portType of childNodes(definitions, 'portType')) {
    const name = attr(portType, 'name');
    if (!name) continue;

    const operations: WsdlOperation[] = [];
    for (const op of childNodes(portType, 'operation')) {
      const opName = attr(op, 'name');
      if (!opName) continue;
      const documentation = textOf(childByLocalName(op, 'documentation'));
      operations.push({
        name: opName,
        input: parseMessageRef(op, 'input'),
        output: parseMessageRef(op, 'output'),
        documentation: documentation || undefined,
      });
    }

    portTypes.push({ name, operations });
  }

  return portTypes;
}

/**
 * Parse bindings from WSDL definitions
 */
function parseBindings(definitions: XmlNode): WsdlBinding[] {
  const bindings: WsdlBinding[] = [];

  for (const binding of childNodes(definitions, 'binding')) {
    const name = attr(binding, 'name');
    if (!name) continue;

    const type = attr(binding, 'type');

    // The SOAP binding extension is a nested element also named "binding"
    let style: string | undefined;
    let transport: string | undefined;
    let soapVersion: WsdlBinding['soapVersion'];
    for (const [key, value] of Object.entries(binding)) {
      if (key.startsWith(ATTRIBUTE_PREFIX) || localName(key) !== 'binding' || !isXmlNode(value)) continue;
      style = attr(value, 'style');
      transport = attr(value, 'transport');
      const prefix = key.includes(':') ? key.slice(0, key.indexOf(':')) : undefined;
      const ns = prefix ? namespaceFor(prefix, value, binding, definitions) : undefined;
      soapVersion = ns === SOAP_12_BINDING_NS ? '1.2' : '1.1';
    }

    bindings.push({
      name,
      portType: type ? localName(type) : '',
      style,
      transport,
      soapVersion,
      operations: parseBindingOperations(binding),
    });
  }

  return bindings;
}

/**
 * Parse operations from binding element
 */
function parseBindingOperations(binding: XmlNode): WsdlOperation[] {
  const operations: WsdlOperation[] = [];

  for (const op of childNodes(binding, 'operation')) {
    const name = attr(op, 'name');
    if (!name) continue;

    // soap:operation / soap12:operation carries the action
    const soapOp = childNodes(op, 'operation')[0];
    operations.push({
      name,
      soapAction: soapOp ? attr(soapOp, 'soapAction') : undefined,
    });
  }

  return operations;
}

/**
 * Parse services from WSDL definitions
 */
function parseServices(definitions: XmlNode): WsdlService[] {
  const services: WsdlService[] = [];

  for (const service of childNodes(definitions, 'service')) {
    const name = attr(service, 'name');
    if (!name) continue;

    const ports: WsdlPort[] = [];
    for (const port of childNodes(service, 'port')) {
      const portName = attr(port, 'name');
      if (!portName) continue;

      const address = childNodes(port, 'address')[0];
      const binding = attr(port, 'binding');
      ports.push({
        name: portName,
        binding: binding ? localName(binding) : '',
        location: (address && attr(address, 'location')) || '',
      });
    }

    services.push({ name, ports });
  }

  return services;
}

/**
 * List operations: portType operations merged with the soapAction of the
 * first binding that declares them. Names are unique, in document order.
 */
export function getOperations(wsdl: ParsedWsdl): WsdlOperation[] {
  const actions = new Map<string, string>();
  for (const binding of wsdl.bindings) {
    for (const op of binding.operations) {
      if (op.soapAction !== undefined && !actions.has(op.name)) {
        actions.set(op.name, op.soapAction);
      }
    }
  }

  const operations = new Map<string, WsdlOperation>();
  for (const portType of wsdl.portTypes) {
    for (const op of portType.operations) {
      if (operations.has(op.name)) continue;
      operations.set(op.name, { ...op, soapAction: actions.get(op.name) });
    }
  }

  // Bindings without a matching portType still expose their operations
  for (const binding of wsdl.bindings) {
    for (const op of binding.operations) {
      if (!operations.has(op.name)) {
        operations.set(op.name, { name: op.name, soapAction: actions.get(op.name) });
      }
    }
  }

  return Array.from(operations.values());
}

/**
 * Get SOAP action for an operation
 */
export function getSoapAction(wsdl: ParsedWsdl, operationName: string): string | undefined {
  return getOperations(wsdl).find((op) => op.name === operationName)?.soapAction;
}

/**
 * Get endpoint location for a service/port combination
 */
export function getEndpointLocation(
  wsdl: ParsedWsdl,
  serviceName: string,
  portName: string
): string | undefined {
  const service = wsdl.services.find((s) => s.name === serviceName);
  return service?.ports.find((p) => p.name === portName)?.location;
}
