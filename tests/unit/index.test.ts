/**
 * Tests for src/index.ts: the public entry points are exported and usable
 * together.
 */

import {
  BatchExecutor,
  EndpointValidator,
  SoapClient,
  SoapVersion,
  TransportClient,
  buildEnvelope,
  getLogger,
  runSoapBatch,
  runSoapRequest,
  runSoapValidate,
} from '../../src/index.js';

describe('public API', () => {
  it('exports the task runners', () => {
    expect(typeof runSoapRequest).toBe('function');
    expect(typeof runSoapValidate).toBe('function');
    expect(typeof runSoapBatch).toBe('function');
  });

  it('exports the engine classes', () => {
    const transport = new TransportClient();
    expect(new SoapClient({ transport })).toBeInstanceOf(SoapClient);
    expect(new EndpointValidator({ transport })).toBeInstanceOf(EndpointValidator);
    expect(new BatchExecutor(new SoapClient({ transport }))).toBeInstanceOf(BatchExecutor);
  });

  it('builds an envelope through the barrel', () => {
    expect(buildEnvelope(SoapVersion.SOAP_1_1, { body: '<Ping/>' }).bodyXml).toBe('<Ping/>');
  });

  it('hands out component loggers', () => {
    expect(getLogger('soap-client').getComponent()).toBe('soap-client');
  });
});
