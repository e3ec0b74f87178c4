import { CancelledError, TransportError } from '../../../src/errors.js';
import {
  categorizeFault,
  failureResult,
  interpretResponse,
} from '../../../src/soap/ResponseInterpreter.js';
import type { TransportResponse } from '../../../src/transport/types.js';
import { soap11Response, soap12Response } from '../../helpers/FakeHttp.js';

function response(statusCode: number, body: string, headers: Record<string, string> = {}): TransportResponse {
  return { statusCode, body, headers, elapsedMs: 12, attempts: 1 };
}

const RESULT_BODY =
  '<m:NumberToWordsResponse xmlns:m="http://www.dataaccess.com/webservicesserver/">' +
  '<m:NumberToWordsResult>five hundred</m:NumberToWordsResult></m:NumberToWordsResponse>';

const CLIENT_FAULT_11 =
  '<soap:Fault><faultcode>soap:Client</faultcode><faultstring>Invalid input</faultstring>' +
  '<detail><reason>ubiNum must be positive</reason></detail></soap:Fault>';

const SENDER_FAULT_12 =
  '<env:Fault><env:Code><env:Value>env:Sender</env:Value><env:Subcode><env:Value>m:BadArgs</env:Value></env:Subcode></env:Code>' +
  '<env:Reason><env:Text xml:lang="en">Missing symbol</env:Text></env:Reason><env:Role>urn:gateway</env:Role></env:Fault>';

describe('interpretResponse', () => {
  it('should return the structured Body on success', () => {
    const result = interpretResponse(response(200, soap11Response(RESULT_BODY), { 'content-type': 'text/xml' }));

    expect(result.success).toBe(true);
    expect(result.statusCode).toBe(200);
    expect(result.headers).toEqual({ 'content-type': 'text/xml' });
    expect(result.body).toEqual({ NumberToWordsResponse: { NumberToWordsResult: 'five hundred' } });
    expect(result.elapsedMs).toBe(12);
    expect(result.error).toBeUndefined();
    expect(result).not.toHaveProperty('extractedData');
  });

  it('should keep text as sent and ignore indentation', () => {
    const indented =
      '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">\n' +
      '  <soap:Body>\n' +
      '    <GetNoteResponse>\n' +
      '      <note>  two leading spaces</note>\n' +
      '    </GetNoteResponse>\n' +
      '  </soap:Body>\n' +
      '</soap:Envelope>';

    const result = interpretResponse(response(200, indented));

    expect(result.body).toEqual({ GetNoteResponse: { note: '  two leading spaces' } });
  });

  it('should return the raw text when requested', () => {
    const raw = soap11Response(RESULT_BODY);
    const result = interpretResponse(response(200, raw), { returnRaw: true });
    expect(result.body).toBe(raw);
  });

  it('should extract a value', () => {
    const result = interpretResponse(response(200, soap11Response(RESULT_BODY)), {
      extractPath: '//NumberToWordsResult',
      stripNamespaces: true,
    });
    expect(result.extractedData).toBe('five hundred');
  });

  it('should extract with prefixes when namespaces are kept', () => {
    const result = interpretResponse(response(200, soap11Response(RESULT_BODY)), {
      extractPath: '//m:NumberToWordsResult/text()',
    });
    expect(result.extractedData).toBe('five hundred');
  });

  it('should omit extractedData when the path matches nothing', () => {
    const result = interpretResponse(response(200, soap11Response(RESULT_BODY)), { extractPath: '//Missing' });

    expect(result.success).toBe(true);
    expect(result).not.toHaveProperty('extractedData');
  });

  it('should report a SOAP 1.1 fault on HTTP 500', () => {
    const result = interpretResponse(response(500, soap11Response(CLIENT_FAULT_11)));

    expect(result.success).toBe(false);
    expect(result.statusCode).toBe(500);
    expect(result.fault).toEqual({
      code: 'Client',
      subcode: undefined,
      reason: 'Invalid input',
      actor: undefined,
      detail: { reason: 'ubiNum must be positive' },
      category: 'CLIENT_ERROR',
      retriable: false,
    });
    expect(result.error).toEqual({
      category: 'SoapFault',
      kind: 'SoapFault',
      message: 'SOAP Fault Client: Invalid input',
    });
  });

  it('should report a fault returned with HTTP 200', () => {
    const result = interpretResponse(response(200, soap11Response(CLIENT_FAULT_11)));
    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe('SoapFault');
  });

  it('should report a SOAP 1.2 fault with subcode and role', () => {
    const result = interpretResponse(response(500, soap12Response(SENDER_FAULT_12)));

    expect(result.fault).toMatchObject({
      code: 'Sender',
      subcode: 'BadArgs',
      reason: 'Missing symbol',
      actor: 'urn:gateway',
      category: 'CLIENT_ERROR',
      retriable: false,
    });
  });

  it('should flag server faults as retriable', () => {
    const fault = '<soap:Fault><faultcode>soap:Server</faultcode><faultstring>Database down</faultstring></soap:Fault>';
    const result = interpretResponse(response(500, soap11Response(fault)));
    expect(result.fault?.category).toBe('SERVER_ERROR');
    expect(result.fault?.retriable).toBe(true);
  });

  it('should report malformed XML with the raw body', () => {
    const result = interpretResponse(response(200, '<html><body>Maintenance'));

    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe('MalformedResponse');
    expect(result.rawBody).toBe('<html><body>Maintenance');
    expect(result.body).toBeUndefined();
  });

  it('should report authentication failure for a 401 with an HTML body', () => {
    const result = interpretResponse(response(401, '<html><body>Login required'));
    expect(result.error).toEqual({
      category: 'AuthError',
      kind: 'AuthenticationFailed',
      message: 'Authentication failed with HTTP 401',
    });
  });

  it('should report an unexpected status without a fault', () => {
    const result = interpretResponse(response(503, soap11Response('<Busy/>')));
    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe('UnexpectedStatus');
    expect(result.error?.message).toBe('Unexpected HTTP status 503');
  });

  it('should accept an empty 202 from a one-way operation', () => {
    const result = interpretResponse(response(202, ''));
    expect(result.success).toBe(true);
    expect(result.body).toBe('');
  });

  it('should reject an empty 500', () => {
    const result = interpretResponse(response(500, '  '));
    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe('UnexpectedStatus');
  });

  it('should return a frozen result', () => {
    const result = interpretResponse(response(200, soap11Response(RESULT_BODY)));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.headers)).toBe(true);
  });
});

describe('categorizeFault', () => {
  it.each([
    ['Client', 'CLIENT_ERROR'],
    ['Sender', 'CLIENT_ERROR'],
    ['Client.Authentication', 'CLIENT_ERROR'],
    ['Server', 'SERVER_ERROR'],
    ['Receiver', 'SERVER_ERROR'],
    ['VersionMismatch', 'VERSION_MISMATCH'],
    ['MustUnderstand', 'MUST_UNDERSTAND'],
    ['Custom', 'UNKNOWN'],
  ])('should map %s to %s', (code, category) => {
    expect(categorizeFault(code)).toBe(category);
  });
});

describe('failureResult', () => {
  it('should carry transport error details and attempts', () => {
    const result = failureResult(new TransportError('Timeout', 'Request timed out after 50ms', { attempts: 3 }), {
      elapsedMs: 160,
    });

    expect(result).toEqual({
      success: false,
      statusCode: 0,
      headers: {},
      error: { category: 'TransportError', kind: 'Timeout', message: 'Request timed out after 50ms' },
      elapsedMs: 160,
      attempts: 3,
    });
  });

  it('should report cancellation', () => {
    expect(failureResult(new CancelledError()).error).toEqual({
      category: 'CancelledError',
      kind: 'Cancelled',
      message: 'Cancelled before completion',
    });
  });

  it('should wrap unknown errors as RequestFailed', () => {
    expect(failureResult(new Error('socket hang up')).error?.kind).toBe('RequestFailed');
  });
});
