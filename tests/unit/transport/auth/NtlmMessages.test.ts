import { AuthError } from '../../../../src/errors.js';
import {
  NtlmFlags,
  createAuthenticateMessage,
  createNegotiateMessage,
  findNtlmChallenge,
  ntHash,
  ntlmV2Hash,
  parseChallengeMessage,
} from '../../../../src/transport/auth/NtlmMessages.js';
import { buildChallengeMessage, readSecurityBuffer } from './ntlmTestMessages.js';

const SERVER_CHALLENGE = Buffer.from('0102030405060708', 'hex');
const CLIENT_CHALLENGE = Buffer.from('aabbccddeeff0011', 'hex');
// MsvAvNbDomainName "EXAMPLE", then MsvAvEOL
const TARGET_INFO = Buffer.from('02000e004500580041004d0050004c00450000000000', 'hex');
const CHALLENGE_FLAGS =
  NtlmFlags.NEGOTIATE_UNICODE |
  NtlmFlags.NEGOTIATE_NTLM |
  NtlmFlags.NEGOTIATE_EXTENDED_SESSIONSECURITY |
  NtlmFlags.NEGOTIATE_TARGET_INFO;

describe('createNegotiateMessage', () => {
  it('should build a 32-byte type 1 message', () => {
    const message = createNegotiateMessage();

    expect(message).toHaveLength(32);
    expect(message.subarray(0, 8).toString('latin1')).toBe('NTLMSSP\0');
    expect(message.readUInt32LE(8)).toBe(1);
    expect(message.readUInt32LE(12)).toBe(0xa0088207);
  });
});

describe('parseChallengeMessage', () => {
  it('should read flags, server challenge, target name and target info', () => {
    const challenge = parseChallengeMessage(
      buildChallengeMessage(SERVER_CHALLENGE, TARGET_INFO, CHALLENGE_FLAGS, 'EXAMPLE')
    );

    expect(challenge.flags).toBe(0x00880201);
    expect(challenge.serverChallenge.toString('hex')).toBe('0102030405060708');
    expect(challenge.targetName).toBe('EXAMPLE');
    expect(challenge.targetInfo.toString('hex')).toBe(TARGET_INFO.toString('hex'));
  });

  it('should reject a message with the wrong type', () => {
    expect(() => parseChallengeMessage(createNegotiateMessage())).toThrow(
      new AuthError('HandshakeFailed', 'Malformed NTLM challenge message')
    );
  });

  it('should reject an out-of-range security buffer', () => {
    const message = buildChallengeMessage(SERVER_CHALLENGE, TARGET_INFO, CHALLENGE_FLAGS, 'EXAMPLE');
    message.writeUInt16LE(500, 40);
    expect(() => parseChallengeMessage(message)).toThrow('NTLM challenge security buffer is out of range');
  });
});

describe('NT hashes', () => {
  it('should compute the NT one-way function', async () => {
    expect((await ntHash('password')).toString('hex')).toBe('8846f7eaee8fb117ad06bdd830b7586c');
    expect((await ntHash('test-secret')).toString('hex')).toBe('ca242c56ff1257264e331e0c5b7abe25');
  });

  it('should compute NTOWFv2 over the upper-cased user and domain', async () => {
    expect((await ntlmV2Hash('tester', 'test-secret', 'EXAMPLE')).toString('hex')).toBe(
      '640455d4db4d44bd19f59ec7f7dae55c'
    );
  });
});

describe('createAuthenticateMessage', () => {
  it('should lay out an NTLMv2 type 3 message', async () => {
    const challenge = parseChallengeMessage(
      buildChallengeMessage(SERVER_CHALLENGE, TARGET_INFO, CHALLENGE_FLAGS, 'EXAMPLE')
    );

    const message = await createAuthenticateMessage(
      challenge,
      { username: 'tester', password: 'test-secret', domain: 'EXAMPLE', workstation: 'WS01' },
      { clientChallenge: CLIENT_CHALLENGE, timestamp: new Date(Date.UTC(2024, 0, 1)) }
    );

    expect(message.subarray(0, 8).toString('latin1')).toBe('NTLMSSP\0');
    expect(message.readUInt32LE(8)).toBe(3);
    expect(message).toHaveLength(192);

    expect(readSecurityBuffer(message, 28).toString('utf16le')).toBe('EXAMPLE');
    expect(readSecurityBuffer(message, 36).toString('utf16le')).toBe('tester');
    expect(readSecurityBuffer(message, 44).toString('utf16le')).toBe('WS01');
    expect(readSecurityBuffer(message, 12).toString('hex')).toBe(
      'd547958735d4be44c6e250d02a30e4c1aabbccddeeff0011'
    );

    const nt = readSecurityBuffer(message, 20);
    expect(nt).toHaveLength(70);
    expect(nt.subarray(0, 16).toString('hex')).toBe('aab5ca2d92d3893d1c3ba32027a90c58');
    // Blob: header, timestamp, client challenge, target info
    expect(nt.subarray(16, 24).toString('hex')).toBe('0101000000000000');
    expect(nt.subarray(24, 32).toString('hex')).toBe('00c08976453cda01');
    expect(nt.subarray(32, 40).toString('hex')).toBe('aabbccddeeff0011');

    expect(message.readUInt32LE(56)).toBe(192);
    expect(message.readUInt32LE(60)).toBe(0x00080201);
  });

  it('should never contain the password', async () => {
    const challenge = parseChallengeMessage(
      buildChallengeMessage(SERVER_CHALLENGE, TARGET_INFO, CHALLENGE_FLAGS, 'EXAMPLE')
    );
    const message = await createAuthenticateMessage(challenge, { username: 'tester', password: 'test-secret' });

    expect(message.includes(Buffer.from('test-secret', 'utf16le'))).toBe(false);
    expect(message.includes(Buffer.from('test-secret', 'latin1'))).toBe(false);
  });
});

describe('findNtlmChallenge', () => {
  it('should decode the token after the NTLM scheme', () => {
    const token = Buffer.from('NTLMSSP\0').toString('base64');
    expect(findNtlmChallenge(`Negotiate, NTLM ${token}`)?.toString('latin1')).toBe('NTLMSSP\0');
  });

  it('should ignore a bare NTLM offer', () => {
    expect(findNtlmChallenge('NTLM')).toBeUndefined();
    expect(findNtlmChallenge('Negotiate')).toBeUndefined();
  });
});
