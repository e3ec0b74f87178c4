/**
 * NTLM message encoding (MS-NLMP)
 *
 * Negotiate (type 1) and authenticate (type 3) messages are built here;
 * challenge (type 2) messages are parsed. Only NTLMv2 responses are
 * produced. No MIC and no session key exchange.
 */

import { createHmac, randomBytes } from 'crypto';
import { md4 } from 'hash-wasm';
import { AuthError } from '../../errors.js';

const SIGNATURE = Buffer.from('NTLMSSP\0', 'latin1');

export const NtlmFlags = {
  NEGOTIATE_UNICODE: 0x00000001,
  NEGOTIATE_OEM: 0x00000002,
  REQUEST_TARGET: 0x00000004,
  NEGOTIATE_NTLM: 0x00000200,
  NEGOTIATE_ALWAYS_SIGN: 0x00008000,
  NEGOTIATE_EXTENDED_SESSIONSECURITY: 0x00080000,
  NEGOTIATE_TARGET_INFO: 0x00800000,
  NEGOTIATE_128: 0x20000000,
  NEGOTIATE_56: 0x80000000,
} as const;

const NEGOTIATE_FLAGS =
  (NtlmFlags.NEGOTIATE_UNICODE |
    NtlmFlags.NEGOTIATE_OEM |
    NtlmFlags.REQUEST_TARGET |
    NtlmFlags.NEGOTIATE_NTLM |
    NtlmFlags.NEGOTIATE_ALWAYS_SIGN |
    NtlmFlags.NEGOTIATE_EXTENDED_SESSIONSECURITY |
    NtlmFlags.NEGOTIATE_128 |
    NtlmFlags.NEGOTIATE_56) >>>
  0;

/** Seconds between 1601-01-01 and 1970-01-01 */
const FILETIME_EPOCH_OFFSET = 11644473600n;

export interface NtlmChallenge {
  readonly flags: number;
  readonly serverChallenge: Buffer;
  readonly targetName: string;
  readonly targetInfo: Buffer;
}

export interface NtlmCredentials {
  readonly username: string;
  readonly password: string;
  readonly domain?: string;
  readonly workstation?: string;
}

export interface AuthenticateOptions {
  /** 8 random bytes, generated when omitted */
  readonly clientChallenge?: Buffer;
  /** Response timestamp, defaults to now */
  readonly timestamp?: Date;
}

/**
 * Type 1 message: announce capabilities, no domain or workstation.
 */
export function createNegotiateMessage(): Buffer {
  const message = Buffer.alloc(32);
  SIGNATURE.copy(message, 0);
  message.writeUInt32LE(1, 8);
  message.writeUInt32LE(NEGOTIATE_FLAGS, 12);
  // Empty domain and workstation security buffers point past the header
  message.writeUInt32LE(32, 20);
  message.writeUInt32LE(32, 28);
  return message;
}

function readSecurityBuffer(message: Buffer, offset: number): Buffer {
  const length = message.readUInt16LE(offset);
  const start = message.readUInt32LE(offset + 4);
  if (start + length > message.length) {
    throw new AuthError('HandshakeFailed', 'NTLM challenge security buffer is out of range');
  }
  return message.subarray(start, start + length);
}

/**
 * Parse a type 2 message.
 *
 * @throws AuthError(HandshakeFailed) when the message is not a valid challenge
 */
export function parseChallengeMessage(message: Buffer): NtlmChallenge {
  if (message.length < 32 || !message.subarray(0, 8).equals(SIGNATURE) || message.readUInt32LE(8) !== 2) {
    throw new AuthError('HandshakeFailed', 'Malformed NTLM challenge message');
  }

  const flags = message.readUInt32LE(20);
  const unicode = (flags & NtlmFlags.NEGOTIATE_UNICODE) !== 0;
  const targetName = readSecurityBuffer(message, 12).toString(unicode ? 'utf16le' : 'latin1');
  const targetInfo = message.length >= 48 ? Buffer.from(readSecurityBuffer(message, 40)) : Buffer.alloc(0);

  return {
    flags,
    serverChallenge: Buffer.from(message.subarray(24, 32)),
    targetName,
    targetInfo,
  };
}

function hmacMd5(key: Buffer, ...data: Buffer[]): Buffer {
  const hmac = createHmac('md5', key);
  for (const chunk of data) hmac.update(chunk);
  return hmac.digest();
}

/**
 * NT one-way function: MD4 of the UTF-16LE password
 */
export async function ntHash(password: string): Promise<Buffer> {
  return Buffer.from(await md4(Buffer.from(password, 'utf16le')), 'hex');
}

/**
 * NTOWFv2: HMAC-MD5 keyed with the NT hash over upper-cased user and domain
 */
export async function ntlmV2Hash(username: string, password: string, domain: string): Promise<Buffer> {
  return hmacMd5(await ntHash(password), Buffer.from(username.toUpperCase() + domain, 'utf16le'));
}

function toFileTime(date: Date): Buffer {
  const ticks = (BigInt(date.getTime()) + FILETIME_EPOCH_OFFSET * 1000n) * 10000n;
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64LE(ticks);
  return buffer;
}

/**
 * NTLMv2 client blob: version, reserved, timestamp, client challenge, target
 * info
 */
export function buildClientBlob(timestamp: Date, clientChallenge: Buffer, targetInfo: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from([0x01, 0x01, 0x00, 0x00]),
    Buffer.alloc(4),
    toFileTime(timestamp),
    clientChallenge,
    Buffer.alloc(4),
    targetInfo,
    Buffer.alloc(4),
  ]);
}

/**
 * Type 3 message carrying the NTLMv2 and LMv2 responses
 */
export async function createAuthenticateMessage(
  challenge: NtlmChallenge,
  credentials: NtlmCredentials,
  options: AuthenticateOptions = {}
): Promise<Buffer> {
  const unicode = (challenge.flags & NtlmFlags.NEGOTIATE_UNICODE) !== 0;
  const encode = (value: string): Buffer => Buffer.from(value, unicode ? 'utf16le' : 'latin1');

  const domain = credentials.domain ?? '';
  const clientChallenge = options.clientChallenge ?? randomBytes(8);
  const v2Hash = await ntlmV2Hash(credentials.username, credentials.password, domain);

  const blob = buildClientBlob(options.timestamp ?? new Date(), clientChallenge, challenge.targetInfo);
  const ntProof = hmacMd5(v2Hash, challenge.serverChallenge, blob);
  const ntResponse = Buffer.concat([ntProof, blob]);
  const lmResponse = Buffer.concat([hmacMd5(v2Hash, challenge.serverChallenge, clientChallenge), clientChallenge]);

  const payloads = [
    encode(domain),
    encode(credentials.username),
    encode(credentials.workstation ?? ''),
    lmResponse,
    ntResponse,
  ] as const;
  const [domainBuf, userBuf, workstationBuf, lmBuf, ntBuf] = payloads;

  const headerLength = 64;
  const header = Buffer.alloc(headerLength);
  SIGNATURE.copy(header, 0);
  header.writeUInt32LE(3, 8);

  let offset = headerLength;
  const writeSecurityBuffer = (position: number, data: Buffer): void => {
    header.writeUInt16LE(data.length, position);
    header.writeUInt16LE(data.length, position + 2);
    header.writeUInt32LE(offset, position + 4);
    offset += data.length;
  };

  // Payload order: domain, user, workstation, LM, NT
  writeSecurityBuffer(28, domainBuf);
  writeSecurityBuffer(36, userBuf);
  writeSecurityBuffer(44, workstationBuf);
  writeSecurityBuffer(12, lmBuf);
  writeSecurityBuffer(20, ntBuf);
  // Empty session key
  header.writeUInt32LE(offset, 56);
  header.writeUInt32LE((challenge.flags & NEGOTIATE_FLAGS) >>> 0, 60);

  return Buffer.concat([header, ...payloads]);
}

/**
 * Extract the base64 type 2 token from a WWW-Authenticate header
 */
export function findNtlmChallenge(wwwAuth: string): Buffer | undefined {
  const match = /(?:^|,\s*)NTLM\s+([A-Za-z0-9+/]+=*)/i.exec(wwwAuth);
  return match?.[1] ? Buffer.from(match[1], 'base64') : undefined;
}
