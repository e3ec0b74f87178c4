/**
 * HTTP Digest authentication (RFC 7616) for outgoing requests.
 *
 * The first round trip goes out without credentials. A 401 carrying a Digest
 * challenge is answered once with the computed response; anything else is
 * returned unchanged.
 */

import { createHash, randomBytes } from 'crypto';
import { AuthError } from '../../errors.js';
import type { AuthHandler, DigestAuth } from './types.js';

export interface DigestChallenge {
  realm: string;
  nonce: string;
  /** Selected quality of protection, if the server offered one we support */
  qop?: 'auth' | 'auth-int';
  opaque?: string;
  algorithm: string;
  /** Set when the server asks for UTF-8 credentials; ISO-8859-1 otherwise */
  charset?: 'UTF-8';
}

export interface DigestResponseParams {
  username: string;
  password: string;
  method: string;
  uri: string;
  body?: string;
  nc: string;
  cnonce: string;
}

/**
 * Parse Digest auth challenge parameters from WWW-Authenticate header.
 * Returns undefined when the header offers no Digest scheme.
 */
export function parseDigestChallenge(wwwAuth: string): Map<string, string> | undefined {
  const start = /(?:^|,\s*)digest\s+/i.exec(wwwAuth);
  if (!start) return undefined;

  const params = new Map<string, string>();
  const challengeStr = wwwAuth.slice(start.index + start[0].length);

  // Match key="value" or key=value pairs
  const pattern = /([^\s=,]+)\s*=\s*("([^"]*(?:\\.[^"]*)*)"|([^=,;\s]+))/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(challengeStr)) !== null) {
    const key = (match[1] ?? '').toLowerCase();
    // Use quoted value (group 3) if available, otherwise unquoted (group 4)
    const value = match[3] !== undefined ? match[3] : match[4] ?? '';
    // Later schemes in a combined header must not override this one
    if (!params.has(key)) {
      params.set(key, value);
    }
  }

  return params;
}

/**
 * Validate raw challenge parameters.
 *
 * @throws AuthError(HandshakeFailed) for a challenge that cannot be answered
 */
export function toDigestChallenge(params: Map<string, string>): DigestChallenge {
  const nonce = params.get('nonce');
  if (!nonce) {
    throw new AuthError('HandshakeFailed', 'Digest challenge has no nonce');
  }

  const algorithm = params.get('algorithm') || 'MD5';
  if (!/^(MD5|SHA-256)(-sess)?$/i.test(algorithm)) {
    throw new AuthError('HandshakeFailed', `Unsupported digest algorithm: ${algorithm}`);
  }

  const offered = (params.get('qop') ?? '').split(',').map((q) => q.trim().toLowerCase());
  let qop: DigestChallenge['qop'];
  if (offered.includes('auth')) {
    qop = 'auth';
  } else if (offered.includes('auth-int')) {
    qop = 'auth-int';
  } else if (params.has('qop')) {
    throw new AuthError('HandshakeFailed', `Unsupported digest qop: ${params.get('qop') ?? ''}`);
  }

  return {
    realm: params.get('realm') ?? '',
    nonce,
    qop,
    opaque: params.get('opaque') || undefined,
    algorithm,
    charset: params.get('charset')?.toUpperCase() === 'UTF-8' ? 'UTF-8' : undefined,
  };
}

/**
 * Build the Authorization header value for a challenge
 */
export function buildDigestAuthHeader(challenge: DigestChallenge, params: DigestResponseParams): string {
  const { realm, nonce, qop, opaque, algorithm } = challenge;
  const hashName = algorithm.toUpperCase().startsWith('SHA-256') ? 'sha256' : 'md5';
  const encoding: BufferEncoding = challenge.charset === 'UTF-8' ? 'utf8' : 'latin1';
  const hash = (data: string, dataEncoding = encoding): string =>
    createHash(hashName).update(data, dataEncoding).digest('hex');

  // HA1 = H(username:realm:password), re-hashed with nonce and cnonce for -sess
  let ha1 = hash(`${params.username}:${realm}:${params.password}`);
  if (algorithm.toLowerCase().endsWith('-sess')) {
    ha1 = hash(`${ha1}:${nonce}:${params.cnonce}`);
  }

  const ha2 =
    qop === 'auth-int'
      ? hash(`${params.method}:${params.uri}:${hash(params.body ?? '', 'utf8')}`)
      : hash(`${params.method}:${params.uri}`);

  const response = qop
    ? hash(`${ha1}:${nonce}:${params.nc}:${params.cnonce}:${qop}:${ha2}`)
    : hash(`${ha1}:${nonce}:${ha2}`);

  let header = `Digest username="${params.username}", realm="${realm}", nonce="${nonce}", uri="${params.uri}", response="${response}"`;

  if (qop) {
    header += `, qop=${qop}, nc=${params.nc}, cnonce="${params.cnonce}"`;
  }
  if (opaque) {
    header += `, opaque="${opaque}"`;
  }
  if (algorithm.toUpperCase() !== 'MD5') {
    header += `, algorithm=${algorithm}`;
  }

  return header;
}

export const digestAuthenticate: AuthHandler<DigestAuth> = async (auth, request, exchange) => {
  const initial = await exchange(request);
  if (initial.statusCode !== 401) {
    return initial;
  }

  const params = parseDigestChallenge(initial.headers['www-authenticate'] ?? '');
  if (!params) {
    return initial;
  }

  const url = new URL(request.url);
  const authorization = buildDigestAuthHeader(toDigestChallenge(params), {
    username: auth.username,
    password: auth.password,
    method: request.method,
    uri: `${url.pathname}${url.search}`,
    body: request.body,
    nc: '00000001',
    cnonce: randomBytes(8).toString('hex'),
  });

  return exchange({ ...request, headers: { ...request.headers, Authorization: authorization } });
};
