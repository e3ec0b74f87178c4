/**
 * Authentication descriptors
 *
 * A closed set of variants, one handler each. Credentials are write-only:
 * they reach the wire and nothing else.
 */

import type { Exchange, HttpRequest, HttpResponse } from '../types.js';

export interface NoAuth {
  readonly type: 'none';
}

export interface BasicAuth {
  readonly type: 'basic';
  readonly username: string;
  readonly password: string;
}

export interface DigestAuth {
  readonly type: 'digest';
  readonly username: string;
  readonly password: string;
}

export interface NtlmAuth {
  readonly type: 'ntlm';
  readonly username: string;
  readonly password: string;
  readonly domain?: string;
  readonly workstation?: string;
}

export interface CertificateAuth {
  readonly type: 'certificate';
  readonly certPath: string;
  readonly keyPath?: string;
  readonly passphrase?: string;
}

export type AuthDescriptor = NoAuth | BasicAuth | DigestAuth | NtlmAuth | CertificateAuth;

export type AuthType = AuthDescriptor['type'];

export const AUTH_TYPES: readonly AuthType[] = ['none', 'basic', 'digest', 'ntlm', 'certificate'];

export const NO_AUTH: NoAuth = Object.freeze({ type: 'none' });

/**
 * Runs one authenticated request, performing as many round trips as the
 * scheme's handshake needs.
 */
export type AuthHandler<A extends AuthDescriptor> = (
  descriptor: A,
  request: HttpRequest,
  exchange: Exchange
) => Promise<HttpResponse>;

/**
 * Redacted description for logs and check-mode output
 */
export function describeAuth(auth: AuthDescriptor): string {
  switch (auth.type) {
    case 'none':
      return 'none';
    case 'certificate':
      return `certificate (${auth.certPath})`;
    case 'ntlm':
      return auth.domain ? `ntlm (${auth.domain}\\${auth.username})` : `ntlm (${auth.username})`;
    default:
      return `${auth.type} (${auth.username})`;
  }
}
