/**
 * Authentication dispatch
 */

import { AuthError } from '../../errors.js';
import type { ClientCertificate, Exchange, HttpRequest, HttpResponse, TlsPolicy } from '../types.js';
import { basicAuthenticate } from './BasicAuthenticator.js';
import { certificateAuthenticate } from './ClientCertAuthenticator.js';
import { digestAuthenticate } from './DigestAuthenticator.js';
import { ntlmAuthenticate } from './NtlmAuthenticator.js';
import type { AuthDescriptor } from './types.js';

export * from './types.js';
export { buildBasicAuthHeader } from './BasicAuthenticator.js';
export { buildDigestAuthHeader, parseDigestChallenge, toDigestChallenge } from './DigestAuthenticator.js';
export type { DigestChallenge, DigestResponseParams } from './DigestAuthenticator.js';
export { loadCertificateMaterial } from './ClientCertAuthenticator.js';
export type { CertificateMaterial } from './ClientCertAuthenticator.js';

/**
 * Check that the descriptor carries every field its scheme needs.
 *
 * @throws AuthError(MissingCredentials)
 */
export function assertCredentials(auth: AuthDescriptor): void {
  switch (auth.type) {
    case 'none':
      return;
    case 'certificate':
      if (!auth.certPath) {
        throw new AuthError('MissingCredentials', 'Certificate authentication requires a certificate path');
      }
      return;
    default:
      if (!auth.username || !auth.password) {
        throw new AuthError('MissingCredentials', `${auth.type} authentication requires username and password`);
      }
  }
}

/**
 * Certificate to present during the TLS handshake: the descriptor's for
 * certificate auth, otherwise the one configured on the TLS policy.
 */
export function resolveClientCertificate(auth: AuthDescriptor, tls: TlsPolicy): ClientCertificate | undefined {
  if (auth.type === 'certificate') {
    return { certPath: auth.certPath, keyPath: auth.keyPath, passphrase: auth.passphrase };
  }
  return tls.clientCertificate;
}

/**
 * Run one request through the descriptor's handler.
 */
export function applyAuth(auth: AuthDescriptor, request: HttpRequest, exchange: Exchange): Promise<HttpResponse> {
  switch (auth.type) {
    case 'none':
      return exchange(request);
    case 'basic':
      return basicAuthenticate(auth, request, exchange);
    case 'digest':
      return digestAuthenticate(auth, request, exchange);
    case 'ntlm':
      return ntlmAuthenticate(auth, request, exchange);
    case 'certificate':
      return certificateAuthenticate(auth, request, exchange);
  }
}

/**
 * Schemes that need more than one round trip
 */
export function isHandshakeScheme(auth: AuthDescriptor): boolean {
  return auth.type === 'digest' || auth.type === 'ntlm';
}
