import { AuthError } from '../../errors.js';
import {
  createAuthenticateMessage,
  createNegotiateMessage,
  findNtlmChallenge,
  parseChallengeMessage,
} from './NtlmMessages.js';
import type { AuthHandler, NtlmAuth } from './types.js';

/**
 * NTLM handshake: negotiate, challenge, authenticate. Every round trip must
 * use the same connection, which the transport guarantees by giving each
 * attempt its own single-socket keep-alive agent.
 */
export const ntlmAuthenticate: AuthHandler<NtlmAuth> = async (auth, request, exchange) => {
  const negotiate = await exchange({
    ...request,
    headers: { ...request.headers, Authorization: `NTLM ${createNegotiateMessage().toString('base64')}` },
  });

  if (negotiate.statusCode !== 401) {
    // Server accepted the request without authenticating
    return negotiate;
  }

  const token = findNtlmChallenge(negotiate.headers['www-authenticate'] ?? '');
  if (!token) {
    throw new AuthError('HandshakeFailed', 'Server did not answer the NTLM negotiate message with a challenge');
  }

  const challenge = parseChallengeMessage(token);
  const authenticate = await createAuthenticateMessage(challenge, {
    username: auth.username,
    password: auth.password,
    domain: auth.domain,
    workstation: auth.workstation,
  });

  return exchange({
    ...request,
    headers: { ...request.headers, Authorization: `NTLM ${authenticate.toString('base64')}` },
  });
};
