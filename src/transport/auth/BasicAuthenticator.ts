import type { AuthHandler, BasicAuth } from './types.js';

export function buildBasicAuthHeader(username: string, password: string): string {
  const credentials = Buffer.from(`${username}:${password}`).toString('base64');
  return `Basic ${credentials}`;
}

/**
 * Preemptive Basic authentication: one round trip.
 */
export const basicAuthenticate: AuthHandler<BasicAuth> = (auth, request, exchange) =>
  exchange({
    ...request,
    headers: { ...request.headers, Authorization: buildBasicAuthHeader(auth.username, auth.password) },
  });
