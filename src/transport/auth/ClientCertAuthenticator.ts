/**
 * Client certificate authentication. The certificate and key are attached to
 * the TLS agent, so the HTTP exchange itself is unchanged.
 */

import { readFile } from 'fs/promises';
import { AuthError } from '../../errors.js';
import type { ClientCertificate } from '../types.js';
import type { AuthHandler, CertificateAuth } from './types.js';

export interface CertificateMaterial {
  cert: Buffer;
  key?: Buffer;
  passphrase?: string;
}

async function readPem(path: string, what: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    // Only the path is reported, never file contents
    const code = error instanceof Error && 'code' in error ? String(error.code) : 'unknown error';
    throw new AuthError('CertificateUnreadable', `Cannot read client ${what} file ${path}: ${code}`, error);
  }
}

/**
 * Read certificate and key files.
 *
 * @throws AuthError(CertificateUnreadable)
 */
export async function loadCertificateMaterial(certificate: ClientCertificate): Promise<CertificateMaterial> {
  const cert = await readPem(certificate.certPath, 'certificate');
  const key = certificate.keyPath ? await readPem(certificate.keyPath, 'key') : undefined;
  return { cert, key, passphrase: certificate.passphrase };
}

export const certificateAuthenticate: AuthHandler<CertificateAuth> = (_auth, request, exchange) => exchange(request);
