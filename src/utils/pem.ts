/**
 * PEM Encoding
 *
 * Standard textual encoding: base64 body wrapped at 64 columns between
 * BEGIN/END lines, each block ending in a newline.
 */

import { Certificate, CertificateChain } from '../types/collaborators';

const PEM_LINE_LENGTH = 64;

export function encodePem(type: string, der: Uint8Array): string {
  const body = Buffer.from(der).toString('base64');
  const lines: string[] = [];

  for (let i = 0; i < body.length; i += PEM_LINE_LENGTH) {
    lines.push(body.slice(i, i + PEM_LINE_LENGTH));
  }

  return `-----BEGIN ${type}-----\n${lines.map((l) => `${l}\n`).join('')}-----END ${type}-----\n`;
}

export function encodeCertificatePem(cert: Certificate): string {
  return encodePem('CERTIFICATE', cert.raw);
}

/** Concatenated PEM blocks in chain order */
export function encodeCertificateChainPem(chain: CertificateChain): string {
  return chain.map(encodeCertificatePem).join('');
}
