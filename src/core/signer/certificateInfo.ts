import * as crypto from 'crypto';
import forge from 'node-forge';

export interface CertificateSummary {
  subject: string;
  issuer: string;
  sha256: string;
  sha1: string;
  md5: string;
  keyAlgorithm: string;
  keySize?: number;
}

function formatName(name: forge.pki.Certificate['subject']): string {
  return name.attributes
    .map((attr) => `${attr.shortName ?? attr.name ?? attr.type}=${String(attr.value)}`)
    .reverse()
    .join(', ');
}

/**
 * DER 인증서의 DN과 지문(SHA-256/SHA-1/MD5, 소문자 hex)
 */
export function describeCertificate(der: Buffer): CertificateSummary {
  const certificate = forge.pki.certificateFromAsn1(
    forge.asn1.fromDer(forge.util.createBuffer(der.toString('binary')))
  );
  const publicKey = new crypto.X509Certificate(der).publicKey;
  const digest = (algorithm: string) => crypto.createHash(algorithm).update(der).digest('hex');

  return {
    subject: formatName(certificate.subject),
    issuer: formatName(certificate.issuer),
    sha256: digest('sha256'),
    sha1: digest('sha1'),
    md5: digest('md5'),
    keyAlgorithm: (publicKey.asymmetricKeyType ?? 'unknown').toUpperCase(),
    keySize: publicKey.asymmetricKeyDetails?.modulusLength,
  };
}
