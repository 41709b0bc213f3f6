import * as crypto from 'crypto';
import forge from 'node-forge';
import { SignerConfig } from '../../types';
import { V1DigestAlgorithm } from './jarManifest';

const OID_SHA1 = '1.3.14.3.2.26';
const OID_SHA256 = '2.16.840.1.101.3.4.2.1';
const OID_MESSAGE_DIGEST = '1.2.840.113549.1.9.4';

/** PKCS#7 서명 블록에서 꺼낸 서명자 정보 */
export interface SignatureBlockInfo {
  /** DER 인코딩 인증서 (서명자 인증서가 첫 번째) */
  certificates: Buffer[];
  hash: 'sha1' | 'sha256';
  signature: Buffer;
  /** 인증 속성이 있으면 서명 대상은 속성 SET의 DER */
  authenticatedAttributes?: Buffer;
  /** 인증 속성의 messageDigest 값 */
  messageDigest?: Buffer;
}

function toForgeBuffer(data: Buffer): forge.util.ByteStringBuffer {
  return forge.util.createBuffer(data.toString('binary'));
}

function derOf(node: forge.asn1.Asn1): Buffer {
  return Buffer.from(forge.asn1.toDer(node).getBytes(), 'binary');
}

function children(node: forge.asn1.Asn1, what: string): forge.asn1.Asn1[] {
  if (!Array.isArray(node.value)) {
    throw new Error(`PKCS#7 구조가 잘못되었습니다: ${what}`);
  }
  return node.value;
}

function primitive(node: forge.asn1.Asn1, what: string): string {
  if (typeof node.value !== 'string') {
    throw new Error(`PKCS#7 구조가 잘못되었습니다: ${what}`);
  }
  return node.value;
}

function at(nodes: forge.asn1.Asn1[], index: number, what: string): forge.asn1.Asn1 {
  const node = nodes[index];
  if (!node) {
    throw new Error(`PKCS#7 구조가 잘못되었습니다: ${what} 없음`);
  }
  return node;
}

function isContextTag(node: forge.asn1.Asn1, tag: number): boolean {
  return node.tagClass === forge.asn1.Class.CONTEXT_SPECIFIC && node.type === tag;
}

/**
 * 서명 파일(.SF)에 대한 detached PKCS#7 SignedData 생성
 *
 * 인증 속성 없이 .SF 바이트 자체를 서명하므로 같은 키와 입력이면 결과가 같습니다.
 */
export function createSignatureBlock(
  signatureFile: Buffer,
  signer: SignerConfig,
  algorithm: V1DigestAlgorithm
): Buffer {
  const certificates = signer.certificates.map((der) =>
    forge.pki.certificateFromAsn1(forge.asn1.fromDer(toForgeBuffer(der)))
  );
  const [signerCertificate] = certificates;
  if (!signerCertificate) {
    throw new Error(`서명자 인증서가 없습니다: ${signer.name}`);
  }

  const p7 = forge.pkcs7.createSignedData();
  p7.content = toForgeBuffer(signatureFile);
  for (const certificate of certificates) {
    p7.addCertificate(certificate);
  }
  p7.addSigner({
    key: signer.privateKeyPem,
    certificate: signerCertificate,
    digestAlgorithm: algorithm === 'SHA-256' ? OID_SHA256 : OID_SHA1,
    authenticatedAttributes: [],
  });
  p7.sign({ detached: true });
  return derOf(p7.toAsn1());
}

/**
 * PKCS#7 SignedData에서 첫 번째 서명자 정보를 꺼냅니다.
 */
export function parseSignatureBlock(der: Buffer): SignatureBlockInfo {
  const contentInfo = forge.asn1.fromDer(toForgeBuffer(der));
  const explicit = at(children(contentInfo, 'ContentInfo'), 1, 'content');
  const signedData = children(at(children(explicit, 'content'), 0, 'SignedData'), 'SignedData');

  const certificates: Buffer[] = [];
  const certificateSet = signedData.find((node) => isContextTag(node, 0));
  if (certificateSet) {
    for (const certificate of children(certificateSet, 'certificates')) {
      certificates.push(derOf(certificate));
    }
  }

  const signerInfos = children(at(signedData, signedData.length - 1, 'signerInfos'), 'signerInfos');
  const signerInfo = children(at(signerInfos, 0, 'SignerInfo'), 'SignerInfo');

  const digestAlgorithm = children(at(signerInfo, 2, 'digestAlgorithm'), 'digestAlgorithm');
  const digestOid = forge.asn1.derToOid(primitive(at(digestAlgorithm, 0, 'OID'), 'OID'));
  let hash: 'sha1' | 'sha256';
  if (digestOid === OID_SHA256) {
    hash = 'sha256';
  } else if (digestOid === OID_SHA1) {
    hash = 'sha1';
  } else {
    throw new Error(`지원하지 않는 다이제스트 알고리즘: ${digestOid}`);
  }

  let index = 3;
  let authenticatedAttributes: Buffer | undefined;
  let messageDigest: Buffer | undefined;
  const maybeAttributes = at(signerInfo, index, 'SignerInfo');
  if (isContextTag(maybeAttributes, 0)) {
    authenticatedAttributes = derOf(maybeAttributes);
    authenticatedAttributes[0] = 0x31;
    messageDigest = findMessageDigest(maybeAttributes);
    index++;
  }
  const signature = Buffer.from(
    primitive(at(signerInfo, index + 1, 'encryptedDigest'), 'encryptedDigest'),
    'binary'
  );

  // 서명자 인증서를 앞으로
  const issuerAndSerial = children(at(signerInfo, 1, 'issuerAndSerialNumber'), 'issuerAndSerialNumber');
  const serial = forge.util.bytesToHex(primitive(at(issuerAndSerial, 1, 'serialNumber'), 'serialNumber'));
  const signerIndex = certificates.findIndex((certDer) => {
    const cert = forge.pki.certificateFromAsn1(forge.asn1.fromDer(toForgeBuffer(certDer)));
    return stripLeadingZeros(cert.serialNumber) === stripLeadingZeros(serial);
  });
  if (signerIndex > 0) {
    certificates.unshift(...certificates.splice(signerIndex, 1));
  }

  return { certificates, hash, signature, authenticatedAttributes, messageDigest };
}

function stripLeadingZeros(hex: string): string {
  return hex.replace(/^(00)+/, '').toLowerCase();
}

function findMessageDigest(attributes: forge.asn1.Asn1): Buffer | undefined {
  for (const attribute of children(attributes, 'authenticatedAttributes')) {
    const [type, values] = children(attribute, 'Attribute');
    if (!type || !values) continue;
    if (forge.asn1.derToOid(primitive(type, 'Attribute type')) !== OID_MESSAGE_DIGEST) continue;
    const [value] = children(values, 'Attribute values');
    return value ? Buffer.from(primitive(value, 'messageDigest'), 'binary') : undefined;
  }
  return undefined;
}

/**
 * PKCS#7 서명이 signedContent(.SF 바이트)에 대해 유효한지 검증
 */
export function verifySignatureBlock(info: SignatureBlockInfo, signedContent: Buffer): string | null {
  const [signerCertificate] = info.certificates;
  if (!signerCertificate) {
    return '서명 블록에 인증서가 없습니다';
  }

  let data = signedContent;
  if (info.authenticatedAttributes) {
    const expected = crypto.createHash(info.hash).update(signedContent).digest();
    if (!info.messageDigest || !info.messageDigest.equals(expected)) {
      return '인증 속성의 messageDigest가 서명 파일과 다릅니다';
    }
    data = info.authenticatedAttributes;
  }

  const publicKey = new crypto.X509Certificate(signerCertificate).publicKey;
  return crypto.verify(info.hash, data, publicKey, info.signature)
    ? null
    : '서명 파일에 대한 서명이 유효하지 않습니다';
}
