import * as crypto from 'crypto';
import { SignerConfig } from '../../types';
import { ApkFormatError } from '../errors';
import { ByteReader, lengthPrefixed, lengthPrefixedSequence, uint32 } from './bytes';

/** RSASSA-PKCS1-v1_5 with SHA2-256 */
export const SIGNATURE_RSA_PKCS1_V1_5_WITH_SHA256 = 0x0103;

export const APK_SIGNATURE_SCHEME_V2_BLOCK_ID = 0x7109871a;
export const APK_SIGNATURE_SCHEME_V3_BLOCK_ID = 0xf05368c0;

/** v2 블록에 기록되는 "v3로도 서명됨" 표시 (v3 블록 제거 방지) */
export const STRIPPING_PROTECTION_ATTR_ID = 0xbeeff00d;
export const STRIPPING_PROTECTION_V3 = 3;

export const V3_MIN_SDK_VERSION = 28;
export const V3_MAX_SDK_VERSION = 0x7fffffff;

export type SchemeVersion = 2 | 3;

export interface SchemeDigest {
  algorithmId: number;
  digest: Buffer;
}

export interface SchemeSignature {
  algorithmId: number;
  signature: Buffer;
}

export interface AdditionalAttribute {
  id: number;
  value: Buffer;
}

/** 파싱된 v2/v3 서명자 */
export interface SchemeSignerBlock {
  /** 서명 대상 바이트 (signed data 원본) */
  signedData: Buffer;
  digests: SchemeDigest[];
  certificates: Buffer[];
  additionalAttributes: AdditionalAttribute[];
  minSdkVersion?: number;
  maxSdkVersion?: number;
  signatures: SchemeSignature[];
  /** SubjectPublicKeyInfo DER */
  publicKey: Buffer;
}

export function blockIdFor(version: SchemeVersion): number {
  return version === 2 ? APK_SIGNATURE_SCHEME_V2_BLOCK_ID : APK_SIGNATURE_SCHEME_V3_BLOCK_ID;
}

function encodeDigests(digests: SchemeDigest[]): Buffer {
  return lengthPrefixedSequence(
    digests.map((d) => Buffer.concat([uint32(d.algorithmId), lengthPrefixed(d.digest)]))
  );
}

function encodeAttributes(attributes: AdditionalAttribute[]): Buffer {
  return lengthPrefixedSequence(
    attributes.map((a) => Buffer.concat([uint32(a.id), a.value]))
  );
}

function encodeSignatures(signatures: SchemeSignature[]): Buffer {
  return lengthPrefixedSequence(
    signatures.map((s) => Buffer.concat([uint32(s.algorithmId), lengthPrefixed(s.signature)]))
  );
}

/**
 * v2 또는 v3 서명 스킴 블록 값 생성
 *
 * 서명자마다 signed data(다이제스트, 인증서 체인, 추가 속성)를 만들고
 * 그 바이트를 RSA/SHA-256으로 서명합니다.
 */
export function buildSchemeBlock(
  version: SchemeVersion,
  signers: SignerConfig[],
  contentDigest: Buffer,
  options: { v3Enabled: boolean }
): Buffer {
  const encodedSigners = signers.map((signer) => {
    const digests = encodeDigests([
      { algorithmId: SIGNATURE_RSA_PKCS1_V1_5_WITH_SHA256, digest: contentDigest },
    ]);
    const certificates = lengthPrefixedSequence(signer.certificates);
    const attributes: AdditionalAttribute[] =
      version === 2 && options.v3Enabled
        ? [{ id: STRIPPING_PROTECTION_ATTR_ID, value: uint32(STRIPPING_PROTECTION_V3) }]
        : [];

    const sdkRange =
      version === 3
        ? Buffer.concat([uint32(V3_MIN_SDK_VERSION), uint32(V3_MAX_SDK_VERSION)])
        : Buffer.alloc(0);
    const signedData = Buffer.concat([digests, certificates, sdkRange, encodeAttributes(attributes)]);

    const signature = crypto.sign('sha256', signedData, signer.privateKeyPem);
    const publicKey = crypto
      .createPublicKey(signer.privateKeyPem)
      .export({ type: 'spki', format: 'der' });

    return Buffer.concat([
      lengthPrefixed(signedData),
      sdkRange,
      encodeSignatures([{ algorithmId: SIGNATURE_RSA_PKCS1_V1_5_WITH_SHA256, signature }]),
      lengthPrefixed(publicKey),
    ]);
  });

  return lengthPrefixedSequence(encodedSigners);
}

function formatError(message: string): ApkFormatError {
  return new ApkFormatError(`잘못된 APK 서명 블록: ${message}`);
}

function parseDigests(reader: ByteReader): SchemeDigest[] {
  return reader.readSequence().map((item) => {
    const itemReader = new ByteReader(item, formatError);
    return { algorithmId: itemReader.readUInt32(), digest: itemReader.readLengthPrefixed() };
  });
}

function parseSignatures(reader: ByteReader): SchemeSignature[] {
  return reader.readSequence().map((item) => {
    const itemReader = new ByteReader(item, formatError);
    return { algorithmId: itemReader.readUInt32(), signature: itemReader.readLengthPrefixed() };
  });
}

function parseAttributes(reader: ByteReader): AdditionalAttribute[] {
  return reader.readSequence().map((item) => {
    const itemReader = new ByteReader(item, formatError);
    const id = itemReader.readUInt32();
    return { id, value: itemReader.readBytes(itemReader.remaining) };
  });
}

/**
 * v2/v3 서명 스킴 블록 값 파싱
 */
export function parseSchemeBlock(version: SchemeVersion, value: Buffer): SchemeSignerBlock[] {
  const reader = new ByteReader(value, formatError);
  const signers = reader.readSequence().map((encoded) => {
    const signerReader = new ByteReader(encoded, formatError);
    const signedData = signerReader.readLengthPrefixed();

    const dataReader = new ByteReader(signedData, formatError);
    const digests = parseDigests(dataReader);
    const certificates = dataReader.readSequence();
    const block: SchemeSignerBlock = {
      signedData,
      digests,
      certificates,
      additionalAttributes: [],
      signatures: [],
      publicKey: Buffer.alloc(0),
    };
    if (version === 3) {
      block.minSdkVersion = dataReader.readUInt32();
      block.maxSdkVersion = dataReader.readUInt32();
    }
    block.additionalAttributes = parseAttributes(dataReader);

    if (version === 3) {
      const minSdk = signerReader.readUInt32();
      const maxSdk = signerReader.readUInt32();
      if (minSdk !== block.minSdkVersion || maxSdk !== block.maxSdkVersion) {
        throw formatError('v3 서명자의 SDK 범위가 signed data와 다릅니다');
      }
    }
    block.signatures = parseSignatures(signerReader);
    block.publicKey = signerReader.readLengthPrefixed();
    return block;
  });

  if (signers.length === 0) {
    throw formatError(`v${version} 블록에 서명자가 없습니다`);
  }
  return signers;
}

/**
 * v2 서명자에 v3 제거 방지 속성이 있는지
 */
export function hasStrippingProtection(signer: SchemeSignerBlock): boolean {
  return signer.additionalAttributes.some(
    (attr) =>
      attr.id === STRIPPING_PROTECTION_ATTR_ID &&
      attr.value.length >= 4 &&
      attr.value.readUInt32LE(0) === STRIPPING_PROTECTION_V3
  );
}

/**
 * 서명자가 기록한 SHA-256 콘텐츠 다이제스트
 */
export function recordedContentDigest(signer: SchemeSignerBlock): Buffer | undefined {
  return signer.digests.find((d) => d.algorithmId === SIGNATURE_RSA_PKCS1_V1_5_WITH_SHA256)
    ?.digest;
}
