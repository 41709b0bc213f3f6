import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import { ApkFormatError, MinSdkVersionError, ParameterError, errorMessage } from '../errors';
import logger from '../../utils/logger';
import { ANDROID_MANIFEST_ENTRY, minSdkVersionOf, readManifestInfo } from './androidManifest';
import { parseApkSections, parseSigningBlock } from './apkSections';
import { computeContentDigest } from './contentDigest';
import {
  MANIFEST_ENTRY_NAME,
  MIN_SDK_WITH_SHA256_JAR,
  V1DigestAlgorithm,
  digestBase64,
  isSignatureEntry,
  parseManifest,
} from './jarManifest';
import { parseSignatureBlock, verifySignatureBlock } from './pkcs7';
import {
  SIGNATURE_RSA_PKCS1_V1_5_WITH_SHA256,
  SchemeVersion,
  blockIdFor,
  hasStrippingProtection,
  parseSchemeBlock,
  recordedContentDigest,
} from './schemeBlocks';
import { ApkEntry, readApkEntries } from './v1Scheme';

/** v2 서명을 인식하는 최소 API 레벨 */
export const MIN_SDK_WITH_V2 = 24;

export interface VerifyOptions {
  minSdkVersion?: number;
  maxSdkVersion?: number;
}

export interface ApkVerificationResult {
  verified: boolean;
  verifiedUsingV1: boolean;
  verifiedUsingV2: boolean;
  verifiedUsingV3: boolean;
  /** 검증된 가장 높은 스킴의 서명자 인증서 (DER) */
  signerCertificates: Buffer[];
  errors: string[];
  warnings: string[];
}

interface SchemeOutcome {
  present: boolean;
  verified: boolean;
  certificates: Buffer[];
}

const NOT_PRESENT: SchemeOutcome = { present: false, verified: false, certificates: [] };

const SIGNATURE_FILE = /^META-INF\/([^/]+)\.SF$/i;
const SIGNATURE_BLOCK_EXTENSIONS = ['RSA', 'DSA', 'EC'];

/** 매니페스트 속성 이름의 알고리즘 표기 (SHA1과 SHA-1 모두 허용) */
const DIGEST_NAMES: Array<[string, V1DigestAlgorithm]> = [
  ['SHA-256', 'SHA-256'],
  ['SHA-1', 'SHA-1'],
  ['SHA1', 'SHA-1'],
];

function findDigest(
  attributes: Map<string, string>,
  suffix: string
): { algorithm: V1DigestAlgorithm; value: string } | undefined {
  for (const [prefix, algorithm] of DIGEST_NAMES) {
    const value = attributes.get(`${prefix}-${suffix}`);
    if (value !== undefined) {
      return { algorithm, value };
    }
  }
  return undefined;
}

/**
 * JAR 서명(V1) 검증
 */
function verifyV1(
  entries: ApkEntry[],
  presentSchemes: Set<SchemeVersion>,
  errors: string[],
  warnings: string[],
  minSdkVersion: number
): SchemeOutcome {
  const byName = new Map(entries.map((entry) => [entry.name, entry]));
  const manifestEntry = byName.get(MANIFEST_ENTRY_NAME);
  const signatureFiles = entries.filter((entry) => SIGNATURE_FILE.test(entry.name));
  if (!manifestEntry && signatureFiles.length === 0) {
    return NOT_PRESENT;
  }
  if (!manifestEntry) {
    errors.push(`V1: ${MANIFEST_ENTRY_NAME}가 없습니다`);
    return { present: true, verified: false, certificates: [] };
  }
  if (signatureFiles.length === 0) {
    errors.push('V1: 서명 파일(.SF)이 없습니다');
    return { present: true, verified: false, certificates: [] };
  }

  const errorCount = errors.length;
  const certificates: Buffer[] = [];

  for (const signatureFile of signatureFiles) {
    const signerName = signatureFile.name.slice('META-INF/'.length, -'.SF'.length);
    const blockEntry = SIGNATURE_BLOCK_EXTENSIONS.map((ext) =>
      byName.get(`META-INF/${signerName}.${ext}`)
    ).find((entry) => entry !== undefined);
    if (!blockEntry) {
      errors.push(`V1 서명자 ${signerName}: 서명 블록 파일이 없습니다`);
      continue;
    }

    try {
      const info = parseSignatureBlock(blockEntry.data);
      const failure = verifySignatureBlock(info, signatureFile.data);
      if (failure) {
        errors.push(`V1 서명자 ${signerName}: ${failure}`);
        continue;
      }
      certificates.push(info.certificates[0]);
    } catch (error) {
      errors.push(`V1 서명자 ${signerName}: 서명 블록을 해석할 수 없습니다 (${errorMessage(error)})`);
      continue;
    }

    let sf: ReturnType<typeof parseManifest>;
    try {
      sf = parseManifest(signatureFile.data);
    } catch (error) {
      errors.push(`V1 서명자 ${signerName}: 서명 파일 형식 오류 (${errorMessage(error)})`);
      continue;
    }
    const manifestDigest = findDigest(sf.main, 'Digest-Manifest');
    if (!manifestDigest) {
      errors.push(`V1 서명자 ${signerName}: 서명 파일에 매니페스트 다이제스트가 없습니다`);
    } else if (digestBase64(manifestDigest.algorithm, manifestEntry.data) !== manifestDigest.value) {
      errors.push(`V1 서명자 ${signerName}: 매니페스트 다이제스트가 일치하지 않습니다`);
    } else if (manifestDigest.algorithm === 'SHA-1' && minSdkVersion >= MIN_SDK_WITH_SHA256_JAR) {
      warnings.push(`V1 서명자 ${signerName}: SHA-1 다이제스트를 사용합니다`);
    }

    // v2/v3 서명이 제거된 APK를 V1만으로 통과시키지 않음
    const signedWith = sf.main.get('X-Android-APK-Signed');
    if (signedWith) {
      for (const id of signedWith.split(',').map((value) => value.trim())) {
        if ((id === '2' || id === '3') && !presentSchemes.has(id === '2' ? 2 : 3)) {
          errors.push(
            `V1 서명자 ${signerName}: v${id} 서명으로도 서명되었다고 표시되어 있지만 v${id} 서명이 없습니다`
          );
        }
      }
    }
  }

  let manifest: ReturnType<typeof parseManifest>;
  try {
    manifest = parseManifest(manifestEntry.data);
  } catch (error) {
    errors.push(`V1: 매니페스트 형식 오류 (${errorMessage(error)})`);
    return { present: true, verified: false, certificates };
  }

  for (const entry of entries) {
    if (isSignatureEntry(entry.name)) continue;
    const section = manifest.entries.get(entry.name);
    const digest = section && findDigest(section, 'Digest');
    if (!digest) {
      errors.push(`V1: 매니페스트에 없는 엔트리입니다: ${entry.name}`);
    } else if (digestBase64(digest.algorithm, entry.data) !== digest.value) {
      errors.push(`V1: 엔트리 다이제스트가 일치하지 않습니다: ${entry.name}`);
    }
  }
  for (const name of manifest.entries.keys()) {
    if (!byName.has(name)) {
      errors.push(`V1: 매니페스트의 엔트리가 APK에 없습니다: ${name}`);
    }
  }

  return { present: true, verified: errors.length === errorCount, certificates };
}

/**
 * APK Signature Scheme v2/v3 블록 검증
 */
function verifySchemeBlock(
  version: SchemeVersion,
  value: Buffer | undefined,
  contentDigest: Buffer,
  errors: string[]
): SchemeOutcome {
  if (!value) {
    return NOT_PRESENT;
  }
  const label = `V${version}`;
  const errorCount = errors.length;

  let signers: ReturnType<typeof parseSchemeBlock>;
  try {
    signers = parseSchemeBlock(version, value);
  } catch (error) {
    errors.push(`${label}: 서명 블록을 해석할 수 없습니다 (${errorMessage(error)})`);
    return { present: true, verified: false, certificates: [] };
  }
  if (signers.length === 0) {
    errors.push(`${label}: 서명자가 없습니다`);
    return { present: true, verified: false, certificates: [] };
  }

  const certificates: Buffer[] = [];
  signers.forEach((signer, index) => {
    const prefix = `${label} 서명자 #${index + 1}`;
    const signature = signer.signatures.find(
      (s) => s.algorithmId === SIGNATURE_RSA_PKCS1_V1_5_WITH_SHA256
    );
    if (!signature) {
      errors.push(`${prefix}: 지원하는 서명 알고리즘이 없습니다`);
      return;
    }

    let publicKey: crypto.KeyObject;
    try {
      publicKey = crypto.createPublicKey({ key: signer.publicKey, format: 'der', type: 'spki' });
    } catch (error) {
      errors.push(`${prefix}: 공개키를 읽을 수 없습니다 (${errorMessage(error)})`);
      return;
    }
    if (!crypto.verify('sha256', signer.signedData, publicKey, signature.signature)) {
      errors.push(`${prefix}: signed data 서명이 유효하지 않습니다`);
      return;
    }

    const signatureIds = signer.signatures.map((s) => s.algorithmId).sort();
    const digestIds = signer.digests.map((d) => d.algorithmId).sort();
    if (signatureIds.join(',') !== digestIds.join(',')) {
      errors.push(`${prefix}: 서명과 다이제스트의 알고리즘 목록이 다릅니다`);
    }

    const recorded = recordedContentDigest(signer);
    if (!recorded || !recorded.equals(contentDigest)) {
      errors.push(`${prefix}: APK 콘텐츠 다이제스트가 일치하지 않습니다`);
    }

    const [certificate] = signer.certificates;
    if (!certificate) {
      errors.push(`${prefix}: 인증서가 없습니다`);
      return;
    }
    try {
      const certificateKey = new crypto.X509Certificate(certificate).publicKey.export({
        type: 'spki',
        format: 'der',
      });
      if (!certificateKey.equals(signer.publicKey)) {
        errors.push(`${prefix}: 인증서의 공개키가 서명자 공개키와 다릅니다`);
      }
    } catch (error) {
      errors.push(`${prefix}: 인증서를 읽을 수 없습니다 (${errorMessage(error)})`);
      return;
    }
    certificates.push(certificate);
  });

  return { present: true, verified: errors.length === errorCount, certificates };
}

function resolveMinSdk(entries: ApkEntry[], options: VerifyOptions): number {
  if (options.minSdkVersion !== undefined) {
    return options.minSdkVersion;
  }
  const manifest = entries.find((entry) => entry.name === ANDROID_MANIFEST_ENTRY);
  if (!manifest) {
    throw new MinSdkVersionError(`APK에 ${ANDROID_MANIFEST_ENTRY}가 없습니다`);
  }
  return minSdkVersionOf(readManifestInfo(manifest.data));
}

function sameCertificates(a: Buffer[], b: Buffer[]): boolean {
  const key = (list: Buffer[]) =>
    list
      .map((der) => crypto.createHash('sha256').update(der).digest('hex'))
      .sort()
      .join(',');
  return key(a) === key(b);
}

/**
 * APK의 V1/V2/V3 서명 검증
 *
 * 지정된 SDK 범위에서 필요한 스킴이 모두 유효해야 verified입니다.
 * 파일을 읽을 수 없거나 ZIP 구조가 잘못되었으면 ApkFormatError를 던집니다.
 */
export async function verifyApk(
  apkPath: string,
  options: VerifyOptions = {}
): Promise<ApkVerificationResult> {
  let apk: Buffer;
  try {
    apk = await fs.readFile(apkPath);
  } catch (error) {
    throw new ApkFormatError(`APK를 읽을 수 없습니다: ${apkPath} (${errorMessage(error)})`);
  }

  const sections = parseApkSections(apk);
  const entries = await readApkEntries(apkPath);
  const minSdkVersion = resolveMinSdk(entries, options);
  const maxSdkVersion = options.maxSdkVersion ?? Number.MAX_SAFE_INTEGER;
  if (minSdkVersion > maxSdkVersion) {
    throw new ParameterError(
      `최소 SDK(${minSdkVersion})가 최대 SDK(${maxSdkVersion})보다 큽니다`
    );
  }
  logger.debug('APK 서명 검증', { apkPath, minSdkVersion, maxSdkVersion });

  const errors: string[] = [];
  const warnings: string[] = [];

  const blocks = new Map<SchemeVersion, Buffer>();
  if (sections.signingBlock) {
    for (const pair of parseSigningBlock(sections.signingBlock)) {
      for (const version of [2, 3] as const) {
        if (pair.id === blockIdFor(version)) {
          blocks.set(version, pair.value);
        }
      }
    }
  }
  const contentDigest = blocks.size > 0 ? computeContentDigest(sections) : Buffer.alloc(0);

  const v2 = verifySchemeBlock(2, blocks.get(2), contentDigest, errors);
  const v3 = verifySchemeBlock(3, blocks.get(3), contentDigest, errors);
  const v1 = verifyV1(entries, new Set(blocks.keys()), errors, warnings, minSdkVersion);

  if (v2.present && !v3.present) {
    const v2Value = blocks.get(2);
    const protectedSigner =
      v2Value !== undefined &&
      v2.verified &&
      parseSchemeBlock(2, v2Value).some((signer) => hasStrippingProtection(signer));
    if (protectedSigner) {
      errors.push('V2 서명이 v3 서명도 있었다고 표시하지만 v3 서명이 없습니다');
    }
  }

  if (!v1.present && !v2.present && !v3.present) {
    errors.push('서명되지 않은 APK입니다');
  } else if (!v1.present && minSdkVersion < MIN_SDK_WITH_V2) {
    errors.push(`최소 SDK ${minSdkVersion}에서는 V1 서명이 필요하지만 없습니다`);
  }
  if (v1.verified && v2.verified && !sameCertificates(v1.certificates, v2.certificates)) {
    errors.push('V1과 V2 서명자 인증서가 다릅니다');
  }

  const signerCertificates = v3.verified
    ? v3.certificates
    : v2.verified
      ? v2.certificates
      : v1.certificates;

  return {
    verified: errors.length === 0,
    verifiedUsingV1: v1.verified,
    verifiedUsingV2: v2.verified,
    verifiedUsingV3: v3.verified,
    signerCertificates,
    errors,
    warnings,
  };
}
