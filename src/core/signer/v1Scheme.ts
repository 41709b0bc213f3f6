import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { SchemeFlags, SignerConfig } from '../../types';
import { ApkFormatError, DigestMismatchError, SignerError, errorMessage } from '../errors';
import { ZipReader, isDirectoryEntry } from '../zip/zipReader';
import {
  BuiltManifest,
  MANIFEST_ENTRY_NAME,
  V1DigestAlgorithm,
  buildManifest,
  buildSignatureFile,
  digestBase64,
  isSignatureEntry,
} from './jarManifest';
import { StoredEntry, rewriteApk } from './apkRewriter';
import { createSignatureBlock } from './pkcs7';

/** APK 엔트리 (압축 해제된 데이터) */
export interface ApkEntry {
  name: string;
  data: Buffer;
  /** 원본이 STORED였는지 */
  store: boolean;
}

/** 서명자 하나의 V1 페이로드 */
export interface V1SignerPayload {
  name: string;
  algorithm: V1DigestAlgorithm;
  /** .SF의 SHA-256 (base64) */
  signatureFileHash: string;
  /** PKCS#7 서명 블록 DER */
  signatureBlock: Buffer;
}

const SIGNER_NAME = /^[A-Z0-9_-]{1,8}$/;
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * APK의 파일 엔트리를 순서대로 읽습니다 (디렉토리 엔트리 제외).
 */
export async function readApkEntries(apkPath: string): Promise<ApkEntry[]> {
  let reader: ZipReader;
  try {
    reader = await ZipReader.open(apkPath);
  } catch (error) {
    throw new ApkFormatError(`APK를 열 수 없습니다: ${apkPath} (${errorMessage(error)})`);
  }

  try {
    const entries: ApkEntry[] = [];
    for await (const entry of reader.entries()) {
      if (isDirectoryEntry(entry)) continue;
      entries.push({
        name: entry.fileName,
        data: await reader.readBuffer(entry),
        store: entry.compressionMethod === 0,
      });
    }
    return entries;
  } catch (error) {
    throw new ApkFormatError(`APK 읽기 실패: ${apkPath} (${errorMessage(error)})`);
  } finally {
    reader.close();
  }
}

/**
 * 엔트리 목록으로 MANIFEST.MF와 .SF를 만듭니다. 엔트리는 이름순으로 기록됩니다.
 */
export function buildV1Files(
  entries: ApkEntry[],
  algorithm: V1DigestAlgorithm,
  schemes: SchemeFlags
): { manifest: BuiltManifest; signatureFile: Buffer } {
  const digests = entries
    .filter((entry) => !isSignatureEntry(entry.name))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((entry) => ({ name: entry.name, digest: digestBase64(algorithm, entry.data) }));

  const manifest = buildManifest(digests, algorithm);
  return { manifest, signatureFile: buildSignatureFile(manifest, algorithm, schemes) };
}

function sha256Base64(data: Buffer): string {
  return crypto.createHash('sha256').update(data).digest('base64');
}

export function formatV1Payload(signers: V1SignerPayload[]): string {
  return signers
    .map((s) =>
      [s.name, s.algorithm, s.signatureFileHash, s.signatureBlock.toString('base64')].join(':')
    )
    .join(';');
}

/**
 * NAME:ALG:SF해시:PKCS7 (서명자별, ';' 구분)
 */
export function parseV1Payload(payload: string): V1SignerPayload[] {
  const signers = payload.split(';').map((part): V1SignerPayload => {
    const fields = part.split(':');
    if (fields.length !== 4) {
      throw new SignerError(`V1 페이로드 형식이 잘못되었습니다: ${part.slice(0, 40)}`);
    }
    const [name, algorithm, signatureFileHash, block] = fields;
    if (!SIGNER_NAME.test(name)) {
      throw new SignerError(`V1 서명자 이름이 잘못되었습니다: ${name}`);
    }
    if (algorithm !== 'SHA-1' && algorithm !== 'SHA-256') {
      throw new SignerError(`V1 다이제스트 알고리즘이 잘못되었습니다: ${algorithm}`);
    }
    if (!BASE64.test(signatureFileHash) || !BASE64.test(block)) {
      throw new SignerError(`V1 페이로드의 base64 값이 잘못되었습니다: ${name}`);
    }
    return {
      name,
      algorithm,
      signatureFileHash,
      signatureBlock: Buffer.from(block, 'base64'),
    };
  });

  const names = new Set<string>();
  for (const signer of signers) {
    if (names.has(signer.name)) {
      throw new SignerError(`V1 서명자 이름이 중복됩니다: ${signer.name}`);
    }
    names.add(signer.name);
  }
  return signers;
}

/**
 * V1 페이로드 생성: 서명자마다 같은 .SF를 PKCS#7로 서명
 */
export async function generateV1Payload(
  apkPath: string,
  signers: SignerConfig[],
  algorithm: V1DigestAlgorithm,
  schemes: SchemeFlags
): Promise<string> {
  const entries = await readApkEntries(apkPath);
  const { signatureFile } = buildV1Files(entries, algorithm, schemes);
  const signatureFileHash = sha256Base64(signatureFile);

  return formatV1Payload(
    signers.map((signer) => {
      let signatureBlock: Buffer;
      try {
        signatureBlock = createSignatureBlock(signatureFile, signer, algorithm);
      } catch (error) {
        throw new SignerError(`V1 서명 실패 (${signer.name}): ${errorMessage(error)}`, {
          cause: error,
        });
      }
      return { name: signer.name, algorithm, signatureFileHash, signatureBlock };
    })
  );
}

/**
 * V1 페이로드 적용
 *
 * 재빌드된 APK로 .SF를 다시 만들어 기록된 해시와 비교한 뒤,
 * MANIFEST.MF, 서명자별 .SF/.RSA를 앞에 두고 나머지 엔트리는 압축된 바이트 그대로
 * 원래 순서로 복사합니다.
 */
export async function applyV1Payload(
  apkPath: string,
  payload: string,
  outputPath: string,
  schemes: SchemeFlags
): Promise<void> {
  const signers = parseV1Payload(payload);
  const [first] = signers;
  if (!first) {
    throw new SignerError('V1 페이로드에 서명자가 없습니다');
  }
  if (signers.some((signer) => signer.algorithm !== first.algorithm)) {
    throw new SignerError('V1 서명자들의 다이제스트 알고리즘이 서로 다릅니다');
  }

  const entries = await readApkEntries(apkPath);
  const { manifest, signatureFile } = buildV1Files(entries, first.algorithm, schemes);
  const actualHash = sha256Base64(signatureFile);
  for (const signer of signers) {
    if (signer.signatureFileHash !== actualHash) {
      throw new DigestMismatchError(
        `V1 서명 파일 다이제스트가 기록과 다릅니다 (서명자 ${signer.name}): APK 내용이나 스킴 플래그가 달라졌습니다`
      );
    }
  }

  const signatureEntries: StoredEntry[] = [{ name: MANIFEST_ENTRY_NAME, data: manifest.bytes }];
  for (const signer of signers) {
    signatureEntries.push({ name: `META-INF/${signer.name}.SF`, data: signatureFile });
    signatureEntries.push({ name: `META-INF/${signer.name}.RSA`, data: signer.signatureBlock });
  }

  const apk = await fs.readFile(apkPath);
  await fs.ensureDir(path.dirname(outputPath));
  await fs.writeFile(outputPath, rewriteApk(apk, signatureEntries, isSignatureEntry));
}
