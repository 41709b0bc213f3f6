import * as fs from 'fs-extra';
import * as path from 'path';
import { SchemeFlags, SignerConfig } from '../../types';
import { ApkFormatError, DigestMismatchError, SignerError, errorMessage } from '../errors';
import {
  SigningBlockPair,
  buildSigningBlock,
  insertSigningBlock,
  parseApkSections,
} from './apkSections';
import { computeContentDigest } from './contentDigest';
import {
  SchemeSignerBlock,
  SchemeVersion,
  blockIdFor,
  buildSchemeBlock,
  parseSchemeBlock,
  recordedContentDigest,
} from './schemeBlocks';

const SCHEME_PART = /^v([23]):([A-Za-z0-9+/]+={0,2})$/;

async function readApk(apkPath: string): Promise<Buffer> {
  try {
    return await fs.readFile(apkPath);
  } catch (error) {
    throw new ApkFormatError(`APK를 읽을 수 없습니다: ${apkPath} (${errorMessage(error)})`);
  }
}

/**
 * V2V3 페이로드 생성
 *
 * V1 서명된 APK의 콘텐츠 다이제스트로 활성화된 스킴의 블록 값을 만듭니다.
 * 결과: "v2:<base64>,v3:<base64>" (활성 스킴만)
 */
export async function generateV2V3Payload(
  v1SignedApk: string,
  signers: SignerConfig[],
  schemes: SchemeFlags
): Promise<string> {
  const sections = parseApkSections(await readApk(v1SignedApk));
  const contentDigest = computeContentDigest(sections);

  const parts: string[] = [];
  for (const version of activeVersions(schemes)) {
    let value: Buffer;
    try {
      value = buildSchemeBlock(version, signers, contentDigest, { v3Enabled: schemes.v3 });
    } catch (error) {
      throw new SignerError(`v${version} 서명 실패: ${errorMessage(error)}`, { cause: error });
    }
    parts.push(`v${version}:${value.toString('base64')}`);
  }
  return parts.join(',');
}

function activeVersions(schemes: SchemeFlags): SchemeVersion[] {
  const versions: SchemeVersion[] = [];
  if (schemes.v2) versions.push(2);
  if (schemes.v3) versions.push(3);
  return versions;
}

/**
 * V2V3 페이로드 파싱 (스킴 버전 → 블록 값)
 */
export function parseV2V3Payload(payload: string): Map<SchemeVersion, Buffer> {
  const blocks = new Map<SchemeVersion, Buffer>();
  for (const part of payload.split(',')) {
    const match = SCHEME_PART.exec(part);
    if (!match) {
      throw new SignerError(`V2/V3 페이로드 형식이 잘못되었습니다: ${part.slice(0, 40)}`);
    }
    const version: SchemeVersion = match[1] === '2' ? 2 : 3;
    if (blocks.has(version)) {
      throw new SignerError(`V2/V3 페이로드에 v${version} 블록이 중복됩니다`);
    }
    blocks.set(version, Buffer.from(match[2], 'base64'));
  }
  return blocks;
}

/**
 * V2V3 페이로드 적용
 *
 * 기록된 signed data의 콘텐츠 다이제스트가 현재 APK와 같은지 확인한 뒤
 * 중앙 디렉토리 앞에 APK Signing Block을 넣습니다. 기존 서명 블록은 버립니다.
 */
export async function applyV2V3Payload(
  v1SignedApk: string,
  payload: string,
  outputApk: string,
  schemes: SchemeFlags
): Promise<void> {
  const blocks = parseV2V3Payload(payload);
  for (const version of [2, 3] as const) {
    const enabled = version === 2 ? schemes.v2 : schemes.v3;
    if (blocks.has(version) !== enabled) {
      throw new SignerError(
        `V2/V3 페이로드의 v${version} 블록 유무가 스킴 플래그(v${version}:${enabled})와 맞지 않습니다`
      );
    }
  }

  const sections = parseApkSections(await readApk(v1SignedApk));
  const contentDigest = computeContentDigest(sections);

  const pairs: SigningBlockPair[] = [];
  for (const version of activeVersions(schemes)) {
    const value = blocks.get(version);
    if (!value) continue;

    let signers: SchemeSignerBlock[];
    try {
      signers = parseSchemeBlock(version, value);
    } catch (error) {
      throw new SignerError(`v${version} 블록을 해석할 수 없습니다: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    for (const signer of signers) {
      const recorded = recordedContentDigest(signer);
      if (!recorded || !recorded.equals(contentDigest)) {
        throw new DigestMismatchError(
          `v${version} 콘텐츠 다이제스트가 기록과 다릅니다: 재빌드된 APK가 다이제스트 생성 때와 다릅니다`
        );
      }
    }
    pairs.push({ id: blockIdFor(version), value });
  }

  await fs.ensureDir(path.dirname(outputApk));
  await fs.writeFile(outputApk, insertSigningBlock(sections, buildSigningBlock(pairs)));
}
