/**
 * JAR 매니페스트 / 서명 파일(.SF) 작성과 파싱
 *
 * 줄은 CRLF로 끝나며 72바이트를 넘으면 공백 한 칸으로 시작하는 연속 줄로 나눕니다.
 */

import * as crypto from 'crypto';
import { SchemeFlags } from '../../types';

export type V1DigestAlgorithm = 'SHA-1' | 'SHA-256';

/** SHA-256 JAR 서명을 인식하는 최소 API 레벨 */
export const MIN_SDK_WITH_SHA256_JAR = 18;

export const MANIFEST_ENTRY_NAME = 'META-INF/MANIFEST.MF';

const LINE_LIMIT = 72;
const CRLF = '\r\n';
const CREATED_BY = '1.0 (bundle-signer)';

export interface ManifestEntryDigest {
  name: string;
  /** base64 */
  digest: string;
}

export interface BuiltManifest {
  bytes: Buffer;
  /** 메인 섹션 (빈 줄 포함) */
  mainSection: Buffer;
  /** 엔트리 이름 → 섹션 바이트 (빈 줄 포함) */
  sections: Map<string, Buffer>;
}

export interface ManifestSection {
  name?: string;
  attributes: Map<string, string>;
}

export interface ParsedManifest {
  main: Map<string, string>;
  entries: Map<string, Map<string, string>>;
}

export function digestAlgorithmForMinSdk(minSdkVersion: number): V1DigestAlgorithm {
  return minSdkVersion >= MIN_SDK_WITH_SHA256_JAR ? 'SHA-256' : 'SHA-1';
}

export function hashName(algorithm: V1DigestAlgorithm): 'sha1' | 'sha256' {
  return algorithm === 'SHA-256' ? 'sha256' : 'sha1';
}

export function digestBase64(algorithm: V1DigestAlgorithm, data: Buffer): string {
  return crypto.createHash(hashName(algorithm)).update(data).digest('base64');
}

/**
 * 시그니처 관련 파일 여부 (매니페스트와 META-INF 바로 아래의 .SF/.RSA/.DSA/.EC)
 */
export function isSignatureEntry(name: string): boolean {
  return name === MANIFEST_ENTRY_NAME || /^META-INF\/[^/]+\.(SF|RSA|DSA|EC)$/i.test(name);
}

/**
 * "이름: 값" 한 줄을 72바이트 단위로 접어 CRLF를 붙입니다.
 * 멀티바이트 문자는 쪼개지 않습니다.
 */
export function formatAttributeLine(name: string, value: string): string {
  const lines: string[] = [];
  let current = '';
  let currentBytes = 0;
  for (const ch of `${name}: ${value}`) {
    const size = Buffer.byteLength(ch, 'utf-8');
    if (currentBytes + size > LINE_LIMIT) {
      lines.push(current);
      current = ' ';
      currentBytes = 1;
    }
    current += ch;
    currentBytes += size;
  }
  lines.push(current);
  return lines.map((line) => `${line}${CRLF}`).join('');
}

function section(attributes: Array<[string, string]>): Buffer {
  const text = attributes.map(([name, value]) => formatAttributeLine(name, value)).join('');
  return Buffer.from(`${text}${CRLF}`, 'utf-8');
}

/**
 * MANIFEST.MF 생성. 엔트리는 호출자가 넘긴 순서대로 기록됩니다.
 */
export function buildManifest(
  entries: ManifestEntryDigest[],
  algorithm: V1DigestAlgorithm
): BuiltManifest {
  const mainSection = section([
    ['Manifest-Version', '1.0'],
    ['Created-By', CREATED_BY],
  ]);
  const sections = new Map<string, Buffer>();
  for (const entry of entries) {
    sections.set(
      entry.name,
      section([
        ['Name', entry.name],
        [`${algorithm}-Digest`, entry.digest],
      ])
    );
  }
  return {
    bytes: Buffer.concat([mainSection, ...sections.values()]),
    mainSection,
    sections,
  };
}

/**
 * X-Android-APK-Signed 값 (v2/v3가 모두 꺼져 있으면 undefined)
 */
export function apkSignedHeaderValue(schemes: SchemeFlags): string | undefined {
  const ids: string[] = [];
  if (schemes.v2) ids.push('2');
  if (schemes.v3) ids.push('3');
  return ids.length > 0 ? ids.join(', ') : undefined;
}

/**
 * 서명 파일(.SF) 생성
 *
 * 매니페스트 전체, 메인 섹션, 엔트리 섹션별 다이제스트를 담습니다.
 */
export function buildSignatureFile(
  manifest: BuiltManifest,
  algorithm: V1DigestAlgorithm,
  schemes: SchemeFlags
): Buffer {
  const main: Array<[string, string]> = [
    ['Signature-Version', '1.0'],
    ['Created-By', CREATED_BY],
    [`${algorithm}-Digest-Manifest`, digestBase64(algorithm, manifest.bytes)],
    [`${algorithm}-Digest-Manifest-Main-Attributes`, digestBase64(algorithm, manifest.mainSection)],
  ];
  const signedWith = apkSignedHeaderValue(schemes);
  if (signedWith) {
    main.push(['X-Android-APK-Signed', signedWith]);
  }

  const parts = [section(main)];
  for (const [name, bytes] of manifest.sections) {
    parts.push(
      section([
        ['Name', name],
        [`${algorithm}-Digest`, digestBase64(algorithm, bytes)],
      ])
    );
  }
  return Buffer.concat(parts);
}

/**
 * 매니페스트 형식 텍스트 파싱 (MANIFEST.MF, *.SF 공용)
 * 연속 줄은 합치고, Name 속성이 있는 섹션은 entries에 모읍니다.
 */
export function parseManifest(bytes: Buffer): ParsedManifest {
  const lines = bytes.toString('utf-8').split(/\r\n|\n|\r/);
  const sections: ManifestSection[] = [];
  let current: Map<string, string> | null = null;
  let lastName: string | null = null;

  const flush = () => {
    if (current) {
      sections.push({ name: current.get('Name'), attributes: current });
    }
    current = null;
    lastName = null;
  };

  for (const line of lines) {
    if (line.length === 0) {
      flush();
      continue;
    }
    if (!current) {
      current = new Map<string, string>();
    }
    if (line.startsWith(' ')) {
      if (lastName === null) {
        throw new Error(`연속 줄 앞에 속성이 없습니다: ${line}`);
      }
      current.set(lastName, `${current.get(lastName) ?? ''}${line.slice(1)}`);
      continue;
    }
    const separator = line.indexOf(': ');
    if (separator <= 0) {
      throw new Error(`매니페스트 속성 형식이 아닙니다: ${line}`);
    }
    lastName = line.slice(0, separator);
    current.set(lastName, line.slice(separator + 2));
  }
  flush();

  const [mainSection, ...rest] = sections;
  const entries = new Map<string, Map<string, string>>();
  for (const entry of rest) {
    if (entry.name !== undefined) {
      entries.set(entry.name, entry.attributes);
    }
  }
  return { main: mainSection?.attributes ?? new Map<string, string>(), entries };
}
