/**
 * 전송 파일 형식 정의
 *
 * 다이제스트 생성 단계와 서명 적용 단계 사이를 잇는 줄 단위 텍스트 파일입니다.
 *
 * ```
 * version: 1.0.0+bundle.<sha256>
 * v2:true,v3:false
 * splits_base-master.apk
 * <V1 페이로드>
 * <V2V3 페이로드>      (v2 또는 v3가 켜진 경우에만)
 * ...
 * ```
 */

import * as semver from 'semver';
import { DigestRecord, SchemeFlags, TransferHeader, VariantDigestGroup } from '../../types';
import { APK_MARKER } from '../shared/variant-names';

/** 이 버전에서 기록하는 포맷 버전 */
export const TRANSFER_FORMAT_VERSION = '1.0.0';

/** 읽을 수 있는 포맷 버전 범위 (0.1.x는 번들 다이제스트가 없는 구버전) */
export const SUPPORTED_FORMAT_VERSIONS = '0.1.x || 1.x';

const BUNDLE_DIGEST_TAG = 'bundle';
const VERSION_LINE = /^version:\s*(\S+)\s*$/;
const FLAGS_LINE = /^v2:\s*(true|false)\s*,\s*v3:\s*(true|false)\s*$/;
const SHA256_HEX = /^[0-9a-f]{64}$/;

/**
 * V2/V3 다이제스트 줄이 필요한지 여부
 */
export function requiresV2V3(flags: SchemeFlags): boolean {
  return flags.v2 || flags.v3;
}

export function createSchemeFlags(v2: boolean, v3: boolean): SchemeFlags {
  return { v1: true, v2, v3 };
}

/**
 * 이름 줄 판별: APK 표식을 포함하면 변형 이름, 아니면 다이제스트 페이로드
 */
export function isNameLine(line: string): boolean {
  return line.includes(APK_MARKER);
}

export function formatVersionLine(header: TransferHeader): string {
  const build = header.bundleDigest ? `+${BUNDLE_DIGEST_TAG}.${header.bundleDigest}` : '';
  return `version: ${header.version}${build}`;
}

export function formatFlagsLine(flags: SchemeFlags): string {
  return `v2:${flags.v2},v3:${flags.v3}`;
}

/**
 * 버전 줄 파싱. 형식이 틀리거나 지원하지 않는 버전이면 사유 문자열을 반환
 */
export function parseVersionLine(line: string): TransferHeader | string {
  const match = VERSION_LINE.exec(line);
  if (!match) {
    return `버전 줄이 아닙니다: ${line}`;
  }
  const parsed = semver.parse(match[1]);
  if (!parsed) {
    return `잘못된 버전 형식: ${match[1]}`;
  }
  if (!semver.satisfies(parsed.version, SUPPORTED_FORMAT_VERSIONS)) {
    return `지원하지 않는 전송 파일 버전: ${parsed.version}`;
  }

  const header: TransferHeader = { version: parsed.version };
  const [tag, digest] = parsed.build;
  if (tag === BUNDLE_DIGEST_TAG && digest !== undefined && SHA256_HEX.test(digest)) {
    header.bundleDigest = digest;
  }
  return header;
}

/**
 * 스킴 플래그 줄 파싱. v2와 v3는 각자의 필드에서 독립적으로 읽습니다.
 */
export function parseFlagsLine(line: string): SchemeFlags | null {
  const match = FLAGS_LINE.exec(line);
  if (!match) {
    return null;
  }
  return createSchemeFlags(match[1] === 'true', match[2] === 'true');
}

/**
 * 그룹 하나를 줄 목록으로 변환. 파싱 시 같은 그룹으로 되돌아오지 않는 값은 거부합니다.
 */
export function formatGroup(group: VariantDigestGroup, flags: SchemeFlags): string[] {
  assertSingleLine(group.variantName, '변형 이름');
  if (!isNameLine(group.variantName)) {
    throw new Error(`변형 이름에 '${APK_MARKER}'가 없습니다: ${group.variantName}`);
  }
  assertPayload(group.v1, group.variantName);

  const lines = [group.variantName, group.v1];
  if (requiresV2V3(flags)) {
    if (group.v2v3 === undefined) {
      throw new Error(`V2/V3 다이제스트가 없습니다: ${group.variantName}`);
    }
    assertPayload(group.v2v3, group.variantName);
    lines.push(group.v2v3);
  } else if (group.v2v3 !== undefined) {
    throw new Error(`V2/V3가 비활성인데 V2/V3 다이제스트가 있습니다: ${group.variantName}`);
  }
  return lines;
}

/**
 * 그룹을 스킴별 레코드로 펼침 (V1, V2V3 순서)
 */
export function toDigestRecords(group: VariantDigestGroup): DigestRecord[] {
  const records: DigestRecord[] = [
    { variantName: group.variantName, schemeKind: 'V1', payload: group.v1 },
  ];
  if (group.v2v3 !== undefined) {
    records.push({ variantName: group.variantName, schemeKind: 'V2V3', payload: group.v2v3 });
  }
  return records;
}

function assertSingleLine(value: string, label: string): void {
  if (value.length === 0 || /[\r\n]/.test(value)) {
    throw new Error(`${label}은(는) 비어 있지 않은 한 줄이어야 합니다`);
  }
}

function assertPayload(payload: string, variantName: string): void {
  assertSingleLine(payload, `다이제스트 페이로드 (${variantName})`);
  if (isNameLine(payload)) {
    throw new Error(`다이제스트 페이로드에 '${APK_MARKER}'가 포함되어 있습니다: ${variantName}`);
  }
}
