/**
 * APK 변형 이름 처리 유틸리티
 *
 * 변형 이름은 두 단계(다이제스트 생성/서명 적용) 사이에서 다이제스트를
 * 다시 찾아내는 키로 쓰입니다.
 */

import { toUnixPath } from './path-utils';

/** 아카이브 경로나 전송 파일 줄이 APK를 가리키는지 판단하는 표식 */
export const APK_MARKER = '.apk';

/**
 * APK를 담은 아카이브 엔트리인지 확인 (디렉토리 엔트리 제외)
 */
export function isApkEntry(entryPath: string): boolean {
  const unixPath = toUnixPath(entryPath);
  return !unixPath.endsWith('/') && unixPath.includes(APK_MARKER);
}

/**
 * 아카이브 경로를 변형 이름으로 변환
 * 첫 번째 '.apk' 뒤는 잘라내고 경로 구분자는 '_'로 바꿉니다.
 *
 * @example
 * toVariantName('splits/base-master.apk') // 'splits_base-master.apk'
 * toVariantName('universal.apk') // 'universal.apk'
 */
export function toVariantName(entryPath: string): string {
  const unixPath = toUnixPath(entryPath);
  const markerIndex = unixPath.indexOf(APK_MARKER);
  if (markerIndex < 0) {
    throw new Error(`APK 엔트리가 아닙니다: ${entryPath}`);
  }
  return unixPath.slice(0, markerIndex + APK_MARKER.length).replace(/\//g, '_');
}

/**
 * 아카이브 경로의 마지막 세그먼트
 */
export function leafName(entryPath: string): string {
  const segments = toUnixPath(entryPath).split('/').filter(Boolean);
  return segments[segments.length - 1] ?? '';
}

/**
 * 유니버설 APK 여부 (파일명 기준)
 */
export function isUniversalVariant(entryPath: string): boolean {
  return leafName(entryPath).includes('universal');
}

/**
 * 서명된 APK의 출력 파일명
 * 유니버설 APK는 자신의 이름을, 나머지는 상위 디렉토리(디바이스 설정)를 접두어로 붙입니다.
 *
 * @example
 * toOutputFileName('universal.apk') // 'universal.apk'
 * toOutputFileName('arm64-v8a/base.apk') // 'arm64-v8a_base.apk'
 */
export function toOutputFileName(entryPath: string): string {
  const segments = toUnixPath(entryPath).split('/').filter(Boolean);
  const leaf = segments[segments.length - 1] ?? '';
  if (isUniversalVariant(entryPath) || segments.length < 2) {
    return leaf;
  }
  return `${segments[segments.length - 2]}_${leaf}`;
}

/**
 * 번들 파일명에서 첫 번째 '.' 앞부분 (app.release.aab → app)
 */
export function bundleBaseName(bundleFileName: string): string {
  return bundleFileName.split('.')[0];
}
