/**
 * 아카이브 내부 경로 처리 유틸리티
 */

import * as path from 'path';

/**
 * 경로를 Unix 스타일(슬래시)로 변환
 * ZIP 아카이브 내부 경로에 사용
 */
export function toUnixPath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * 아카이브 내부 경로를 baseDir 아래의 로컬 파일 경로로 변환
 * baseDir 밖으로 벗어나는 경로는 거부합니다.
 */
export function resolveArchivePath(baseDir: string, archivePath: string): string {
  const base = path.resolve(baseDir);
  const resolved = path.resolve(base, ...toUnixPath(archivePath).split('/').filter(Boolean));
  if (resolved !== base && !resolved.startsWith(base + path.sep)) {
    throw new Error(`작업 디렉토리를 벗어나는 경로입니다: ${archivePath}`);
  }
  return resolved;
}
