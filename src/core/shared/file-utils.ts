// 파일 해시 및 복사 유틸리티
import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';

/**
 * 파일을 스트리밍으로 읽어 SHA-256 hex 다이제스트 계산
 */
export async function sha256File(filePath: string): Promise<string> {
  const digest = await digestStream(fs.createReadStream(filePath), 'sha256');
  return digest.toString('hex');
}

/**
 * 스트림을 파일로 기록 (상위 디렉토리 자동 생성)
 */
export async function writeStreamToFile(source: Readable, destPath: string): Promise<void> {
  await fs.ensureDir(path.dirname(destPath));
  await pipeline(source, fs.createWriteStream(destPath));
}

/**
 * 스트림 전체를 지정한 해시로 다이제스트
 */
export async function digestStream(source: Readable, algorithm: string): Promise<Buffer> {
  const hash = crypto.createHash(algorithm);
  for await (const chunk of source) {
    hash.update(chunk);
  }
  return hash.digest();
}

/**
 * 파일 존재 여부 (일반 파일만)
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
