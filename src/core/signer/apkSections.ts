import { ApkFormatError } from '../errors';
import { ByteReader, uint32, uint64 } from './bytes';

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_MIN_SIZE = 22;
const EOCD_MAX_COMMENT = 0xffff;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_LOCATOR_SIZE = 20;

export const APK_SIG_BLOCK_MAGIC = Buffer.from('APK Sig Block 42', 'ascii');
const APK_SIG_BLOCK_MIN_SIZE = 32;

/**
 * 서명 관점에서 본 APK의 구간
 *
 * [contents][signing block?][central directory][EOCD]
 */
export interface ApkSections {
  /** 로컬 파일 헤더와 데이터 (서명 블록 앞까지) */
  contents: Buffer;
  /** 기존 APK Signing Block (없으면 null) */
  signingBlock: Buffer | null;
  centralDirectory: Buffer;
  eocd: Buffer;
  /** contents 끝 = 서명 블록이 놓일 위치 */
  contentsEnd: number;
}

export interface SigningBlockPair {
  id: number;
  value: Buffer;
}

function formatError(message: string): ApkFormatError {
  return new ApkFormatError(`잘못된 APK: ${message}`);
}

/**
 * End of Central Directory 레코드 위치 (코멘트 길이까지 일치해야 인정)
 */
export function findEocdOffset(apk: Buffer): number {
  if (apk.length < EOCD_MIN_SIZE) {
    return -1;
  }
  const lowest = Math.max(0, apk.length - EOCD_MIN_SIZE - EOCD_MAX_COMMENT);
  for (let offset = apk.length - EOCD_MIN_SIZE; offset >= lowest; offset--) {
    if (apk.readUInt32LE(offset) !== EOCD_SIGNATURE) continue;
    const commentLength = apk.readUInt16LE(offset + 20);
    if (offset + EOCD_MIN_SIZE + commentLength === apk.length) {
      return offset;
    }
  }
  return -1;
}

/**
 * APK를 contents / 서명 블록 / 중앙 디렉토리 / EOCD로 나눕니다.
 * ZIP64 아카이브는 지원하지 않습니다.
 */
export function parseApkSections(apk: Buffer): ApkSections {
  const eocdOffset = findEocdOffset(apk);
  if (eocdOffset < 0) {
    throw formatError('End of Central Directory를 찾을 수 없습니다');
  }

  if (
    eocdOffset >= ZIP64_LOCATOR_SIZE &&
    apk.readUInt32LE(eocdOffset - ZIP64_LOCATOR_SIZE) === ZIP64_LOCATOR_SIGNATURE
  ) {
    throw formatError('ZIP64 아카이브는 지원하지 않습니다');
  }

  const eocd = apk.subarray(eocdOffset);
  const totalEntries = eocd.readUInt16LE(10);
  const cdSize = eocd.readUInt32LE(12);
  const cdOffset = eocd.readUInt32LE(16);
  if (totalEntries === 0xffff || cdSize === 0xffffffff || cdOffset === 0xffffffff) {
    throw formatError('ZIP64 아카이브는 지원하지 않습니다');
  }
  if (cdOffset + cdSize !== eocdOffset) {
    throw formatError(
      `중앙 디렉토리 위치가 맞지 않습니다 (offset ${cdOffset} + size ${cdSize} != ${eocdOffset})`
    );
  }

  const blockStart = findSigningBlockStart(apk, cdOffset);
  const contentsEnd = blockStart ?? cdOffset;

  return {
    contents: apk.subarray(0, contentsEnd),
    signingBlock: blockStart === null ? null : apk.subarray(blockStart, cdOffset),
    centralDirectory: apk.subarray(cdOffset, eocdOffset),
    eocd,
    contentsEnd,
  };
}

function findSigningBlockStart(apk: Buffer, cdOffset: number): number | null {
  if (cdOffset < APK_SIG_BLOCK_MIN_SIZE) {
    return null;
  }
  const magic = apk.subarray(cdOffset - APK_SIG_BLOCK_MAGIC.length, cdOffset);
  if (!magic.equals(APK_SIG_BLOCK_MAGIC)) {
    return null;
  }

  const footerSize = apk.readBigUInt64LE(cdOffset - APK_SIG_BLOCK_MAGIC.length - 8);
  const totalSize = footerSize + 8n;
  if (footerSize < 24n || totalSize > BigInt(cdOffset)) {
    throw formatError(`APK Signing Block 크기가 잘못되었습니다: ${footerSize}`);
  }
  const start = cdOffset - Number(totalSize);
  if (apk.readBigUInt64LE(start) !== footerSize) {
    throw formatError('APK Signing Block 머리/꼬리 크기가 다릅니다');
  }
  return start;
}

/**
 * EOCD의 중앙 디렉토리 offset 필드를 바꾼 사본
 */
export function withCentralDirectoryOffset(eocd: Buffer, offset: number): Buffer {
  const patched = Buffer.from(eocd);
  patched.writeUInt32LE(offset, 16);
  return patched;
}

/**
 * APK Signing Block의 ID-값 쌍 목록
 */
export function parseSigningBlock(block: Buffer): SigningBlockPair[] {
  const reader = new ByteReader(block, formatError);
  reader.readUInt64();
  const pairs: SigningBlockPair[] = [];
  const trailerSize = 8 + APK_SIG_BLOCK_MAGIC.length;
  while (reader.remaining > trailerSize) {
    const length = reader.readUInt64();
    if (length < 4) {
      throw formatError(`APK Signing Block 항목 길이가 잘못되었습니다: ${length}`);
    }
    const id = reader.readUInt32();
    pairs.push({ id, value: reader.readBytes(length - 4) });
  }
  if (reader.remaining !== trailerSize) {
    throw formatError('APK Signing Block 끝이 잘렸습니다');
  }
  return pairs;
}

/**
 * APK Signing Block 생성
 *
 * uint64 size | (uint64 len, uint32 id, value)* | uint64 size | magic
 * size는 첫 size 필드를 제외한 블록 크기입니다.
 */
export function buildSigningBlock(pairs: SigningBlockPair[]): Buffer {
  const encodedPairs = pairs.map((pair) =>
    Buffer.concat([uint64(pair.value.length + 4), uint32(pair.id), pair.value])
  );
  const pairsSize = encodedPairs.reduce((sum, pair) => sum + pair.length, 0);
  const size = pairsSize + 8 + APK_SIG_BLOCK_MAGIC.length;
  return Buffer.concat([uint64(size), ...encodedPairs, uint64(size), APK_SIG_BLOCK_MAGIC]);
}

/**
 * contents 뒤에 서명 블록을 넣고 EOCD offset을 고친 APK
 */
export function insertSigningBlock(sections: ApkSections, block: Buffer): Buffer {
  const centralDirectoryOffset = sections.contentsEnd + block.length;
  return Buffer.concat([
    sections.contents,
    block,
    sections.centralDirectory,
    withCentralDirectoryOffset(sections.eocd, centralDirectoryOffset),
  ]);
}
