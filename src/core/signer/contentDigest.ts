import * as crypto from 'crypto';
import { ApkSections, withCentralDirectoryOffset } from './apkSections';

const CHUNK_SIZE = 1024 * 1024;
const CHUNK_PREFIX = 0xa5;
const TOP_LEVEL_PREFIX = 0x5a;

function chunkDigest(chunk: Buffer): Buffer {
  const header = Buffer.alloc(5);
  header.writeUInt8(CHUNK_PREFIX, 0);
  header.writeUInt32LE(chunk.length, 1);
  return crypto.createHash('sha256').update(header).update(chunk).digest();
}

/**
 * 1 MiB 청크 단위 SHA-256 콘텐츠 다이제스트
 *
 * 청크: SHA-256(0xa5 || uint32 len || chunk)
 * 최상위: SHA-256(0x5a || uint32 chunkCount || chunkDigest*)
 *
 * EOCD의 중앙 디렉토리 offset은 서명 블록이 들어갈 위치(contentsEnd)로 바꿔서 계산합니다.
 */
export function computeContentDigest(sections: ApkSections): Buffer {
  const eocd = withCentralDirectoryOffset(sections.eocd, sections.contentsEnd);
  const digests: Buffer[] = [];
  for (const section of [sections.contents, sections.centralDirectory, eocd]) {
    for (let offset = 0; offset < section.length; offset += CHUNK_SIZE) {
      digests.push(chunkDigest(section.subarray(offset, offset + CHUNK_SIZE)));
    }
  }

  const header = Buffer.alloc(5);
  header.writeUInt8(TOP_LEVEL_PREFIX, 0);
  header.writeUInt32LE(digests.length, 1);
  const top = crypto.createHash('sha256').update(header);
  for (const digest of digests) {
    top.update(digest);
  }
  return top.digest();
}
