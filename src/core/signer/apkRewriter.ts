import { ApkFormatError } from '../errors';
import { ByteReader } from './bytes';
import { parseApkSections } from './apkSections';

const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const EOCD_SIGNATURE = 0x06054b50;
const LOCAL_HEADER_SIZE = 30;

/** 데이터 디스크립터 사용 플래그 (bit 3) */
const FLAG_DATA_DESCRIPTOR = 0x0008;
const METHOD_STORED = 0;

/** 정렬 패딩용 extra 필드 ID */
export const ALIGNMENT_EXTRA_ID = 0xd935;
export const STORED_ALIGNMENT = 4;
export const NATIVE_LIBRARY_ALIGNMENT = 4096;

/** 새로 만드는 엔트리의 DOS 날짜 (2008-01-01 00:00) */
const FIXED_DOS_TIME = 0;
const FIXED_DOS_DATE = ((2008 - 1980) << 9) | (1 << 5) | 1;

/** 중앙 디렉토리 레코드 (원본 바이트 그대로) */
export interface CentralDirectoryRecord {
  name: string;
  nameBytes: Buffer;
  versionMadeBy: number;
  versionNeeded: number;
  flags: number;
  method: number;
  time: number;
  date: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  internalAttributes: number;
  externalAttributes: number;
  localHeaderOffset: number;
  extra: Buffer;
  comment: Buffer;
}

/** 압축하지 않고 새로 넣는 엔트리 */
export interface StoredEntry {
  name: string;
  data: Buffer;
}

function formatError(message: string): ApkFormatError {
  return new ApkFormatError(`잘못된 APK: ${message}`);
}

const CRC_TABLE = (() => {
  const table: number[] = [];
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

export function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = CRC_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * 중앙 디렉토리 레코드를 아카이브 순서대로 읽습니다.
 */
export function readCentralDirectory(apk: Buffer): CentralDirectoryRecord[] {
  const sections = parseApkSections(apk);
  const count = sections.eocd.readUInt16LE(10);
  const reader = new ByteReader(sections.centralDirectory, formatError);
  const records: CentralDirectoryRecord[] = [];

  for (let i = 0; i < count; i++) {
    if (reader.readUInt32() !== CENTRAL_HEADER_SIGNATURE) {
      throw formatError(`중앙 디렉토리 레코드 서명이 잘못되었습니다 (${i}번째)`);
    }
    const header = reader.readBytes(42);
    const nameLength = header.readUInt16LE(24);
    const extraLength = header.readUInt16LE(26);
    const commentLength = header.readUInt16LE(28);
    const nameBytes = reader.readBytes(nameLength);
    records.push({
      name: nameBytes.toString('utf8'),
      nameBytes,
      versionMadeBy: header.readUInt16LE(0),
      versionNeeded: header.readUInt16LE(2),
      flags: header.readUInt16LE(4),
      method: header.readUInt16LE(6),
      time: header.readUInt16LE(8),
      date: header.readUInt16LE(10),
      crc32: header.readUInt32LE(12),
      compressedSize: header.readUInt32LE(16),
      uncompressedSize: header.readUInt32LE(20),
      internalAttributes: header.readUInt16LE(32),
      externalAttributes: header.readUInt32LE(34),
      localHeaderOffset: header.readUInt32LE(38),
      extra: reader.readBytes(extraLength),
      comment: reader.readBytes(commentLength),
    });
  }
  return records;
}

/**
 * 레코드의 로컬 헤더 extra 필드와 압축된 그대로의 데이터
 */
export function readLocalEntry(
  apk: Buffer,
  record: CentralDirectoryRecord
): { extra: Buffer; dataOffset: number; rawData: Buffer } {
  const offset = record.localHeaderOffset;
  if (offset + LOCAL_HEADER_SIZE > apk.length || apk.readUInt32LE(offset) !== LOCAL_HEADER_SIGNATURE) {
    throw formatError(`로컬 파일 헤더를 찾을 수 없습니다: ${record.name}`);
  }
  const nameLength = apk.readUInt16LE(offset + 26);
  const extraLength = apk.readUInt16LE(offset + 28);
  const extraStart = offset + LOCAL_HEADER_SIZE + nameLength;
  const dataOffset = extraStart + extraLength;
  const dataEnd = dataOffset + record.compressedSize;
  if (dataEnd > apk.length) {
    throw formatError(`엔트리 데이터가 잘렸습니다: ${record.name}`);
  }
  return {
    extra: apk.subarray(extraStart, dataOffset),
    dataOffset,
    rawData: apk.subarray(dataOffset, dataEnd),
  };
}

/**
 * STORED 엔트리의 데이터 정렬 단위. 네이티브 라이브러리는 페이지 단위입니다.
 */
export function alignmentFor(name: string, method: number): number {
  if (method !== METHOD_STORED) return 1;
  return name.endsWith('.so') ? NATIVE_LIBRARY_ALIGNMENT : STORED_ALIGNMENT;
}

/**
 * 기존 정렬 패딩(0xd935, zipalign의 0 채움)을 걷어낸 extra 필드
 * 구조가 맞지 않으면 원본을 그대로 둡니다.
 */
export function stripAlignmentPadding(extra: Buffer): Buffer {
  const kept: Buffer[] = [];
  let offset = 0;
  while (offset + 4 <= extra.length) {
    const id = extra.readUInt16LE(offset);
    const size = extra.readUInt16LE(offset + 2);
    const end = offset + 4 + size;
    if (end > extra.length) {
      return extra;
    }
    if (id !== ALIGNMENT_EXTRA_ID && id !== 0) {
      kept.push(extra.subarray(offset, end));
    }
    offset = end;
  }
  const rest = extra.subarray(offset);
  if (rest.some((byte) => byte !== 0)) {
    return extra;
  }
  return Buffer.concat(kept);
}

/**
 * 데이터 시작 위치가 alignment의 배수가 되도록 0xd935 레코드를 덧붙인 extra 필드
 */
export function alignedExtra(extra: Buffer, headerEnd: number, alignment: number): Buffer {
  if (alignment <= 1 || (headerEnd + extra.length) % alignment === 0) {
    return extra;
  }
  // id(2) + size(2) + alignment(2) + 0 채움
  const minimum = headerEnd + extra.length + 6;
  const padding = (alignment - (minimum % alignment)) % alignment;
  const record = Buffer.alloc(6 + padding);
  record.writeUInt16LE(ALIGNMENT_EXTRA_ID, 0);
  record.writeUInt16LE(2 + padding, 2);
  record.writeUInt16LE(alignment, 4);
  return Buffer.concat([extra, record]);
}

interface OutputEntry {
  nameBytes: Buffer;
  versionMadeBy: number;
  versionNeeded: number;
  flags: number;
  method: number;
  time: number;
  date: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  internalAttributes: number;
  externalAttributes: number;
  localExtra: Buffer;
  centralExtra: Buffer;
  comment: Buffer;
  rawData: Buffer;
}

function localHeader(entry: OutputEntry, extra: Buffer): Buffer {
  const header = Buffer.alloc(LOCAL_HEADER_SIZE);
  header.writeUInt32LE(LOCAL_HEADER_SIGNATURE, 0);
  header.writeUInt16LE(entry.versionNeeded, 4);
  header.writeUInt16LE(entry.flags, 6);
  header.writeUInt16LE(entry.method, 8);
  header.writeUInt16LE(entry.time, 10);
  header.writeUInt16LE(entry.date, 12);
  header.writeUInt32LE(entry.crc32, 14);
  header.writeUInt32LE(entry.compressedSize, 18);
  header.writeUInt32LE(entry.uncompressedSize, 22);
  header.writeUInt16LE(entry.nameBytes.length, 26);
  header.writeUInt16LE(extra.length, 28);
  return header;
}

function centralHeader(entry: OutputEntry, offset: number): Buffer {
  const header = Buffer.alloc(46);
  header.writeUInt32LE(CENTRAL_HEADER_SIGNATURE, 0);
  header.writeUInt16LE(entry.versionMadeBy, 4);
  header.writeUInt16LE(entry.versionNeeded, 6);
  header.writeUInt16LE(entry.flags, 8);
  header.writeUInt16LE(entry.method, 10);
  header.writeUInt16LE(entry.time, 12);
  header.writeUInt16LE(entry.date, 14);
  header.writeUInt32LE(entry.crc32, 16);
  header.writeUInt32LE(entry.compressedSize, 20);
  header.writeUInt32LE(entry.uncompressedSize, 24);
  header.writeUInt16LE(entry.nameBytes.length, 28);
  header.writeUInt16LE(entry.centralExtra.length, 30);
  header.writeUInt16LE(entry.comment.length, 32);
  header.writeUInt16LE(0, 34);
  header.writeUInt16LE(entry.internalAttributes, 36);
  header.writeUInt32LE(entry.externalAttributes, 38);
  header.writeUInt32LE(offset, 42);
  return Buffer.concat([header, entry.nameBytes, entry.centralExtra, entry.comment]);
}

function storedEntry(entry: StoredEntry): OutputEntry {
  return {
    nameBytes: Buffer.from(entry.name, 'utf8'),
    versionMadeBy: 20,
    versionNeeded: 10,
    flags: 0,
    method: METHOD_STORED,
    time: FIXED_DOS_TIME,
    date: FIXED_DOS_DATE,
    crc32: crc32(entry.data),
    compressedSize: entry.data.length,
    uncompressedSize: entry.data.length,
    internalAttributes: 0,
    externalAttributes: 0,
    localExtra: Buffer.alloc(0),
    centralExtra: Buffer.alloc(0),
    comment: Buffer.alloc(0),
    rawData: entry.data,
  };
}

function copiedEntry(apk: Buffer, record: CentralDirectoryRecord): OutputEntry {
  const local = readLocalEntry(apk, record);
  return {
    ...record,
    // 크기와 CRC를 로컬 헤더에 기록하므로 데이터 디스크립터는 쓰지 않음
    flags: record.flags & ~FLAG_DATA_DESCRIPTOR,
    localExtra: stripAlignmentPadding(local.extra),
    centralExtra: record.extra,
    rawData: local.rawData,
  };
}

/**
 * APK를 다시 씁니다.
 *
 * prepend 엔트리(무압축)를 맨 앞에 두고, exclude에 걸리지 않는 원본 엔트리는
 * 압축된 바이트를 그대로 원래 순서로 복사합니다. STORED 엔트리는 4바이트,
 * `.so`는 4096바이트 경계에 데이터가 오도록 extra 필드를 채웁니다.
 * 기존 APK Signing Block은 버려집니다.
 */
export function rewriteApk(
  apk: Buffer,
  prepend: StoredEntry[],
  exclude: (name: string) => boolean
): Buffer {
  const entries = prepend.map((entry): [string, OutputEntry] => [entry.name, storedEntry(entry)]);
  for (const record of readCentralDirectory(apk)) {
    if (!exclude(record.name)) {
      entries.push([record.name, copiedEntry(apk, record)]);
    }
  }
  if (entries.length > 0xffff) {
    throw formatError(`엔트리가 너무 많습니다: ${entries.length}`);
  }

  const chunks: Buffer[] = [];
  const central: Buffer[] = [];
  let offset = 0;
  for (const [name, entry] of entries) {
    const headerEnd = offset + LOCAL_HEADER_SIZE + entry.nameBytes.length;
    const extra = alignedExtra(entry.localExtra, headerEnd, alignmentFor(name, entry.method));
    if (extra.length > 0xffff) {
      throw formatError(`extra 필드가 너무 큽니다: ${name}`);
    }
    const parts = [localHeader(entry, extra), entry.nameBytes, extra, entry.rawData];
    central.push(centralHeader(entry, offset));
    chunks.push(...parts);
    offset += parts.reduce((sum, part) => sum + part.length, 0);
    if (offset > 0xffffffff) {
      throw formatError('ZIP64가 필요한 크기는 지원하지 않습니다');
    }
  }

  const centralDirectory = Buffer.concat(central);
  const eocd = Buffer.alloc(22);
  eocd.writeUInt32LE(EOCD_SIGNATURE, 0);
  eocd.writeUInt16LE(entries.length, 8);
  eocd.writeUInt16LE(entries.length, 10);
  eocd.writeUInt32LE(centralDirectory.length, 12);
  eocd.writeUInt32LE(offset, 16);
  return Buffer.concat([...chunks, centralDirectory, eocd]);
}
