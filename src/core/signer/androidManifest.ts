/**
 * 바이너리 AndroidManifest.xml 리더
 *
 * 서명에 필요한 값(uses-sdk@minSdkVersion, application@debuggable)만 읽습니다.
 */

import { ApkFormatError, MinSdkVersionError, errorMessage } from '../errors';
import { ZipReader } from '../zip/zipReader';

export const ANDROID_MANIFEST_ENTRY = 'AndroidManifest.xml';

const RES_XML_TYPE = 0x0003;
const RES_STRING_POOL_TYPE = 0x0001;
const RES_XML_RESOURCE_MAP_TYPE = 0x0180;
const RES_XML_START_ELEMENT_TYPE = 0x0102;

const UTF8_FLAG = 1 << 8;

const TYPE_REFERENCE = 0x01;
const TYPE_STRING = 0x03;
const TYPE_INT_DEC = 0x10;
const TYPE_INT_HEX = 0x11;
const TYPE_INT_BOOLEAN = 0x12;

export const ATTR_MIN_SDK_VERSION = 0x0101020c;
export const ATTR_DEBUGGABLE = 0x0101000f;

/** 매니페스트에 uses-sdk가 없을 때의 최소 SDK */
export const DEFAULT_MIN_SDK_VERSION = 1;

export interface ManifestAttribute {
  name: string;
  resourceId?: number;
  dataType: number;
  data: number;
  /** 문자열 원본 값 (없으면 undefined) */
  rawValue?: string;
}

export interface ManifestElement {
  name: string;
  attributes: ManifestAttribute[];
}

export interface ManifestInfo {
  /** uses-sdk@minSdkVersion (없으면 undefined) */
  minSdkAttribute?: ManifestAttribute;
  debuggable: boolean;
}

function formatError(message: string): ApkFormatError {
  return new ApkFormatError(`AndroidManifest.xml 형식 오류: ${message}`);
}

function ensureRange(buf: Buffer, offset: number, length: number): void {
  if (offset < 0 || offset + length > buf.length) {
    throw formatError(`범위를 벗어났습니다 (offset ${offset}, length ${length})`);
  }
}

function decodeLength8(buf: Buffer, offset: number): [number, number] {
  const first = buf.readUInt8(offset);
  if (first & 0x80) {
    return [((first & 0x7f) << 8) | buf.readUInt8(offset + 1), 2];
  }
  return [first, 1];
}

function decodeLength16(buf: Buffer, offset: number): [number, number] {
  const first = buf.readUInt16LE(offset);
  if (first & 0x8000) {
    return [((first & 0x7fff) << 16) | buf.readUInt16LE(offset + 2), 4];
  }
  return [first, 2];
}

function parseStringPool(buf: Buffer, chunkStart: number, headerSize: number): string[] {
  const stringCount = buf.readUInt32LE(chunkStart + 8);
  const flags = buf.readUInt32LE(chunkStart + 16);
  const stringsStart = buf.readUInt32LE(chunkStart + 20);
  const utf8 = (flags & UTF8_FLAG) !== 0;
  const offsetsStart = chunkStart + headerSize;
  ensureRange(buf, offsetsStart, stringCount * 4);

  const strings: string[] = [];
  for (let i = 0; i < stringCount; i++) {
    let position = chunkStart + stringsStart + buf.readUInt32LE(offsetsStart + i * 4);
    if (utf8) {
      const [, utf16Size] = decodeLength8(buf, position);
      position += utf16Size;
      const [byteLength, lengthSize] = decodeLength8(buf, position);
      position += lengthSize;
      ensureRange(buf, position, byteLength);
      strings.push(buf.toString('utf-8', position, position + byteLength));
    } else {
      const [charLength, lengthSize] = decodeLength16(buf, position);
      position += lengthSize;
      ensureRange(buf, position, charLength * 2);
      strings.push(buf.toString('utf16le', position, position + charLength * 2));
    }
  }
  return strings;
}

/**
 * 바이너리 XML의 시작 태그들을 문서 순서대로 반환
 */
export function parseBinaryXml(buf: Buffer): ManifestElement[] {
  ensureRange(buf, 0, 8);
  if (buf.readUInt16LE(0) !== RES_XML_TYPE) {
    throw formatError('바이너리 XML이 아닙니다');
  }

  let strings: string[] = [];
  let resourceIds: number[] = [];
  const elements: ManifestElement[] = [];
  const stringAt = (index: number): string | undefined =>
    index === 0xffffffff ? undefined : strings[index];

  let offset = buf.readUInt16LE(2);
  while (offset + 8 <= buf.length) {
    const type = buf.readUInt16LE(offset);
    const headerSize = buf.readUInt16LE(offset + 2);
    const size = buf.readUInt32LE(offset + 4);
    if (size < 8 || headerSize < 8) {
      throw formatError(`청크 크기가 잘못되었습니다 (offset ${offset})`);
    }
    ensureRange(buf, offset, size);

    if (type === RES_STRING_POOL_TYPE) {
      strings = parseStringPool(buf, offset, headerSize);
    } else if (type === RES_XML_RESOURCE_MAP_TYPE) {
      resourceIds = [];
      for (let p = offset + headerSize; p + 4 <= offset + size; p += 4) {
        resourceIds.push(buf.readUInt32LE(p));
      }
    } else if (type === RES_XML_START_ELEMENT_TYPE) {
      const ext = offset + headerSize;
      const nameIndex = buf.readUInt32LE(ext + 4);
      const attributeStart = buf.readUInt16LE(ext + 8);
      const attributeSize = buf.readUInt16LE(ext + 10);
      const attributeCount = buf.readUInt16LE(ext + 12);
      ensureRange(buf, ext + attributeStart, attributeSize * attributeCount);

      const attributes: ManifestAttribute[] = [];
      for (let i = 0; i < attributeCount; i++) {
        const a = ext + attributeStart + i * attributeSize;
        const attrNameIndex = buf.readUInt32LE(a + 4);
        attributes.push({
          name: stringAt(attrNameIndex) ?? '',
          resourceId: attrNameIndex < resourceIds.length ? resourceIds[attrNameIndex] : undefined,
          rawValue: stringAt(buf.readUInt32LE(a + 8)),
          dataType: buf.readUInt8(a + 15),
          data: buf.readUInt32LE(a + 16),
        });
      }
      elements.push({ name: stringAt(nameIndex) ?? '', attributes });
    }
    offset += size;
  }
  return elements;
}

function findAttribute(
  element: ManifestElement,
  name: string,
  resourceId: number
): ManifestAttribute | undefined {
  return (
    element.attributes.find((attr) => attr.resourceId === resourceId) ??
    element.attributes.find((attr) => attr.name === name)
  );
}

function minSdkFrom(attribute: ManifestAttribute): number {
  switch (attribute.dataType) {
    case TYPE_INT_DEC:
    case TYPE_INT_HEX:
      return attribute.data;
    case TYPE_STRING: {
      const raw = attribute.rawValue ?? '';
      if (/^\d+$/.test(raw)) {
        return Number(raw);
      }
      throw new MinSdkVersionError(`minSdkVersion이 코드네임입니다: ${raw}`);
    }
    case TYPE_REFERENCE:
      throw new MinSdkVersionError('minSdkVersion이 리소스 참조여서 값을 알 수 없습니다');
    default:
      throw new MinSdkVersionError(`minSdkVersion 값 타입을 알 수 없습니다: 0x${attribute.dataType.toString(16)}`);
  }
}

/**
 * 바이너리 매니페스트에서 최소 SDK 속성과 debuggable 여부 추출
 */
export function readManifestInfo(manifest: Buffer): ManifestInfo {
  let elements: ManifestElement[];
  try {
    elements = parseBinaryXml(manifest);
  } catch (error) {
    throw new MinSdkVersionError(`AndroidManifest.xml을 해석할 수 없습니다: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const usesSdk = elements.find((element) => element.name === 'uses-sdk');
  const minSdkAttribute = usesSdk && findAttribute(usesSdk, 'minSdkVersion', ATTR_MIN_SDK_VERSION);

  let debuggable = false;
  const application = elements.find((element) => element.name === 'application');
  const debuggableAttr =
    application && findAttribute(application, 'debuggable', ATTR_DEBUGGABLE);
  if (debuggableAttr) {
    // 리소스 참조는 값을 알 수 없으므로 debuggable로 취급
    debuggable =
      debuggableAttr.dataType === TYPE_INT_BOOLEAN
        ? debuggableAttr.data !== 0
        : debuggableAttr.dataType === TYPE_REFERENCE || debuggableAttr.rawValue === 'true';
  }

  return { minSdkAttribute, debuggable };
}

/**
 * 최소 SDK 버전. uses-sdk가 없으면 1, 코드네임이나 리소스 참조면 MinSdkVersionError
 */
export function minSdkVersionOf(info: ManifestInfo): number {
  return info.minSdkAttribute ? minSdkFrom(info.minSdkAttribute) : DEFAULT_MIN_SDK_VERSION;
}

/**
 * APK 파일에서 AndroidManifest.xml을 읽어 정보 추출
 */
export async function readApkManifestInfo(apkPath: string): Promise<ManifestInfo> {
  let reader: ZipReader;
  try {
    reader = await ZipReader.open(apkPath);
  } catch (error) {
    throw new ApkFormatError(`APK를 열 수 없습니다: ${apkPath} (${errorMessage(error)})`);
  }

  try {
    for await (const entry of reader.entries()) {
      if (entry.fileName === ANDROID_MANIFEST_ENTRY) {
        return readManifestInfo(await reader.readBuffer(entry));
      }
    }
  } finally {
    reader.close();
  }
  throw new MinSdkVersionError(`APK에 ${ANDROID_MANIFEST_ENTRY}가 없습니다: ${apkPath}`);
}
