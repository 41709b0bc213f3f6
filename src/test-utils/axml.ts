/**
 * 테스트용 바이너리 AndroidManifest.xml 생성기
 *
 * 매니페스트 리더가 읽는 청크(문자열 풀, 리소스 맵, 시작 태그)만 만듭니다.
 */

import { ATTR_DEBUGGABLE, ATTR_MIN_SDK_VERSION } from '../core/signer/androidManifest';

export interface ManifestFixture {
  /** 숫자면 정수, 문자열이면 문자열 값(코드네임 등)으로 기록 */
  minSdkVersion?: number | string;
  debuggable?: boolean;
}

const TYPE_STRING = 0x03;
const TYPE_INT_DEC = 0x10;
const TYPE_INT_BOOLEAN = 0x12;
const NO_INDEX = 0xffffffff;

interface AttributeFixture {
  name: number;
  rawValue: number;
  dataType: number;
  data: number;
}

function chunk(type: number, headerSize: number, header: Buffer, body: Buffer): Buffer {
  const start = Buffer.alloc(8);
  start.writeUInt16LE(type, 0);
  start.writeUInt16LE(headerSize, 2);
  start.writeUInt32LE(8 + header.length + body.length, 4);
  return Buffer.concat([start, header, body]);
}

function stringPool(strings: string[]): Buffer {
  const encoded = strings.map((value) => {
    const bytes = Buffer.from(value, 'utf-8');
    return Buffer.concat([Buffer.from([value.length, bytes.length]), bytes, Buffer.from([0])]);
  });
  const offsets = Buffer.alloc(strings.length * 4);
  let position = 0;
  encoded.forEach((bytes, index) => {
    offsets.writeUInt32LE(position, index * 4);
    position += bytes.length;
  });
  let data = Buffer.concat(encoded);
  if (data.length % 4 !== 0) {
    data = Buffer.concat([data, Buffer.alloc(4 - (data.length % 4))]);
  }

  const header = Buffer.alloc(20);
  header.writeUInt32LE(strings.length, 0);
  header.writeUInt32LE(0, 4);
  header.writeUInt32LE(1 << 8, 8);
  header.writeUInt32LE(28 + offsets.length, 12);
  header.writeUInt32LE(0, 16);
  return chunk(0x0001, 28, header, Buffer.concat([offsets, data]));
}

function resourceMap(ids: number[]): Buffer {
  const body = Buffer.alloc(ids.length * 4);
  ids.forEach((id, index) => body.writeUInt32LE(id, index * 4));
  return chunk(0x0180, 8, Buffer.alloc(0), body);
}

function startElement(name: number, attributes: AttributeFixture[]): Buffer {
  const header = Buffer.alloc(8);
  header.writeUInt32LE(1, 0);
  header.writeUInt32LE(NO_INDEX, 4);

  const ext = Buffer.alloc(20);
  ext.writeUInt32LE(NO_INDEX, 0);
  ext.writeUInt32LE(name, 4);
  ext.writeUInt16LE(20, 8);
  ext.writeUInt16LE(20, 10);
  ext.writeUInt16LE(attributes.length, 12);

  const encoded = attributes.map((attr) => {
    const buf = Buffer.alloc(20);
    buf.writeUInt32LE(NO_INDEX, 0);
    buf.writeUInt32LE(attr.name, 4);
    buf.writeUInt32LE(attr.rawValue, 8);
    buf.writeUInt16LE(8, 12);
    buf.writeUInt8(attr.dataType, 15);
    buf.writeUInt32LE(attr.data >>> 0, 16);
    return buf;
  });
  return chunk(0x0102, 16, header, Buffer.concat([ext, ...encoded]));
}

export function buildBinaryManifest(fixture: ManifestFixture = {}): Buffer {
  // 0, 1번 문자열은 리소스 맵으로 속성 ID와 연결
  const strings = ['minSdkVersion', 'debuggable', 'manifest', 'uses-sdk', 'application'];
  const elements = [startElement(2, [])];

  if (fixture.minSdkVersion !== undefined) {
    if (typeof fixture.minSdkVersion === 'number') {
      elements.push(
        startElement(3, [{ name: 0, rawValue: NO_INDEX, dataType: TYPE_INT_DEC, data: fixture.minSdkVersion }])
      );
    } else {
      strings.push(fixture.minSdkVersion);
      elements.push(
        startElement(3, [
          { name: 0, rawValue: strings.length - 1, dataType: TYPE_STRING, data: strings.length - 1 },
        ])
      );
    }
  }

  const applicationAttributes: AttributeFixture[] =
    fixture.debuggable === undefined
      ? []
      : [
          {
            name: 1,
            rawValue: NO_INDEX,
            dataType: TYPE_INT_BOOLEAN,
            data: fixture.debuggable ? 0xffffffff : 0,
          },
        ];
  elements.push(startElement(4, applicationAttributes));

  const body = Buffer.concat([
    stringPool(strings),
    resourceMap([ATTR_MIN_SDK_VERSION, ATTR_DEBUGGABLE]),
    ...elements,
  ]);
  return chunk(0x0003, 8, Buffer.alloc(0), body);
}
