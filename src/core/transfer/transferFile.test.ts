import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { TransferFileFormatError, VariantCorrelationError } from '../errors';
import {
  TRANSFER_FORMAT_VERSION,
  createSchemeFlags,
  formatFlagsLine,
  formatGroup,
  formatVersionLine,
  parseFlagsLine,
  parseVersionLine,
  toDigestRecords,
} from './transferFormat';
import { TransferFileWriter, formatTransferFile } from './transferFileWriter';
import {
  TransferFileReader,
  indexByVariant,
  parseTransferFile,
  readTransferFile,
} from './transferFileReader';

const BUNDLE_DIGEST = 'ab'.repeat(32);

function expectFormatError(fn: () => unknown, line: number): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(TransferFileFormatError);
  if (caught instanceof TransferFileFormatError) {
    expect(caught.line).toBe(line);
  }
}

describe('transferFormat', () => {
  describe('버전 줄', () => {
    it('번들 다이제스트를 빌드 메타데이터로 기록', () => {
      expect(formatVersionLine({ version: '1.0.0', bundleDigest: BUNDLE_DIGEST })).toBe(
        `version: 1.0.0+bundle.${BUNDLE_DIGEST}`
      );
      expect(formatVersionLine({ version: '0.1.0' })).toBe('version: 0.1.0');
    });

    it('번들 다이제스트 파싱', () => {
      expect(parseVersionLine(`version: 1.0.0+bundle.${BUNDLE_DIGEST}`)).toEqual({
        version: '1.0.0',
        bundleDigest: BUNDLE_DIGEST,
      });
    });

    it('다이제스트가 없는 0.1.x 버전 허용', () => {
      expect(parseVersionLine('version: 0.1.0')).toEqual({ version: '0.1.0' });
    });

    it('지원하지 않는 버전은 사유 문자열 반환', () => {
      expect(parseVersionLine('version: 2.0.0')).toBe('지원하지 않는 전송 파일 버전: 2.0.0');
      expect(parseVersionLine('version: abc')).toBe('잘못된 버전 형식: abc');
      expect(parseVersionLine('v2:true,v3:false')).toBe('버전 줄이 아닙니다: v2:true,v3:false');
    });
  });

  describe('스킴 플래그 줄', () => {
    it('v2와 v3를 각각 읽음', () => {
      expect(parseFlagsLine('v2:false,v3:true')).toEqual({ v1: true, v2: false, v3: true });
      expect(parseFlagsLine('v2:true,v3:false')).toEqual({ v1: true, v2: true, v3: false });
    });

    it('형식이 틀리면 null', () => {
      expect(parseFlagsLine('v2:yes,v3:false')).toBeNull();
      expect(parseFlagsLine('v3:true,v2:true')).toBeNull();
    });

    it('기록 형식', () => {
      expect(formatFlagsLine(createSchemeFlags(true, false))).toBe('v2:true,v3:false');
    });
  });

  describe('formatGroup', () => {
    const v1Only = createSchemeFlags(false, false);
    const withV2 = createSchemeFlags(true, false);

    it('V1만 켜져 있으면 두 줄', () => {
      expect(formatGroup({ variantName: 'universal.apk', v1: 'V1' }, v1Only)).toEqual([
        'universal.apk',
        'V1',
      ]);
    });

    it('v2가 켜져 있으면 세 줄', () => {
      expect(
        formatGroup({ variantName: 'universal.apk', v1: 'V1', v2v3: 'V2V3' }, withV2)
      ).toEqual(['universal.apk', 'V1', 'V2V3']);
    });

    it('V2V3 페이로드 누락/불필요는 오류', () => {
      expect(() => formatGroup({ variantName: 'universal.apk', v1: 'V1' }, withV2)).toThrow(
        'V2/V3 다이제스트가 없습니다: universal.apk'
      );
      expect(() =>
        formatGroup({ variantName: 'universal.apk', v1: 'V1', v2v3: 'V2V3' }, v1Only)
      ).toThrow('V2/V3가 비활성인데');
    });

    it('되돌아오지 않는 값은 거부', () => {
      expect(() => formatGroup({ variantName: 'universal', v1: 'V1' }, v1Only)).toThrow(
        "변형 이름에 '.apk'가 없습니다"
      );
      expect(() => formatGroup({ variantName: 'a.apk', v1: 'x.apk' }, v1Only)).toThrow(
        "다이제스트 페이로드에 '.apk'가 포함되어 있습니다"
      );
      expect(() => formatGroup({ variantName: 'a.apk', v1: 'V1\nV2' }, v1Only)).toThrow(
        '한 줄이어야 합니다'
      );
    });
  });

  it('toDigestRecords는 V1, V2V3 순서로 펼침', () => {
    expect(toDigestRecords({ variantName: 'a.apk', v1: 'P1', v2v3: 'P2' })).toEqual([
      { variantName: 'a.apk', schemeKind: 'V1', payload: 'P1' },
      { variantName: 'a.apk', schemeKind: 'V2V3', payload: 'P2' },
    ]);
    expect(toDigestRecords({ variantName: 'a.apk', v1: 'P1' })).toHaveLength(1);
  });
});

describe('TransferFileReader', () => {
  it('formatTransferFile 결과를 그대로 복원', () => {
    const file = {
      header: { version: TRANSFER_FORMAT_VERSION, bundleDigest: BUNDLE_DIGEST },
      flags: createSchemeFlags(false, true),
      groups: [
        { variantName: 'splits_base-master.apk', v1: 'A', v2v3: 'B' },
        { variantName: 'universal.apk', v1: 'C', v2v3: 'D' },
      ],
    };
    const text = formatTransferFile(file);
    expect(text).toBe(
      [
        `version: 1.0.0+bundle.${BUNDLE_DIGEST}`,
        'v2:false,v3:true',
        'splits_base-master.apk',
        'A',
        'B',
        'universal.apk',
        'C',
        'D',
        '',
      ].join('\n')
    );
    expect(parseTransferFile(text)).toEqual(file);
  });

  it('CRLF 줄바꿈 허용', () => {
    const parsed = parseTransferFile('version: 0.1.0\r\nv2:false,v3:false\r\na.apk\r\nP\r\n');
    expect(parsed.groups).toEqual([{ variantName: 'a.apk', v1: 'P' }]);
    expect(parsed.header.bundleDigest).toBeUndefined();
  });

  it('그룹이 없는 파일', () => {
    expect(parseTransferFile('version: 1.0.0\nv2:false,v3:false\n').groups).toEqual([]);
  });

  it('V2V3 없이 끝나면 EOF 위치의 형식 오류', () => {
    const text = 'version: 1.0.0\nv2:true,v3:false\na.apk\nP1\nP2\nb.apk\nP3\n';
    expectFormatError(() => parseTransferFile(text), 8);
  });

  it('V1 다이제스트 자리에 이름이 오면 해당 줄의 형식 오류', () => {
    const text = 'version: 1.0.0\nv2:false,v3:false\na.apk\nb.apk\nP\n';
    expectFormatError(() => parseTransferFile(text), 4);
  });

  it('이름 자리에 다이제스트가 오면 형식 오류', () => {
    const text = 'version: 1.0.0\nv2:false,v3:false\na.apk\nP1\nP2\n';
    expectFormatError(() => parseTransferFile(text), 5);
  });

  it('빈 줄은 형식 오류', () => {
    const text = 'version: 1.0.0\n\nv2:false,v3:false\n';
    expectFormatError(() => parseTransferFile(text), 2);
  });

  it('지원하지 않는 버전은 1번째 줄 오류', () => {
    expectFormatError(() => parseTransferFile('version: 3.1.0\nv2:false,v3:false\n'), 1);
  });

  it('빈 입력은 버전 줄 없음', () => {
    expectFormatError(() => parseTransferFile(''), 1);
  });

  it('변형 이름 중복은 상관 오류', () => {
    const text = 'version: 1.0.0\nv2:false,v3:false\na.apk\nP1\na.apk\nP2\n';
    expect(() => parseTransferFile(text)).toThrow(VariantCorrelationError);
  });

  it('상태 전이', () => {
    const reader = new TransferFileReader();
    expect(reader.currentState).toBe('expect-header');
    reader.feed('version: 1.0.0');
    expect(reader.currentState).toBe('expect-flags');
    reader.feed('v2:true,v3:true');
    reader.feed('a.apk');
    expect(reader.currentState).toBe('expect-v1-digest');
    reader.feed('P1');
    expect(reader.currentState).toBe('expect-v2v3-digest');
    reader.feed('P2');
    expect(reader.currentState).toBe('expect-name-or-eof');
    expect(reader.finish().groups).toEqual([{ variantName: 'a.apk', v1: 'P1', v2v3: 'P2' }]);
  });

  it('indexByVariant', () => {
    const index = indexByVariant([
      { variantName: 'a.apk', v1: 'P1' },
      { variantName: 'b.apk', v1: 'P2' },
    ]);
    expect(index.get('b.apk')).toEqual({ variantName: 'b.apk', v1: 'P2' });
    expect(() =>
      indexByVariant([
        { variantName: 'a.apk', v1: 'P1' },
        { variantName: 'a.apk', v1: 'P2' },
      ])
    ).toThrow(VariantCorrelationError);
  });
});

describe('TransferFileWriter', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'transfer-test-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('헤더를 쓰고 APK Set마다 그룹을 이어 붙임', async () => {
    const filePath = path.join(tempDir, 'out', 'app.bin');
    const writer = new TransferFileWriter(
      filePath,
      { version: TRANSFER_FORMAT_VERSION, bundleDigest: BUNDLE_DIGEST },
      createSchemeFlags(true, false)
    );
    await writer.create();
    await writer.append([{ variantName: 'splits_base-master.apk', v1: 'A', v2v3: 'B' }]);
    await writer.append([]);
    await writer.append([{ variantName: 'universal.apk', v1: 'C', v2v3: 'D' }]);
    expect(writer.count).toBe(2);

    const parsed = await readTransferFile(filePath);
    expect(parsed.header).toEqual({ version: '1.0.0', bundleDigest: BUNDLE_DIGEST });
    expect(parsed.flags).toEqual({ v1: true, v2: true, v3: false });
    expect(parsed.groups.map((group) => group.variantName)).toEqual([
      'splits_base-master.apk',
      'universal.apk',
    ]);
  });

  it('APK Set 사이에서 이름이 겹치면 상관 오류', async () => {
    const writer = new TransferFileWriter(
      path.join(tempDir, 'app.bin'),
      { version: TRANSFER_FORMAT_VERSION },
      createSchemeFlags(false, false)
    );
    await writer.create();
    await writer.append([{ variantName: 'universal.apk', v1: 'A' }]);
    await expect(writer.append([{ variantName: 'universal.apk', v1: 'B' }])).rejects.toThrow(
      VariantCorrelationError
    );
  });

  it('create 전 append는 오류', async () => {
    const writer = new TransferFileWriter(
      path.join(tempDir, 'app.bin'),
      { version: TRANSFER_FORMAT_VERSION },
      createSchemeFlags(false, false)
    );
    await expect(writer.append([{ variantName: 'a.apk', v1: 'A' }])).rejects.toThrow(
      'create()를 먼저 호출해야 합니다'
    );
  });
});
