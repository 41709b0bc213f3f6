import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ApkFormatError } from '../errors';
import { writeZip } from '../../test-utils/zip';
import {
  APK_SIG_BLOCK_MAGIC,
  buildSigningBlock,
  findEocdOffset,
  insertSigningBlock,
  parseApkSections,
  parseSigningBlock,
} from './apkSections';

describe('apkSections', () => {
  let tempDir: string;
  let apk: Buffer;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sections-test-'));
    const apkPath = path.join(tempDir, 'app.apk');
    await writeZip(apkPath, [
      { name: 'AndroidManifest.xml', data: Buffer.from('manifest'), store: false },
      { name: 'classes.dex', data: Buffer.from('dex'), store: true },
    ]);
    apk = await fs.readFile(apkPath);
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('서명 블록이 없는 APK 구간', () => {
    const sections = parseApkSections(apk);
    const eocdOffset = findEocdOffset(apk);

    expect(sections.signingBlock).toBeNull();
    expect(sections.eocd.length).toBe(22);
    expect(eocdOffset).toBe(apk.length - 22);
    expect(sections.contentsEnd + sections.centralDirectory.length).toBe(eocdOffset);
  });

  it('서명 블록을 넣으면 중앙 디렉토리 offset이 바뀜', () => {
    const sections = parseApkSections(apk);
    const block = buildSigningBlock([
      { id: 0x7109871a, value: Buffer.from('v2-block') },
      { id: 0x42726577, value: Buffer.alloc(4) },
    ]);
    const signed = insertSigningBlock(sections, block);

    const reparsed = parseApkSections(signed);
    expect(reparsed.contentsEnd).toBe(sections.contentsEnd);
    expect(reparsed.signingBlock).toEqual(block);
    expect(reparsed.eocd.readUInt32LE(16)).toBe(sections.contentsEnd + block.length);
    expect(reparsed.centralDirectory).toEqual(sections.centralDirectory);
    expect(parseSigningBlock(block)).toEqual([
      { id: 0x7109871a, value: Buffer.from('v2-block') },
      { id: 0x42726577, value: Buffer.alloc(4) },
    ]);
  });

  it('서명 블록 레이아웃', () => {
    const block = buildSigningBlock([{ id: 1, value: Buffer.from('ab') }]);
    // 8 + (8 + 4 + 2) + 8 + 16
    expect(block.length).toBe(46);
    expect(block.readBigUInt64LE(0)).toBe(38n);
    expect(block.readBigUInt64LE(block.length - 24)).toBe(38n);
    expect(block.subarray(block.length - 16)).toEqual(APK_SIG_BLOCK_MAGIC);
  });

  it('ZIP이 아니면 ApkFormatError', () => {
    expect(() => parseApkSections(Buffer.from('not a zip at all, just text'))).toThrow(ApkFormatError);
    expect(findEocdOffset(Buffer.alloc(10))).toBe(-1);
  });

  it('중앙 디렉토리 위치가 어긋나면 ApkFormatError', () => {
    const broken = Buffer.concat([Buffer.from('prefix'), apk]);
    expect(() => parseApkSections(broken)).toThrow('중앙 디렉토리 위치가 맞지 않습니다');
  });
});
