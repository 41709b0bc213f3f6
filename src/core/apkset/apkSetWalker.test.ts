import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ApkSetIOError } from '../errors';
import { writeZip } from '../../test-utils/zip';
import { ExtractedVariant } from '../../types';
import { walkApkSet } from './apkSetWalker';

async function collect(apkSetPath: string, workDir: string): Promise<ExtractedVariant[]> {
  const variants: ExtractedVariant[] = [];
  for await (const variant of walkApkSet(apkSetPath, workDir)) {
    variants.push(variant);
  }
  return variants;
}

describe('apkSetWalker', () => {
  let tempDir: string;
  let apkSetPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'walker-test-'));
    apkSetPath = path.join(tempDir, 'app.apks');
    await writeZip(apkSetPath, [
      { name: 'toc.pb', data: Buffer.from('toc'), store: true },
      { name: 'splits/base-master.apk', data: Buffer.from('master'), store: false },
      { name: 'splits/base-xxhdpi.apk', data: Buffer.from('xxhdpi'), store: true },
      { name: 'standalones/standalone-x86.apk', data: Buffer.from('x86'), store: false },
    ]);
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('APK 엔트리만 아카이브 순서대로 추출', async () => {
    const workDir = path.join(tempDir, 'work');
    const variants = await collect(apkSetPath, workDir);

    expect(variants.map((variant) => variant.name)).toEqual([
      'splits_base-master.apk',
      'splits_base-xxhdpi.apk',
      'standalones_standalone-x86.apk',
    ]);
    expect(variants[0].entryPath).toBe('splits/base-master.apk');
    expect(variants[0].filePath).toBe(path.join(workDir, 'splits', 'base-master.apk'));
    expect(await fs.readFile(variants[0].filePath, 'utf-8')).toBe('master');
    expect(await fs.readFile(variants[2].filePath, 'utf-8')).toBe('x86');
    expect(await fs.pathExists(path.join(workDir, 'toc.pb'))).toBe(false);
  });

  it('소비자가 다음 변형을 요청할 때까지 추출하지 않음', async () => {
    const workDir = path.join(tempDir, 'work');
    const walker = walkApkSet(apkSetPath, workDir);

    const first = await walker.next();
    expect(first.done).toBe(false);
    expect(await fs.pathExists(path.join(workDir, 'splits', 'base-master.apk'))).toBe(true);
    expect(await fs.pathExists(path.join(workDir, 'splits', 'base-xxhdpi.apk'))).toBe(false);

    await walker.return(undefined);
    const after = await walker.next();
    expect(after.done).toBe(true);
  });

  it('중간에 멈춰도 이후 순회는 처음부터', async () => {
    const workDir = path.join(tempDir, 'work');
    for await (const variant of walkApkSet(apkSetPath, workDir)) {
      expect(variant.name).toBe('splits_base-master.apk');
      break;
    }
    const variants = await collect(apkSetPath, path.join(tempDir, 'work2'));
    expect(variants).toHaveLength(3);
  });

  it('APK가 없는 APK Set', async () => {
    const emptySet = path.join(tempDir, 'empty.apks');
    await writeZip(emptySet, [{ name: 'toc.pb', data: Buffer.from('toc'), store: true }]);
    expect(await collect(emptySet, path.join(tempDir, 'work'))).toEqual([]);
  });

  it('열 수 없는 APK Set은 ApkSetIOError', async () => {
    await expect(
      collect(path.join(tempDir, 'missing.apks'), path.join(tempDir, 'work'))
    ).rejects.toBeInstanceOf(ApkSetIOError);

    const broken = path.join(tempDir, 'broken.apks');
    await fs.writeFile(broken, 'not a zip');
    await expect(collect(broken, path.join(tempDir, 'work'))).rejects.toBeInstanceOf(
      ApkSetIOError
    );
  });
});
