import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { DigestOptions, SchemeFlags } from '../../types';
import { createTestApk, createTestSigner, TestSigner } from '../../test-utils/apk';
import { DigestMismatchError, MinSdkVersionError, SignerError } from '../errors';
import { createSchemeFlags } from '../transfer/transferFormat';
import { writeZip } from '../../test-utils/zip';
import { ApkSchemeSigner } from './apkSchemeSigner';
import { verifyApk } from './apkVerifier';
import { parseV1Payload, readApkEntries } from './v1Scheme';

describe('ApkSchemeSigner', () => {
  let testSigner: TestSigner;
  let tempDir: string;
  const signer = new ApkSchemeSigner();

  const options = (schemes: SchemeFlags, overrides: Partial<DigestOptions> = {}): DigestOptions => ({
    schemes,
    debuggableApkPermitted: true,
    ...overrides,
  });

  /** 두 단계 서명을 한 번에 수행 */
  async function signBothPhases(apk: string, output: string, schemes: SchemeFlags): Promise<string[]> {
    const signers = [testSigner.config];
    const v1 = await signer.generateV1Payload(apk, signers, options(schemes));
    if (!schemes.v2 && !schemes.v3) {
      await signer.applyV1Payload(apk, v1, output, schemes);
      return [v1];
    }
    const scratch = path.join(tempDir, 'scratch.apk');
    await signer.applyV1Payload(apk, v1, scratch, schemes);
    const v2v3 = await signer.generateV2V3Payload(scratch, signers, options(schemes));
    await signer.applyV2V3Payload(scratch, v2v3, output, schemes);
    return [v1, v2v3];
  }

  beforeAll(() => {
    testSigner = createTestSigner();
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scheme-signer-test-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('V1', () => {
    it('V1만 서명한 APK가 검증됨', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const output = path.join(tempDir, 'signed.apk');
      await createTestApk(apk, { minSdkVersion: 21 });

      const [v1] = await signBothPhases(apk, output, createSchemeFlags(false, false));

      const [payload] = parseV1Payload(v1);
      expect(payload.name).toBe('TEST');
      expect(payload.algorithm).toBe('SHA-256');

      const result = await verifyApk(output);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.verified).toBe(true);
      expect(result.verifiedUsingV1).toBe(true);
      expect(result.verifiedUsingV2).toBe(false);
      expect(result.signerCertificates).toEqual([testSigner.certificate]);
    });

    it('서명 파일을 앞에 두고 원래 엔트리 순서를 유지', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const output = path.join(tempDir, 'signed.apk');
      await createTestApk(apk, { minSdkVersion: 21 });

      await signBothPhases(apk, output, createSchemeFlags(false, false));

      const entries = await readApkEntries(output);
      expect(entries.map((entry) => entry.name)).toEqual([
        'META-INF/MANIFEST.MF',
        'META-INF/TEST.SF',
        'META-INF/TEST.RSA',
        'AndroidManifest.xml',
        'classes.dex',
        'res/layout/main.xml',
        'resources.arsc',
      ]);
      expect(entries.find((entry) => entry.name === 'resources.arsc')?.store).toBe(true);
    });

    it('최소 SDK 18 미만이면 SHA-1', async () => {
      const apk = path.join(tempDir, 'app.apk');
      await createTestApk(apk, { minSdkVersion: 14 });

      const v1 = await signer.generateV1Payload(
        apk,
        [testSigner.config],
        options(createSchemeFlags(false, false))
      );
      expect(parseV1Payload(v1)[0].algorithm).toBe('SHA-1');
    });

    it('지정한 최소 SDK가 매니페스트보다 우선', async () => {
      const apk = path.join(tempDir, 'app.apk');
      await createTestApk(apk, { minSdkVersion: 'Tiramisu' });

      const v1 = await signer.generateV1Payload(
        apk,
        [testSigner.config],
        options(createSchemeFlags(false, false), { minSdkVersion: 14 })
      );
      expect(parseV1Payload(v1)[0].algorithm).toBe('SHA-1');
    });

    it('코드네임 최소 SDK는 MinSdkVersionError', async () => {
      const apk = path.join(tempDir, 'app.apk');
      await createTestApk(apk, { minSdkVersion: 'Tiramisu' });

      await expect(
        signer.generateV1Payload(apk, [testSigner.config], options(createSchemeFlags(false, false)))
      ).rejects.toBeInstanceOf(MinSdkVersionError);
    });

    it('debuggable APK는 허용하지 않으면 거부', async () => {
      const apk = path.join(tempDir, 'app.apk');
      await createTestApk(apk, { minSdkVersion: 21, debuggable: true });

      await expect(
        signer.generateV1Payload(
          apk,
          [testSigner.config],
          options(createSchemeFlags(false, false), { debuggableApkPermitted: false })
        )
      ).rejects.toBeInstanceOf(SignerError);
      await expect(
        signer.generateV1Payload(apk, [testSigner.config], options(createSchemeFlags(false, false)))
      ).resolves.toMatch(/^TEST:SHA-256:/);
    });

    it('내용이 다른 APK에 적용하면 DigestMismatchError', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const other = path.join(tempDir, 'other.apk');
      await createTestApk(apk, { minSdkVersion: 21 });
      await createTestApk(other, { minSdkVersion: 21, entries: { 'classes.dex': 'other' } });

      const schemes = createSchemeFlags(false, false);
      const v1 = await signer.generateV1Payload(apk, [testSigner.config], options(schemes));
      await expect(
        signer.applyV1Payload(other, v1, path.join(tempDir, 'out.apk'), schemes)
      ).rejects.toBeInstanceOf(DigestMismatchError);
    });

    it('기록 때와 스킴 플래그가 다르면 DigestMismatchError', async () => {
      const apk = path.join(tempDir, 'app.apk');
      await createTestApk(apk, { minSdkVersion: 21 });

      const v1 = await signer.generateV1Payload(
        apk,
        [testSigner.config],
        options(createSchemeFlags(true, false))
      );
      await expect(
        signer.applyV1Payload(apk, v1, path.join(tempDir, 'out.apk'), createSchemeFlags(false, false))
      ).rejects.toBeInstanceOf(DigestMismatchError);
    });

    it('서명 후 엔트리를 바꾸면 검증 실패', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const output = path.join(tempDir, 'signed.apk');
      await createTestApk(apk, { minSdkVersion: 21 });
      await signBothPhases(apk, output, createSchemeFlags(false, false));

      const entries = await readApkEntries(output);
      const tampered = path.join(tempDir, 'tampered.apk');
      await writeZip(
        tampered,
        entries.map((entry) => ({
          name: entry.name,
          data: entry.name === 'classes.dex' ? Buffer.from('patched') : entry.data,
          store: entry.store,
        }))
      );

      const result = await verifyApk(tampered);
      expect(result.verified).toBe(false);
      expect(result.errors).toEqual(['V1: 엔트리 다이제스트가 일치하지 않습니다: classes.dex']);
    });
  });

  describe('V2/V3', () => {
    it('v2 서명 APK가 검증됨', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const output = path.join(tempDir, 'signed.apk');
      await createTestApk(apk, { minSdkVersion: 21 });

      const [, v2v3] = await signBothPhases(apk, output, createSchemeFlags(true, false));
      expect(v2v3.startsWith('v2:')).toBe(true);
      expect(v2v3).not.toContain(',');

      const result = await verifyApk(output);
      expect(result.errors).toEqual([]);
      expect(result.verifiedUsingV1).toBe(true);
      expect(result.verifiedUsingV2).toBe(true);
      expect(result.verifiedUsingV3).toBe(false);
    });

    it('v2와 v3 서명 APK가 검증됨', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const output = path.join(tempDir, 'signed.apk');
      await createTestApk(apk, { minSdkVersion: 24 });

      const [, v2v3] = await signBothPhases(apk, output, createSchemeFlags(true, true));
      expect(v2v3.split(',').map((part) => part.slice(0, 3))).toEqual(['v2:', 'v3:']);

      const result = await verifyApk(output);
      expect(result.errors).toEqual([]);
      expect(result.verified).toBe(true);
      expect(result.verifiedUsingV2).toBe(true);
      expect(result.verifiedUsingV3).toBe(true);
      expect(result.signerCertificates).toEqual([testSigner.certificate]);
    });

    it('v3만 켜도 V2V3 페이로드 생성', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const output = path.join(tempDir, 'signed.apk');
      await createTestApk(apk, { minSdkVersion: 24 });

      const [, v2v3] = await signBothPhases(apk, output, createSchemeFlags(false, true));
      expect(v2v3.startsWith('v3:')).toBe(true);

      const result = await verifyApk(output);
      expect(result.errors).toEqual([]);
      expect(result.verifiedUsingV3).toBe(true);
    });

    it('v3 블록을 떼어내면 검증 실패', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const scratch = path.join(tempDir, 'v1.apk');
      const output = path.join(tempDir, 'stripped.apk');
      await createTestApk(apk, { minSdkVersion: 24 });

      const schemes = createSchemeFlags(true, true);
      const v1 = await signer.generateV1Payload(apk, [testSigner.config], options(schemes));
      await signer.applyV1Payload(apk, v1, scratch, schemes);
      const v2v3 = await signer.generateV2V3Payload(scratch, [testSigner.config], options(schemes));
      const [v2Only] = v2v3.split(',');
      await signer.applyV2V3Payload(scratch, v2Only, output, createSchemeFlags(true, false));

      const result = await verifyApk(output);
      expect(result.verified).toBe(false);
      expect(result.errors).toContain('V2 서명이 v3 서명도 있었다고 표시하지만 v3 서명이 없습니다');
    });

    it('페이로드의 블록 구성이 스킴 플래그와 다르면 SignerError', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const scratch = path.join(tempDir, 'v1.apk');
      await createTestApk(apk, { minSdkVersion: 24 });

      const schemes = createSchemeFlags(true, false);
      const v1 = await signer.generateV1Payload(apk, [testSigner.config], options(schemes));
      await signer.applyV1Payload(apk, v1, scratch, schemes);
      const v2v3 = await signer.generateV2V3Payload(scratch, [testSigner.config], options(schemes));

      await expect(
        signer.applyV2V3Payload(scratch, v2v3, path.join(tempDir, 'out.apk'), createSchemeFlags(true, true))
      ).rejects.toBeInstanceOf(SignerError);
    });

    it('다른 V1 서명본에 적용하면 DigestMismatchError', async () => {
      const apk = path.join(tempDir, 'app.apk');
      const other = path.join(tempDir, 'other.apk');
      await createTestApk(apk, { minSdkVersion: 24 });
      await createTestApk(other, { minSdkVersion: 24, entries: { 'classes.dex': 'other' } });

      const schemes = createSchemeFlags(true, false);
      const scratchA = path.join(tempDir, 'a.apk');
      const scratchB = path.join(tempDir, 'b.apk');
      await signer.applyV1Payload(
        apk,
        await signer.generateV1Payload(apk, [testSigner.config], options(schemes)),
        scratchA,
        schemes
      );
      await signer.applyV1Payload(
        other,
        await signer.generateV1Payload(other, [testSigner.config], options(schemes)),
        scratchB,
        schemes
      );
      const v2v3 = await signer.generateV2V3Payload(scratchA, [testSigner.config], options(schemes));

      await expect(
        signer.applyV2V3Payload(scratchB, v2v3, path.join(tempDir, 'out.apk'), schemes)
      ).rejects.toBeInstanceOf(DigestMismatchError);
    });

    it('v2/v3가 모두 꺼져 있으면 V2V3 페이로드를 만들지 않음', async () => {
      const apk = path.join(tempDir, 'app.apk');
      await createTestApk(apk, { minSdkVersion: 24 });
      await expect(
        signer.generateV2V3Payload(apk, [testSigner.config], options(createSchemeFlags(false, false)))
      ).rejects.toBeInstanceOf(SignerError);
    });
  });
});
