import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ApkSetMode, SchemeFlags, SignerConfig } from '../types';
import { FakeBundleExpander, FakeSigner } from '../test-utils/fakes';
import { DigestRecorder } from './digestRecorder';
import {
  BundleMismatchError,
  DigestMismatchError,
  ParameterError,
  TransferFileFormatError,
  VariantCorrelationError,
} from './errors';
import { SignatureApplier } from './signatureApplier';
import { createSchemeFlags } from './transfer/transferFormat';
import { withWorkspace } from './workspace';

const SIGNER: SignerConfig = { name: 'TEST', privateKeyPem: 'test-key', certificates: [] };

const LAYOUT: Record<ApkSetMode, string[]> = {
  split: ['splits/base-master.apk', 'arm64-v8a/base.apk'],
  universal: ['universal.apk'],
};

function tagOf(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').slice(0, 16);
}

describe('SignatureApplier', () => {
  let tempDir: string;
  let bundlePath: string;
  let transferFilePath: string;
  let outputDir: string;

  const record = (schemes: SchemeFlags, layout = LAYOUT) =>
    withWorkspace((workspace) =>
      new DigestRecorder(new FakeSigner(), new FakeBundleExpander(layout)).generate(
        {
          bundlePath,
          outputPath: transferFilePath,
          signers: [SIGNER],
          schemes,
          debuggableApkPermitted: true,
        },
        workspace
      )
    );

  const apply = (signer: FakeSigner, layout = LAYOUT) =>
    withWorkspace((workspace) =>
      new SignatureApplier(signer, new FakeBundleExpander(layout)).apply(
        { bundlePath, transferFilePath, outputDir },
        workspace
      )
    );

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'applier-test-'));
    bundlePath = path.join(tempDir, 'app.aab');
    transferFilePath = path.join(tempDir, 'app.bin');
    outputDir = path.join(tempDir, 'signed');
    await fs.writeFile(bundlePath, 'bundle');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('기록된 페이로드로 모든 변형에 서명 적용', async () => {
    await record(createSchemeFlags(true, false));
    const signer = new FakeSigner();

    const result = await apply(signer);

    expect(result.signedApks).toEqual([
      path.join(outputDir, 'splits_base-master.apk'),
      path.join(outputDir, 'arm64-v8a_base.apk'),
      path.join(outputDir, 'universal.apk'),
    ]);
    expect(result.apkSetPath).toBe(path.join(outputDir, 'app.aab.apks'));
    expect(result.unvisited).toEqual([]);

    expect(await fs.readFile(path.join(outputDir, 'arm64-v8a_base.apk'), 'utf-8')).toBe(
      'apk:arm64-v8a/base.apk'
    );
    expect(await fs.pathExists(result.apkSetPath)).toBe(true);

    const v2v3Calls = signer.callsOf('applyV2V3Payload');
    expect(v2v3Calls.map((call) => call.outputApk)).toEqual(result.signedApks);
    expect(v2v3Calls[2].payload).toBe(`V2V3-${tagOf('apk:universal.apk')}`);
  });

  it('V1만 켜져 있으면 V1 서명본을 바로 출력', async () => {
    await record(createSchemeFlags(false, false));
    const signer = new FakeSigner();

    const result = await apply(signer);

    expect(signer.callsOf('applyV1Payload').map((call) => call.outputApk)).toEqual(
      result.signedApks
    );
    expect(signer.callsOf('applyV2V3Payload')).toHaveLength(0);
  });

  it('스킴 플래그는 전송 파일에 기록된 값을 사용', async () => {
    await record(createSchemeFlags(false, true));
    const signer = new FakeSigner();

    await apply(signer);

    expect(signer.calls.every((call) => call.schemes.v3 && !call.schemes.v2)).toBe(true);
    expect(signer.callsOf('applyV2V3Payload')).toHaveLength(3);
  });

  it('번들이 바뀌면 아무것도 쓰기 전에 BundleMismatchError', async () => {
    await record(createSchemeFlags(false, false));
    await fs.writeFile(bundlePath, 'other bundle');

    await expect(apply(new FakeSigner())).rejects.toBeInstanceOf(BundleMismatchError);
    expect(await fs.pathExists(outputDir)).toBe(false);
  });

  it('번들 다이제스트가 없는 구버전 전송 파일도 적용', async () => {
    await fs.writeFile(
      transferFilePath,
      ['version: 0.1.0', 'v2:false,v3:false', 'universal.apk', `V1-TEST-${tagOf('apk:universal.apk')}`, ''].join(
        '\n'
      )
    );

    const result = await apply(new FakeSigner(), { split: [], universal: ['universal.apk'] });

    expect(result.signedApks).toEqual([path.join(outputDir, 'universal.apk')]);
  });

  it('기록되지 않은 변형이 나오면 상관 오류', async () => {
    await record(createSchemeFlags(false, false));

    await expect(
      apply(new FakeSigner(), {
        split: [...LAYOUT.split, 'splits/base-hdpi.apk'],
        universal: LAYOUT.universal,
      })
    ).rejects.toThrow('기록된 다이제스트가 없는 변형입니다: splits_base-hdpi.apk');
  });

  it('APK Set에 없던 변형은 unvisited로 보고', async () => {
    await record(createSchemeFlags(false, false));

    const result = await apply(new FakeSigner(), {
      split: ['splits/base-master.apk'],
      universal: LAYOUT.universal,
    });

    expect(result.unvisited).toEqual(['arm64-v8a_base.apk']);
    expect(result.signedApks).toHaveLength(2);
  });

  it('출력 파일 이름이 겹치면 상관 오류', async () => {
    const layout = { split: ['x/a/base.apk'], universal: ['a/base.apk'] };
    await record(createSchemeFlags(false, false), layout);

    await expect(apply(new FakeSigner(), layout)).rejects.toThrow(
      '출력 파일 이름이 겹칩니다: a_base.apk (x_a_base.apk, a_base.apk)'
    );
  });

  it('같은 변형이 두 번 나오면 상관 오류', async () => {
    await fs.writeFile(
      transferFilePath,
      ['version: 1.0.0', 'v2:false,v3:false', 'universal.apk', `V1-TEST-${tagOf('apk:universal.apk')}`, ''].join(
        '\n'
      )
    );

    await expect(
      apply(new FakeSigner(), { split: ['universal.apk'], universal: ['universal.apk'] })
    ).rejects.toBeInstanceOf(VariantCorrelationError);
  });

  it('페이로드가 다시 만든 APK와 맞지 않으면 DigestMismatchError', async () => {
    await fs.writeFile(
      transferFilePath,
      ['version: 1.0.0', 'v2:false,v3:false', 'universal.apk', 'V1-TEST-0000000000000000', ''].join(
        '\n'
      )
    );

    await expect(
      apply(new FakeSigner(), { split: [], universal: ['universal.apk'] })
    ).rejects.toBeInstanceOf(DigestMismatchError);
  });

  it('형식이 틀린 전송 파일은 APK Set을 만들기 전에 거부', async () => {
    await fs.writeFile(transferFilePath, 'version: 1.0.0\nv2:true,v3:false\nuniversal.apk\nP1\n');
    const expander = new FakeBundleExpander(LAYOUT);

    await expect(
      withWorkspace((workspace) =>
        new SignatureApplier(new FakeSigner(), expander).apply(
          { bundlePath, transferFilePath, outputDir },
          workspace
        )
      )
    ).rejects.toBeInstanceOf(TransferFileFormatError);
    expect(expander.calls).toHaveLength(0);
  });

  it('전송 파일이 없으면 ParameterError', async () => {
    await expect(apply(new FakeSigner())).rejects.toBeInstanceOf(ParameterError);
  });
});
