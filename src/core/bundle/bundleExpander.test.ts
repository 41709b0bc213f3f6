import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import forge from 'node-forge';
import { BundleExpansionIOError, ParameterError } from '../errors';
import { Workspace } from '../workspace';
import { BundletoolExpander, apkSetFileName, buildApksArguments } from './bundleExpander';
import {
  DISPOSABLE_KEY_ALIAS,
  DISPOSABLE_KEY_PASSWORD,
  createDisposableKeystore,
} from './disposableKeystore';

describe('bundleExpander', () => {
  let workspace: Workspace;

  beforeEach(async () => {
    workspace = await Workspace.create('expander-test-');
  });

  afterEach(async () => {
    await workspace.dispose();
  });

  describe('apkSetFileName', () => {
    it('분할 APK Set은 번들 basename', () => {
      expect(apkSetFileName('/tmp/app.release.aab', 'split')).toBe('app.apks');
    });

    it('유니버설 APK Set은 universal.apks', () => {
      expect(apkSetFileName('/tmp/app.aab', 'universal')).toBe('universal.apks');
    });
  });

  describe('buildApksArguments', () => {
    const keystore = { path: '/work/ks.p12', alias: 'default', password: 'test-secret' };

    it('분할 모드', () => {
      expect(buildApksArguments('/opt/bundletool.jar', 'app.aab', 'out/app.apks', keystore, 'split')).toEqual([
        '-jar',
        '/opt/bundletool.jar',
        'build-apks',
        '--bundle=app.aab',
        '--output=out/app.apks',
        '--ks=/work/ks.p12',
        '--ks-key-alias=default',
        '--ks-pass=pass:test-secret',
        '--key-pass=pass:test-secret',
        '--overwrite',
      ]);
    });

    it('유니버설 모드는 --mode=universal 추가', () => {
      const args = buildApksArguments('/opt/bundletool.jar', 'app.aab', 'universal.apks', keystore, 'universal');
      expect(args[args.length - 1]).toBe('--mode=universal');
    });
  });

  describe('BundletoolExpander', () => {
    it('jar 경로가 설정되지 않으면 ParameterError', async () => {
      const expander = new BundletoolExpander({ bundletoolJar: '', javaPath: 'java' }, workspace);
      await expect(
        expander.buildApkSet('app.aab', 'split', workspace.path('apks'))
      ).rejects.toBeInstanceOf(ParameterError);
    });

    it('jar 파일이 없으면 BundleExpansionIOError', async () => {
      const expander = new BundletoolExpander(
        { bundletoolJar: workspace.path('missing.jar'), javaPath: 'java' },
        workspace
      );
      await expect(
        expander.buildApkSet('app.aab', 'split', workspace.path('apks'))
      ).rejects.toBeInstanceOf(BundleExpansionIOError);
    });
  });

  describe('createDisposableKeystore', () => {
    it('별칭과 비밀번호로 열리는 PKCS#12 키스토어', async () => {
      const filePath = workspace.path('keystore', 'disposable.p12');
      const info = await createDisposableKeystore(filePath);

      expect(info).toEqual({
        path: filePath,
        alias: DISPOSABLE_KEY_ALIAS,
        password: DISPOSABLE_KEY_PASSWORD,
      });

      const der = await fs.readFile(filePath);
      const p12 = forge.pkcs12.pkcs12FromAsn1(
        forge.asn1.fromDer(forge.util.createBuffer(der.toString('binary'))),
        DISPOSABLE_KEY_PASSWORD
      );
      const bags = p12.getBags({ friendlyName: DISPOSABLE_KEY_ALIAS }).friendlyName ?? [];
      expect(bags.some((bag) => bag.key !== undefined)).toBe(true);
      expect(bags.some((bag) => bag.cert !== undefined)).toBe(true);
      expect(path.basename(filePath)).toBe('disposable.p12');
    });
  });
});
