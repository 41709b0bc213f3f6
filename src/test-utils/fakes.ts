import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ApkSetMode, DigestOptions, SchemeFlags, SignerConfig } from '../types';
import { BundleExpander, apkSetFileName } from '../core/bundle/bundleExpander';
import { DigestMismatchError } from '../core/errors';
import { Signer } from '../core/signer/types';
import { writeZip } from './zip';

export interface SignerCall {
  method: keyof Signer;
  apk: string;
  payload?: string;
  outputApk?: string;
  schemes: SchemeFlags;
}

async function contentTag(filePath: string): Promise<string> {
  const data = await fs.readFile(filePath);
  return crypto.createHash('sha256').update(data).digest('hex').slice(0, 16);
}

/**
 * 파일 내용 해시를 페이로드로 쓰는 가짜 서명자
 *
 * 적용 시 페이로드가 입력 파일 내용과 맞지 않으면 DigestMismatchError를 던지고,
 * 맞으면 입력을 그대로 복사합니다.
 */
export class FakeSigner implements Signer {
  readonly calls: SignerCall[] = [];

  async generateV1Payload(apk: string, signers: SignerConfig[], options: DigestOptions): Promise<string> {
    this.calls.push({ method: 'generateV1Payload', apk, schemes: options.schemes });
    return `V1-${signers.map((s) => s.name).join('+')}-${await contentTag(apk)}`;
  }

  async applyV1Payload(apk: string, payload: string, outputApk: string, schemes: SchemeFlags): Promise<void> {
    this.calls.push({ method: 'applyV1Payload', apk, payload, outputApk, schemes });
    if (!payload.endsWith(`-${await contentTag(apk)}`)) {
      throw new DigestMismatchError(`V1 페이로드가 APK와 맞지 않습니다: ${apk}`);
    }
    await fs.copy(apk, outputApk, { overwrite: true });
  }

  async generateV2V3Payload(
    v1SignedApk: string,
    _signers: SignerConfig[],
    options: DigestOptions
  ): Promise<string> {
    this.calls.push({ method: 'generateV2V3Payload', apk: v1SignedApk, schemes: options.schemes });
    return `V2V3-${await contentTag(v1SignedApk)}`;
  }

  async applyV2V3Payload(
    v1SignedApk: string,
    payload: string,
    outputApk: string,
    schemes: SchemeFlags
  ): Promise<void> {
    this.calls.push({ method: 'applyV2V3Payload', apk: v1SignedApk, payload, outputApk, schemes });
    if (payload !== `V2V3-${await contentTag(v1SignedApk)}`) {
      throw new DigestMismatchError(`V2/V3 페이로드가 APK와 맞지 않습니다: ${v1SignedApk}`);
    }
    await fs.copy(v1SignedApk, outputApk, { overwrite: true });
  }

  callsOf(method: keyof Signer): SignerCall[] {
    return this.calls.filter((call) => call.method === method);
  }
}

/**
 * 지정한 엔트리 경로로 APK Set을 만드는 가짜 BundleExpander
 *
 * 각 APK 엔트리의 내용은 "apk:<엔트리 경로>"이고, APK가 아닌 toc.pb가 함께 들어갑니다.
 */
export class FakeBundleExpander implements BundleExpander {
  readonly calls: Array<{ bundlePath: string; mode: ApkSetMode; outputDir: string }> = [];

  constructor(private readonly layout: Record<ApkSetMode, string[]>) {}

  async buildApkSet(bundlePath: string, mode: ApkSetMode, outputDir: string): Promise<string> {
    this.calls.push({ bundlePath, mode, outputDir });
    const outputPath = path.join(outputDir, apkSetFileName(bundlePath, mode));
    await writeZip(outputPath, [
      { name: 'toc.pb', data: Buffer.from('toc'), store: true },
      ...this.layout[mode].map((entryPath) => ({
        name: entryPath,
        data: Buffer.from(`apk:${entryPath}`),
        store: true,
      })),
    ]);
    return outputPath;
  }
}
