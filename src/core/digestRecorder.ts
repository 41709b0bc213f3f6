import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import {
  ApkSetMode,
  DigestOptions,
  ExtractedVariant,
  SchemeFlags,
  SignerConfig,
  TransferFile,
  TransferHeader,
  VariantDigestGroup,
  VariantProgressEvent,
} from '../types';
import logger from '../utils/logger';
import { walkApkSet } from './apkset/apkSetWalker';
import { BundleExpander } from './bundle/bundleExpander';
import { ParameterError } from './errors';
import { isFile, sha256File } from './shared/file-utils';
import { Signer } from './signer/types';
import { TRANSFER_FORMAT_VERSION, requiresV2V3 } from './transfer/transferFormat';
import { TransferFileWriter } from './transfer/transferFileWriter';
import { Workspace } from './workspace';

/** 분할 APK Set을 먼저, 유니버설 APK Set을 나중에 처리 */
export const APK_SET_MODES: readonly ApkSetMode[] = ['split', 'universal'];

// 다이제스트 생성 요청
export interface DigestRequest {
  bundlePath: string;
  /** 전송 파일 경로 */
  outputPath: string;
  signers: SignerConfig[];
  schemes: SchemeFlags;
  minSdkVersion?: number;
  maxSdkVersion?: number;
  debuggableApkPermitted: boolean;
}

// 이벤트 타입
export interface DigestRecorderEvents {
  apkSetBuilt: (mode: ApkSetMode, apkSetPath: string) => void;
  variant: (event: VariantProgressEvent) => void;
}

/**
 * 1단계: 번들에서 APK를 만들어 변형별 서명 다이제스트를 전송 파일에 기록
 *
 * 개인키가 있는 환경에서 실행되며, 결과 파일만 2단계 환경으로 옮기면 됩니다.
 */
export class DigestRecorder extends EventEmitter<DigestRecorderEvents> {
  constructor(
    private readonly signer: Signer,
    private readonly expander: BundleExpander
  ) {
    super();
  }

  async generate(request: DigestRequest, workspace: Workspace): Promise<TransferFile> {
    await this.validate(request);

    const header: TransferHeader = {
      version: TRANSFER_FORMAT_VERSION,
      bundleDigest: await sha256File(request.bundlePath),
    };
    const writer = new TransferFileWriter(request.outputPath, header, request.schemes);
    await writer.create();
    logger.info('다이제스트 생성 시작', {
      bundlePath: request.bundlePath,
      outputPath: request.outputPath,
      schemes: request.schemes,
    });

    const options: DigestOptions = {
      schemes: request.schemes,
      minSdkVersion: request.minSdkVersion,
      maxSdkVersion: request.maxSdkVersion,
      debuggableApkPermitted: request.debuggableApkPermitted,
    };
    const scratch = workspace.path('scratch', 'v1-signed.apk');
    await workspace.dir('scratch');

    const apkSets: Array<[ApkSetMode, string]> = [];
    for (const mode of APK_SET_MODES) {
      const apkSetPath = await this.expander.buildApkSet(
        request.bundlePath,
        mode,
        await workspace.dir('apks', mode)
      );
      this.emit('apkSetBuilt', mode, apkSetPath);
      apkSets.push([mode, apkSetPath]);
    }

    const groups: VariantDigestGroup[] = [];
    for (const [mode, apkSetPath] of apkSets) {
      const setGroups: VariantDigestGroup[] = [];
      for await (const variant of walkApkSet(apkSetPath, workspace.path('extracted', mode))) {
        const group = await this.digestVariant(variant, request.signers, options, scratch);
        await fs.remove(variant.filePath);
        setGroups.push(group);
        this.emit('variant', { apkSet: mode, variant: variant.name, index: setGroups.length - 1 });
      }
      await writer.append(setGroups);
      groups.push(...setGroups);
      logger.info('APK Set 다이제스트 기록', { mode, variants: setGroups.length });
    }

    logger.info('다이제스트 생성 완료', { outputPath: request.outputPath, variants: writer.count });
    return { header, flags: request.schemes, groups };
  }

  private async validate(request: DigestRequest): Promise<void> {
    if (request.signers.length === 0) {
      throw new ParameterError('서명자 설정이 없습니다');
    }
    if (!(await isFile(request.bundlePath))) {
      throw new ParameterError(`번들 파일이 없습니다: ${request.bundlePath}`);
    }
    const { minSdkVersion, maxSdkVersion } = request;
    if (minSdkVersion !== undefined && maxSdkVersion !== undefined && minSdkVersion > maxSdkVersion) {
      throw new ParameterError(
        `최소 SDK(${minSdkVersion})가 최대 SDK(${maxSdkVersion})보다 큽니다`
      );
    }
  }

  /**
   * 변형 하나의 V1 페이로드와, v2/v3가 켜져 있으면 V1 서명본 기준 V2V3 페이로드
   */
  private async digestVariant(
    variant: ExtractedVariant,
    signers: SignerConfig[],
    options: DigestOptions,
    scratch: string
  ): Promise<VariantDigestGroup> {
    logger.debug('변형 다이제스트 생성', { variant: variant.name });
    const v1 = await this.signer.generateV1Payload(variant.filePath, signers, options);
    if (!requiresV2V3(options.schemes)) {
      return { variantName: variant.name, v1 };
    }

    await this.signer.applyV1Payload(variant.filePath, v1, scratch, options.schemes);
    const v2v3 = await this.signer.generateV2V3Payload(scratch, signers, options);
    return { variantName: variant.name, v1, v2v3 };
  }
}
