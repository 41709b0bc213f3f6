import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import * as path from 'path';
import {
  ApkSetMode,
  ExtractedVariant,
  SchemeFlags,
  VariantDigestGroup,
  VariantProgressEvent,
} from '../types';
import logger from '../utils/logger';
import { walkApkSet } from './apkset/apkSetWalker';
import { BundleExpander } from './bundle/bundleExpander';
import { APK_SET_MODES } from './digestRecorder';
import { BundleMismatchError, ParameterError, VariantCorrelationError } from './errors';
import { isFile, sha256File } from './shared/file-utils';
import { toOutputFileName } from './shared/variant-names';
import { Signer } from './signer/types';
import { indexByVariant, readTransferFile } from './transfer/transferFileReader';
import { requiresV2V3 } from './transfer/transferFormat';
import { Workspace } from './workspace';

// 서명 적용 요청
export interface ApplyRequest {
  bundlePath: string;
  transferFilePath: string;
  outputDir: string;
}

// 서명 적용 결과
export interface ApplyResult {
  /** 서명된 APK 경로 (처리 순서) */
  signedApks: string[];
  /** 출력 디렉토리에 복사한 분할 APK Set */
  apkSetPath: string;
  /** 기록되어 있지만 이번 APK Set에 없던 변형 */
  unvisited: string[];
}

// 이벤트 타입
export interface SignatureApplierEvents {
  apkSetBuilt: (mode: ApkSetMode, apkSetPath: string) => void;
  variant: (event: VariantProgressEvent) => void;
}

/**
 * 2단계: 같은 번들에서 APK를 다시 만들고 전송 파일의 서명을 끼워 넣음
 *
 * 개인키 없이 실행되며, 스킴 플래그는 전송 파일에 기록된 값만 사용합니다.
 */
export class SignatureApplier extends EventEmitter<SignatureApplierEvents> {
  constructor(
    private readonly signer: Signer,
    private readonly expander: BundleExpander
  ) {
    super();
  }

  async apply(request: ApplyRequest, workspace: Workspace): Promise<ApplyResult> {
    if (!(await isFile(request.bundlePath))) {
      throw new ParameterError(`번들 파일이 없습니다: ${request.bundlePath}`);
    }
    if (!(await isFile(request.transferFilePath))) {
      throw new ParameterError(`전송 파일이 없습니다: ${request.transferFilePath}`);
    }

    // 서명된 APK를 하나라도 쓰기 전에 전송 파일 전체를 검증
    const transfer = await readTransferFile(request.transferFilePath);
    const recorded = indexByVariant(transfer.groups);
    logger.info('전송 파일 로드', {
      transferFilePath: request.transferFilePath,
      version: transfer.header.version,
      schemes: transfer.flags,
      variants: transfer.groups.length,
    });

    if (transfer.header.bundleDigest) {
      const actual = await sha256File(request.bundlePath);
      if (actual !== transfer.header.bundleDigest) {
        throw new BundleMismatchError(transfer.header.bundleDigest, actual);
      }
    } else {
      logger.warn('전송 파일에 번들 다이제스트가 없어 번들 일치 여부를 확인하지 않습니다', {
        transferFilePath: request.transferFilePath,
      });
    }

    await fs.ensureDir(request.outputDir);
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

    const visited = new Set<string>();
    const outputNames = new Map<string, string>();
    const signedApks: string[] = [];
    let apkSetCopy = '';

    for (const [mode, apkSetPath] of apkSets) {
      let index = 0;
      for await (const variant of walkApkSet(apkSetPath, workspace.path('extracted', mode))) {
        const group = recorded.get(variant.name);
        if (!group) {
          throw new VariantCorrelationError(
            variant.name,
            `기록된 다이제스트가 없는 변형입니다: ${variant.name}`
          );
        }
        if (visited.has(variant.name)) {
          throw new VariantCorrelationError(
            variant.name,
            `APK Set에 같은 이름의 변형이 두 번 나타났습니다: ${variant.name}`
          );
        }
        visited.add(variant.name);

        const outputName = toOutputFileName(variant.entryPath);
        const previous = outputNames.get(outputName);
        if (previous !== undefined) {
          throw new VariantCorrelationError(
            variant.name,
            `출력 파일 이름이 겹칩니다: ${outputName} (${previous}, ${variant.name})`
          );
        }
        outputNames.set(outputName, variant.name);

        const outputPath = path.join(request.outputDir, outputName);
        await this.signVariant(variant, group, transfer.flags, scratch, outputPath);
        await fs.remove(variant.filePath);
        signedApks.push(outputPath);
        this.emit('variant', { apkSet: mode, variant: variant.name, index: index++, outputPath });
      }

      if (mode === 'split') {
        apkSetCopy = path.join(request.outputDir, `${path.basename(request.bundlePath)}.apks`);
        await fs.copy(apkSetPath, apkSetCopy, { overwrite: true });
        logger.info('분할 APK Set 복사', { apkSetCopy });
      }
    }

    const unvisited = transfer.groups
      .map((group) => group.variantName)
      .filter((name) => !visited.has(name));
    for (const name of unvisited) {
      logger.warn('전송 파일에 기록되었지만 APK Set에 없는 변형입니다', { variant: name });
    }

    logger.info('서명 적용 완료', { outputDir: request.outputDir, signed: signedApks.length });
    return { signedApks, apkSetPath: apkSetCopy, unvisited };
  }

  private async signVariant(
    variant: ExtractedVariant,
    group: VariantDigestGroup,
    schemes: SchemeFlags,
    scratch: string,
    outputPath: string
  ): Promise<void> {
    logger.debug('변형 서명 적용', { variant: variant.name, outputPath });
    if (!requiresV2V3(schemes)) {
      await this.signer.applyV1Payload(variant.filePath, group.v1, outputPath, schemes);
      return;
    }
    if (group.v2v3 === undefined) {
      throw new VariantCorrelationError(
        variant.name,
        `V2/V3 다이제스트가 기록되지 않은 변형입니다: ${variant.name}`
      );
    }
    await this.signer.applyV1Payload(variant.filePath, group.v1, scratch, schemes);
    await this.signer.applyV2V3Payload(scratch, group.v2v3, outputPath, schemes);
  }
}
