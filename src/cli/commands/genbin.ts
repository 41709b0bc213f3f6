import chalk from 'chalk';
import * as path from 'path';
import { BundletoolExpander } from '../../core/bundle/bundleExpander';
import { getConfigManager } from '../../core/config';
import { DigestRecorder } from '../../core/digestRecorder';
import { bundleBaseName } from '../../core/shared/variant-names';
import { ApkSchemeSigner } from '../../core/signer/apkSchemeSigner';
import { loadSignerConfig } from '../../core/signer/credentials';
import { createSchemeFlags } from '../../core/transfer/transferFormat';
import { withWorkspace } from '../../core/workspace';
import logger from '../../utils/logger';
import {
  SignerOptions,
  parseBooleanOption,
  parseSdkVersionOption,
  requireOption,
  toSignerParams,
} from '../options';

// genbin 옵션
export interface GenbinOptions extends SignerOptions {
  bundle?: string;
  bin?: string;
  minSdkVersion?: string;
  maxSdkVersion?: string;
  v2SigningEnabled?: boolean | string;
  v3SigningEnabled?: boolean | string;
  debuggableApkPermitted?: boolean | string;
  verbose?: boolean | string;
}

/**
 * 전송 파일 경로 (<binDir>/<번들 basename>.bin)
 */
export function transferFilePathFor(bundlePath: string, binDir: string): string {
  return path.join(binDir, `${bundleBaseName(path.basename(bundlePath))}.bin`);
}

/**
 * genbin 명령어 핸들러
 */
export async function genbinCommand(options: GenbinOptions): Promise<void> {
  const verbose = parseBooleanOption(options.verbose, '--verbose');
  if (verbose) {
    logger.setConsoleLevel('debug');
  }

  const bundlePath = path.resolve(requireOption(options.bundle, '입력 번들 경로(--bundle)'));
  const binDir = path.resolve(requireOption(options.bin, '전송 파일 디렉토리(--bin)'));
  const schemes = createSchemeFlags(
    parseBooleanOption(options.v2SigningEnabled, '--v2-signing-enabled'),
    parseBooleanOption(options.v3SigningEnabled, '--v3-signing-enabled')
  );
  const debuggableApkPermitted = parseBooleanOption(
    options.debuggableApkPermitted ?? true,
    '--debuggable-apk-permitted'
  );
  const minSdkVersion = parseSdkVersionOption(options.minSdkVersion, '--min-sdk-version');
  const maxSdkVersion = parseSdkVersionOption(options.maxSdkVersion, '--max-sdk-version');

  const signer = await loadSignerConfig(toSignerParams(options));
  const outputPath = transferFilePathFor(bundlePath, binDir);
  const config = getConfigManager().getConfig();

  console.log(chalk.cyan('다이제스트 생성 중...'));
  const transfer = await withWorkspace(async (workspace) => {
    const recorder = new DigestRecorder(
      new ApkSchemeSigner(),
      new BundletoolExpander(config, workspace)
    );
    recorder.on('variant', (event) => {
      if (verbose) {
        console.log(chalk.gray(`  [${event.apkSet}] ${event.variant}`));
      }
    });
    return recorder.generate(
      {
        bundlePath,
        outputPath,
        signers: [signer],
        schemes,
        minSdkVersion,
        maxSdkVersion,
        debuggableApkPermitted,
      },
      workspace
    );
  });

  console.log(chalk.green(`✓ 다이제스트 생성 완료: ${outputPath} (${transfer.groups.length}개 변형)`));
  if (verbose) {
    console.log(chalk.gray(`  v2:${schemes.v2}, v3:${schemes.v3}, 서명자: ${signer.name}`));
  }
}
