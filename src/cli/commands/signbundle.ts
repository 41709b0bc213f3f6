import chalk from 'chalk';
import * as path from 'path';
import { BundletoolExpander } from '../../core/bundle/bundleExpander';
import { getConfigManager } from '../../core/config';
import { SignatureApplier } from '../../core/signatureApplier';
import { ApkSchemeSigner } from '../../core/signer/apkSchemeSigner';
import { withWorkspace } from '../../core/workspace';
import logger from '../../utils/logger';
import { parseBooleanOption, requireOption } from '../options';

// signbundle 옵션
export interface SignbundleOptions {
  bundle?: string;
  bin?: string;
  out?: string;
  verbose?: boolean | string;
}

/**
 * signbundle 명령어 핸들러
 */
export async function signbundleCommand(options: SignbundleOptions): Promise<void> {
  const verbose = parseBooleanOption(options.verbose, '--verbose');
  if (verbose) {
    logger.setConsoleLevel('debug');
  }

  const bundlePath = path.resolve(requireOption(options.bundle, '입력 번들 경로(--bundle)'));
  const transferFilePath = path.resolve(requireOption(options.bin, '전송 파일 경로(--bin)'));
  const outputDir = path.resolve(requireOption(options.out, '출력 디렉토리(--out)'));
  const config = getConfigManager().getConfig();

  console.log(chalk.cyan('서명 적용 중...'));
  const result = await withWorkspace(async (workspace) => {
    const applier = new SignatureApplier(
      new ApkSchemeSigner(),
      new BundletoolExpander(config, workspace)
    );
    applier.on('variant', (event) => {
      console.log(chalk.gray(`  ✓ ${event.outputPath ?? event.variant}`));
    });
    return applier.apply({ bundlePath, transferFilePath, outputDir }, workspace);
  });

  console.log(chalk.green(`✓ 서명 완료: ${result.signedApks.length}개 APK → ${outputDir}`));
  console.log(chalk.cyan(`  APK Set: ${result.apkSetPath}`));
  if (result.unvisited.length > 0) {
    console.log(chalk.yellow(`  사용되지 않은 다이제스트: ${result.unvisited.join(', ')}`));
  }
}
