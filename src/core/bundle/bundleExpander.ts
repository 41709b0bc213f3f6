import { execFile } from 'child_process';
import * as fs from 'fs-extra';
import * as path from 'path';
import { promisify } from 'util';
import { ApkSetMode } from '../../types';
import { Config } from '../config';
import { BundleExpansionIOError, InvalidBundleError, ParameterError, errorMessage } from '../errors';
import { bundleBaseName } from '../shared/variant-names';
import { Workspace } from '../workspace';
import logger from '../../utils/logger';
import { KeystoreInfo, createDisposableKeystore } from './disposableKeystore';

const execFileAsync = promisify(execFile);

/** bundletool 출력 버퍼 상한 */
const MAX_BUFFER_SIZE = 16 * 1024 * 1024;

/** bundletool이 번들 자체의 문제를 보고할 때 출력하는 예외 */
const INVALID_BUNDLE_PATTERN = /Invalid(Bundle|Module|Version)Exception|ValidationException/;

/**
 * App Bundle → APK Set 확장
 */
export interface BundleExpander {
  /**
   * mode에 따라 분할 APK Set(<번들 basename>.apks) 또는 유니버설 APK Set(universal.apks)을
   * outputDir에 만들고 그 경로를 반환
   */
  buildApkSet(bundlePath: string, mode: ApkSetMode, outputDir: string): Promise<string>;
}

/**
 * APK Set 파일명
 */
export function apkSetFileName(bundlePath: string, mode: ApkSetMode): string {
  return mode === 'universal' ? 'universal.apks' : `${bundleBaseName(path.basename(bundlePath))}.apks`;
}

/**
 * bundletool build-apks 인자
 */
export function buildApksArguments(
  bundletoolJar: string,
  bundlePath: string,
  outputPath: string,
  keystore: KeystoreInfo,
  mode: ApkSetMode
): string[] {
  const args = [
    '-jar',
    bundletoolJar,
    'build-apks',
    `--bundle=${bundlePath}`,
    `--output=${outputPath}`,
    `--ks=${keystore.path}`,
    `--ks-key-alias=${keystore.alias}`,
    `--ks-pass=pass:${keystore.password}`,
    `--key-pass=pass:${keystore.password}`,
    '--overwrite',
  ];
  if (mode === 'universal') {
    args.push('--mode=universal');
  }
  return args;
}

function outputOf(error: unknown, key: 'stderr' | 'stdout'): string {
  if (typeof error === 'object' && error !== null && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

/**
 * 외부 bundletool jar를 java로 실행하는 BundleExpander
 *
 * 일회용 키스토어는 작업 디렉토리마다 한 번 만들어 재사용합니다.
 */
export class BundletoolExpander implements BundleExpander {
  private keystore: Promise<KeystoreInfo> | null = null;

  constructor(
    private readonly config: Pick<Config, 'bundletoolJar' | 'javaPath'>,
    private readonly workspace: Workspace
  ) {}

  async buildApkSet(bundlePath: string, mode: ApkSetMode, outputDir: string): Promise<string> {
    const bundletoolJar = this.config.bundletoolJar;
    if (!bundletoolJar) {
      throw new ParameterError(
        'bundletool jar 경로가 설정되지 않았습니다 (config set bundletoolJar <경로> 또는 BUNDLETOOL_JAR)'
      );
    }
    if (!(await fs.pathExists(bundletoolJar))) {
      throw new BundleExpansionIOError(`bundletool jar를 찾을 수 없습니다: ${bundletoolJar}`);
    }

    await fs.ensureDir(outputDir);
    const outputPath = path.join(outputDir, apkSetFileName(bundlePath, mode));
    const keystore = await this.getKeystore();
    const args = buildApksArguments(bundletoolJar, bundlePath, outputPath, keystore, mode);

    logger.info('APK Set 빌드 시작', { bundlePath, mode, outputPath });
    try {
      const { stderr } = await execFileAsync(this.config.javaPath, args, {
        maxBuffer: MAX_BUFFER_SIZE,
      });
      if (stderr.trim()) {
        logger.debug('bundletool stderr', { stderr: stderr.trim() });
      }
    } catch (error) {
      const stderr = outputOf(error, 'stderr');
      const detail = stderr.trim() || errorMessage(error);
      if (INVALID_BUNDLE_PATTERN.test(stderr)) {
        throw new InvalidBundleError(`잘못된 App Bundle입니다: ${bundlePath}\n${detail}`);
      }
      throw new BundleExpansionIOError(`bundletool 실행 실패 (${mode}): ${detail}`, {
        cause: error,
      });
    }

    if (!(await fs.pathExists(outputPath))) {
      throw new BundleExpansionIOError(`bundletool이 APK Set을 만들지 않았습니다: ${outputPath}`);
    }
    logger.info('APK Set 빌드 완료', { mode, outputPath });
    return outputPath;
  }

  private getKeystore(): Promise<KeystoreInfo> {
    if (!this.keystore) {
      this.keystore = createDisposableKeystore(this.workspace.path('keystore', 'disposable.p12'));
    }
    return this.keystore;
  }
}
