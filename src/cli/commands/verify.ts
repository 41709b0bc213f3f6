import chalk from 'chalk';
import * as path from 'path';
import { ParameterError } from '../../core/errors';
import { verifyApk } from '../../core/signer/apkVerifier';
import { describeCertificate } from '../../core/signer/certificateInfo';
import logger from '../../utils/logger';
import { parseBooleanOption, parseSdkVersionOption } from '../options';

// verify 옵션
export interface VerifyCommandOptions {
  in?: string;
  minSdkVersion?: string;
  maxSdkVersion?: string;
  printCerts?: boolean;
  verbose?: boolean | string;
  Werr?: boolean;
}

/**
 * 인증서 정보 출력
 */
function printCertificate(der: Buffer, name: string, verbose: boolean): void {
  const summary = describeCertificate(der);
  console.log(`${name} certificate DN: ${summary.subject}`);
  console.log(`${name} certificate SHA-256 digest: ${summary.sha256}`);
  console.log(`${name} certificate SHA-1 digest: ${summary.sha1}`);
  console.log(`${name} certificate MD5 digest: ${summary.md5}`);
  if (verbose) {
    console.log(`${name} key algorithm: ${summary.keyAlgorithm}`);
    console.log(`${name} key size (bits): ${summary.keySize ?? 'n/a'}`);
  }
}

/**
 * verify 명령어 핸들러
 *
 * 검증 실패, 또는 -Werr일 때 경고가 있으면 종료 코드 1
 */
export async function verifyCommand(apk: string | undefined, options: VerifyCommandOptions): Promise<void> {
  const verbose = parseBooleanOption(options.verbose, '--verbose');
  if (verbose) {
    logger.setConsoleLevel('debug');
  }
  if (apk && options.in && apk !== options.in) {
    throw new ParameterError('APK 경로는 --in 또는 인자 중 하나로만 지정하세요');
  }
  const input = apk ?? options.in;
  if (!input) {
    throw new ParameterError('검증할 APK가 지정되지 않았습니다');
  }

  const result = await verifyApk(path.resolve(input), {
    minSdkVersion: parseSdkVersionOption(options.minSdkVersion, '--min-sdk-version'),
    maxSdkVersion: parseSdkVersionOption(options.maxSdkVersion, '--max-sdk-version'),
  });

  if (result.verified) {
    if (verbose) {
      console.log(chalk.green('Verifies'));
      console.log(`Verified using v1 scheme (JAR signing): ${result.verifiedUsingV1}`);
      console.log(`Verified using v2 scheme (APK Signature Scheme v2): ${result.verifiedUsingV2}`);
      console.log(`Verified using v3 scheme (APK Signature Scheme v3): ${result.verifiedUsingV3}`);
      console.log(`Number of signers: ${result.signerCertificates.length}`);
    }
    if (options.printCerts) {
      result.signerCertificates.forEach((der, index) => {
        printCertificate(der, `Signer #${index + 1}`, verbose);
      });
    }
  } else {
    console.error(chalk.red('DOES NOT VERIFY'));
  }

  for (const error of result.errors) {
    console.error(chalk.red(`ERROR: ${error}`));
  }
  const warn = options.Werr ? console.error : console.log;
  for (const warning of result.warnings) {
    warn(chalk.yellow(`WARNING: ${warning}`));
  }

  if (!result.verified || (options.Werr && result.warnings.length > 0)) {
    process.exitCode = 1;
  }
}
