#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import logger from '../utils/logger';
import { errorMessage } from '../core/errors';
import { reportError } from './report';
import type { GenbinOptions } from './commands/genbin';
import type { SignbundleOptions } from './commands/signbundle';
import type { VerifyCommandOptions } from './commands/verify';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('bundle-signer')
  .description(chalk.cyan('Android App Bundle 분리 서명 도구 - 다이제스트 생성(genbin)과 서명 적용(signbundle)'))
  .version(VERSION, '--version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .exitOverride();

// genbin 명령어 (개인키가 있는 환경)
program
  .command('genbin')
  .description('번들의 모든 APK 변형에 대한 서명 다이제스트를 전송 파일로 기록')
  .option('--bundle <path>', '입력 App Bundle (.aab)')
  .option('--bin <dir>', '전송 파일(<번들 이름>.bin)을 기록할 디렉토리')
  .option('--ks <path>', 'PKCS#12 키스토어')
  .option('--ks-key-alias <alias>', '키스토어의 키 별칭')
  .option('--ks-pass <spec>', '키스토어 비밀번호 (pass:<값>, env:<변수>, file:<경로>)')
  .option('--key-pass <spec>', '키 비밀번호 (기본: 키스토어 비밀번호)')
  .option('--key <path>', '개인키 파일 (PKCS#8/PKCS#1, PEM 또는 DER)')
  .option('--cert <path>', '인증서 파일 (PEM 또는 DER)')
  .option('--v1-signer-name <name>', 'JAR 서명 파일 이름 (최대 8자)')
  .option('--min-sdk-version <level>', '최소 API 레벨 (기본: APK 매니페스트)')
  .option('--max-sdk-version <level>', '최대 API 레벨')
  .option('--v2-signing-enabled [bool]', 'APK Signature Scheme v2 사용', false)
  .option('--v3-signing-enabled [bool]', 'APK Signature Scheme v3 사용', false)
  .option('--debuggable-apk-permitted [bool]', 'debuggable APK 서명 허용', true)
  .option('-v, --verbose [bool]', '상세 출력', false)
  .action(async (options: GenbinOptions) => {
    const { genbinCommand } = await import('./commands/genbin');
    await genbinCommand(options);
  });

// signbundle 명령어 (개인키가 없는 환경)
program
  .command('signbundle')
  .description('전송 파일의 서명을 다시 빌드한 APK에 적용')
  .option('--bundle <path>', '입력 App Bundle (genbin과 같은 파일)')
  .option('--bin <path>', 'genbin이 만든 전송 파일')
  .option('--out <dir>', '서명된 APK 출력 디렉토리')
  .option('-v, --verbose [bool]', '상세 출력', false)
  .action(async (options: SignbundleOptions) => {
    const { signbundleCommand } = await import('./commands/signbundle');
    await signbundleCommand(options);
  });

// verify 명령어
program
  .command('verify')
  .description('APK 서명 검증')
  .argument('[apk]', '검증할 APK')
  .option('--in <apk>', '검증할 APK')
  .option('--min-sdk-version <level>', '최소 API 레벨 (기본: APK 매니페스트)')
  .option('--max-sdk-version <level>', '최대 API 레벨')
  .option('--print-certs', '서명자 인증서 출력')
  .option('-v, --verbose [bool]', '상세 출력', false)
  .option('--Werr', '경고를 오류로 취급 (-Werr)')
  .action(async (apk: string | undefined, options: VerifyCommandOptions) => {
    const { verifyCommand } = await import('./commands/verify');
    await verifyCommand(apk, options);
  });

// config 명령어
const config = program.command('config').description('설정 관리');

config
  .command('get')
  .description('설정값 조회')
  .argument('[key]', '설정 키')
  .action(async (key?: string) => {
    const { configGet } = await import('./commands/config');
    await configGet(key);
  });

config
  .command('set')
  .description('설정값 변경')
  .argument('<key>', '설정 키 (bundletoolJar, javaPath, logLevel)')
  .argument('<value>', '설정값')
  .action(async (key: string, value: string) => {
    const { configSet } = await import('./commands/config');
    await configSet(key, value);
  });

config
  .command('list')
  .description('모든 설정 표시')
  .action(async () => {
    const { configList } = await import('./commands/config');
    await configList();
  });

config
  .command('reset')
  .description('설정 초기화')
  .action(async () => {
    const { configReset } = await import('./commands/config');
    await configReset();
  });

// version 명령어
program
  .command('version')
  .description('버전 정보 표시')
  .action(() => {
    console.log(VERSION);
  });

/**
 * 단일 대시 -Werr를 commander 옵션으로 변환
 */
function normalizeArgv(argv: string[]): string[] {
  return argv.map((arg) => (arg === '-Werr' ? '--Werr' : arg));
}

async function main(): Promise<void> {
  try {
    await logger.initialize();
  } catch (error) {
    logger.warn('로그 파일을 준비하지 못했습니다', { error: errorMessage(error) });
  }

  // 명령어가 없으면 도움말 표시
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(normalizeArgv(process.argv));
}

main().catch(reportError);
