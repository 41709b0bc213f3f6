import chalk from 'chalk';
import { CommanderError } from 'commander';
import {
  ErrorCodes,
  ErrorExitCodes,
  MinSdkVersionError,
  exitCodeFor,
  errorMessage,
} from '../core/errors';
import logger from '../utils/logger';

/**
 * 명령 실패를 stderr에 출력하고 종료 코드를 설정
 *
 * commander 옵션 오류는 commander가 메시지를 이미 출력했으므로 종료 코드만 정합니다.
 */
export function reportError(error: unknown): void {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode === 0 ? 0 : ErrorExitCodes[ErrorCodes.PARAMETER];
    return;
  }

  console.error(chalk.red(`오류: ${errorMessage(error)}`));
  if (error instanceof MinSdkVersionError) {
    console.error(
      chalk.yellow('APK의 최소 지원 플랫폼 버전을 알 수 없습니다. --min-sdk-version으로 지정하세요')
    );
  }
  logger.debug('명령 실패', {
    name: error instanceof Error ? error.name : typeof error,
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exitCode = exitCodeFor(error);
}
