import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

// 표준 출력은 명령 결과 전용이므로 로그는 모두 stderr로 보냄
function createConsoleTransport(level: string): winston.transport {
  return new winston.transports.Console({
    level,
    format: consoleFormat,
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  });
}

class Logger {
  private logger: winston.Logger;
  private consoleTransport: winston.transport;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용)
    this.consoleTransport = createConsoleTransport(process.env.BUNDLE_SIGNER_LOG_LEVEL || 'warn');
    this.logger = winston.createLogger({
      level: 'debug',
      format: logFormat,
      transports: [this.consoleTransport],
    });
  }

  /**
   * 파일 로테이션 트랜스포트를 추가합니다. 로그 경로는 ConfigManager에서 가져옵니다.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();
    const { logLevel } = configManager.getConfig();

    this.logger.add(
      new DailyRotateFile({
        dirname: logsDir,
        filename: 'bundle-signer-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '30d',
        level: logLevel,
        format: logFormat,
      })
    );

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir });
  }

  /**
   * 콘솔 출력 레벨 변경 (--verbose 등)
   */
  setConsoleLevel(level: string): void {
    this.consoleTransport.level = level;
  }

  /**
   * 에러 로그
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  /**
   * 경고 로그
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * 정보 로그
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * 디버그 로그
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
