import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
export interface Config {
  // bundletool 실행 설정
  bundletoolJar?: string;
  javaPath: string;

  // 기타 설정
  logLevel: string;
}

// 기본 설정값
const DEFAULT_CONFIG: Config = {
  javaPath: 'java',
  logLevel: 'info',
};

// 설정 키 설명 (config list 출력용)
export const CONFIG_DESCRIPTIONS: Record<keyof Config, string> = {
  bundletoolJar: 'bundletool jar 경로',
  javaPath: 'java 실행 파일',
  logLevel: '로그 레벨',
};

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = path.join(os.homedir(), '.bundle-signer')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 저장된 값, 기본값, 환경 변수 순으로 병합합니다.
   */
  getConfig(): Config {
    let stored: Partial<Config> = {};
    if (fs.pathExistsSync(this.configPath)) {
      stored = pickConfig(fs.readJsonSync(this.configPath));
    }
    return applyEnvironment({ ...DEFAULT_CONFIG, ...stored }, process.env);
  }

  /**
   * 설정값을 변경합니다.
   */
  set(key: string, value: string): Config {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }
    fs.ensureDirSync(this.configDir);
    let config: Record<string, unknown> = {};

    if (fs.pathExistsSync(this.configPath)) {
      config = fs.readJsonSync(this.configPath);
    }

    config[key] = value;
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return this.getConfig();
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }
}

export function isConfigKey(key: string): key is keyof Config {
  return Object.prototype.hasOwnProperty.call(CONFIG_DESCRIPTIONS, key);
}

/**
 * JSON 값에서 알려진 문자열 설정만 추출
 */
function pickConfig(raw: unknown): Partial<Config> {
  const picked: Partial<Config> = {};
  if (typeof raw !== 'object' || raw === null) {
    return picked;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (isConfigKey(key) && typeof value === 'string' && value.length > 0) {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * 환경 변수 오버라이드 (BUNDLETOOL_JAR, JAVA_HOME)
 */
export function applyEnvironment(config: Config, env: NodeJS.ProcessEnv): Config {
  const result = { ...config };
  if (env.BUNDLETOOL_JAR) {
    result.bundletoolJar = env.BUNDLETOOL_JAR;
  }
  if (env.JAVA_HOME) {
    result.javaPath = path.join(env.JAVA_HOME, 'bin', 'java');
  }
  return result;
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
