import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, applyEnvironment, getConfigManager, isConfigKey } from './config';

describe('ConfigManager', () => {
  let configDir: string;
  let manager: ConfigManager;

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
    manager = new ConfigManager(configDir);
    vi.stubEnv('BUNDLETOOL_JAR', '');
    vi.stubEnv('JAVA_HOME', '');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.remove(configDir);
  });

  it('싱글톤 인스턴스 반환', () => {
    expect(getConfigManager()).toBe(getConfigManager());
  });

  it('저장된 설정이 없으면 기본값', () => {
    expect(manager.getConfig()).toEqual({ javaPath: 'java', logLevel: 'info' });
  });

  it('설정값 저장 후 다시 읽음', () => {
    const config = manager.set('bundletoolJar', '/opt/bundletool.jar');
    expect(config.bundletoolJar).toBe('/opt/bundletool.jar');
    expect(new ConfigManager(configDir).getConfig().bundletoolJar).toBe('/opt/bundletool.jar');
    expect(fs.readJsonSync(path.join(configDir, 'settings.json'))).toEqual({
      bundletoolJar: '/opt/bundletool.jar',
    });
  });

  it('알 수 없는 키는 거부', () => {
    expect(() => manager.set('concurrentDownloads', '3')).toThrow('알 수 없는 설정 키: concurrentDownloads');
  });

  it('저장 파일의 알 수 없는 키와 문자열이 아닌 값은 무시', () => {
    fs.writeJsonSync(path.join(configDir, 'settings.json'), {
      javaPath: '/usr/bin/java',
      logLevel: 3,
      unknown: 'x',
    });
    expect(manager.getConfig()).toEqual({ javaPath: '/usr/bin/java', logLevel: 'info' });
  });

  it('reset은 기본값으로 되돌림', () => {
    manager.set('logLevel', 'debug');
    manager.reset();
    expect(manager.getConfig()).toEqual({ javaPath: 'java', logLevel: 'info' });
  });

  it('환경 변수가 저장된 값보다 우선', () => {
    manager.set('bundletoolJar', '/opt/bundletool.jar');
    vi.stubEnv('BUNDLETOOL_JAR', '/env/bundletool.jar');
    expect(manager.getConfig().bundletoolJar).toBe('/env/bundletool.jar');
  });

  it('디렉토리 경로', async () => {
    await manager.ensureDirectories();
    expect(manager.getConfigDir()).toBe(configDir);
    expect(manager.getLogsDir()).toBe(path.join(configDir, 'logs'));
    expect(await fs.pathExists(path.join(configDir, 'logs'))).toBe(true);
  });
});

describe('applyEnvironment', () => {
  it('JAVA_HOME은 bin/java로 변환', () => {
    expect(
      applyEnvironment({ javaPath: 'java', logLevel: 'info' }, { JAVA_HOME: '/opt/jdk' }).javaPath
    ).toBe(path.join('/opt/jdk', 'bin', 'java'));
  });

  it('환경 변수가 없으면 그대로', () => {
    const config = { javaPath: 'java', logLevel: 'info' };
    expect(applyEnvironment(config, {})).toEqual(config);
  });
});

it('isConfigKey', () => {
  expect(isConfigKey('javaPath')).toBe(true);
  expect(isConfigKey('toString')).toBe(false);
});
