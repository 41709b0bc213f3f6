import chalk from 'chalk';
import Table from 'cli-table3';
import { CONFIG_DESCRIPTIONS, getConfigManager, isConfigKey } from '../../core/config';
import { ParameterError } from '../../core/errors';

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  if (key) {
    if (!isConfigKey(key)) {
      throw new ParameterError(`알 수 없는 설정 키: ${key}`);
    }
    const value = config[key];
    if (value !== undefined) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(value));
    } else {
      console.log(chalk.yellow(`설정 '${key}'이 지정되지 않았습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  if (!isConfigKey(key)) {
    throw new ParameterError(`알 수 없는 설정 키: ${key}`);
  }
  getConfigManager().set(key, value);
  console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${value}`));
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const config = getConfigManager().getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [18, 40, 24],
  });

  for (const [key, description] of Object.entries(CONFIG_DESCRIPTIONS)) {
    const value = isConfigKey(key) ? config[key] : undefined;
    table.push([key, value ?? chalk.gray('(없음)'), description]);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  getConfigManager().reset();
  console.log(chalk.green('✓ 설정이 초기화되었습니다'));
}
