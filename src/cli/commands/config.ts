import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isConfigKey } from '../../core/config';

const descriptions: Record<string, string> = {
  defaultFlavor: '기본 배포판',
  defaultDestination: '기본 설치 경로',
  mirrorUrl: 'FreeDOS 미러 루트 URL',
  requestTimeoutMs: '요청 제한 시간 (ms)',
  diskImageTool: '디스크 이미지 복사 도구',
  logLevel: '로그 레벨',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (!key) {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  const value = isConfigKey(key) ? config[key] : undefined;
  if (value !== undefined) {
    console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(value)));
  } else {
    console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  // 숫자로 읽히는 값은 숫자로 저장
  const parsedValue: string | number = value.trim() !== '' && !isNaN(Number(value)) ? Number(value) : value;

  getConfigManager().set(key, parsedValue);
  console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
  });

  for (const [key, value] of Object.entries(config)) {
    table.push([key, String(value), descriptions[key] || '-']);
  }

  console.log(chalk.cyan(`\n설정 목록 (${configManager.getConfigPath()}):\n`));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  getConfigManager().reset();
  console.log(chalk.green('✓ 설정이 초기화되었습니다'));
}
