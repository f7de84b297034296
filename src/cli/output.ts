import chalk from 'chalk';
import type { InstallResult } from '../types';

/**
 * 설치 결과 출력
 */
export function printInstallResult(result: InstallResult): void {
  console.log('');

  if (result.reused) {
    console.log(chalk.green(`✓ 기존 설치를 그대로 사용합니다: ${result.destination}`));
    return;
  }

  console.log(chalk.green('✓ 설치 완료!'));
  console.log(chalk.gray(`  대상 경로: ${result.destination}`));
  console.log(chalk.gray(`  처리한 파일: ${result.installed.length}개`));

  if (result.skipped.length > 0) {
    console.log(chalk.yellow(`  건너뛴 패키지 (${result.skipped.length}개): ${result.skipped.join(', ')}`));
  }
}
