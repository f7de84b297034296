import chalk from 'chalk';
import { isDosFetchError } from '../core/errors';
import logger from '../utils/logger';

/**
 * 실패 내용을 출력하고 종료 코드 반환
 */
export function reportError(error: unknown): number {
  if (isDosFetchError(error)) {
    logger.error(error.message, { code: error.code, ...error.context });
    console.error(chalk.red(`✗ ${error.message}`));
    return error.exitCode;
  }

  logger.logError(error, '예상하지 못한 오류');
  console.error(chalk.red(`✗ 오류: ${error instanceof Error ? error.message : String(error)}`));
  return 1;
}
