import chalk from 'chalk';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { createOrchestrator } from '../../core/orchestrator';
import type { InstallResult } from '../../types';
import { printInstallResult } from '../output';
import { attachProgress } from '../progress';

// custom 옵션
export interface CustomOptions {
  dest?: string;
  checksum?: string[];
}

/**
 * custom 명령어 핸들러 (URL 또는 디스크 세트 설치)
 */
export async function customCommand(urls: string[], options: CustomOptions): Promise<void> {
  const config = getConfigManager().getConfig();
  const destination = path.resolve(options.dest ?? config.defaultDestination);

  console.log(chalk.cyan(`대상 경로: ${destination}\n`));

  const orchestrator = createOrchestrator(config);
  const stopProgress = attachProgress(orchestrator);

  let result: InstallResult;
  try {
    result = await orchestrator.installCustom({ urls, destination, checksums: options.checksum });
  } finally {
    stopProgress();
  }

  printInstallResult(result);
}
