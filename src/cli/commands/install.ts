import chalk from 'chalk';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { createOrchestrator } from '../../core/orchestrator';
import type { InstallResult } from '../../types';
import { printInstallResult } from '../output';
import { attachProgress } from '../progress';

// install 옵션
export interface InstallOptions {
  dest?: string;
}

/**
 * install 명령어 핸들러 (카탈로그 배포판 설치)
 */
export async function installCommand(flavor: string | undefined, options: InstallOptions): Promise<void> {
  const config = getConfigManager().getConfig();
  const flavorId = flavor ?? config.defaultFlavor;
  const destination = path.resolve(options.dest ?? config.defaultDestination);

  console.log(chalk.cyan(`${flavorId} 설치 준비 중...`));
  console.log(chalk.cyan(`대상 경로: ${destination}\n`));

  const orchestrator = createOrchestrator(config);
  const stopProgress = attachProgress(orchestrator);

  let result: InstallResult;
  try {
    result = await orchestrator.installFlavor(flavorId, destination);
  } finally {
    stopProgress();
  }

  printInstallResult(result);
}
