import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager } from '../../core/config';
import { FlavorCatalog } from '../../core/catalog/flavors';

/**
 * flavors 명령어 핸들러 (카탈로그 목록)
 */
export async function flavorsCommand(): Promise<void> {
  const config = getConfigManager().getConfig();
  const catalog = FlavorCatalog.load({ mirrorUrl: config.mirrorUrl });

  const table = new Table({
    head: [chalk.cyan('ID'), chalk.cyan('이름'), chalk.cyan('버전'), chalk.cyan('패키지'), chalk.cyan('저장소')],
  });

  for (const flavor of catalog.list()) {
    const marker = flavor.id === config.defaultFlavor ? ' *' : '';
    table.push([
      flavor.id + marker,
      flavor.name,
      flavor.version,
      `base ${flavor.packages.base.length} / unixlike ${flavor.packages.unixlike.length}`,
      flavor.baseUrl,
    ]);
  }

  console.log(chalk.cyan('\n배포판 목록:\n'));
  console.log(table.toString());
  console.log(chalk.gray('  * 기본 배포판'));
}
