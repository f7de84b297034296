import chalk from 'chalk';
import { expandDiskSet, parseDiskName } from '../../core/shared/disk-set';
import { decodedFilename } from '../../core/shared/url-utils';

/**
 * expand 명령어 핸들러 (디스크 세트 미리보기)
 */
export async function expandCommand(url: string): Promise<void> {
  const pattern = parseDiskName(decodedFilename(url));
  const refs = expandDiskSet(url);

  if (pattern) {
    console.log(chalk.cyan(`디스크 세트: ${refs.length}개`));
  } else {
    console.log(chalk.cyan('단일 파일'));
  }

  for (const ref of refs) {
    console.log(ref.url);
  }
}
