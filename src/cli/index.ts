#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { VERSION } from '../core/fetcher';
import logger from '../utils/logger';
import { reportError } from './errors';

// 인터럽트 시 exit 훅으로 스테이징 영역 정리
process.on('SIGINT', () => process.exit(130));
process.on('SIGTERM', () => process.exit(143));

/**
 * 로그 파일을 닫은 뒤 종료
 */
async function exitWith(code: number): Promise<never> {
  await logger.flush();
  process.exit(code);
}

/**
 * 명령어 실행 후 실패하면 종료 코드와 함께 종료
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      await exitWith(reportError(error));
    }
  };
}

// 메인 프로그램
const program = new Command();

program
  .name('dosfetch')
  .description(chalk.cyan('dosfetch - DOS 배포판과 디스크 세트 다운로더'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .hook('preAction', async () => {
    await logger.initialize();
  });

// install 명령어
program
  .command('install')
  .description('카탈로그의 배포판 설치')
  .argument('[flavor]', '배포판 ID (기본값: 설정의 defaultFlavor)')
  .option('-d, --dest <path>', '설치 경로 (기본값: 설정의 defaultDestination)')
  .action(
    run(async (flavor: string | undefined, options: { dest?: string }) => {
      const { installCommand } = await import('./commands/install');
      await installCommand(flavor, options);
    })
  );

// custom 명령어
program
  .command('custom')
  .description('URL 또는 디스크 세트 설치 (URL 하나는 디스크 세트 시드로 사용)')
  .argument('<urls...>', '다운로드할 URL')
  .option('-d, --dest <path>', '설치 경로 (기본값: 설정의 defaultDestination)')
  .option('-c, --checksum <sha256...>', 'URL 순서대로의 SHA-256 값')
  .action(
    run(async (urls: string[], options: { dest?: string; checksum?: string[] }) => {
      const { customCommand } = await import('./commands/custom');
      await customCommand(urls, options);
    })
  );

// expand 명령어
program
  .command('expand')
  .description('디스크 세트 URL 목록 미리보기')
  .argument('<url>', '디스크 세트 중 하나의 URL')
  .action(
    run(async (url: string) => {
      const { expandCommand } = await import('./commands/expand');
      await expandCommand(url);
    })
  );

// flavors 명령어
program
  .command('flavors')
  .description('지원하는 배포판 목록')
  .action(
    run(async () => {
      const { flavorsCommand } = await import('./commands/flavors');
      await flavorsCommand();
    })
  );

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(
        run(async (key: string | undefined) => {
          const { configGet } = await import('./commands/config');
          await configGet(key);
        })
      )
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(
        run(async (key: string, value: string) => {
          const { configSet } = await import('./commands/config');
          await configSet(key, value);
        })
      )
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(
        run(async () => {
          const { configList } = await import('./commands/config');
          await configList();
        })
      )
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(
        run(async () => {
          const { configReset } = await import('./commands/config');
          await configReset();
        })
      )
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.exitCode !== 0) {
    console.error(chalk.red(`오류: ${err.message}`));
  }
  process.exit(err.exitCode);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  dosfetch - DOS 배포판과 디스크 세트 다운로더\n'));
  console.log('  사용법: dosfetch <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    install     카탈로그의 배포판 설치');
  console.log('    custom      URL 또는 디스크 세트 설치');
  console.log('    expand      디스크 세트 URL 목록 미리보기');
  console.log('    flavors     지원하는 배포판 목록');
  console.log('    config      설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    dosfetch install freedos-1.3 -d ~/dos/drive_c'));
  console.log(chalk.gray('    dosfetch custom "https://example.org/games/game-disk1of3.zip" -d ~/dos/game'));
  console.log(chalk.gray('    dosfetch expand "https://example.org/games/game-disk1of3.zip"'));
  console.log('\n  자세한 내용: dosfetch --help\n');
} else {
  program
    .parseAsync(process.argv)
    .then(() => logger.flush())
    .catch((error: unknown) => exitWith(reportError(error)));
}
