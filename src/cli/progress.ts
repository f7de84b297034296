import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { Orchestrator } from '../core/orchestrator';

/**
 * 오케스트레이터 이벤트를 진행률 바로 표시
 *
 * @returns 진행률 표시를 끝내는 함수
 */
export function attachProgress(orchestrator: Orchestrator): () => void {
  const multibar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: ' {bar} | {filename} | {percentage}% | {value}/{total} bytes',
    },
    cliProgress.Presets.shades_classic
  );

  let bar: cliProgress.SingleBar | null = null;

  orchestrator.on('fetchStart', () => {
    bar = null;
  });

  orchestrator.on('progress', (event) => {
    if (!bar) {
      bar = multibar.create(event.totalBytes, 0, { filename: event.ref.filename });
    }
    bar.update(event.downloadedBytes, { filename: event.ref.filename });
  });

  orchestrator.on('fetchComplete', (artifact) => {
    const mark = artifact.reused ? chalk.gray('재사용') : chalk.green('✓');
    multibar.log(`${mark} ${artifact.filename}\n`);
  });

  orchestrator.on('packageSkipped', (pkg, sections) => {
    multibar.log(chalk.yellow(`! ${pkg}: ${sections.join(', ')}에 없어 건너뜀\n`));
  });

  orchestrator.on('processed', (result) => {
    const action = result.kind === 'disk-image' ? '디스크 이미지 복사' : '이동';
    multibar.log(chalk.gray(`  ${result.source} → ${action}\n`));
  });

  return () => {
    multibar.stop();
    orchestrator.removeAllListeners();
  };
}
