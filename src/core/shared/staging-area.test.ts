/**
 * staging-area.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { StagingArea, stagingDirName, withStagingArea } from './staging-area';

describe('staging-area', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dosfetch-staging-'));
  });

  afterEach(async () => {
    await fs.remove(baseDir);
  });

  describe('stagingDirName', () => {
    it('프로그램명, 사용자, pid로 구성', () => {
      const name = stagingDirName('dosfetch');
      expect(name.startsWith('dosfetch-')).toBe(true);
      expect(name.endsWith(`-${process.pid}`)).toBe(true);
    });
  });

  describe('StagingArea', () => {
    it('생성 시 디렉토리를 만들고 dispose 시 삭제', async () => {
      const staging = await StagingArea.create({ baseDir, programName: 'dosfetch' });
      expect(staging.path).toBe(path.join(baseDir, stagingDirName('dosfetch')));
      expect(await fs.pathExists(staging.path)).toBe(true);

      await staging.dispose();
      expect(await fs.pathExists(staging.path)).toBe(false);
      expect(staging.isDisposed).toBe(true);
    });

    it('남아 있던 같은 이름의 디렉토리는 비움', async () => {
      const leftover = path.join(baseDir, stagingDirName('dosfetch'));
      await fs.outputFile(path.join(leftover, 'stale.zip'), 'old');

      const staging = await StagingArea.create({ baseDir, programName: 'dosfetch' });
      expect(await fs.readdir(staging.path)).toEqual([]);
      await staging.dispose();
    });

    it('압축 해제용 하위 디렉토리는 매번 새로 생성', async () => {
      const staging = await StagingArea.create({ baseDir, programName: 'dosfetch' });
      const first = await staging.createUnpackDir();
      const second = await staging.createUnpackDir();

      expect(first).toBe(path.join(staging.path, 'unpack-1'));
      expect(second).toBe(path.join(staging.path, 'unpack-2'));
      await staging.dispose();
    });

    it('dispose는 여러 번 호출해도 안전', async () => {
      const staging = await StagingArea.create({ baseDir, programName: 'dosfetch' });
      await staging.dispose();
      await expect(staging.dispose()).resolves.toBeUndefined();
    });

    it('dispose 후 exit 리스너를 제거', async () => {
      const before = process.listenerCount('exit');
      const staging = await StagingArea.create({ baseDir, programName: 'dosfetch' });
      expect(process.listenerCount('exit')).toBe(before + 1);

      await staging.dispose();
      expect(process.listenerCount('exit')).toBe(before);
    });
  });

  describe('withStagingArea', () => {
    const factory = () => StagingArea.create({ baseDir, programName: 'dosfetch' });

    it('작업 결과를 반환하고 디렉토리를 삭제', async () => {
      let stagingPath = '';
      const result = await withStagingArea(factory, async (staging) => {
        stagingPath = staging.path;
        await fs.outputFile(path.join(staging.path, 'a.zip'), 'data');
        return 42;
      });

      expect(result).toBe(42);
      expect(await fs.pathExists(stagingPath)).toBe(false);
    });

    it('작업이 실패해도 디렉토리를 삭제', async () => {
      let stagingPath = '';
      await expect(
        withStagingArea(factory, async (staging) => {
          stagingPath = staging.path;
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(stagingPath).not.toBe('');
      expect(await fs.pathExists(stagingPath)).toBe(false);
    });
  });
});
