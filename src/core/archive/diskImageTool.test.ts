/**
 * diskImageTool.ts 단위 테스트
 *
 * child_process.spawn을 모킹하여 mtools 없이 실행합니다.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ChildProcess, spawn } from 'child_process';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { MtoolsDiskImageTool, buildCopyAllArgs, findExecutable } from './diskImageTool';
import { DiskImageToolError } from '../errors';
import { itOnUnix } from '../../test-utils/platform';

vi.mock('child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('child_process')>();
  return { ...actual, spawn: vi.fn() };
});

function fakeChild(): ChildProcess {
  const child = new ChildProcess();
  child.stdout = new PassThrough();
  child.stderr = new PassThrough();
  return child;
}

describe('diskImageTool', () => {
  describe('buildCopyAllArgs', () => {
    it('이미지 루트 전체를 재귀 복사하는 인자', () => {
      expect(buildCopyAllArgs('/stage/unpack-1/disk1.img', '/dos/c')).toEqual([
        '-i',
        '/stage/unpack-1/disk1.img',
        '-s',
        '-n',
        '-m',
        '::*',
        '/dos/c',
      ]);
    });
  });

  describe('MtoolsDiskImageTool.copyAll', () => {
    const mockedSpawn = vi.mocked(spawn);

    beforeEach(() => {
      mockedSpawn.mockReset();
    });

    it('MTOOLS_LOWER_CASE=1 환경으로 mcopy 실행', async () => {
      const child = fakeChild();
      mockedSpawn.mockReturnValue(child);

      const tool = new MtoolsDiskImageTool();
      const pending = tool.copyAll('/stage/disk1.img', '/dos/c');
      child.emit('close', 0, null);
      await pending;

      expect(mockedSpawn).toHaveBeenCalledTimes(1);
      const [command, args, options] = mockedSpawn.mock.calls[0];
      expect(command).toBe('mcopy');
      expect(args).toEqual(buildCopyAllArgs('/stage/disk1.img', '/dos/c'));
      expect(options).toMatchObject({ env: { MTOOLS_LOWER_CASE: '1' } });
    });

    it('종료 코드가 0이 아니면 stderr를 담은 DiskImageToolError', async () => {
      const child = fakeChild();
      mockedSpawn.mockReturnValue(child);

      const tool = new MtoolsDiskImageTool({ command: 'mcopy' });
      const pending = tool.copyAll('/stage/disk1.img', '/dos/c').catch((e: unknown) => e);
      child.stderr?.emit('data', Buffer.from('init: non DOS media\n'));
      child.emit('close', 1, null);

      const error = await pending;
      expect(error).toBeInstanceOf(DiskImageToolError);
      if (!(error instanceof DiskImageToolError)) return;
      expect(error.exitStatus).toBe(1);
      expect(error.message).toBe("'mcopy' 실행 실패 (종료 코드: 1)\ninit: non DOS media");
    });

    it('실행 자체가 실패하면 DiskImageToolError', async () => {
      const child = fakeChild();
      mockedSpawn.mockReturnValue(child);

      const tool = new MtoolsDiskImageTool({ command: 'mcopy-missing' });
      const pending = tool.copyAll('/stage/disk1.img', '/dos/c').catch((e: unknown) => e);
      child.emit('error', new Error('spawn mcopy-missing ENOENT'));

      const error = await pending;
      expect(error).toBeInstanceOf(DiskImageToolError);
      if (!(error instanceof DiskImageToolError)) return;
      expect(error.exitStatus).toBeNull();
      expect(error.message).toContain('ENOENT');
    });
  });

  describe('findExecutable', () => {
    let binDir: string;

    beforeEach(async () => {
      binDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dosfetch-bin-'));
    });

    afterEach(async () => {
      await fs.remove(binDir);
    });

    itOnUnix('검색 경로의 실행 파일을 찾음', async () => {
      const executable = path.join(binDir, 'mcopy');
      await fs.writeFile(executable, '#!/bin/sh\nexit 0\n', { mode: 0o755 });

      const searchPath = ['/nonexistent-dosfetch-dir', binDir].join(path.delimiter);
      expect(await findExecutable('mcopy', searchPath)).toBe(executable);
      expect(await new MtoolsDiskImageTool({ searchPath }).locate()).toBe(executable);
    });

    itOnUnix('실행 권한이 없으면 찾지 못함', async () => {
      await fs.writeFile(path.join(binDir, 'mcopy'), 'data', { mode: 0o644 });
      expect(await findExecutable('mcopy', binDir)).toBeNull();
    });

    it('디렉토리는 실행 파일로 보지 않음', async () => {
      await fs.ensureDir(path.join(binDir, 'mcopy'));
      expect(await findExecutable('mcopy', binDir)).toBeNull();
    });

    it('검색 경로가 비어 있으면 null', async () => {
      expect(await findExecutable('mcopy', '')).toBeNull();
    });
  });
});
