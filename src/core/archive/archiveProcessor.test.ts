/**
 * archiveProcessor.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ArchiveProcessor } from './archiveProcessor';
import { StagingArea } from '../shared/staging-area';
import { createResourceRef } from '../shared/url-utils';
import { DiskImageToolError } from '../errors';
import type { LocalArtifact } from '../../types';
import type { DiskImageTool } from './diskImageTool';
import { createZip } from '../../test-utils/zip';
import { FakeDiskImageTool } from '../../test-utils/fakeDiskImageTool';

function artifactFor(filePath: string): LocalArtifact {
  const filename = path.basename(filePath);
  return {
    ref: createResourceRef(`https://example.org/files/${filename}`),
    path: filePath,
    filename,
    size: fs.statSync(filePath).size,
    reused: false,
    verification: { status: 'unverified' },
  };
}

describe('ArchiveProcessor', () => {
  let workDir: string;
  let downloads: string;
  let destination: string;
  let staging: StagingArea;
  let tool: FakeDiskImageTool;
  let processor: ArchiveProcessor;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dosfetch-archive-'));
    downloads = path.join(workDir, 'downloads');
    destination = path.join(workDir, 'drive_c');
    staging = await StagingArea.create({ baseDir: workDir, programName: 'archive-test' });
    tool = new FakeDiskImageTool();
    processor = new ArchiveProcessor(tool);
  });

  afterEach(async () => {
    await staging.dispose();
    await fs.remove(workDir);
  });

  it('파일이 하나뿐인 ZIP은 디스크 이미지로 풀어 복사', async () => {
    const zipPath = await createZip(path.join(downloads, 'game-disk1of2.zip'), { 'DISK1.IMG': 'raw image' });

    const result = await processor.process(artifactFor(zipPath), destination, staging);

    expect(result).toEqual({ kind: 'disk-image', source: 'game-disk1of2.zip', image: 'DISK1.IMG', destination });
    expect(tool.calls).toHaveLength(1);
    expect(tool.calls[0].imageContent).toBe('raw image');
    expect(path.basename(tool.calls[0].imagePath)).toBe('DISK1.IMG');
    expect(tool.calls[0].destination).toBe(destination);
    expect(await fs.readFile(path.join(destination, 'command.com'), 'utf-8')).toBe('COMMAND');
  });

  it('하위 경로에 든 단일 이미지도 인식', async () => {
    const zipPath = await createZip(path.join(downloads, 'tool.ZIP'), { 'images/tool.ima': 'nested image' });

    const result = await processor.process(artifactFor(zipPath), destination, staging);

    expect(result.kind).toBe('disk-image');
    expect(tool.calls[0].imageContent).toBe('nested image');
    expect(path.basename(tool.calls[0].imagePath)).toBe('tool.ima');
  });

  it('풀어낸 디렉토리는 처리 후 삭제', async () => {
    const zipPath = await createZip(path.join(downloads, 'disk.zip'), { 'disk.img': 'img' });

    await processor.process(artifactFor(zipPath), destination, staging);

    expect(await fs.readdir(staging.path)).toEqual([]);
  });

  it('도구가 실패해도 풀어낸 디렉토리는 삭제', async () => {
    const failing: DiskImageTool = {
      command: 'mcopy',
      installHint: '',
      locate: async () => '/usr/bin/mcopy',
      copyAll: async () => {
        throw new DiskImageToolError('mcopy', 1, 'init: non DOS media');
      },
    };
    const zipPath = await createZip(path.join(downloads, 'disk.zip'), { 'disk.img': 'img' });

    await expect(
      new ArchiveProcessor(failing).process(artifactFor(zipPath), destination, staging)
    ).rejects.toBeInstanceOf(DiskImageToolError);
    expect(await fs.readdir(staging.path)).toEqual([]);
  });

  it('여러 파일을 담은 ZIP 패키지는 그대로 옮김', async () => {
    const zipPath = await createZip(path.join(downloads, 'kernel.zip'), {
      'BIN/KERNL386.SYS': 'kernel',
      'APPINFO/KERNEL.LSM': 'lsm',
    });

    const result = await processor.process(artifactFor(zipPath), destination, staging);

    expect(result).toEqual({ kind: 'moved', source: 'kernel.zip', destination: path.join(destination, 'kernel.zip') });
    expect(tool.calls).toHaveLength(0);
    expect(await fs.pathExists(zipPath)).toBe(false);
    expect(await fs.pathExists(path.join(destination, 'kernel.zip'))).toBe(true);
  });

  it('ZIP이 아닌 파일은 그대로 옮김', async () => {
    const filePath = path.join(downloads, 'readme.txt');
    await fs.outputFile(filePath, 'hello');

    const result = await processor.process(artifactFor(filePath), destination, staging);

    expect(result.kind).toBe('moved');
    expect(await fs.readFile(path.join(destination, 'readme.txt'), 'utf-8')).toBe('hello');
  });

  it('같은 이름의 파일이 있으면 덮어씀', async () => {
    await fs.outputFile(path.join(destination, 'readme.txt'), 'old');
    const filePath = path.join(downloads, 'readme.txt');
    await fs.outputFile(filePath, 'new');

    await processor.process(artifactFor(filePath), destination, staging);

    expect(await fs.readFile(path.join(destination, 'readme.txt'), 'utf-8')).toBe('new');
  });
});
