import JSZip from 'jszip';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { LocalArtifact } from '../../types';
import logger from '../../utils/logger';
import type { StagingArea } from '../shared/staging-area';
import { isZipFilename, toLocalFilename } from '../shared/filename-utils';
import type { DiskImageTool } from './diskImageTool';

// 처리 결과
export type ProcessResult =
  | {
      kind: 'disk-image';
      /** 원본 아카이브 파일명 */
      source: string;
      /** ZIP 안의 디스크 이미지 항목 이름 */
      image: string;
      destination: string;
    }
  | {
      kind: 'moved';
      source: string;
      /** 옮겨진 파일 경로 */
      destination: string;
    };

/**
 * ZIP 안의 파일 항목 (디렉토리 항목 제외)
 */
function fileEntries(zip: JSZip): JSZip.JSZipObject[] {
  return Object.values(zip.files).filter((entry) => !entry.dir);
}

export class ArchiveProcessor {
  constructor(private readonly tool: DiskImageTool) {}

  /**
   * 파일 항목이 정확히 하나인 ZIP이면 그 항목을 반환
   * ZIP이 아니거나 여러 파일을 담은 패키지면 null
   */
  async findDiskImageEntry(filePath: string): Promise<JSZip.JSZipObject | null> {
    if (!isZipFilename(path.basename(filePath))) {
      return null;
    }

    const zip = await JSZip.loadAsync(await fs.readFile(filePath));
    const entries = fileEntries(zip);
    return entries.length === 1 ? entries[0] : null;
  }

  /**
   * 결과물을 destination에 풀거나 옮김
   */
  async process(artifact: LocalArtifact, destination: string, staging: StagingArea): Promise<ProcessResult> {
    await fs.ensureDir(destination);

    const entry = await this.findDiskImageEntry(artifact.path);
    if (entry) {
      await this.copyFromDiskImage(entry, destination, staging);
      logger.info('디스크 이미지 내용을 복사했습니다', { source: artifact.filename, image: entry.name });
      return { kind: 'disk-image', source: artifact.filename, image: entry.name, destination };
    }

    const target = path.join(destination, artifact.filename);
    await fs.move(artifact.path, target, { overwrite: true });
    logger.info('파일을 옮겼습니다', { source: artifact.filename, destination: target });
    return { kind: 'moved', source: artifact.filename, destination: target };
  }

  /**
   * 이미지를 스테이징 영역에 풀고 도구로 루트 전체를 복사
   */
  private async copyFromDiskImage(
    entry: JSZip.JSZipObject,
    destination: string,
    staging: StagingArea
  ): Promise<void> {
    const unpackDir = await staging.createUnpackDir();
    try {
      const imagePath = path.join(unpackDir, toLocalFilename(path.posix.basename(entry.name)));
      await fs.writeFile(imagePath, await entry.async('nodebuffer'));
      await this.tool.copyAll(imagePath, destination);
    } finally {
      await fs.remove(unpackDir);
    }
  }
}
