import * as fs from 'fs-extra';
import * as path from 'path';
import type { DiskImageTool } from '../core/archive/diskImageTool';

export interface CopyCall {
  imagePath: string;
  destination: string;
  /** 호출 시점의 이미지 내용 */
  imageContent: string;
}

/**
 * 프로세스 내 디스크 이미지 도구
 * 이미지 내용을 파일명별로 기록한 뒤 files에 지정한 파일을 destination에 만듭니다.
 */
export class FakeDiskImageTool implements DiskImageTool {
  readonly command = 'fake-mcopy';
  readonly installHint = 'mtools 패키지를 설치하세요.';
  readonly calls: CopyCall[] = [];

  constructor(
    private readonly files: Record<string, string> = { 'command.com': 'COMMAND' },
    private readonly available = true
  ) {}

  async locate(): Promise<string | null> {
    return this.available ? `/usr/bin/${this.command}` : null;
  }

  async copyAll(imagePath: string, destination: string): Promise<void> {
    this.calls.push({
      imagePath,
      destination,
      imageContent: await fs.readFile(imagePath, 'utf-8'),
    });
    for (const [name, content] of Object.entries(this.files)) {
      await fs.outputFile(path.join(destination, name), content);
    }
  }
}
