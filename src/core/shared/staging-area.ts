/**
 * 스테이징 영역
 *
 * 다운로드와 압축 해제 중간 결과물을 두는 프로세스 단위 임시 디렉토리입니다.
 * 이름은 `<프로그램명>-<사용자>-<pid>` 형식이며, dispose 시 또는 프로세스 종료 시 삭제됩니다.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import logger from '../../utils/logger';
import { sanitizeNameComponent } from './filename-utils';

export interface StagingAreaOptions {
  /** 상위 디렉토리 (기본값: OS 임시 디렉토리) */
  baseDir?: string;
  /** 디렉토리 이름에 쓰일 프로그램명 */
  programName?: string;
}

/**
 * 스테이징 영역 생성 함수 (오케스트레이터에 주입)
 */
export type StagingAreaFactory = () => Promise<StagingArea>;

/**
 * 현재 사용자 이름
 */
function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER || process.env.USERNAME || 'user';
  }
}

/**
 * 실행 파일 이름 (확장자 제외)
 */
function executableName(): string {
  return path.parse(process.argv[1] ?? '').name || 'dosfetch';
}

/**
 * 프로세스 단위로 고유한 스테이징 디렉토리 이름
 */
export function stagingDirName(programName: string = executableName()): string {
  return [
    sanitizeNameComponent(programName),
    sanitizeNameComponent(currentUser()),
    String(process.pid),
  ].join('-');
}

export class StagingArea {
  private disposed = false;
  private unpackCount = 0;
  private readonly exitHook = (): void => {
    // 'exit' 이벤트에서는 동기 작업만 가능
    fs.removeSync(this.path);
  };

  private constructor(readonly path: string) {}

  /**
   * 스테이징 디렉토리 생성
   * 같은 pid로 남아 있던 이전 디렉토리는 비웁니다.
   */
  static async create(options: StagingAreaOptions = {}): Promise<StagingArea> {
    const dir = path.join(options.baseDir ?? os.tmpdir(), stagingDirName(options.programName));
    await fs.emptyDir(dir);

    const area = new StagingArea(dir);
    process.once('exit', area.exitHook);
    logger.debug('스테이징 영역 생성', { path: dir });
    return area;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * 아카이브 하나를 풀기 위한 새 하위 디렉토리
   */
  async createUnpackDir(): Promise<string> {
    this.unpackCount++;
    const dir = path.join(this.path, `unpack-${this.unpackCount}`);
    await fs.emptyDir(dir);
    return dir;
  }

  /**
   * 스테이징 디렉토리 삭제
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    process.removeListener('exit', this.exitHook);
    await fs.remove(this.path);
    logger.debug('스테이징 영역 삭제', { path: this.path });
  }
}

/**
 * 스테이징 영역을 만들어 작업을 실행하고, 성공/실패와 관계없이 삭제
 */
export async function withStagingArea<T>(
  factory: StagingAreaFactory,
  task: (staging: StagingArea) => Promise<T>
): Promise<T> {
  const staging = await factory();
  try {
    return await task(staging);
  } finally {
    await staging.dispose();
  }
}
