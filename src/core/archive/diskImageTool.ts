import { spawn } from 'child_process';
import * as fs from 'fs-extra';
import * as path from 'path';
import { DiskImageToolError } from '../errors';
import logger from '../../utils/logger';

/**
 * DOS 디스크 이미지에서 파일을 꺼내는 외부 도구
 */
export interface DiskImageTool {
  /** 실행 파일 이름 또는 경로 */
  readonly command: string;
  /** 설치 안내 문구 */
  readonly installHint: string;
  /** PATH에서 실행 파일 찾기 (없으면 null) */
  locate(): Promise<string | null>;
  /** 이미지 루트의 모든 파일을 destination으로 재귀 복사 */
  copyAll(imagePath: string, destination: string): Promise<void>;
}

// 8.3 파일명을 소문자로 복사
export const MTOOLS_ENV = { MTOOLS_LOWER_CASE: '1' } as const;

// 도구 옵션
export interface MtoolsOptions {
  command?: string;
  /** 검색 경로 (기본값: PATH 환경 변수) */
  searchPath?: string;
}

/**
 * mcopy 인자
 * -s: 재귀, -n: 덮어쓰기 확인 없음, -m: 수정 시각 유지
 */
export function buildCopyAllArgs(imagePath: string, destination: string): string[] {
  return ['-i', imagePath, '-s', '-n', '-m', '::*', destination];
}

/**
 * 실행 가능한 일반 파일인지 확인
 */
async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * 검색 경로에서 실행 파일 찾기
 * 경로 구분자가 들어간 command는 그 경로만 확인합니다.
 */
export async function findExecutable(
  command: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | null> {
  if (command.includes('/') || command.includes(path.sep)) {
    const resolved = path.resolve(command);
    return (await isExecutableFile(resolved)) ? resolved : null;
  }

  const extensions =
    process.platform === 'win32' ? (process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];

  for (const dir of searchPath.split(path.delimiter).filter(Boolean)) {
    for (const ext of extensions) {
      const candidate = path.join(dir, command + ext);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

/**
 * mtools의 mcopy를 사용하는 디스크 이미지 도구
 */
export class MtoolsDiskImageTool implements DiskImageTool {
  readonly command: string;
  readonly installHint = 'mtools 패키지를 설치하세요 (예: apt install mtools, brew install mtools).';
  private searchPath?: string;

  constructor(options: MtoolsOptions = {}) {
    this.command = options.command ?? 'mcopy';
    this.searchPath = options.searchPath;
  }

  async locate(): Promise<string | null> {
    return findExecutable(this.command, this.searchPath);
  }

  async copyAll(imagePath: string, destination: string): Promise<void> {
    const args = buildCopyAllArgs(imagePath, destination);
    logger.debug('디스크 이미지 복사 실행', { command: this.command, args });

    await new Promise<void>((resolve, reject) => {
      const child = spawn(this.command, args, {
        env: { ...process.env, ...MTOOLS_ENV },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        logger.debug(`[${this.command}] ${data.toString('utf8').trim()}`);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString('utf8');
      });

      child.on('error', (error) => {
        reject(new DiskImageToolError(this.command, null, error.message));
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new DiskImageToolError(this.command, code, stderr));
        }
      });
    });
  }
}
