import axios from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { Readable } from 'stream';
import type { FetchProgressEvent, LocalArtifact, ResourceRef, VerificationResult } from '../types';
import { DosFetchError, FetchError, NotFoundError } from './errors';
import { ChecksumVerifier, getChecksumVerifier } from './shared/checksum-verifier';
import { isMetadataFile, toLocalFilename } from './shared/filename-utils';
import { quoteUrl } from './shared/url-utils';
import logger from '../utils/logger';

// 버전 정보
export const VERSION = '1.0.0';

// 디스크 기록 단위
export const CHUNK_SIZE = 1024;

// 페처 옵션
export interface FetcherOptions {
  timeoutMs?: number;
  verifier?: ChecksumVerifier;
}

// 단일 다운로드 옵션
export interface FetchOptions {
  /** 호출자가 지정한 SHA-256 (없으면 동반 .txt 파일 사용) */
  expectedDigest?: string;
  onProgress?: (event: FetchProgressEvent) => void;
}

/**
 * 스트림 청크를 Buffer로 변환
 */
function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError('지원하지 않는 응답 청크 형식입니다');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Fetcher {
  private timeoutMs: number;
  private verifier: ChecksumVerifier;

  constructor(options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 300000;
    this.verifier = options.verifier ?? getChecksumVerifier();
  }

  /**
   * 리소스를 destDir에 받아 LocalArtifact 생성
   * 같은 이름의 파일이 이미 있으면 다시 받지 않고 검증만 합니다.
   */
  async fetch(ref: ResourceRef, destDir: string, options: FetchOptions = {}): Promise<LocalArtifact> {
    await fs.ensureDir(destDir);

    const filename = toLocalFilename(ref.filename);
    const filePath = path.join(destDir, filename);
    const reused = await fs.pathExists(filePath);

    if (reused) {
      logger.info('이미 받은 파일을 사용합니다', { file: filename });
    } else {
      await this.download(ref, filePath, options.onProgress);
    }

    const verification = await this.verifyUnlessMetadata(filePath, options.expectedDigest);
    const stat = await fs.stat(filePath);

    return {
      ref,
      path: filePath,
      filename,
      size: stat.size,
      reused,
      verification,
    };
  }

  /**
   * 메타데이터(.txt) 파일이 아니면 체크섬 검증
   */
  private async verifyUnlessMetadata(filePath: string, expected?: string): Promise<VerificationResult> {
    if (isMetadataFile(path.basename(filePath))) {
      return { status: 'skipped' };
    }
    return this.verifier.verify(filePath, expected);
  }

  /**
   * 파일 다운로드
   * content-length가 있으면 CHUNK_SIZE 단위로 기록하며 진행률을 보고하고,
   * 없으면 전체를 읽어 한 번에 기록합니다.
   */
  protected async download(
    ref: ResourceRef,
    filePath: string,
    onProgress?: (event: FetchProgressEvent) => void
  ): Promise<void> {
    const url = quoteUrl(ref.url);
    logger.debug('다운로드 시작', { url });

    let stream: Readable;
    let totalBytes: number;

    try {
      const response = await axios.get<Readable>(url, {
        responseType: 'stream',
        timeout: this.timeoutMs,
        headers: { 'User-Agent': `dosfetch/${VERSION}` },
      });
      stream = response.data;
      totalBytes = parseInt(String(response.headers['content-length'] ?? ''), 10);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response?.status === 404) {
          throw new NotFoundError(ref.url);
        }
        throw new FetchError(ref.url, error.message, error.response?.status);
      }
      throw new FetchError(ref.url, errorMessage(error));
    }

    try {
      if (Number.isFinite(totalBytes) && totalBytes > 0) {
        await this.writeChunked(stream, filePath, ref, totalBytes, onProgress);
      } else {
        await this.writeAll(stream, filePath);
      }
    } catch (error) {
      // 일부만 기록된 파일 제거
      await fs.remove(filePath);
      if (error instanceof DosFetchError) throw error;
      throw new FetchError(ref.url, errorMessage(error));
    }

    logger.debug('다운로드 완료', { url, filePath });
  }

  /**
   * CHUNK_SIZE 단위로 기록 (청크마다 진행률 콜백)
   */
  private async writeChunked(
    stream: Readable,
    filePath: string,
    ref: ResourceRef,
    totalBytes: number,
    onProgress?: (event: FetchProgressEvent) => void
  ): Promise<void> {
    const fd = await fs.open(filePath, 'w');
    let pending = Buffer.alloc(0);
    let downloadedBytes = 0;

    const writeChunk = async (chunk: Buffer): Promise<void> => {
      await fs.write(fd, chunk, 0, chunk.length);
      downloadedBytes += chunk.length;
      onProgress?.({
        ref,
        downloadedBytes,
        totalBytes,
        progress: Math.min(100, (downloadedBytes / totalBytes) * 100),
      });
    };

    try {
      for await (const data of stream) {
        pending = Buffer.concat([pending, toBuffer(data)]);
        while (pending.length >= CHUNK_SIZE) {
          await writeChunk(pending.subarray(0, CHUNK_SIZE));
          pending = pending.subarray(CHUNK_SIZE);
        }
      }
      if (pending.length > 0) {
        await writeChunk(pending);
      }
    } finally {
      await fs.close(fd);
    }
  }

  /**
   * 전체를 읽어 한 번에 기록
   */
  private async writeAll(stream: Readable, filePath: string): Promise<void> {
    const chunks: Buffer[] = [];
    for await (const data of stream) {
      chunks.push(toBuffer(data));
    }
    await fs.writeFile(filePath, Buffer.concat(chunks));
  }
}
