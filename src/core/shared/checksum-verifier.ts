/**
 * SHA-256 체크섬 검증기
 *
 * 기대값 우선순위:
 *   1. 호출자가 넘긴 값
 *   2. 확장자를 .txt로 바꾼 동반 메타데이터 파일의 첫 번째 'SHA' 줄
 * 둘 다 없으면 경고만 남기고 검증 없이 진행합니다.
 */

import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { VerificationResult } from '../../types';
import { IntegrityError } from '../errors';
import logger from '../../utils/logger';
import { METADATA_EXTENSION, replaceExtension } from './filename-utils';

const DIGEST_LINE_PREFIX = 'SHA';

/**
 * 메타데이터 파일 내용에서 다이제스트 추출
 * 'SHA'로 시작하는 첫 줄만 사용하며, 'SHA256', 'SHA-256:' 같은 라벨은 건너뜁니다.
 *
 * @example
 * parseCompanionDigest('Name: kernel\nSHA256 ab12...') // 'ab12...'
 */
export function parseCompanionDigest(content: string): string | null {
  const line = content.split(/\r?\n/).find((l) => l.startsWith(DIGEST_LINE_PREFIX));
  if (!line) {
    return null;
  }

  const value = line
    .slice(DIGEST_LINE_PREFIX.length)
    .replace(/^[0-9-]*:?/, '')
    .trim()
    .split(/\s+/)[0];

  return value ? value.toLowerCase() : null;
}

/**
 * 동반 메타데이터 파일 경로
 */
export function companionPath(filePath: string): string {
  return path.join(path.dirname(filePath), replaceExtension(path.basename(filePath), METADATA_EXTENSION));
}

export class ChecksumVerifier {
  /**
   * 파일의 SHA-256 다이제스트 (소문자 hex)
   */
  async computeDigest(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = crypto.createHash('sha256');
      const stream = fs.createReadStream(filePath);

      stream.on('data', (data) => hash.update(data));
      stream.on('end', () => resolve(hash.digest('hex').toLowerCase()));
      stream.on('error', reject);
    });
  }

  /**
   * 동반 메타데이터 파일에서 기대 다이제스트 조회
   */
  async findCompanionDigest(filePath: string): Promise<string | null> {
    const metadataPath = companionPath(filePath);
    if (metadataPath === filePath || !(await fs.pathExists(metadataPath))) {
      return null;
    }

    const content = await fs.readFile(metadataPath, 'utf-8');
    return parseCompanionDigest(content);
  }

  /**
   * 파일 검증
   *
   * @param expected 호출자가 지정한 기대 다이제스트
   * @throws IntegrityError 다이제스트 불일치
   */
  async verify(filePath: string, expected?: string): Promise<VerificationResult> {
    const filename = path.basename(filePath);
    const explicit = expected?.trim().toLowerCase();
    const companion = explicit ? null : await this.findCompanionDigest(filePath);
    const wanted = explicit || companion;

    if (!wanted) {
      logger.warn('체크섬 정보가 없어 검증 없이 진행합니다', { file: filename });
      return { status: 'unverified' };
    }

    const actual = await this.computeDigest(filePath);
    if (actual !== wanted) {
      throw new IntegrityError(filePath, actual, wanted);
    }

    logger.info('체크섬 확인 완료', { file: filename, sha256: actual });
    return { status: 'verified', digest: actual, source: explicit ? 'explicit' : 'companion' };
  }
}

// 싱글톤 인스턴스
let checksumVerifierInstance: ChecksumVerifier | null = null;

export function getChecksumVerifier(): ChecksumVerifier {
  if (!checksumVerifierInstance) {
    checksumVerifierInstance = new ChecksumVerifier();
  }
  return checksumVerifierInstance;
}
