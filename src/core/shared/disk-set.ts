/**
 * 멀티 디스크 세트 파일명 해석
 *
 * 디스크 세트의 파일 하나를 가리키는 URL(시드 URL)에서 세트 전체 URL 목록을 만듭니다.
 * 지원하는 표기 (대소문자 무시):
 *   - `game-disk2of3.zip`, `Game Disk 2 of 3.zip` : 3장 중 2번째
 *   - `tool-disk4.zip` : 4장 세트의 마지막 디스크
 *   - 'disk'가 없는 파일명 : 단일 리소스
 */

import type { DiskNamePattern, ResourceRef } from '../../types';
import { MalformedFilenameError } from '../errors';
import { createResourceRef, decodedFilename, urlDirectory, urlQuery } from './url-utils';

const INDEX_OF_TOTAL_PATTERN = /disk ?(\d+) *of *(\d+)/i;
const LAST_INDEX_PATTERN = /disk ?(\d+)/i;

/**
 * 파일명에서 디스크 번호 패턴 해석
 *
 * @returns 'disk'가 없는 파일명이면 null
 * @throws MalformedFilenameError 'disk' 뒤에 번호가 없거나 번호가 유효하지 않은 경우
 */
export function parseDiskName(filename: string): DiskNamePattern | null {
  if (!filename.toLowerCase().includes('disk')) {
    return null;
  }

  const ofMatch = INDEX_OF_TOTAL_PATTERN.exec(filename);
  if (ofMatch) {
    const digits = ofMatch[1];
    const index = parseInt(digits, 10);
    const total = parseInt(ofMatch[2], 10);

    if (total < 1) {
      throw new MalformedFilenameError(filename, '전체 디스크 수가 0입니다');
    }
    if (index < 1 || index > total) {
      throw new MalformedFilenameError(filename, `디스크 번호 ${index}가 범위(1-${total})를 벗어났습니다`);
    }

    return {
      kind: 'index-of-total',
      index,
      total,
      digitsStart: ofMatch.index + ofMatch[0].indexOf(digits),
      digits,
    };
  }

  const lastMatch = LAST_INDEX_PATTERN.exec(filename);
  if (!lastMatch) {
    throw new MalformedFilenameError(filename, "'disk' 뒤에 디스크 번호가 없습니다");
  }

  const digits = lastMatch[1];
  const total = parseInt(digits, 10);
  if (total < 1) {
    throw new MalformedFilenameError(filename, '디스크 번호가 0입니다');
  }

  return {
    kind: 'last-index',
    index: total,
    total,
    digitsStart: lastMatch.index + lastMatch[0].indexOf(digits),
    digits,
  };
}

/**
 * 디스크 번호 문자열 생성 (원래 번호가 0으로 채워져 있으면 같은 폭 유지)
 */
function formatIndex(index: number, original: string): string {
  if (original.length > 1 && original.startsWith('0')) {
    return String(index).padStart(original.length, '0');
  }
  return String(index);
}

/**
 * 세트에 속한 디스크 1..N의 파일명 목록
 *
 * @example
 * siblingFilenames('game-disk2of3.zip')
 * // ['game-disk1of3.zip', 'game-disk2of3.zip', 'game-disk3of3.zip']
 */
export function siblingFilenames(filename: string): string[] {
  const pattern = parseDiskName(filename);
  if (!pattern) {
    return [filename];
  }

  const prefix = filename.slice(0, pattern.digitsStart);
  const suffix = filename.slice(pattern.digitsStart + pattern.digits.length);
  const names: string[] = [];

  for (let i = 1; i <= pattern.total; i++) {
    names.push(prefix + formatIndex(i, pattern.digits) + suffix);
  }

  return names;
}

/**
 * 시드 URL에서 디스크 세트 전체의 리소스 참조 목록 생성
 * 디렉토리 경로와 쿼리는 유지하고 파일명의 디스크 번호만 바꿉니다.
 */
export function expandDiskSet(seedUrl: string): ResourceRef[] {
  const filename = decodedFilename(seedUrl);
  if (!parseDiskName(filename)) {
    return [createResourceRef(seedUrl)];
  }

  const directory = urlDirectory(seedUrl);
  const query = urlQuery(seedUrl);
  return siblingFilenames(filename).map((name) =>
    createResourceRef(directory + encodeURIComponent(name) + query)
  );
}
