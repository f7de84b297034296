/**
 * 로컬 파일명 처리 유틸리티
 * 다운로드한 파일의 이름을 로컬 경로로 쓸 때와 메타데이터 파일을 찾을 때 사용합니다.
 */

/**
 * 로컬 파일명에 쓸 수 없는 문자 (경로 구분자 및 제어 문자)
 */
const PATH_UNSAFE_CHARS = /[/\\\x00-\x1F]/g;

/**
 * 메타데이터(체크섬) 동반 파일 확장자
 */
export const METADATA_EXTENSION = '.txt';

/**
 * 디코딩된 파일명을 로컬 파일명으로 변환
 * 퍼센트 디코딩 후 생길 수 있는 경로 구분자만 치환하고 나머지는 그대로 유지
 *
 * @example
 * toLocalFilename('Game Disk 1 of 3.zip') // 'Game Disk 1 of 3.zip'
 * toLocalFilename('a/b.zip') // 'a_b.zip'
 */
export function toLocalFilename(name: string): string {
  const safe = name.replace(PATH_UNSAFE_CHARS, '_');
  if (!safe || safe === '.' || safe === '..') {
    return '_unnamed_';
  }
  return safe;
}

/**
 * 디렉토리 이름 구성 요소로 쓸 안전한 문자열 생성
 * 알파벳, 숫자, 점, 대시, 언더스코어만 허용
 *
 * @example
 * sanitizeNameComponent('DOMAIN\\j.doe') // 'DOMAIN_j.doe'
 */
export function sanitizeNameComponent(name: string, maxLength = 64): string {
  const safe = name
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '');

  return (safe || '_unnamed_').slice(0, maxLength);
}

/**
 * 파일 확장자 추출
 *
 * @returns 확장자 (점 포함) 또는 빈 문자열
 */
export function getExtension(filename: string): string {
  const match = filename.match(/\.[^.]+$/);
  return match ? match[0] : '';
}

/**
 * 파일명에서 확장자 제거
 */
export function removeExtension(filename: string): string {
  return filename.replace(/\.[^.]+$/, '');
}

/**
 * 확장자 교체 (확장자가 없으면 덧붙임)
 *
 * @example
 * replaceExtension('kernel.zip', '.txt') // 'kernel.txt'
 */
export function replaceExtension(filename: string, extension: string): string {
  return removeExtension(filename) + extension;
}

/**
 * 체크섬 메타데이터 동반 파일 여부
 */
export function isMetadataFile(filename: string): boolean {
  return getExtension(filename).toLowerCase() === METADATA_EXTENSION;
}

/**
 * ZIP 파일명 여부 (대소문자 무시)
 */
export function isZipFilename(filename: string): boolean {
  return getExtension(filename).toLowerCase() === '.zip';
}
