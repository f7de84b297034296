/**
 * URL 처리 유틸리티
 * 업스트림 파일명의 공백, 특수문자를 허용하기 위한 인코딩과 파일명 추출
 */

import type { ResourceRef } from '../../types';

/**
 * 경로/쿼리에서 인코딩 없이 허용되는 문자
 * '%'는 기존 이스케이프 시퀀스 보존을 위해 별도로 처리
 */
const PATH_SAFE_CHAR = /^[A-Za-z0-9\-_.~!$&'()*+,;=:@/?]$/;

const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

/**
 * scheme://authority 부분과 나머지를 분리
 */
function splitAuthority(url: string): { origin: string; rest: string } {
  const match = url.match(/^([A-Za-z][A-Za-z0-9+.-]*:\/\/[^/?#]*)(.*)$/s);
  if (!match) {
    return { origin: '', rest: url };
  }
  return { origin: match[1], rest: match[2] };
}

/**
 * URL 경로와 쿼리를 퍼센트 인코딩
 * 이미 인코딩된 %XX 시퀀스는 그대로 유지
 *
 * @example
 * quoteUrl('https://example.org/Game Disk 1.zip') // 'https://example.org/Game%20Disk%201.zip'
 */
export function quoteUrl(url: string): string {
  const { origin, rest } = splitAuthority(url);
  const chars = Array.from(rest);
  let quoted = '';

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch === '%') {
      const next = (chars[i + 1] ?? '') + (chars[i + 2] ?? '');
      quoted += HEX_PAIR.test(next) ? '%' : '%25';
    } else if (PATH_SAFE_CHAR.test(ch)) {
      quoted += ch;
    } else {
      quoted += encodeURIComponent(ch);
    }
  }

  return origin + quoted;
}

/**
 * 쿼리를 제외한 경로 부분
 */
function pathPart(url: string): string {
  const { rest } = splitAuthority(url);
  const queryIndex = rest.indexOf('?');
  return queryIndex === -1 ? rest : rest.slice(0, queryIndex);
}

/**
 * '?'로 시작하는 쿼리 부분 (없으면 빈 문자열)
 * 파일명의 '#'은 경로 문자로 취급하므로 프래그먼트는 따로 나누지 않음
 */
export function urlQuery(url: string): string {
  const { rest } = splitAuthority(url);
  const queryIndex = rest.indexOf('?');
  return queryIndex === -1 ? '' : rest.slice(queryIndex);
}

/**
 * URL의 마지막 경로 세그먼트를 디코딩한 파일명
 * 잘못된 이스케이프가 있으면 원문 그대로 반환
 */
export function decodedFilename(url: string): string {
  const p = pathPart(url);
  const segment = p.slice(p.lastIndexOf('/') + 1);
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * 마지막 세그먼트를 제외한 디렉토리 URL ('/'로 끝남)
 */
export function urlDirectory(url: string): string {
  const { origin } = splitAuthority(url);
  const p = pathPart(url);
  return origin + p.slice(0, p.lastIndexOf('/') + 1);
}

/**
 * 기본 URL에 경로 세그먼트 결합
 *
 * @example
 * joinUrl('https://example.org/repos/1.3', 'base', 'kernel.zip')
 * // 'https://example.org/repos/1.3/base/kernel.zip'
 */
export function joinUrl(base: string, ...segments: string[]): string {
  const head = base.endsWith('/') ? base : `${base}/`;
  return head + segments.map((s) => s.replace(/^\/+|\/+$/g, '')).join('/');
}

/**
 * URL에서 리소스 참조 생성
 */
export function createResourceRef(url: string): ResourceRef {
  return Object.freeze({ url, filename: decodedFilename(url) });
}
