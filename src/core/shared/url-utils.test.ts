/**
 * url-utils.ts 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  quoteUrl,
  decodedFilename,
  urlDirectory,
  urlQuery,
  joinUrl,
  createResourceRef,
} from './url-utils';

describe('url-utils', () => {
  describe('quoteUrl', () => {
    it('공백을 인코딩해야 함', () => {
      expect(quoteUrl('https://example.org/files/Game Disk 1 of 3.zip')).toBe(
        'https://example.org/files/Game%20Disk%201%20of%203.zip'
      );
    });

    it('파일명의 #을 인코딩해야 함', () => {
      expect(quoteUrl('https://example.org/a#1.zip')).toBe('https://example.org/a%231.zip');
    });

    it('기존 이스케이프 시퀀스는 유지해야 함', () => {
      expect(quoteUrl('https://example.org/a%20b.zip')).toBe('https://example.org/a%20b.zip');
    });

    it('이스케이프가 아닌 %는 인코딩해야 함', () => {
      expect(quoteUrl('https://example.org/100%.zip')).toBe('https://example.org/100%25.zip');
    });

    it('비 ASCII 문자는 UTF-8로 인코딩해야 함', () => {
      expect(quoteUrl('https://example.org/jeu-é.zip')).toBe('https://example.org/jeu-%C3%A9.zip');
    });

    it('쿼리 구분자와 authority는 유지해야 함', () => {
      expect(quoteUrl('http://example.org:8080/get?name=a b&x=1')).toBe(
        'http://example.org:8080/get?name=a%20b&x=1'
      );
    });
  });

  describe('decodedFilename', () => {
    it('마지막 세그먼트를 디코딩해야 함', () => {
      expect(decodedFilename('https://example.org/dir/Game%20Disk%201.zip')).toBe('Game Disk 1.zip');
    });

    it('쿼리는 제외해야 함', () => {
      expect(decodedFilename('https://example.org/dir/tool.zip?mirror=1')).toBe('tool.zip');
    });

    it('잘못된 이스케이프는 원문 반환', () => {
      expect(decodedFilename('https://example.org/bad%zz.zip')).toBe('bad%zz.zip');
    });
  });

  describe('urlDirectory', () => {
    it('마지막 세그먼트를 제외한 경로 반환', () => {
      expect(urlDirectory('https://example.org/dir/sub/a.zip?x=1')).toBe('https://example.org/dir/sub/');
    });
  });

  describe('urlQuery', () => {
    it("'?'부터 끝까지 반환", () => {
      expect(urlQuery('https://example.org/dl/a.zip?token=abc&n=2')).toBe('?token=abc&n=2');
    });

    it('쿼리가 없으면 빈 문자열', () => {
      expect(urlQuery('https://example.org/dl/a.zip')).toBe('');
    });
  });

  describe('joinUrl', () => {
    it('슬래시 중복 없이 결합', () => {
      expect(joinUrl('https://example.org/repos/1.3', 'base', 'kernel.zip')).toBe(
        'https://example.org/repos/1.3/base/kernel.zip'
      );
      expect(joinUrl('https://example.org/repos/1.3/', '/base/', 'kernel.zip')).toBe(
        'https://example.org/repos/1.3/base/kernel.zip'
      );
    });
  });

  describe('createResourceRef', () => {
    it('URL과 디코딩된 파일명을 가져야 함', () => {
      const ref = createResourceRef('https://example.org/a%20b.zip');
      expect(ref).toEqual({ url: 'https://example.org/a%20b.zip', filename: 'a b.zip' });
      expect(Object.isFrozen(ref)).toBe(true);
    });
  });
});
