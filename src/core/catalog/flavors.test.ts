/**
 * flavors.ts 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import { FlavorCatalog, CATALOG_SECTIONS } from './flavors';
import { InvalidCatalogError, UnknownFlavorError } from '../errors';

const sample = {
  mirror: 'https://mirror.example.org/freedos/',
  flavors: [
    {
      id: 'freedos-1.3',
      name: 'FreeDOS',
      version: '1.3',
      path: 'repositories/1.3',
      packages: { base: ['kernel', 'command'], unixlike: ['less'] },
    },
  ],
};

describe('FlavorCatalog', () => {
  describe('load', () => {
    const catalog = FlavorCatalog.load();

    it('내장 카탈로그에 FreeDOS 1.1~1.3 포함', () => {
      expect(catalog.ids).toEqual(['freedos-1.1', 'freedos-1.2', 'freedos-1.3']);
    });

    it('기본 미러의 저장소 경로를 base URL로 사용', () => {
      expect(catalog.get('freedos-1.3').baseUrl).toBe(
        'https://www.ibiblio.org/pub/micro/pc-stuff/freedos/files/repositories/1.3'
      );
    });

    it('모든 배포판이 kernel과 command를 base에 포함', () => {
      for (const flavor of catalog.list()) {
        expect(flavor.packages.base).toContain('kernel');
        expect(flavor.packages.base).toContain('command');
      }
    });

    it('mirrorUrl로 미러 루트 교체', () => {
      const mirrored = FlavorCatalog.load({ mirrorUrl: 'http://localhost:8080/freedos' });
      expect(mirrored.get('freedos-1.2').baseUrl).toBe('http://localhost:8080/freedos/repositories/1.2');
    });
  });

  describe('fromData', () => {
    it('섹션 순서는 base, unixlike', () => {
      expect(CATALOG_SECTIONS).toEqual(['base', 'unixlike']);
    });

    it('항목을 불변 구조로 고정', () => {
      const flavor = FlavorCatalog.fromData(sample).get('freedos-1.3');

      expect(flavor).toEqual({
        id: 'freedos-1.3',
        name: 'FreeDOS',
        version: '1.3',
        baseUrl: 'https://mirror.example.org/freedos/repositories/1.3',
        packages: { base: ['kernel', 'command'], unixlike: ['less'] },
      });
      expect(Object.isFrozen(flavor)).toBe(true);
      expect(Object.isFrozen(flavor.packages)).toBe(true);
      expect(Object.isFrozen(flavor.packages.base)).toBe(true);
    });

    it('원본 데이터를 바꿔도 카탈로그는 그대로', () => {
      const data = structuredClone(sample);
      const catalog = FlavorCatalog.fromData(data);
      data.flavors[0].packages.base.push('fdisk');

      expect(catalog.get('freedos-1.3').packages.base).toEqual(['kernel', 'command']);
    });

    it('알 수 없는 ID는 UnknownFlavorError', () => {
      const catalog = FlavorCatalog.fromData(sample);
      expect(catalog.has('msdos-6.22')).toBe(false);
      expect(() => catalog.get('msdos-6.22')).toThrow(UnknownFlavorError);
      expect(() => catalog.get('msdos-6.22')).toThrow('알 수 없는 배포판: msdos-6.22 (지원: freedos-1.3)');
    });

    it('형식이 잘못된 데이터는 InvalidCatalogError', () => {
      expect(() => FlavorCatalog.fromData(null)).toThrow(InvalidCatalogError);
      expect(() => FlavorCatalog.fromData({ flavors: [] })).toThrow('mirror 값이 없습니다');
      expect(() =>
        FlavorCatalog.fromData({
          mirror: sample.mirror,
          flavors: [{ ...sample.flavors[0], packages: { base: ['kernel'] } }],
        })
      ).toThrow('flavors[0].packages.unixlike는 패키지 이름 목록이어야 합니다');
      expect(() =>
        FlavorCatalog.fromData({ mirror: sample.mirror, flavors: [{ ...sample.flavors[0], id: '' }] })
      ).toThrow('flavors[0].id 값이 없습니다');
    });

    it('중복 ID는 거부', () => {
      expect(() =>
        FlavorCatalog.fromData({ mirror: sample.mirror, flavors: [sample.flavors[0], sample.flavors[0]] })
      ).toThrow('중복된 배포판 ID: freedos-1.3');
    });
  });
});
