/**
 * 배포판 카탈로그
 *
 * flavors.json을 한 번 읽어 검증한 뒤 불변 구조로 고정합니다.
 * mirrorUrl을 지정하면 모든 배포판의 미러 루트를 교체합니다.
 */

import catalogData from './flavors.json';
import type { CatalogSection, FlavorDefinition } from '../../types';
import { InvalidCatalogError, UnknownFlavorError } from '../errors';
import { joinUrl } from '../shared/url-utils';

export const CATALOG_SECTIONS: readonly CatalogSection[] = ['base', 'unixlike'];

export interface CatalogOptions {
  /** 미러 루트 URL (기본값: flavors.json의 mirror) */
  mirrorUrl?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string' && item.length > 0);
}

function requireString(entry: Record<string, unknown>, key: string, where: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidCatalogError(`${where}.${key} 값이 없습니다`);
  }
  return value;
}

/**
 * 배포판 항목 하나를 검증해 FlavorDefinition으로 변환
 */
function parseFlavor(entry: unknown, index: number, mirror: string): FlavorDefinition {
  const where = `flavors[${index}]`;
  if (!isRecord(entry)) {
    throw new InvalidCatalogError(`${where}가 객체가 아닙니다`);
  }

  const packages = entry.packages;
  if (!isRecord(packages)) {
    throw new InvalidCatalogError(`${where}.packages가 객체가 아닙니다`);
  }

  const sections: Partial<Record<CatalogSection, readonly string[]>> = {};
  for (const section of CATALOG_SECTIONS) {
    const names = packages[section];
    if (!isStringArray(names)) {
      throw new InvalidCatalogError(`${where}.packages.${section}는 패키지 이름 목록이어야 합니다`);
    }
    sections[section] = Object.freeze([...names]);
  }

  return Object.freeze({
    id: requireString(entry, 'id', where),
    name: requireString(entry, 'name', where),
    version: requireString(entry, 'version', where),
    baseUrl: joinUrl(mirror, requireString(entry, 'path', where)),
    packages: Object.freeze({
      base: sections.base ?? [],
      unixlike: sections.unixlike ?? [],
    }),
  });
}

export class FlavorCatalog {
  private constructor(private readonly flavors: ReadonlyMap<string, FlavorDefinition>) {}

  /**
   * 카탈로그 데이터 검증 후 생성
   */
  static fromData(data: unknown, options: CatalogOptions = {}): FlavorCatalog {
    if (!isRecord(data) || !Array.isArray(data.flavors)) {
      throw new InvalidCatalogError('flavors 목록이 없습니다');
    }

    const mirror = options.mirrorUrl || (typeof data.mirror === 'string' ? data.mirror : '');
    if (!mirror) {
      throw new InvalidCatalogError('mirror 값이 없습니다');
    }

    const flavors = new Map<string, FlavorDefinition>();
    data.flavors.forEach((entry: unknown, index: number) => {
      const flavor = parseFlavor(entry, index, mirror);
      if (flavors.has(flavor.id)) {
        throw new InvalidCatalogError(`중복된 배포판 ID: ${flavor.id}`);
      }
      flavors.set(flavor.id, flavor);
    });

    const catalog = new FlavorCatalog(flavors);
    Object.freeze(catalog);
    return catalog;
  }

  /**
   * 내장 flavors.json 로드
   */
  static load(options: CatalogOptions = {}): FlavorCatalog {
    return FlavorCatalog.fromData(catalogData, options);
  }

  get ids(): string[] {
    return [...this.flavors.keys()];
  }

  has(id: string): boolean {
    return this.flavors.has(id);
  }

  /**
   * @throws UnknownFlavorError 카탈로그에 없는 ID
   */
  get(id: string): FlavorDefinition {
    const flavor = this.flavors.get(id);
    if (!flavor) {
      throw new UnknownFlavorError(id, this.ids);
    }
    return flavor;
  }

  list(): FlavorDefinition[] {
    return [...this.flavors.values()];
  }
}
