import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import * as path from 'path';
import type {
  CatalogSection,
  FetchProgressEvent,
  FlavorDefinition,
  InstallResult,
  LocalArtifact,
  RepositorySection,
  ResourceRef,
} from '../types';
import logger from '../utils/logger';
import { ArchiveProcessor } from './archive/archiveProcessor';
import type { ProcessResult } from './archive/archiveProcessor';
import { MtoolsDiskImageTool } from './archive/diskImageTool';
import type { DiskImageTool } from './archive/diskImageTool';
import { CATALOG_SECTIONS, FlavorCatalog } from './catalog/flavors';
import type { Config } from './config';
import {
  DosFetchError,
  IntegrityError,
  MissingDependencyError,
  NotFoundError,
  PreexistingDestinationError,
} from './errors';
import { Fetcher } from './fetcher';
import { getChecksumVerifier } from './shared/checksum-verifier';
import type { ChecksumVerifier } from './shared/checksum-verifier';
import { expandDiskSet } from './shared/disk-set';
import { METADATA_EXTENSION, toLocalFilename } from './shared/filename-utils';
import { StagingArea, withStagingArea } from './shared/staging-area';
import type { StagingAreaFactory } from './shared/staging-area';
import { createResourceRef, joinUrl } from './shared/url-utils';

// 이미 DOS가 설치된 디렉토리를 알려주는 파일 (대소문자 무시)
export const SYSTEM_MARKERS: readonly string[] = ['command.com', 'kernel.sys', 'io.sys', 'ibmbio.com'];

// 섹션별 조회 순서 (unixlike에 없으면 util)
export const SECTION_LOOKUP: Readonly<Record<CatalogSection, readonly RepositorySection[]>> = {
  base: ['base'],
  unixlike: ['unixlike', 'util'],
};

// 이벤트 타입
export interface OrchestratorEvents {
  fetchStart: (ref: ResourceRef) => void;
  progress: (event: FetchProgressEvent) => void;
  fetchComplete: (artifact: LocalArtifact) => void;
  packageSkipped: (pkg: string, sections: readonly RepositorySection[]) => void;
  processed: (result: ProcessResult) => void;
  reused: (destination: string) => void;
}

// 협력 객체
export interface OrchestratorDeps {
  catalog: FlavorCatalog;
  fetcher: Fetcher;
  verifier: ChecksumVerifier;
  archiveProcessor: ArchiveProcessor;
  diskImageTool: DiskImageTool;
  createStaging: StagingAreaFactory;
}

// 사용자 지정 설치 요청
export interface CustomInstallRequest {
  /** 하나면 디스크 세트 시드, 여러 개면 그대로 사용 */
  urls: string[];
  destination: string;
  /** i번째 값은 세트의 i번째 파일용 SHA-256 */
  checksums?: string[];
}

/**
 * 디렉토리가 존재하고 비어 있지 않은지 확인
 */
async function isNonEmptyDir(dir: string): Promise<boolean> {
  if (!(await fs.pathExists(dir))) return false;
  return (await fs.readdir(dir)).length > 0;
}

/**
 * 체크섬이 맞지 않은 파일을 보존할 디렉토리 (대상 디렉토리 옆)
 */
export function rejectedDirFor(destination: string): string {
  return `${path.resolve(destination)}.rejected`;
}

/**
 * 로컬 파일명이 겹치는 첫 번째 이름
 */
function findDuplicateFilename(refs: readonly ResourceRef[]): string | null {
  const seen = new Set<string>();
  for (const ref of refs) {
    const filename = toLocalFilename(ref.filename);
    if (seen.has(filename)) return filename;
    seen.add(filename);
  }
  return null;
}

/**
 * 시스템 파일이 있는지 확인
 */
export function hasSystemMarker(entries: readonly string[]): boolean {
  return entries.some((entry) => SYSTEM_MARKERS.includes(entry.toLowerCase()));
}

export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    super();
    this.deps = deps;
  }

  /**
   * 디스크 이미지 도구 확인 (네트워크 작업 전에 호출)
   *
   * @returns 도구 실행 파일 경로
   * @throws MissingDependencyError 도구가 PATH에 없음
   */
  async checkEnvironment(): Promise<string> {
    const tool = this.deps.diskImageTool;
    const located = await tool.locate();
    if (!located) {
      throw new MissingDependencyError(tool.command, tool.installHint);
    }
    logger.debug('디스크 이미지 도구 확인', { command: tool.command, path: located });
    return located;
  }

  /**
   * 카탈로그의 배포판 설치
   */
  async installFlavor(flavorId: string, destination: string): Promise<InstallResult> {
    await this.checkEnvironment();
    const flavor = this.deps.catalog.get(flavorId);

    if (await isNonEmptyDir(destination)) {
      throw new PreexistingDestinationError(destination);
    }
    await fs.ensureDir(destination);

    logger.info('배포판 설치 시작', { flavor: flavor.id, destination });

    return withStagingArea(this.deps.createStaging, async (staging) => {
      const artifacts: LocalArtifact[] = [];
      const skipped: string[] = [];

      await this.keepRejected(destination, async () => {
        for (const section of CATALOG_SECTIONS) {
          for (const pkg of flavor.packages[section]) {
            const artifact = await this.fetchPackage(flavor, section, pkg, staging.path);
            if (artifact) {
              artifacts.push(artifact);
            } else {
              skipped.push(pkg);
            }
          }
        }
      });

      const installed = await this.processAll(artifacts, destination, staging);
      logger.info('배포판 설치 완료', { flavor: flavor.id, installed: installed.length, skipped: skipped.length });
      return { destination, installed, skipped, reused: false };
    });
  }

  /**
   * 사용자 지정 URL 설치
   * 대상 디렉토리에 이미 파일이 있으면 다시 받지 않습니다.
   */
  async installCustom(request: CustomInstallRequest): Promise<InstallResult> {
    const { urls, destination } = request;
    const checksums = request.checksums ?? [];

    if (urls.length === 0) {
      throw new DosFetchError('URL을 하나 이상 지정하세요', 'INVALID_REQUEST');
    }

    await this.checkEnvironment();
    await fs.ensureDir(destination);

    const refs = urls.length === 1 ? expandDiskSet(urls[0]) : urls.map(createResourceRef);
    if (checksums.length > 0 && checksums.length !== refs.length) {
      logger.warn('체크섬 개수가 파일 수와 다릅니다', { checksums: checksums.length, files: refs.length });
    }

    // 스테이징 영역과 대상 디렉토리에서 서로 덮어쓰지 않도록 거부
    const duplicate = findDuplicateFilename(refs);
    if (duplicate) {
      throw new DosFetchError(`같은 파일명을 가진 URL이 여러 개입니다: ${duplicate}`, 'INVALID_REQUEST', {
        filename: duplicate,
      });
    }

    const entries = await fs.readdir(destination);
    if (entries.length > 0) {
      if (checksums.length > 0 && !hasSystemMarker(entries)) {
        await this.verifyExisting(refs, checksums, destination);
      }
      logger.warn('대상 디렉토리에 파일이 있어 그대로 사용합니다', { destination });
      this.emit('reused', destination);
      return { destination, installed: [], skipped: [], reused: true };
    }

    return withStagingArea(this.deps.createStaging, async (staging) => {
      const artifacts: LocalArtifact[] = [];
      await this.keepRejected(destination, async () => {
        for (const [index, ref] of refs.entries()) {
          artifacts.push(await this.fetchOne(ref, staging.path, checksums[index]));
        }
      });

      const installed = await this.processAll(artifacts, destination, staging);
      return { destination, installed, skipped: [], reused: false };
    });
  }

  /**
   * 기존 디렉토리에 있는 세트 파일을 파일명 기준으로 재검증
   */
  private async verifyExisting(refs: ResourceRef[], checksums: string[], destination: string): Promise<void> {
    for (const [index, ref] of refs.entries()) {
      const expected = checksums[index];
      const filePath = path.join(destination, toLocalFilename(ref.filename));
      if (expected && (await fs.pathExists(filePath))) {
        await this.deps.verifier.verify(filePath, expected);
      }
    }
  }

  /**
   * 다운로드 중 체크섬 불일치가 나면 해당 파일을 스테이징 영역 밖으로 옮긴 뒤
   * 옮긴 경로를 담은 IntegrityError를 다시 던짐
   */
  private async keepRejected(destination: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      if (!(error instanceof IntegrityError)) throw error;

      const kept = path.join(rejectedDirFor(destination), path.basename(error.filePath));
      await fs.move(error.filePath, kept, { overwrite: true });
      logger.warn('체크섬이 맞지 않는 파일을 보존합니다', { path: kept });
      throw new IntegrityError(kept, error.actual, error.expected);
    }
  }

  /**
   * 패키지 하나를 섹션 순서대로 찾아 받기
   * 모든 섹션에 없으면 경고 후 null
   */
  private async fetchPackage(
    flavor: FlavorDefinition,
    section: CatalogSection,
    pkg: string,
    stagingDir: string
  ): Promise<LocalArtifact | null> {
    const candidates = SECTION_LOOKUP[section];

    for (const candidate of candidates) {
      const sectionUrl = joinUrl(flavor.baseUrl, candidate);
      const metadata = await this.fetchMetadata(joinUrl(sectionUrl, `${pkg}${METADATA_EXTENSION}`), stagingDir);

      try {
        return await this.fetchOne(createResourceRef(joinUrl(sectionUrl, `${pkg}.zip`)), stagingDir);
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        // 다른 섹션의 체크섬과 섞이지 않도록 제거
        if (metadata) await fs.remove(metadata.path);
        logger.debug('섹션에 패키지 없음', { package: pkg, section: candidate });
      }
    }

    logger.warn('패키지를 찾을 수 없어 건너뜁니다', { package: pkg, flavor: flavor.id, sections: candidates });
    this.emit('packageSkipped', pkg, candidates);
    return null;
  }

  /**
   * 동반 메타데이터 받기 (없어도 됨)
   */
  private async fetchMetadata(url: string, stagingDir: string): Promise<LocalArtifact | null> {
    try {
      return await this.fetchOne(createResourceRef(url), stagingDir);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private async fetchOne(ref: ResourceRef, stagingDir: string, expectedDigest?: string): Promise<LocalArtifact> {
    this.emit('fetchStart', ref);
    const artifact = await this.deps.fetcher.fetch(ref, stagingDir, {
      expectedDigest,
      onProgress: (event) => this.emit('progress', event),
    });
    this.emit('fetchComplete', artifact);
    return artifact;
  }

  /**
   * 받은 결과물을 순서대로 대상 디렉토리에 처리
   */
  private async processAll(
    artifacts: LocalArtifact[],
    destination: string,
    staging: StagingArea
  ): Promise<string[]> {
    const installed: string[] = [];
    for (const artifact of artifacts) {
      const result = await this.deps.archiveProcessor.process(artifact, destination, staging);
      this.emit('processed', result);
      installed.push(artifact.filename);
    }
    return installed;
  }
}

/**
 * 설정값으로 기본 협력 객체를 조립
 */
export function createOrchestrator(config: Config): Orchestrator {
  const verifier = getChecksumVerifier();
  const diskImageTool = new MtoolsDiskImageTool({ command: config.diskImageTool });

  return new Orchestrator({
    catalog: FlavorCatalog.load({ mirrorUrl: config.mirrorUrl }),
    fetcher: new Fetcher({ timeoutMs: config.requestTimeoutMs, verifier }),
    verifier,
    archiveProcessor: new ArchiveProcessor(diskImageTool),
    diskImageTool,
    createStaging: () => StagingArea.create({ programName: 'dosfetch' }),
  });
}
