// ============================================
// 리소스 관련 타입
// ============================================

/** 원격 리소스 참조 */
export interface ResourceRef {
  /** 원본 URL (퍼센트 인코딩 전) */
  readonly url: string;
  /** 디코딩된 파일명 (URL 경로의 마지막 세그먼트) */
  readonly filename: string;
}

/** 디스크 번호 표기 방식 */
export type DiskPatternKind =
  /** `disk <K> of <N>` */
  | 'index-of-total'
  /** `disk<N>` (마지막 디스크 번호) */
  | 'last-index';

/** 파일명에서 찾은 디스크 번호 정보 */
export interface DiskNamePattern {
  kind: DiskPatternKind;
  /** 파일명에 적힌 디스크 번호 */
  index: number;
  /** 세트 전체 디스크 수 */
  total: number;
  /** 교체 대상 숫자의 시작 위치 */
  digitsStart: number;
  /** 교체 대상 숫자 문자열 (0 채움 포함) */
  digits: string;
}

// ============================================
// 검증 관련 타입
// ============================================

/** 기대 체크섬 출처 */
export type DigestSource = 'explicit' | 'companion';

/** 체크섬 검증 결과 */
export type VerificationResult =
  | {
      status: 'verified';
      digest: string;
      source: DigestSource;
    }
  | {
      status: 'unverified';
      digest?: undefined;
      source?: undefined;
    }
  | {
      /** 메타데이터 파일은 검증 대상이 아님 */
      status: 'skipped';
      digest?: undefined;
      source?: undefined;
    };

// ============================================
// 다운로드 관련 타입
// ============================================

/** 다운로드 진행률 이벤트 */
export interface FetchProgressEvent {
  ref: ResourceRef;
  downloadedBytes: number;
  /** content-length를 모르면 0 */
  totalBytes: number;
  /** 0-100, 전체 크기를 모르면 0 */
  progress: number;
}

/** 로컬에 저장된 다운로드 결과물 */
export interface LocalArtifact {
  ref: ResourceRef;
  path: string;
  filename: string;
  size: number;
  /** 이미 존재하던 파일을 재사용했는지 */
  reused: boolean;
  verification: VerificationResult;
}

// ============================================
// 카탈로그 관련 타입
// ============================================

/** 저장소 섹션 */
export type RepositorySection = 'base' | 'unixlike' | 'util';

/** 카탈로그에 정의된 섹션 (util은 폴백 전용) */
export type CatalogSection = Exclude<RepositorySection, 'util'>;

/** 배포판 정의 */
export interface FlavorDefinition {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly baseUrl: string;
  readonly packages: Readonly<Record<CatalogSection, readonly string[]>>;
}

// ============================================
// 설치 결과 타입
// ============================================

/** 설치 결과 */
export interface InstallResult {
  destination: string;
  /** 대상 디렉토리로 옮기거나 풀어낸 결과물 파일명 */
  installed: string[];
  /** 찾지 못해 건너뛴 패키지 */
  skipped: string[];
  /** 기존 디렉토리를 그대로 재사용했는지 */
  reused: boolean;
}
