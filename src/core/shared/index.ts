// 공통 모듈 진입점

// 파일명 유틸리티
export {
  METADATA_EXTENSION,
  toLocalFilename,
  sanitizeNameComponent,
  getExtension,
  removeExtension,
  replaceExtension,
  isMetadataFile,
  isZipFilename,
} from './filename-utils';

// URL 유틸리티
export { quoteUrl, decodedFilename, urlDirectory, urlQuery, joinUrl, createResourceRef } from './url-utils';

// 디스크 세트 확장
export { parseDiskName, siblingFilenames, expandDiskSet } from './disk-set';

// 체크섬 검증
export { ChecksumVerifier, getChecksumVerifier, parseCompanionDigest, companionPath } from './checksum-verifier';

// 스테이징 영역
export { StagingArea, stagingDirName, withStagingArea } from './staging-area';
export type { StagingAreaOptions, StagingAreaFactory } from './staging-area';
