// Core module exports for dosfetch

// Orchestrator
export {
  Orchestrator,
  createOrchestrator,
  hasSystemMarker,
  rejectedDirFor,
  SYSTEM_MARKERS,
  SECTION_LOOKUP,
} from './orchestrator';
export type { OrchestratorDeps, OrchestratorEvents, CustomInstallRequest } from './orchestrator';

// Fetcher
export { Fetcher, VERSION, CHUNK_SIZE } from './fetcher';
export type { FetcherOptions, FetchOptions } from './fetcher';

// Archive
export { ArchiveProcessor } from './archive/archiveProcessor';
export type { ProcessResult } from './archive/archiveProcessor';
export { MtoolsDiskImageTool, findExecutable, buildCopyAllArgs, MTOOLS_ENV } from './archive/diskImageTool';
export type { DiskImageTool, MtoolsOptions } from './archive/diskImageTool';

// Catalog
export { FlavorCatalog, CATALOG_SECTIONS } from './catalog/flavors';
export type { CatalogOptions } from './catalog/flavors';

// Config
export { ConfigManager, getConfigManager, isConfigKey } from './config';
export type { Config, ConfigKey } from './config';

// Errors
export * from './errors';

// Shared utilities
export * from './shared';
