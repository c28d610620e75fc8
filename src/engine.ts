export * from './types.js';
export {
  TidyError,
  TemplateError,
  RenderError,
  SetupError,
  ConfigError,
  StoreError,
  classifyFsError,
  type ErrorCode,
} from './errors.js';
export { createLogger, logger, type Logger, type LogLevel } from './logger.js';
export { DEFAULT_CONFIG, loadConfig, parseConfig, resolveTemplate, dataPaths } from './config.js';
export {
  DEFAULT_TEMPLATE,
  DEFAULT_RULES,
  RELEASE_FALLBACK_TEMPLATE,
  compileTemplate,
  renderPath,
  albumKey,
  findCompilations,
} from './template.js';
export { findDuplicates, selectKeeper, type DetectOptions } from './duplicates.js';
export { computePartialHash } from './hash.js';
export {
  buildPlan,
  planDisposals,
  withDisposals,
  summarizePlan,
  planToRows,
  planToCsv,
  type PlanOptions,
  type DisposalOptions,
} from './planner.js';
export { executePlan, type ExecuteOptions, type FileOperations } from './executor.js';
export { UndoLog, type ArchivedBatch, type UndoOptions } from './undo-log.js';
export { MemoryTrackStore, NdjsonTrackStore, withStoreBatch, type TrackStore } from './track-store.js';
export { findMusicFiles, ingestDirectory, type IngestOptions, type IngestSummary } from './scanner.js';
export { extractMetadata, toTrackInput } from './metadata.js';
