export { loadConfig, writeDefaultConfig, validateConfig, getConfigHome, CONFIG_DEFAULTS } from "./config/index.js";
export { Logger } from "./utils/logger.js";
export type { LogLevel, LoggerOptions } from "./utils/logger.js";
export {
    Synchronizer,
    formatProgress,
    formatSyncResult,
    percentComplete,
    SyncValidationError,
    InvalidPatternError,
    SourceNotFoundError,
    SyncCancelledError,
} from "./sync/index.js";
export type { PatternSyncConfig, SyncJob } from "./config/index.js";
export type { SyncOptions, SyncResult, ProgressEvent, ProgressCallback, SyncLogger, FileOutcome } from "./sync/index.js";
