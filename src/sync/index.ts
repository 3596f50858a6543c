export { Synchronizer, defaultConcurrency } from "./synchronizer.js";
export { compilePatterns, matchesAny } from "./patterns.js";
export { scanTree } from "./scanner.js";
export { resolveAction } from "./resolver.js";
export { withRetry, processFile, backoffDelay } from "./retry.js";
export { Semaphore } from "./semaphore.js";
export { SyncAggregator, describeOutcome } from "./aggregator.js";
export { formatProgress, formatSyncResult, percentComplete } from "./result.js";
export {
    SyncValidationError,
    InvalidPatternError,
    SourceNotFoundError,
    SyncCancelledError,
} from "./errors.js";
export type {
    MatchedFile,
    ResolvedAction,
    FileStatus,
    FileOutcome,
    ProgressEvent,
    ProgressCallback,
    SyncResult,
    SyncLogger,
    SyncOptions,
} from "./types.js";
