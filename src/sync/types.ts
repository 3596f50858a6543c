/**
 * A source file selected by the pattern set.
 */
export interface MatchedFile {
    /** Absolute path of the file under the source root */
    sourcePath: string;
    /** Path relative to the source root; reused unchanged under the destination root */
    relativePath: string;
}

/**
 * What the resolver decided for one file.
 * - `create`: nothing exists at the destination
 * - `update`: the source is strictly newer than the destination
 * - `skip`: the destination is as new as or newer than the source
 */
export type ResolvedAction = "create" | "update" | "skip";

/** Final classification of a processed file */
export type FileStatus = "created" | "updated" | "skipped" | "failed";

interface OutcomeBase {
    relativePath: string;
    /** Attempts consumed, including the first (always >= 1) */
    attempts: number;
}

export interface SucceededOutcome extends OutcomeBase {
    status: "created" | "updated" | "skipped";
}

export interface FailedOutcome extends OutcomeBase {
    status: "failed";
    /** The error thrown by the last attempt */
    error: Error;
}

/**
 * Result of processing a single matched file.
 */
export type FileOutcome = SucceededOutcome | FailedOutcome;

/**
 * Snapshot of run progress, passed to the progress callback.
 */
export interface ProgressEvent {
    readonly processedFiles: number;
    readonly totalFiles: number;
    readonly currentOperation: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;

/**
 * Summary of a synchronization run.
 */
export interface SyncResult {
    /** Whether the run only reported what it would do */
    readonly dryRun: boolean;
    /** Number of files that matched the pattern set */
    readonly totalFiles: number;
    readonly filesCreated: number;
    readonly filesUpdated: number;
    readonly filesSkipped: number;
    readonly filesFailed: number;
    /** Sum over all files of (attempts - 1) */
    readonly totalRetryAttempts: number;
    /** One "<relativePath>: <message>" entry per failed file, in completion order */
    readonly errors: readonly string[];
    /** True when no file failed */
    readonly isSuccess: boolean;
    /** filesCreated + filesUpdated */
    readonly filesModified: number;
}

/**
 * Minimal logging surface used by the synchronizer.
 */
export interface SyncLogger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Inputs for one synchronize() call.
 */
export interface SyncOptions {
    /** Source directory */
    originPath: string;
    /** Destination directory; created if missing (also in dry-run) */
    destinationPath: string;
    /** Semicolon-separated, case-insensitive regular expressions matched against file names */
    patterns: string;
    /** Retries per file after the first attempt (default 0) */
    maxRetries?: number;
    /** Report what would happen without touching the destination tree (default false) */
    dryRun?: boolean;
    onProgress?: ProgressCallback;
    signal?: AbortSignal;
}
