/**
 * A named synchronization job (one entry under `jobs:` in .patternsync.yml).
 */
export interface SyncJob {
    /** Optional label for log readability and `list` output */
    name?: string;
    /** Directory copied from */
    source: string;
    /** Directory copied to */
    destination: string;
    /** Semicolon-separated regular expressions matched against file names */
    patterns: string;
    /** Retries per file after the first attempt */
    maxRetries: number;
    /** Report only, do not copy */
    dryRun: boolean;
}

/**
 * Top-level configuration (maps to .patternsync.yml).
 */
export interface PatternSyncConfig {
    /** Files processed at once; 0 uses the number of available processors */
    maxConcurrency: number;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
    /** Configured jobs, run in order */
    jobs: SyncJob[];
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    maxConcurrency: 0,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    patterns: ".*",
    maxRetries: 0,
    dryRun: false,
    configFileName: ".patternsync.yml",
} as const;
