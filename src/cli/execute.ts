import * as fs from "node:fs";
import * as path from "node:path";
import { CONFIG_DEFAULTS } from "../config/types.js";
import type { PatternSyncConfig, SyncJob } from "../config/types.js";
import { jobLabel, loadConfig } from "../config/loader.js";
import type { Synchronizer } from "../sync/synchronizer.js";
import { formatProgress, formatSyncResult } from "../sync/result.js";
import type { SyncLogger, SyncResult } from "../sync/types.js";
import { Logger } from "../utils/logger.js";

export interface ExecuteOptions {
    /** Suppress per-file progress lines */
    quiet?: boolean;
    /** Force dry-run regardless of the job setting */
    dryRun?: boolean;
    signal?: AbortSignal;
    /** Output sink (defaults to console.log) */
    write?: (line: string) => void;
}

/**
 * Run one job, printing progress lines, the summary and any per-file errors.
 */
export async function executeJob(
    synchronizer: Synchronizer,
    job: SyncJob,
    label: string,
    logger: SyncLogger,
    options: ExecuteOptions = {},
): Promise<SyncResult> {
    const write = options.write ?? ((line: string) => console.log(line));
    const dryRun = options.dryRun === true || job.dryRun;

    logger.info(`Running ${label}: ${job.source} → ${job.destination} (patterns: ${job.patterns})`);

    const result = await synchronizer.synchronize({
        originPath: job.source,
        destinationPath: job.destination,
        patterns: job.patterns,
        maxRetries: job.maxRetries,
        dryRun,
        signal: options.signal,
        onProgress: options.quiet ? undefined : (event) => write(formatProgress(event)),
    });

    write(formatSyncResult(result));
    for (const error of result.errors) {
        write(`  ✗ ${error}`);
    }
    return result;
}

/**
 * Load the config if one exists in configDir; used where a config is optional.
 */
export function loadOptionalConfig(configDir: string): PatternSyncConfig | null {
    if (!fs.existsSync(path.join(configDir, CONFIG_DEFAULTS.configFileName))) {
        return null;
    }
    return loadConfig(configDir);
}

/**
 * File logger under <configDir>/logs that mirrors warnings on stderr.
 */
export function createCliLogger(configDir: string, config: PatternSyncConfig | null): Logger {
    return new Logger({
        logDir: path.join(configDir, "logs"),
        maxLogSizeMB: config?.maxLogSizeMB ?? CONFIG_DEFAULTS.maxLogSizeMB,
        maxLogFiles: config?.maxLogFiles ?? CONFIG_DEFAULTS.maxLogFiles,
        echo: (level, line) => {
            if (level === "warn") console.error(line);
        },
    });
}

/**
 * Run work with an AbortSignal that fires on Ctrl-C or SIGTERM.
 */
export async function withInterrupt<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const abort = (): void => {
        console.error("Interrupted, cancelling...");
        controller.abort();
    };

    process.on("SIGINT", abort);
    process.on("SIGTERM", abort);
    try {
        return await work(controller.signal);
    } finally {
        process.off("SIGINT", abort);
        process.off("SIGTERM", abort);
    }
}

export interface SelectedJob {
    job: SyncJob;
    label: string;
}

/**
 * Pick jobs by name in the order given, or every job when no names are given.
 * @throws Error listing any names the config does not define
 */
export function selectJobs(config: PatternSyncConfig, names: readonly string[]): SelectedJob[] {
    const all = config.jobs.map((job, index) => ({ job, label: jobLabel(job, index) }));
    if (names.length === 0) return all;

    const unknown = names.filter((name) => !config.jobs.some((job) => job.name === name));
    if (unknown.length > 0) {
        throw new Error(`Unknown job(s): ${unknown.join(", ")}`);
    }
    return names.flatMap((name) => all.filter(({ job }) => job.name === name));
}
