import * as os from "node:os";
import * as path from "node:path";
import { ensureDirectory, isDirectory } from "../utils/fileops.js";
import {
    SourceNotFoundError,
    SyncCancelledError,
    SyncValidationError,
    errorMessage,
    throwIfCancelled,
} from "./errors.js";
import { compilePatterns } from "./patterns.js";
import { DRY_RUN_PREFIX, createProgressEvent, formatSyncResult } from "./result.js";
import { processFile } from "./retry.js";
import { SyncAggregator } from "./aggregator.js";
import { scanTree } from "./scanner.js";
import { Semaphore } from "./semaphore.js";
import type { MatchedFile, SyncLogger, SyncOptions, SyncResult } from "./types.js";

/**
 * Concurrency used when none (or a non-positive value) is given.
 */
export function defaultConcurrency(): number {
    return os.availableParallelism();
}

function requireNonBlank(value: unknown, name: string): string {
    if (typeof value !== "string" || value.trim() === "") {
        throw new SyncValidationError(`${name} must be a non-empty string`);
    }
    return value;
}

/**
 * One-way, pattern-filtered directory synchronizer.
 *
 * Copies files whose name matches one of the patterns from the origin tree to
 * the destination tree when they are missing there or older than the origin
 * copy. Nothing is ever deleted from the destination.
 */
export class Synchronizer {
    private readonly semaphore: Semaphore;
    private readonly logger?: SyncLogger;

    /**
     * @param maxConcurrency Maximum number of files processed at once; values <= 0 use the number of available processors
     * @param logger Optional sink for run, retry and failure messages
     */
    constructor(maxConcurrency = 0, logger?: SyncLogger) {
        const limit = maxConcurrency > 0 ? Math.floor(maxConcurrency) : defaultConcurrency();
        this.semaphore = new Semaphore(Math.max(1, limit));
        this.logger = logger;
    }

    /**
     * Concurrency bound shared by every synchronize() call on this instance.
     */
    get maxConcurrency(): number {
        return this.semaphore.capacity();
    }

    /**
     * Run one synchronization pass.
     *
     * Argument problems are thrown before the filesystem is touched. Failures of
     * individual files are retried and then counted in the result; a missing
     * origin, a failed scan or cancellation rejects the whole call.
     *
     * @throws SyncValidationError for blank paths or patterns, or a bad maxRetries
     * @throws InvalidPatternError when a pattern does not compile
     * @throws SourceNotFoundError when the origin directory does not exist
     * @throws SyncCancelledError when options.signal is aborted
     */
    async synchronize(options: SyncOptions): Promise<SyncResult> {
        const originPath = path.resolve(requireNonBlank(options.originPath, "originPath"));
        const destinationPath = path.resolve(requireNonBlank(options.destinationPath, "destinationPath"));
        const patternString = requireNonBlank(options.patterns, "patterns");
        const maxRetries = options.maxRetries ?? 0;
        if (!Number.isInteger(maxRetries) || maxRetries < 0) {
            throw new SyncValidationError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
        }
        const dryRun = options.dryRun ?? false;
        const { onProgress, signal } = options;
        const patterns = compilePatterns(patternString);

        const modePrefix = dryRun ? DRY_RUN_PREFIX : "";

        try {
            if (!(await isDirectory(originPath))) {
                throw new SourceNotFoundError(originPath);
            }

            // The root is created even in dry-run; subdirectories never are
            throwIfCancelled(signal);
            await ensureDirectory(destinationPath);

            const files = await scanTree(originPath, patterns, signal);
            this.logger?.info(
                `${modePrefix}Synchronizing ${originPath} → ${destinationPath}: ${files.length} matching file(s)`,
            );

            const aggregator = new SyncAggregator(files.length, dryRun);
            onProgress?.(createProgressEvent(0, files.length, `${modePrefix}Starting synchronization...`));

            await this.dispatch(files, async (file) => {
                const outcome = await processFile(file, destinationPath, {
                    maxRetries,
                    dryRun,
                    signal,
                    logger: this.logger,
                });
                if (outcome.status === "failed") {
                    this.logger?.error(
                        `Failed ${outcome.relativePath} after ${outcome.attempts} attempt(s): ${outcome.error.message}`,
                    );
                }
                const event = aggregator.record(outcome);
                onProgress?.(event);
            }, signal);

            const completion = dryRun
                ? `${DRY_RUN_PREFIX}Synchronization analysis completed`
                : "Synchronization completed";
            onProgress?.(createProgressEvent(files.length, files.length, completion));

            const result = aggregator.snapshot();
            this.logger?.info(formatSyncResult(result));
            return result;
        } catch (err) {
            if (err instanceof SyncCancelledError) {
                this.logger?.warn(`Synchronization cancelled: ${originPath} → ${destinationPath}`);
            } else {
                this.logger?.error(`Synchronization failed: ${errorMessage(err)}`);
            }
            throw err;
        }
    }

    /**
     * Run work for every file with at most maxConcurrency in flight.
     * Waits for every dispatched unit to settle, then rethrows the first
     * failure, preferring cancellation.
     */
    private async dispatch(
        files: readonly MatchedFile[],
        work: (file: MatchedFile) => Promise<void>,
        signal?: AbortSignal,
    ): Promise<void> {
        const settled = await Promise.allSettled(
            files.map(async (file) => {
                await this.semaphore.acquire(signal);
                try {
                    await work(file);
                } finally {
                    this.semaphore.release();
                }
            }),
        );

        const failures: unknown[] = settled.flatMap((entry) => (entry.status === "rejected" ? [entry.reason] : []));
        if (failures.length === 0) return;

        const cancelled = failures.find((reason) => reason instanceof SyncCancelledError);
        throw cancelled ?? failures[0];
    }
}
