import * as path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { copyFileStreaming, ensureDirectory } from "../utils/fileops.js";
import { SyncCancelledError, throwIfCancelled } from "./errors.js";
import { resolveAction } from "./resolver.js";
import type { FileOutcome, FileStatus, MatchedFile, ResolvedAction, SyncLogger } from "./types.js";

/** Delay before the first retry; doubles for every further attempt */
export const RETRY_BASE_DELAY_MS = 100;

export interface RetryOptions {
    /** Retries allowed after the first attempt */
    maxRetries: number;
    signal?: AbortSignal;
    baseDelayMs?: number;
    /** Called before each backoff wait with the attempt that just failed */
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export type RetryResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: Error; attempts: number };

/**
 * Backoff before retrying after the given 1-indexed attempt: base × 2^(attempt-1).
 */
export function backoffDelay(attempt: number, baseDelayMs = RETRY_BASE_DELAY_MS): number {
    return baseDelayMs * 2 ** (attempt - 1);
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

/**
 * Run an operation up to maxRetries + 1 times with exponential backoff between attempts.
 * Every error is treated as retryable. Failures are returned, not thrown;
 * only cancellation is thrown.
 *
 * @throws SyncCancelledError when the signal is aborted before an attempt, during one, or while waiting
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions,
): Promise<RetryResult<T>> {
    const { maxRetries, signal } = options;
    const baseDelayMs = options.baseDelayMs ?? RETRY_BASE_DELAY_MS;
    let attempt = 0;

    for (;;) {
        attempt++;
        throwIfCancelled(signal);
        try {
            const value = await operation(attempt);
            return { ok: true, value, attempts: attempt };
        } catch (err) {
            throwIfCancelled(signal);
            const error = toError(err);
            if (attempt > maxRetries) {
                return { ok: false, error, attempts: attempt };
            }

            const delayMs = backoffDelay(attempt, baseDelayMs);
            options.onRetry?.(attempt, error, delayMs);
            try {
                await sleep(delayMs, undefined, { signal });
            } catch (sleepErr) {
                throw new SyncCancelledError(undefined, { cause: sleepErr });
            }
        }
    }
}

export interface ProcessFileOptions {
    maxRetries: number;
    dryRun: boolean;
    signal?: AbortSignal;
    logger?: SyncLogger;
}

const STATUS_BY_ACTION: Record<ResolvedAction, Exclude<FileStatus, "failed">> = {
    create: "created",
    update: "updated",
    skip: "skipped",
};

/**
 * Bring one matched file up to date at the destination.
 * Per attempt: ensure the destination directory (not in dry-run), resolve the action,
 * and copy unless it is a skip or a dry run.
 */
export async function processFile(
    file: MatchedFile,
    destinationRoot: string,
    options: ProcessFileOptions,
): Promise<FileOutcome> {
    const { dryRun, signal, logger } = options;
    const destinationPath = path.join(destinationRoot, file.relativePath);

    const result = await withRetry(
        async () => {
            if (!dryRun) {
                await ensureDirectory(path.dirname(destinationPath));
            }
            const action = await resolveAction(file.sourcePath, destinationPath);
            if (action !== "skip" && !dryRun) {
                await copyFileStreaming(file.sourcePath, destinationPath, signal);
            }
            return action;
        },
        {
            maxRetries: options.maxRetries,
            signal,
            onRetry: (attempt, error, delayMs) => {
                logger?.warn(
                    `Attempt ${attempt} failed for ${file.relativePath}: ${error.message} (retrying in ${delayMs}ms)`,
                );
            },
        },
    );

    if (!result.ok) {
        return {
            status: "failed",
            relativePath: file.relativePath,
            attempts: result.attempts,
            error: result.error,
        };
    }

    return {
        status: STATUS_BY_ACTION[result.value],
        relativePath: file.relativePath,
        attempts: result.attempts,
    };
}
