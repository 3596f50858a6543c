import * as path from "node:path";
import { DRY_RUN_PREFIX, createProgressEvent } from "./result.js";
import type { FileOutcome, FileStatus, ProgressEvent, SyncResult } from "./types.js";

const LABELS: Record<FileStatus, string> = {
    created: "Created",
    updated: "Updated",
    skipped: "Skipped",
    failed: "Failed",
};

const DRY_RUN_LABELS: Record<FileStatus, string> = {
    created: `${DRY_RUN_PREFIX}Would Create`,
    updated: `${DRY_RUN_PREFIX}Would Update`,
    skipped: `${DRY_RUN_PREFIX}Would Skip`,
    failed: "Failed",
};

/**
 * Label describing what happened to a file, e.g. `Created` or `[DRY RUN] Would Update`.
 */
export function describeOutcome(status: FileStatus, dryRun: boolean): string {
    return dryRun ? DRY_RUN_LABELS[status] : LABELS[status];
}

/**
 * Accumulates per-file outcomes for one synchronize() call.
 *
 * record() is synchronous: on the event loop each call runs to completion
 * before any other file's completion is handled, so counters, the error list
 * and the processed count always move together.
 */
export class SyncAggregator {
    private readonly dryRun: boolean;
    private readonly totalFiles: number;
    private processed = 0;
    private created = 0;
    private updated = 0;
    private skipped = 0;
    private failed = 0;
    private retries = 0;
    private readonly errors: string[] = [];

    constructor(totalFiles: number, dryRun: boolean) {
        this.totalFiles = totalFiles;
        this.dryRun = dryRun;
    }

    /**
     * Tally one completed file and return the progress event announcing it.
     */
    record(outcome: FileOutcome): ProgressEvent {
        if (outcome.attempts > 1) {
            this.retries += outcome.attempts - 1;
        }

        switch (outcome.status) {
            case "created":
                this.created++;
                break;
            case "updated":
                this.updated++;
                break;
            case "skipped":
                this.skipped++;
                break;
            case "failed":
                this.failed++;
                this.errors.push(`${outcome.relativePath}: ${outcome.error.message}`);
                break;
        }

        this.processed++;
        const label = describeOutcome(outcome.status, this.dryRun);
        return createProgressEvent(
            this.processed,
            this.totalFiles,
            `${label}: ${path.basename(outcome.relativePath)}`,
        );
    }

    /**
     * Frozen copy of the current totals.
     */
    snapshot(): SyncResult {
        return Object.freeze({
            dryRun: this.dryRun,
            totalFiles: this.totalFiles,
            filesCreated: this.created,
            filesUpdated: this.updated,
            filesSkipped: this.skipped,
            filesFailed: this.failed,
            totalRetryAttempts: this.retries,
            errors: Object.freeze([...this.errors]),
            isSuccess: this.failed === 0,
            filesModified: this.created + this.updated,
        });
    }
}
