import type { ProgressEvent, SyncResult } from "./types.js";

export const DRY_RUN_PREFIX = "[DRY RUN] ";

/**
 * Build a frozen progress event.
 */
export function createProgressEvent(
    processedFiles: number,
    totalFiles: number,
    currentOperation: string,
): ProgressEvent {
    return Object.freeze({ processedFiles, totalFiles, currentOperation });
}

/**
 * Completion percentage (0-100). Zero when there is nothing to process.
 */
export function percentComplete(event: ProgressEvent): number {
    return event.totalFiles > 0 ? (event.processedFiles / event.totalFiles) * 100 : 0;
}

/**
 * Render a progress event, e.g. `2/3 (66.7%) - Created: a.txt`.
 */
export function formatProgress(event: ProgressEvent): string {
    const percent = percentComplete(event).toFixed(1);
    return `${event.processedFiles}/${event.totalFiles} (${percent}%) - ${event.currentOperation}`;
}

/**
 * Render a one-line summary of a run.
 */
export function formatSyncResult(result: SyncResult): string {
    const prefix = result.dryRun ? DRY_RUN_PREFIX : "";
    let message =
        `${prefix}Sync completed: ${result.totalFiles} total, ` +
        `${result.filesCreated} created, ${result.filesUpdated} updated, ` +
        `${result.filesSkipped} skipped, ${result.filesFailed} failed`;
    if (result.totalRetryAttempts > 0) {
        message += `, ${result.totalRetryAttempts} retries`;
    }
    return message;
}
