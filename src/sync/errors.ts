/**
 * Thrown when synchronize() is called with unusable arguments.
 * Raised before any filesystem access.
 */
export class SyncValidationError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "SyncValidationError";
    }
}

/**
 * Thrown when a pattern string yields no patterns or a segment is not a valid regular expression.
 */
export class InvalidPatternError extends SyncValidationError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "InvalidPatternError";
    }
}

/**
 * Thrown when the source root does not exist or is not a directory.
 */
export class SourceNotFoundError extends Error {
    readonly sourcePath: string;

    constructor(sourcePath: string) {
        super(`Origin directory not found: ${sourcePath}`);
        this.name = "SourceNotFoundError";
        this.sourcePath = sourcePath;
    }
}

/**
 * Thrown when a run is aborted through its AbortSignal.
 * Kept distinct from per-file failures, which are tallied in the result instead.
 */
export class SyncCancelledError extends Error {
    constructor(message = "Synchronization was cancelled", options?: ErrorOptions) {
        super(message, options);
        this.name = "SyncCancelledError";
    }
}

/**
 * Throw a SyncCancelledError if the signal has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new SyncCancelledError(undefined, { cause: signal.reason });
    }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
