import { errorMessage } from "../sync/errors.js";

/**
 * Parse an optional CLI option as a non-negative integer.
 * @throws Error naming the option when the value is not a whole number >= 0
 */
export function parseNonNegativeInteger(value: string | undefined, optionName: string, fallback: number): number {
    if (value === undefined) return fallback;
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        throw new Error(`${optionName} must be a non-negative integer, got "${value}"`);
    }
    return Number.parseInt(trimmed, 10);
}

/**
 * Print an error the way every command reports one and exit with status 1.
 */
export function exitWithError(err: unknown): never {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
}
