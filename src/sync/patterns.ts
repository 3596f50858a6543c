import { InvalidPatternError } from "./errors.js";

/** Separator between individual expressions in a pattern string */
export const PATTERN_SEPARATOR = ";";

/**
 * Compile a semicolon-separated list of regular expressions.
 * Segments are trimmed and empty ones dropped; each is compiled case-insensitively.
 * @throws InvalidPatternError when nothing is left or a segment does not compile
 */
export function compilePatterns(patternString: string): RegExp[] {
    const segments = patternString
        .split(PATTERN_SEPARATOR)
        .map((segment) => segment.trim())
        .filter((segment) => segment !== "");

    if (segments.length === 0) {
        throw new InvalidPatternError("Pattern string contains no patterns");
    }

    return segments.map((segment) => {
        try {
            return new RegExp(segment, "i");
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new InvalidPatternError(`Invalid pattern "${segment}": ${message}`, { cause: err });
        }
    });
}

/**
 * True if any pattern matches anywhere within the file name.
 * Patterns are not anchored; add ^ and $ to match whole names.
 */
export function matchesAny(patterns: readonly RegExp[], fileName: string): boolean {
    return patterns.some((pattern) => pattern.test(fileName));
}
