import * as fsp from "node:fs/promises";
import type { ResolvedAction } from "./types.js";

/**
 * How much newer the source must be before a file counts as updated.
 * Copies carry the source mtime over through utimes(), which takes seconds as a
 * double and so lands within a microsecond of it, not on it.
 */
export const MTIME_TOLERANCE_MS = 1;

/**
 * Decide what a sync pass should do with one file by comparing existence
 * and modification time. Read-only.
 *
 * Equal modification times (within MTIME_TOLERANCE_MS) resolve to `skip`, never `update`.
 */
export async function resolveAction(sourcePath: string, destinationPath: string): Promise<ResolvedAction> {
    const sourceStat = await fsp.stat(sourcePath);

    let destinationMtimeMs: number;
    try {
        destinationMtimeMs = (await fsp.stat(destinationPath)).mtimeMs;
    } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
            return "create";
        }
        throw err;
    }

    return sourceStat.mtimeMs - destinationMtimeMs > MTIME_TOLERANCE_MS ? "update" : "skip";
}
