import type { Dirent } from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { throwIfCancelled } from "./errors.js";
import { matchesAny } from "./patterns.js";
import type { MatchedFile } from "./types.js";

/**
 * True unless the link resolves to something other than a regular file.
 * Links that cannot be resolved are kept so that copying them reports the failure.
 */
async function linksToFile(linkPath: string): Promise<boolean> {
    try {
        return (await fsp.stat(linkPath)).isFile();
    } catch {
        return true;
    }
}

/**
 * Recursively collect the files under a root whose base name matches the pattern set.
 * Directories are descended into but never returned. A symbolic link to a file
 * counts as that file; linked directories are not descended into.
 * The order of the result is filesystem enumeration order.
 *
 * @throws SyncCancelledError if the signal is aborted while scanning
 */
export async function scanTree(
    rootPath: string,
    patterns: readonly RegExp[],
    signal?: AbortSignal,
): Promise<MatchedFile[]> {
    const matched: MatchedFile[] = [];

    async function walk(currentPath: string): Promise<void> {
        throwIfCancelled(signal);
        const entries: Dirent[] = await fsp.readdir(currentPath, { withFileTypes: true });

        for (const entry of entries) {
            throwIfCancelled(signal);
            const fullPath = path.join(currentPath, entry.name);

            if (entry.isDirectory()) {
                await walk(fullPath);
            } else if (!matchesAny(patterns, entry.name)) {
                continue;
            } else if (entry.isFile() || (entry.isSymbolicLink() && (await linksToFile(fullPath)))) {
                matched.push({
                    sourcePath: fullPath,
                    relativePath: path.relative(rootPath, fullPath),
                });
            }
        }
    }

    await walk(rootPath);
    return matched;
}
