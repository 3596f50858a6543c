import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import { pipeline } from "node:stream/promises";

/** Read buffer size for streaming copies (64 KiB) */
export const COPY_BUFFER_SIZE = 64 * 1024;

/** Suffix of the file a copy is written to before it is renamed into place */
export const PARTIAL_SUFFIX = ".patternsync-partial";

/**
 * Stream a file's bytes to a destination, replacing anything already there.
 * Memory use is bounded by the buffer size regardless of file size.
 *
 * The bytes go to a sibling `.partial` file that is renamed into place once
 * complete, so a failed or aborted copy leaves the destination as it was.
 * The source's access and modification times are carried over.
 */
export async function copyFileStreaming(
    srcPath: string,
    destPath: string,
    signal?: AbortSignal,
): Promise<void> {
    const partialPath = `${destPath}${PARTIAL_SUFFIX}`;
    const handle = await fsp.open(partialPath, "w");

    try {
        const readStream = fs.createReadStream(srcPath, { highWaterMark: COPY_BUFFER_SIZE });
        await pipeline(readStream, handle.createWriteStream(), { signal });

        // Preserve mtime
        const srcStat = await fsp.stat(srcPath);
        await fsp.utimes(partialPath, srcStat.atimeMs / 1000, srcStat.mtimeMs / 1000);
        await fsp.rename(partialPath, destPath);
    } catch (err) {
        await handle.close();
        await fsp.rm(partialPath, { force: true });
        throw err;
    }
}

/**
 * Create a directory and any missing parents. No-op if it already exists.
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
    await fsp.mkdir(dirPath, { recursive: true });
}

/**
 * True if the path exists and is a directory.
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
    try {
        const stat = await fsp.stat(dirPath);
        return stat.isDirectory();
    } catch {
        return false;
    }
}
