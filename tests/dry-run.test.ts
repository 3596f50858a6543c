import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { Synchronizer } from "../src/sync/synchronizer.js";
import { formatSyncResult } from "../src/sync/result.js";
import type { ProgressEvent } from "../src/sync/types.js";
import { createTempDir, cleanupDir, writeFile, readFile, listFiles, OLD_TIME, NEW_TIME } from "./helpers.js";

describe("dry run", () => {
    let root: string;
    let src: string;
    let dest: string;

    beforeEach(() => {
        root = createTempDir();
        src = path.join(root, "origin");
        dest = path.join(root, "destination");

        writeFile(src, "a.txt", "new a");
        writeFile(src, path.join("sub", "b.txt"), "new b");
        writeFile(src, "c.txt", "newer c", NEW_TIME);
        writeFile(dest, "c.txt", "stale c", OLD_TIME);
        writeFile(src, "d.txt", "same d", OLD_TIME);
        writeFile(dest, "d.txt", "same d", OLD_TIME);
    });

    afterEach(() => {
        cleanupDir(root);
    });

    it("should report what would happen without writing anything", async () => {
        const result = await new Synchronizer(2).synchronize({
            originPath: src,
            destinationPath: dest,
            patterns: ".*",
            dryRun: true,
        });

        expect(result).toMatchObject({
            dryRun: true,
            totalFiles: 4,
            filesCreated: 2,
            filesUpdated: 1,
            filesSkipped: 1,
            filesFailed: 0,
        });
        expect(formatSyncResult(result)).toBe(
            "[DRY RUN] Sync completed: 4 total, 2 created, 1 updated, 1 skipped, 0 failed",
        );
        expect(listFiles(dest)).toEqual(["c.txt", "d.txt"]);
        expect(fs.existsSync(path.join(dest, "sub"))).toBe(false);
        expect(readFile(dest, "c.txt")).toBe("stale c");
        expect(fs.statSync(path.join(dest, "c.txt")).mtimeMs).toBe(OLD_TIME.getTime());
    });

    it("should count the same outcomes as the real run that follows it", async () => {
        const synchronizer = new Synchronizer(2);
        const options = { originPath: src, destinationPath: dest, patterns: ".*" };

        const preview = await synchronizer.synchronize({ ...options, dryRun: true });
        const real = await synchronizer.synchronize(options);

        expect({ ...preview, dryRun: false }).toEqual(real);
        expect(readFile(dest, path.join("sub", "b.txt"))).toBe("new b");
    });

    it("should label every event as hypothetical", async () => {
        const events: ProgressEvent[] = [];

        await new Synchronizer(1).synchronize({
            originPath: src,
            destinationPath: dest,
            patterns: ".*",
            dryRun: true,
            onProgress: (event) => events.push(event),
        });

        expect(events).toHaveLength(6);
        expect(events[0].currentOperation).toBe("[DRY RUN] Starting synchronization...");
        expect(
            events
                .slice(1, 5)
                .map((e) => e.currentOperation)
                .sort(),
        ).toEqual([
            "[DRY RUN] Would Create: a.txt",
            "[DRY RUN] Would Create: b.txt",
            "[DRY RUN] Would Skip: d.txt",
            "[DRY RUN] Would Update: c.txt",
        ]);
        expect(events[5]).toEqual({
            processedFiles: 4,
            totalFiles: 4,
            currentOperation: "[DRY RUN] Synchronization analysis completed",
        });
    });

    it("should create a missing destination root but nothing inside it", async () => {
        const target = path.join(root, "fresh");

        const result = await new Synchronizer(2).synchronize({
            originPath: src,
            destinationPath: target,
            patterns: ".*",
            dryRun: true,
        });

        expect(result.filesCreated).toBe(4);
        expect(fs.statSync(target).isDirectory()).toBe(true);
        expect(fs.readdirSync(target)).toEqual([]);
    });
});
