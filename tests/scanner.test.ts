import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { scanTree } from "../src/sync/scanner.js";
import { compilePatterns } from "../src/sync/patterns.js";
import { SyncCancelledError } from "../src/sync/errors.js";
import { createTempDir, cleanupDir, writeFile } from "./helpers.js";

describe("scanTree", () => {
    let root: string;

    beforeEach(() => {
        root = createTempDir();
    });

    afterEach(() => {
        cleanupDir(root);
    });

    it("should find matching files at every depth with paths relative to the root", async () => {
        writeFile(root, "top.txt", "1");
        writeFile(root, path.join("sub", "mid.txt"), "2");
        writeFile(root, path.join("sub", "deep", "low.txt"), "3");
        writeFile(root, path.join("sub", "deep", "skip.bin"), "4");

        const files = await scanTree(root, compilePatterns(String.raw`\.txt$`));
        const relative = files.map((f) => f.relativePath).sort();

        expect(relative).toEqual([
            path.join("sub", "deep", "low.txt"),
            path.join("sub", "mid.txt"),
            "top.txt",
        ]);
        for (const file of files) {
            expect(file.sourcePath).toBe(path.join(root, file.relativePath));
        }
    });

    it("should match against the base name only", async () => {
        writeFile(root, path.join("reports", "data.bin"), "x");

        const files = await scanTree(root, compilePatterns("reports"));
        expect(files).toEqual([]);
    });

    it("should not return directories even when their name matches", async () => {
        writeFile(root, path.join("folder.txt", "inner.md"), "x");

        const files = await scanTree(root, compilePatterns(String.raw`\.txt$`));
        expect(files).toEqual([]);
    });

    describe("symbolic links", () => {
        let outside: string;

        beforeEach(() => {
            outside = createTempDir();
        });

        afterEach(() => {
            cleanupDir(outside);
        });

        it("should include a link to a file under the link's own name", async () => {
            const target = writeFile(outside, "real.txt", "x");
            fs.symlinkSync(target, path.join(root, "link.txt"));

            const files = await scanTree(root, compilePatterns(String.raw`\.txt$`));
            expect(files).toEqual([{ sourcePath: path.join(root, "link.txt"), relativePath: "link.txt" }]);
        });

        it("should match a linked file by the link's name, not the target's", async () => {
            const target = writeFile(outside, "real.bin", "x");
            fs.symlinkSync(target, path.join(root, "link.txt"));

            expect(await scanTree(root, compilePatterns(String.raw`\.bin$`))).toEqual([]);
        });

        it("should not descend into a linked directory", async () => {
            writeFile(outside, "inner.txt", "x");
            fs.symlinkSync(outside, path.join(root, "linked-dir"), "dir");
            // A link back to the root would loop forever if followed
            fs.symlinkSync(root, path.join(root, "loop"), "dir");

            expect(await scanTree(root, compilePatterns(".*"))).toEqual([]);
        });

        it("should keep a dangling link so that copying it can report the failure", async () => {
            fs.symlinkSync(path.join(outside, "gone.txt"), path.join(root, "dangling.txt"));

            const files = await scanTree(root, compilePatterns(".*"));
            expect(files.map((f) => f.relativePath)).toEqual(["dangling.txt"]);
        });
    });

    it("should return an empty list for an empty directory", async () => {
        expect(await scanTree(root, compilePatterns(".*"))).toEqual([]);
    });

    it("should abort with a cancellation error instead of a partial list", async () => {
        writeFile(root, "a.txt", "x");
        writeFile(root, "b.txt", "y");
        const controller = new AbortController();
        controller.abort();

        await expect(scanTree(root, compilePatterns(".*"), controller.signal)).rejects.toBeInstanceOf(
            SyncCancelledError,
        );
    });

    it("should propagate a missing root as a filesystem error", async () => {
        await expect(scanTree(path.join(root, "missing"), compilePatterns(".*"))).rejects.toThrow(/ENOENT/);
    });
});
