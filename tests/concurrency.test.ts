import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as path from "node:path";
import { Synchronizer } from "../src/sync/synchronizer.js";
import { createTempDir, cleanupDir, writeFile, listFiles } from "./helpers.js";

const copies = vi.hoisted(() => ({ inFlight: 0, peak: 0 }));

// Every copy holds its slot for a while so that concurrent copies overlap
vi.mock("../src/utils/fileops.js", async (importOriginal) => {
    const actual = await importOriginal<typeof import("../src/utils/fileops.js")>();
    return {
        ...actual,
        copyFileStreaming: async (srcPath: string, destPath: string, signal?: AbortSignal): Promise<void> => {
            copies.inFlight++;
            copies.peak = Math.max(copies.peak, copies.inFlight);
            try {
                await new Promise<void>((resolve) => setTimeout(resolve, 25));
                await actual.copyFileStreaming(srcPath, destPath, signal);
            } finally {
                copies.inFlight--;
            }
        },
    };
});

function seed(dir: string, count: number): void {
    for (let i = 0; i < count; i++) {
        writeFile(dir, `file-${String(i).padStart(2, "0")}.txt`, `content ${i}`);
    }
}

describe("concurrency bound", () => {
    let root: string;

    beforeEach(() => {
        root = createTempDir();
        copies.inFlight = 0;
        copies.peak = 0;
    });

    afterEach(() => {
        cleanupDir(root);
    });

    it("should keep at most maxConcurrency files in flight and still process them all", async () => {
        const src = path.join(root, "origin");
        const dest = path.join(root, "destination");
        seed(src, 30);

        const result = await new Synchronizer(3).synchronize({ originPath: src, destinationPath: dest, patterns: ".*" });

        expect(result.filesCreated).toBe(30);
        expect(listFiles(dest)).toHaveLength(30);
        expect(copies.peak).toBe(3);
        expect(copies.inFlight).toBe(0);
    });

    it("should process one file at a time with a bound of one", async () => {
        const src = path.join(root, "origin");
        seed(src, 5);

        const result = await new Synchronizer(1).synchronize({
            originPath: src,
            destinationPath: path.join(root, "destination"),
            patterns: ".*",
        });

        expect(result.filesCreated).toBe(5);
        expect(copies.peak).toBe(1);
    });

    it("should share the bound between concurrent calls on one instance", async () => {
        const synchronizer = new Synchronizer(3);
        seed(path.join(root, "one"), 6);
        seed(path.join(root, "two"), 6);

        const [first, second] = await Promise.all([
            synchronizer.synchronize({
                originPath: path.join(root, "one"),
                destinationPath: path.join(root, "one-copy"),
                patterns: ".*",
            }),
            synchronizer.synchronize({
                originPath: path.join(root, "two"),
                destinationPath: path.join(root, "two-copy"),
                patterns: ".*",
            }),
        ]);

        expect(first.filesCreated + second.filesCreated).toBe(12);
        expect(copies.peak).toBe(3);
    });
});
