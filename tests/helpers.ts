import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

export function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "patternsync-test-"));
}

export function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file (creating parents) and optionally pin its modification time.
 */
export function writeFile(root: string, relativePath: string, content: string, mtime?: Date): string {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    if (mtime) {
        fs.utimesSync(filePath, mtime, mtime);
    }
    return filePath;
}

export function readFile(root: string, relativePath: string): string {
    return fs.readFileSync(path.join(root, relativePath), "utf-8");
}

/**
 * Every file under a directory, as sorted relative paths.
 */
export function listFiles(root: string): string[] {
    const files: string[] = [];
    const walk = (dir: string): void => {
        for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                walk(full);
            } else {
                files.push(path.relative(root, full));
            }
        }
    };
    walk(root);
    return files.sort();
}

export const OLD_TIME = new Date("2024-01-01T00:00:00Z");
export const NEW_TIME = new Date("2024-06-01T00:00:00Z");
