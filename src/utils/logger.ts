import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { SyncLogger } from "../sync/types.js";

const DEFAULT_LOG_DIR = path.join(os.homedir(), ".patternsync", "logs");
const LOG_BASENAME = "patternsync";
const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    /** Rotated files kept besides the current one */
    maxLogFiles?: number;
    /** Lines below this level are dropped (default: info) */
    minLevel?: LogLevel;
    /** Also hand every written line to this function, e.g. to mirror errors on stderr */
    echo?: (level: LogLevel, line: string) => void;
}

/**
 * Appends `[timestamp] [LEVEL] message` lines to ~/.patternsync/logs/patternsync.log.
 * When the file reaches maxLogSizeMB it becomes patternsync.1.log, older
 * rotations shift up by one and the oldest beyond maxLogFiles is removed.
 */
export class Logger implements SyncLogger {
    private readonly logDir: string;
    private readonly logFile: string;
    private readonly maxLogSize: number;
    private readonly maxLogFiles: number;
    private readonly minLevel: LogLevel;
    private readonly echo?: (level: LogLevel, line: string) => void;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? DEFAULT_LOG_DIR;
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.minLevel = options.minLevel ?? "info";
        this.echo = options.echo;
        this.logFile = this.rotatedPath(0);
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    getLogFilePath(): string {
        return this.logFile;
    }

    debug(message: string): void {
        this.write("debug", message);
    }

    info(message: string): void {
        this.write("info", message);
    }

    warn(message: string): void {
        this.write("warn", message);
    }

    error(message: string): void {
        this.write("error", message);
    }

    isLevelEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
    }

    private write(level: LogLevel, message: string): void {
        if (!this.isLevelEnabled(level)) return;

        const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, line + "\n", "utf-8");
        this.echo?.(level, line);
    }

    /** 0 is the live log; n > 0 the n-th rotation */
    private rotatedPath(index: number): string {
        const suffix = index === 0 ? "" : `.${index}`;
        return path.join(this.logDir, `${LOG_BASENAME}${suffix}.log`);
    }

    private rotateIfNeeded(): void {
        try {
            if (!fs.existsSync(this.logFile)) return;
            if (fs.statSync(this.logFile).size < this.maxLogSize) return;

            const oldest = this.rotatedPath(this.maxLogFiles);
            if (fs.existsSync(oldest)) {
                fs.unlinkSync(oldest);
            }
            for (let i = this.maxLogFiles - 1; i >= 0; i--) {
                const from = this.rotatedPath(i);
                if (fs.existsSync(from)) {
                    fs.renameSync(from, this.rotatedPath(i + 1));
                }
            }
        } catch {
            // If rotation fails, keep appending to the current log
        }
    }
}
