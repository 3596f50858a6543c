import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import type { PatternSyncConfig, SyncJob } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";

/**
 * Returns the patternsync config home directory: ~/.patternsync
 * This is where the default config file and the logs are stored.
 */
export function getConfigHome(): string {
    return path.join(os.homedir(), ".patternsync");
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNonNegativeInteger(raw: Record<string, unknown>, key: string, fallback: number, where: string): number {
    const value = raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw new Error(`${where}${key} must be a non-negative integer`);
    }
    return value;
}

function readPositiveNumber(raw: Record<string, unknown>, key: string, fallback: number): number {
    const value = raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== "number" || value <= 0) {
        throw new Error(`${key} must be a positive number`);
    }
    return value;
}

function validateJob(job: unknown, index: number): SyncJob {
    const where = `jobs[${index}].`;
    if (!isRecord(job)) {
        throw new Error(`jobs[${index}] must be an object`);
    }

    for (const key of ["source", "destination"]) {
        const value = job[key];
        if (typeof value !== "string" || value.trim() === "") {
            throw new Error(`${where}${key} must be a non-empty string`);
        }
    }

    let patterns: string = CONFIG_DEFAULTS.patterns;
    if (job.patterns !== undefined && job.patterns !== null) {
        if (typeof job.patterns !== "string" || job.patterns.trim() === "") {
            throw new Error(`${where}patterns must be a non-empty string`);
        }
        patterns = job.patterns;
    }

    let dryRun: boolean = CONFIG_DEFAULTS.dryRun;
    if (job.dryRun !== undefined && job.dryRun !== null) {
        if (typeof job.dryRun !== "boolean") {
            throw new Error(`${where}dryRun must be true or false`);
        }
        dryRun = job.dryRun;
    }

    const validated: SyncJob = {
        source: String(job.source),
        destination: String(job.destination),
        patterns,
        maxRetries: readNonNegativeInteger(job, "maxRetries", CONFIG_DEFAULTS.maxRetries, where),
        dryRun,
    };

    if (typeof job.name === "string" && job.name.trim() !== "") {
        validated.name = job.name.trim();
    }

    return validated;
}

/**
 * Validate a loaded configuration object. Throws on invalid config.
 */
export function validateConfig(config: unknown): PatternSyncConfig {
    if (!isRecord(config)) {
        throw new Error("Configuration must be a YAML object");
    }

    const maxConcurrency = readNonNegativeInteger(config, "maxConcurrency", CONFIG_DEFAULTS.maxConcurrency, "");
    const maxLogSizeMB = readPositiveNumber(config, "maxLogSizeMB", CONFIG_DEFAULTS.maxLogSizeMB);
    const maxLogFiles = readPositiveNumber(config, "maxLogFiles", CONFIG_DEFAULTS.maxLogFiles);
    if (!Number.isInteger(maxLogFiles)) {
        throw new Error("maxLogFiles must be a positive integer");
    }

    // null means the key exists but has no items (e.g. "jobs:" with only commented examples below)
    // undefined means the key is missing entirely, which is an error
    if (!("jobs" in config)) {
        throw new Error("jobs must be an array");
    }
    const rawJobs = config.jobs ?? [];
    if (!Array.isArray(rawJobs)) {
        throw new Error("jobs must be an array");
    }

    const jobs = rawJobs.map((job: unknown, index: number) => validateJob(job, index));

    const names = new Set<string>();
    for (const job of jobs) {
        if (job.name === undefined) continue;
        if (names.has(job.name)) {
            throw new Error(`Duplicate job name: ${job.name}`);
        }
        names.add(job.name);
    }

    return { maxConcurrency, maxLogSizeMB, maxLogFiles, jobs };
}

/**
 * Label for a job in logs and CLI output: its name, or its position.
 */
export function jobLabel(job: SyncJob, index: number): string {
    return job.name ? `"${job.name}"` : `job[${index}]`;
}

/**
 * Load and validate a patternsync config from a YAML file.
 * @param configDir Directory containing the config file (defaults to ~/.patternsync)
 */
export function loadConfig(configDir?: string): PatternSyncConfig {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (!fs.existsSync(configPath)) {
        throw new Error(`Config file not found: ${configPath}`);
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = yaml.parse(raw);
    return validateConfig(parsed);
}

/**
 * Write a default .patternsync.yml configuration file.
 * @param configDir Directory to write the config file to (defaults to ~/.patternsync)
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string): string {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (fs.existsSync(configPath)) {
        throw new Error(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const template = [
        "# patternsync configuration",
        "",
        "# Files processed at once (0 = number of available processors)",
        "maxConcurrency: 0",
        "",
        "# Log rotation settings (optional)",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
        "",
        "# Jobs: each entry copies matching files from source to destination",
        "# when they are missing there or older. Nothing is ever deleted.",
        "# 'patterns' holds semicolon-separated regular expressions matched",
        "# (case-insensitively, anywhere in the name) against file names.",
        "# Add your jobs below. Remove the '#' from the example to get started.",
        "jobs:",
        "# - name: documents",
        "#   source: /home/user/documents",
        "#   destination: /mnt/backup/documents",
        "#   patterns: \".*\\\\.docx;.*\\\\.pdf\"",
        "#   maxRetries: 2      # retries per file with exponential backoff (default: 0)",
        "#   dryRun: false      # report only (default: false)",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
