import { getConfigHome } from "../../config/loader.js";
import { CONFIG_DEFAULTS } from "../../config/types.js";
import { Synchronizer } from "../../sync/synchronizer.js";
import { createCliLogger, executeJob, loadOptionalConfig, withInterrupt } from "../execute.js";
import { exitWithError, parseNonNegativeInteger } from "../util.js";

interface SyncOptions {
    patterns?: string;
    retries?: string;
    concurrency?: string;
    dryRun?: boolean;
    quiet?: boolean;
    config?: string;
}

export async function syncCommand(source: string, destination: string, options: SyncOptions): Promise<void> {
    try {
        const configDir = options.config ?? getConfigHome();
        const config = loadOptionalConfig(configDir);
        const logger = createCliLogger(configDir, config);

        const maxRetries = parseNonNegativeInteger(options.retries, "--retries", CONFIG_DEFAULTS.maxRetries);
        const maxConcurrency = parseNonNegativeInteger(
            options.concurrency,
            "--concurrency",
            config?.maxConcurrency ?? CONFIG_DEFAULTS.maxConcurrency,
        );

        const synchronizer = new Synchronizer(maxConcurrency, logger);
        const result = await withInterrupt((signal) =>
            executeJob(
                synchronizer,
                {
                    source,
                    destination,
                    patterns: options.patterns ?? CONFIG_DEFAULTS.patterns,
                    maxRetries,
                    dryRun: options.dryRun ?? false,
                },
                "sync",
                logger,
                { quiet: options.quiet, signal },
            ),
        );

        if (!result.isSuccess) {
            process.exitCode = 1;
        }
    } catch (err) {
        exitWithError(err);
    }
}
