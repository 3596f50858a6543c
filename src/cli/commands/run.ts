import { getConfigHome, loadConfig } from "../../config/loader.js";
import { SyncCancelledError } from "../../sync/errors.js";
import { Synchronizer } from "../../sync/synchronizer.js";
import { createCliLogger, executeJob, selectJobs, withInterrupt } from "../execute.js";
import { exitWithError } from "../util.js";

interface RunOptions {
    config?: string;
    dryRun?: boolean;
    quiet?: boolean;
}

export async function runCommand(names: string[], options: RunOptions): Promise<void> {
    try {
        const configDir = options.config ?? getConfigHome();
        const config = loadConfig(configDir);
        const selected = selectJobs(config, names);

        if (selected.length === 0) {
            console.log("No jobs configured. Add some to the config file first.");
            return;
        }

        const logger = createCliLogger(configDir, config);
        const synchronizer = new Synchronizer(config.maxConcurrency, logger);
        let failedJobs = 0;

        await withInterrupt(async (signal) => {
            for (const { job, label } of selected) {
                console.log(`\n=== ${label}: ${job.source} → ${job.destination}`);
                try {
                    const result = await executeJob(synchronizer, job, label, logger, {
                        quiet: options.quiet,
                        dryRun: options.dryRun,
                        signal,
                    });
                    if (!result.isSuccess) failedJobs++;
                } catch (err) {
                    // A cancelled run stops the remaining jobs as well
                    if (err instanceof SyncCancelledError) throw err;
                    const message = err instanceof Error ? err.message : String(err);
                    console.error(`Job ${label} failed: ${message}`);
                    failedJobs++;
                }
            }
        });

        if (failedJobs > 0) {
            console.error(`\n${failedJobs} of ${selected.length} job(s) did not complete cleanly.`);
            process.exitCode = 1;
        }
    } catch (err) {
        exitWithError(err);
    }
}
