import { getConfigHome, jobLabel, loadConfig } from "../../config/loader.js";
import { defaultConcurrency } from "../../sync/synchronizer.js";
import { exitWithError } from "../util.js";

interface ListOptions {
    config?: string;
}

export function listCommand(options: ListOptions): void {
    try {
        const configDir = options.config ?? getConfigHome();
        const config = loadConfig(configDir);

        const concurrency =
            config.maxConcurrency > 0 ? String(config.maxConcurrency) : `${defaultConcurrency()} (processors)`;
        console.log(`Config: ${configDir}`);
        console.log(`Max concurrency: ${concurrency}`);
        console.log(`Jobs: ${config.jobs.length}`);

        config.jobs.forEach((job, index) => {
            console.log(`\n  ${jobLabel(job, index)}${job.dryRun ? " [dry run]" : ""}`);
            console.log(`    source:      ${job.source}`);
            console.log(`    destination: ${job.destination}`);
            console.log(`    patterns:    ${job.patterns}`);
            console.log(`    retries:     ${job.maxRetries}`);
        });
    } catch (err) {
        exitWithError(err);
    }
}
