import * as path from "node:path";
import { getConfigHome, writeDefaultConfig } from "../../config/loader.js";
import { exitWithError } from "../util.js";

interface InitOptions {
    config?: string;
}

export function initCommand(options: InitOptions): void {
    try {
        const configDir = options.config ?? getConfigHome();
        const configPath = writeDefaultConfig(configDir);
        console.log(`Created configuration file: ${configPath}`);
        console.log(`Logs will be written to: ${path.join(configDir, "logs")}`);
        console.log("Add jobs to the file, check them with 'patternsync list', then run 'patternsync run'.");
    } catch (err) {
        exitWithError(err);
    }
}
