#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { listCommand } from "./commands/list.js";
import { runCommand } from "./commands/run.js";
import { syncCommand } from "./commands/sync.js";

const program = new Command();

program
    .name("patternsync")
    .description("Copy files matching regular expressions from one directory tree to another")
    .version("0.1.0");

program
    .command("init")
    .description("Create a .patternsync.yml configuration file in ~/.patternsync")
    .option("--config <dir>", "Directory to write the config file to (defaults to ~/.patternsync)")
    .action(initCommand);

program
    .command("sync")
    .description("Copy new and newer matching files from <source> to <destination>")
    .argument("<source>", "Directory to copy from")
    .argument("<destination>", "Directory to copy to (created if missing)")
    .option("-p, --patterns <patterns>", "Semicolon-separated regular expressions matched against file names", ".*")
    .option("-r, --retries <n>", "Retries per file, with exponential backoff")
    .option("-c, --concurrency <n>", "Files processed at once (0 = number of processors)")
    .option("--dry-run", "Report what would be copied without copying")
    .option("-q, --quiet", "Only print the summary")
    .option("--config <dir>", "Directory containing the config file and logs (defaults to ~/.patternsync)")
    .action(syncCommand);

program
    .command("run")
    .description("Run configured jobs (all of them when no names are given)")
    .argument("[names...]", "Names of the jobs to run")
    .option("--config <dir>", "Directory containing the config file (defaults to ~/.patternsync)")
    .option("--dry-run", "Report what would be copied without copying")
    .option("-q, --quiet", "Only print summaries")
    .action(runCommand);

program
    .command("list")
    .description("Show the configured jobs")
    .option("--config <dir>", "Directory containing the config file (defaults to ~/.patternsync)")
    .action(listCommand);

await program.parseAsync();
