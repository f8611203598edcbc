#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { VERSION } from "./constants";
import { initCommand } from "./commands/init";
import { runCommand } from "./commands/run";
import { indexClearCommand, indexStatusCommand } from "./commands/index-cache";

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

const program = new Command();

program
  .name("geosnag")
  .description("Enrich photos with GPS from other photos taken nearby in time")
  .version(VERSION);

program
  .command("init")
  .description("Create a default config file")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

program
  .command("run")
  .description("Scan photos, match them by time and optionally write GPS data")
  .option("-c, --config <path>", "Path to config.yaml")
  .option("-n, --dry-run", "Preview matches without writing (overrides config)")
  .option("--apply", "Write GPS data (overrides dryRun in config)")
  .option("-r, --report <file>", "Save match report to CSV file")
  .addOption(
    new Option("-w, --write-mode <mode>", "GPS write method (overrides config)").choices([
      "exif",
      "xmp_sidecar",
      "both",
    ])
  )
  .option("-d, --max-delta <minutes>", "Max time difference in minutes (overrides config)", parseInteger)
  .option("-v, --verbose", "Enable debug logging")
  .option("--preview-count <n>", "Number of matches to preview", parseInteger, 20)
  .option("--no-skip-processed", "Don't skip photos already processed by geosnag")
  .option("--workers <n>", "Number of parallel metadata reads (overrides config)", parseInteger)
  .option("--reindex", "Force full rescan, ignore cached index")
  .option("--no-index", "Disable the scan index entirely (don't read or write it)")
  .option("--rematch", "Re-evaluate every target, ignore cached no-match results")
  .action(runCommand);

const index = program.command("index").description("Inspect or reset the scan index");

index
  .command("status")
  .description("Show scan index details")
  .option("-c, --config <path>", "Path to config.yaml")
  .action(indexStatusCommand);

index
  .command("clear")
  .description("Clear the scan index (next run rereads every file)")
  .option("-c, --config <path>", "Path to config.yaml")
  .action(indexClearCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
