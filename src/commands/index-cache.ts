import { existsSync, statSync } from "fs";
import { loadConfig } from "../config";
import { ScanIndex } from "../db";

interface IndexCommandOptions {
  config?: string;
}

function indexPathFor(options: IndexCommandOptions): string | null {
  try {
    return loadConfig(options.config).indexPath;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return null;
  }
}

/**
 * index status - Show what the scan index holds
 */
export async function indexStatusCommand(options: IndexCommandOptions = {}): Promise<void> {
  const indexPath = indexPathFor(options);
  if (!indexPath) return;

  console.log(`Index file: ${indexPath}`);
  if (!existsSync(indexPath)) {
    console.log("  ○ No index yet (run 'geosnag run' first)");
    return;
  }

  const index = new ScanIndex(indexPath);
  const entries = index.load();
  const sizeKb = (statSync(indexPath).size / 1024).toFixed(1);

  console.log(`  ✓ Cached files: ${entries.toLocaleString()}`);
  console.log(`  ✓ File size: ${sizeKb} KB`);
  console.log(
    `  ✓ Match threshold: ${index.thresholdMinutes === null ? "not set" : `${index.thresholdMinutes} min`}`
  );
  console.log(`  ✓ Match generation: ${index.generation}`);
}

/**
 * index clear - Empty the scan index; the next run rereads every file
 */
export async function indexClearCommand(options: IndexCommandOptions = {}): Promise<void> {
  const indexPath = indexPathFor(options);
  if (!indexPath) return;

  if (!existsSync(indexPath)) {
    console.log("No index found. Nothing to clear.");
    return;
  }

  const index = new ScanIndex(indexPath);
  const entries = index.load();
  index.clear();
  index.save();
  console.log(`Cleared ${entries} cached file(s) from ${indexPath}.`);
}
