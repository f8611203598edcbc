import ora from "ora";
import cliProgress from "cli-progress";
import { basename } from "path";
import { loadConfig, withOverrides, type Config } from "../config";
import { configureLogging, createLogger } from "../logger";
import { ScanIndex } from "../db";
import { resolveBackends } from "../metadata/backends";
import { ExifMetadataReader } from "../metadata/reader";
import { ExifGpsWriter } from "../metadata/writer";
import { LocalPhotoSource, normalizeExtensions } from "../sources/local";
import { PhotoScanner } from "../pipeline/scanner";
import { scanAndMatch, type ScanAndMatchResult } from "../pipeline/run";
import { applyMatches } from "../pipeline/apply";
import { saveReport } from "../export/report";
import { formatMatchPreview } from "../utils/table";
import { formatMatchSummary, formatScanSummary, summarizeScan } from "../utils/summary";

const log = createLogger("cli");

export interface RunOptions {
  config?: string;
  apply?: boolean;
  dryRun?: boolean;
  report?: string;
  writeMode?: string;
  maxDelta?: number;
  verbose?: boolean;
  previewCount?: number;
  /** False with --no-skip-processed. */
  skipProcessed?: boolean;
  workers?: number;
  reindex?: boolean;
  /** False with --no-index. */
  index?: boolean;
  rematch?: boolean;
}

function resolveRunConfig(options: RunOptions): { config: Config; indexPath: string } {
  const loaded = loadConfig(options.config);
  const config = withOverrides(loaded.config, {
    dryRun: options.apply ? false : options.dryRun ? true : undefined,
    writeMode: options.writeMode,
    maxTimeDeltaMinutes: options.maxDelta,
    skipProcessed: options.skipProcessed === false ? false : undefined,
    workers: options.workers,
    useIndex: options.index === false ? false : undefined,
    logLevel: options.verbose ? "debug" : undefined,
  });
  return { config, indexPath: loaded.indexPath };
}

function openIndex(indexPath: string, reindex: boolean): ScanIndex {
  const index = new ScanIndex(indexPath);
  if (reindex) {
    log.info("--reindex: clearing cached index");
    index.clear();
  } else {
    index.load();
  }
  return index;
}

function printLines(lines: string[]): void {
  for (const line of lines) console.log(line);
}

/**
 * run - Scan, match and (with --apply) write GPS data
 */
export async function runCommand(options: RunOptions): Promise<void> {
  const spinner = ora();

  let config: Config;
  let indexPath: string;
  try {
    ({ config, indexPath } = resolveRunConfig(options));
  } catch (error) {
    spinner.fail(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  configureLogging({ level: config.logLevel, file: config.logFile });

  if (config.scanDirs.length === 0) {
    spinner.fail("No directories configured. Set scanDirs in config.yaml.");
    process.exit(1);
  }

  const capabilities = await resolveBackends();
  const needsExiftool = config.writeMode === "exif" || config.writeMode === "both";
  if (!config.dryRun && needsExiftool && !capabilities.exiftool) {
    spinner.fail("No EXIF write backend available.");
    console.error("\nExifTool was not found. Install it and make sure it is on PATH:");
    console.error("  brew install exiftool          # macOS");
    console.error("  apt install libimage-exiftool-perl  # Debian/Ubuntu");
    console.error("\nOr use --write-mode xmp_sidecar to write sidecar files only.");
    process.exit(1);
  }

  if (config.dryRun) {
    console.log("DRY RUN: no files will be modified (use --apply to write GPS data)\n");
  } else {
    console.log("LIVE MODE: files will be modified\n");
  }

  const index = config.useIndex ? openIndex(indexPath, options.reindex ?? false) : null;
  const scanner = new PhotoScanner(ExifMetadataReader.fromCapabilities(capabilities), new LocalPhotoSource());

  const progressBar = new cliProgress.SingleBar(
    {
      format: "Scanning |{bar}| {percentage}% | {value}/{total} | Cached: {cached} | Errors: {errors} | {file}",
      barsize: 20,
    },
    cliProgress.Presets.shades_classic
  );
  let progressStarted = false;

  const startedAt = Date.now();
  let result: ScanAndMatchResult;
  try {
    result = await scanAndMatch(scanner, index, {
      scan: {
        directories: config.scanDirs,
        extensions: normalizeExtensions(config.extensions),
        recursive: config.recursive,
        excludePatterns: config.excludePatterns,
        workers: config.workers,
        onProgress: (progress) => {
          if (!progressStarted) {
            progressBar.start(progress.total, 0, { cached: 0, errors: 0, file: "" });
            progressStarted = true;
          }
          progressBar.update(progress.processed, {
            cached: progress.cached,
            errors: progress.errors,
            file: basename(progress.currentPhoto),
          });
        },
      },
      maxTimeDeltaMinutes: config.matching.maxTimeDeltaMinutes,
      skipProcessed: config.skipProcessed,
      rematch: options.rematch ?? false,
      onPhase: (phase) => {
        if (phase === "match" && progressStarted) progressBar.stop();
      },
    });
  } catch (error) {
    if (progressStarted) progressBar.stop();
    spinner.fail(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const { scan, match } = result;
  const analysisSeconds = ((Date.now() - startedAt) / 1000).toFixed(1);

  if (scan.photos.length === 0) {
    spinner.info("No photos found. Check scanDirs and extensions in config.yaml.");
    return;
  }

  console.log(`\nCache: ${scan.stats.cached} cached, ${scan.stats.scanned} read, ${scan.stats.pruned} pruned`);
  console.log();
  printLines(formatScanSummary(summarizeScan(scan.photos, config.skipProcessed)));
  console.log();
  printLines(formatMatchSummary(match.matches, match.stats, match.cacheSkipped));
  console.log();
  printLines(formatMatchPreview(match.matches, options.previewCount ?? 20));

  if (options.report) {
    try {
      saveReport(match.matches, match.unmatched, options.report);
      spinner.succeed(`Report saved to: ${options.report}`);
    } catch (error) {
      spinner.fail(`Failed to save report: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  }

  if (match.matches.length === 0) {
    console.log("\nNo matches found. Nothing to write.");
    return;
  }

  if (config.dryRun) {
    console.log(`\nDry run complete in ${analysisSeconds}s. ${match.stats.matched} photos would be geo-tagged.`);
    console.log("Run with --apply to write GPS data.");
    if (!options.report) {
      console.log("Use --report matches.csv to save a detailed report.");
    }
    return;
  }

  const writeBar = new cliProgress.SingleBar(
    {
      format: "Writing  |{bar}| {percentage}% | {value}/{total} | Failed: {failed} | {file}",
      barsize: 20,
    },
    cliProgress.Presets.shades_classic
  );
  writeBar.start(match.matches.length, 0, { failed: 0, file: "" });

  const writeStartedAt = Date.now();
  const outcome = await applyMatches(match.matches, new ExifGpsWriter(capabilities), {
    writeMode: config.writeMode,
    minConfidence: config.matching.minConfidence,
    onProgress: (progress) => {
      writeBar.update(progress.done, { failed: progress.failed, file: basename(progress.currentPhoto) });
    },
  });
  writeBar.stop();

  console.log("\nWrite results:");
  console.log(`  Successful:  ${String(outcome.success).padStart(6)}`);
  console.log(`  Failed:      ${String(outcome.failed).padStart(6)}`);
  if (outcome.skipped > 0) {
    console.log(`  Skipped:     ${String(outcome.skipped).padStart(6)}  (below ${config.matching.minConfidence}% confidence)`);
  }
  console.log(`  Write mode:  ${config.writeMode}`);
  console.log(`  Timing: analysis=${analysisSeconds}s, write=${((Date.now() - writeStartedAt) / 1000).toFixed(1)}s`);

  if (outcome.failed > 0) {
    for (const failure of outcome.failures) {
      console.error(`  ✗ ${failure.path}: ${failure.errors.join("; ")}`);
    }
    spinner.fail(`${outcome.failed} writes failed. Check the log for details.`);
    process.exitCode = 1;
    return;
  }

  spinner.succeed(`All ${outcome.success} photos geo-tagged. They will be skipped on the next run.`);
}
