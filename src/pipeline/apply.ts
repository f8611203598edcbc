import { createLogger } from "../logger";
import type { WriteMode } from "../config";
import type { GpsWriter, WriteResult } from "../metadata/types";
import type { GpsCoordinates, MatchResult } from "../photos/types";

const log = createLogger("apply");

export interface ApplyProgress {
  done: number;
  total: number;
  success: number;
  failed: number;
  currentPhoto: string;
}

export interface ApplyOptions {
  writeMode: WriteMode;
  /** Matches below this confidence are skipped, not written. */
  minConfidence: number;
  onProgress?: (progress: ApplyProgress) => void;
}

export interface ApplyFailure {
  path: string;
  errors: string[];
}

export interface ApplyOutcome {
  success: number;
  failed: number;
  skipped: number;
  failures: ApplyFailure[];
}

function sourceCoordinates(match: MatchResult): GpsCoordinates | null {
  const { latitude, longitude, altitude } = match.source;
  if (latitude === null || longitude === null) return null;
  return { latitude, longitude, altitude };
}

/**
 * Write each match's source coordinates into its target. A file counts as a
 * success only when every write its mode requires succeeded. Writes run one
 * file at a time.
 */
export async function applyMatches(
  matches: readonly MatchResult[],
  writer: GpsWriter,
  options: ApplyOptions
): Promise<ApplyOutcome> {
  const outcome: ApplyOutcome = { success: 0, failed: 0, skipped: 0, failures: [] };
  const { writeMode, minConfidence } = options;
  let done = 0;

  for (const match of matches) {
    const target = match.target;
    done++;

    if (match.confidence < minConfidence) {
      log.debug(
        { photo: target.path, confidence: match.confidence, minConfidence },
        "Skipping match below confidence threshold"
      );
      outcome.skipped++;
      options.onProgress?.({ done, total: matches.length, success: outcome.success, failed: outcome.failed, currentPhoto: target.path });
      continue;
    }

    const gps = sourceCoordinates(match);
    const results: WriteResult[] = [];

    if (!gps) {
      results.push({ path: target.path, success: false, method: "exif", error: "Source has no coordinates" });
    } else {
      if (writeMode === "exif" || writeMode === "both") {
        results.push(
          await writer.writeExif(target.path, gps, { stamp: true, formatMismatch: target.formatMismatch })
        );
      }
      if (writeMode === "xmp_sidecar" || writeMode === "both") {
        results.push(await writer.writeSidecar(target.path, gps, { stamp: writeMode === "xmp_sidecar" }));
      }
    }

    const failed = results.filter((r) => !r.success);
    if (failed.length === 0) {
      outcome.success++;
    } else {
      outcome.failed++;
      outcome.failures.push({
        path: target.path,
        errors: failed.map((r) => `${r.method}: ${r.error ?? "unknown error"}`),
      });
      for (const result of failed) {
        log.error({ photo: target.path, method: result.method, error: result.error }, "Write failed");
      }
    }

    if (done % 50 === 0) {
      log.info({ done, total: matches.length, success: outcome.success, failed: outcome.failed }, "Write progress");
    }
    options.onProgress?.({ done, total: matches.length, success: outcome.success, failed: outcome.failed, currentPhoto: target.path });
  }

  return outcome;
}
