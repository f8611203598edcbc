import { createLogger } from "../logger";
import type { ScanIndex } from "../db";
import { matchWithCache, type CachedMatchOutcome } from "./match-cache";
import type { PhotoScanner, ScanOptions, ScanOutcome } from "./scanner";

const log = createLogger("run");

export type RunPhase = "scan" | "match";

export interface ScanAndMatchOptions {
  scan: Omit<ScanOptions, "index">;
  maxTimeDeltaMinutes: number;
  skipProcessed: boolean;
  rematch: boolean;
  onPhase?: (phase: RunPhase) => void;
}

export interface ScanAndMatchResult {
  scan: ScanOutcome;
  match: CachedMatchOutcome;
}

/**
 * Scan, then match through the match cache. The index (already loaded or
 * cleared by the caller) is saved after each phase; a clean index skips the
 * write.
 */
export async function scanAndMatch(
  scanner: PhotoScanner,
  index: ScanIndex | null,
  options: ScanAndMatchOptions
): Promise<ScanAndMatchResult> {
  index?.validateMatchThreshold(options.maxTimeDeltaMinutes);

  options.onPhase?.("scan");
  const scan = await scanner.scan({ ...options.scan, index });
  index?.save();

  options.onPhase?.("match");
  const startedAt = Date.now();
  const match = matchWithCache(scan.photos, {
    index,
    maxTimeDeltaMinutes: options.maxTimeDeltaMinutes,
    skipProcessed: options.skipProcessed,
    rematch: options.rematch,
  });
  index?.save();
  log.info({ ms: Date.now() - startedAt }, "Matching finished");

  return { scan, match };
}
