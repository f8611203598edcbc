import { createLogger } from "../logger";
import type { ScanIndex } from "../db";
import { dateKeyOf, isGpsSource, type PhotoRecord } from "../photos/types";
import { fingerprintPaths } from "../utils/hash";
import { matchPhotos, type MatchOutcome } from "./matcher";

const log = createLogger("match-cache");

export interface CachedMatchOptions {
  index: ScanIndex | null;
  maxTimeDeltaMinutes: number;
  skipProcessed?: boolean;
  /** Ignore cached no-match results and evaluate every target. */
  rematch?: boolean;
}

export interface CachedMatchOutcome extends MatchOutcome {
  /** Targets skipped because an unchanged no-match result was cached. */
  cacheSkipped: number;
}

/**
 * Per-date fingerprint of the GPS source paths. Changes whenever a source is
 * added to or removed from that date.
 */
export function buildSourceFingerprints(photos: readonly PhotoRecord[]): Map<string, string> {
  const pathsByDate = new Map<string, string[]>();
  for (const photo of photos) {
    if (!isGpsSource(photo)) continue;
    const key = dateKeyOf(photo);
    if (key === null) continue;
    const paths = pathsByDate.get(key);
    if (paths) paths.push(photo.path);
    else pathsByDate.set(key, [photo.path]);
  }

  const fingerprints = new Map<string, string>();
  for (const [key, paths] of pathsByDate) {
    fingerprints.set(key, fingerprintPaths(paths));
  }
  return fingerprints;
}

/** Fingerprint stored with a target's match result; "" when its date has no sources. */
export function fingerprintFor(fingerprints: ReadonlyMap<string, string>, photo: PhotoRecord): string {
  const key = dateKeyOf(photo);
  return (key !== null ? fingerprints.get(key) : undefined) ?? "";
}

/**
 * Run the matcher, skipping targets whose last evaluation was a no-match
 * against the same set of same-day sources under the current threshold, then
 * write the fresh outcome of every evaluated target back to the index.
 *
 * The caller is expected to have called `index.validateMatchThreshold()` for
 * this run's threshold beforehand.
 */
export function matchWithCache(photos: readonly PhotoRecord[], options: CachedMatchOptions): CachedMatchOutcome {
  const { index, maxTimeDeltaMinutes } = options;
  const skipProcessed = options.skipProcessed ?? true;

  if (!index) {
    return { ...matchPhotos({ photos }, { maxTimeDeltaMinutes, skipProcessed }), cacheSkipped: 0 };
  }

  const fingerprints = buildSourceFingerprints(photos);
  const skipped: PhotoRecord[] = [];
  let toMatch: readonly PhotoRecord[] = photos;

  if (!options.rematch) {
    const evaluated: PhotoRecord[] = [];
    for (const photo of photos) {
      // Sources and photos the matcher only counts are never cache-skipped
      if (photo.hasGps || photo.takenAt === null || (skipProcessed && photo.processed)) {
        evaluated.push(photo);
        continue;
      }

      const cached = index.getMatchResult(photo.path);
      if (cached.status === "no_match" && cached.sourceFingerprint === fingerprintFor(fingerprints, photo)) {
        skipped.push(photo);
      } else {
        evaluated.push(photo);
      }
    }
    toMatch = evaluated;

    if (skipped.length > 0) {
      log.info({ skipped: skipped.length }, "Match cache: skipping targets unmatched on a previous run");
    }
  }

  const outcome = matchPhotos({ photos: toMatch }, { maxTimeDeltaMinutes, skipProcessed });

  for (const match of outcome.matches) {
    index.updateMatchResult(match.target.path, "matched", fingerprintFor(fingerprints, match.target));
  }
  for (const target of outcome.unmatched) {
    index.updateMatchResult(target.path, "no_match", fingerprintFor(fingerprints, target));
  }

  return {
    matches: outcome.matches,
    unmatched: [...outcome.unmatched, ...skipped],
    stats: {
      ...outcome.stats,
      totalPhotos: photos.length,
      unmatched: outcome.stats.unmatched + skipped.length,
    },
    cacheSkipped: skipped.length,
  };
}
