import { createLogger } from "../logger";
import { dateKeyOf, isGpsSource, type MatchResult, type PhotoRecord } from "../photos/types";

const log = createLogger("matcher");

export interface MatchStats {
  totalPhotos: number;
  /** Photos with GPS and a capture time. */
  sources: number;
  /** Targets with a capture time (eligible for matching). */
  targets: number;
  alreadyProcessed: number;
  /** Targets without a capture time. */
  withoutDatetime: number;
  /** Distinct calendar dates that have at least one source. */
  sourceDates: number;
  matched: number;
  unmatched: number;
  avgConfidence: number;
  avgTimeDeltaMinutes: number;
}

export interface MatchOutcome {
  matches: MatchResult[];
  /** Targets with no source in range, plus targets without a capture time. */
  unmatched: PhotoRecord[];
  stats: MatchStats;
}

export type MatchInput =
  | { photos: readonly PhotoRecord[] }
  | { sources: readonly PhotoRecord[]; targets: readonly PhotoRecord[] };

export interface MatchOptions {
  maxTimeDeltaMinutes: number;
  /** Exclude photos carrying the processed marker from the target pool (default true). */
  skipProcessed?: boolean;
}

export function emptyMatchStats(): MatchStats {
  return {
    totalPhotos: 0,
    sources: 0,
    targets: 0,
    alreadyProcessed: 0,
    withoutDatetime: 0,
    sourceDates: 0,
    matched: 0,
    unmatched: 0,
    avgConfidence: 0,
    avgTimeDeltaMinutes: 0,
  };
}

/**
 * Confidence for a time gap: 100 at zero, falling linearly to 0 at the
 * threshold, clamped to [0, 100]. A zero threshold only admits exact ties.
 */
export function computeConfidence(absDeltaMs: number, thresholdMs: number): number {
  if (thresholdMs <= 0) return absDeltaMs === 0 ? 100 : 0;
  const confidence = 100 * (1 - absDeltaMs / thresholdMs);
  return Math.max(0, Math.min(100, confidence));
}

function takenAtMs(photo: PhotoRecord): number {
  return photo.takenAt ? photo.takenAt.getTime() : Number.NaN;
}

/**
 * Split photos into sources and targets. GPS wins over the processed marker:
 * a processed photo with GPS still donates its location.
 */
function classify(
  photos: readonly PhotoRecord[],
  skipProcessed: boolean,
  stats: MatchStats
): { sources: PhotoRecord[]; targets: PhotoRecord[] } {
  const sources: PhotoRecord[] = [];
  const targets: PhotoRecord[] = [];

  for (const photo of photos) {
    if (photo.hasGps) {
      // GPS without a capture time is counted but never used
      if (photo.takenAt) sources.push(photo);
    } else if (skipProcessed && photo.processed) {
      stats.alreadyProcessed++;
    } else {
      targets.push(photo);
    }
  }

  return { sources, targets };
}

/** Sources grouped by calendar date, each group ordered by capture time then path. */
export function groupSourcesByDate(sources: readonly PhotoRecord[]): Map<string, PhotoRecord[]> {
  const byDate = new Map<string, PhotoRecord[]>();
  for (const source of sources) {
    if (!isGpsSource(source)) continue;
    const key = dateKeyOf(source);
    if (key === null) continue;
    const group = byDate.get(key);
    if (group) group.push(source);
    else byDate.set(key, [source]);
  }

  for (const group of byDate.values()) {
    group.sort((a, b) => takenAtMs(a) - takenAtMs(b) || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }
  return byDate;
}

/**
 * Nearest same-day source within the threshold. On equal gaps the earlier
 * source wins (first in the time-ordered group).
 */
export function findNearestSource(
  target: PhotoRecord,
  candidates: readonly PhotoRecord[],
  thresholdMs: number
): { source: PhotoRecord; absDeltaMs: number } | null {
  const targetMs = takenAtMs(target);
  let best: PhotoRecord | null = null;
  let bestDelta = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const delta = Math.abs(targetMs - takenAtMs(candidate));
    if (delta <= thresholdMs && delta < bestDelta) {
      best = candidate;
      bestDelta = delta;
    }
  }

  return best ? { source: best, absDeltaMs: bestDelta } : null;
}

/**
 * Pair every eligible target with the closest-in-time GPS source taken on the
 * same calendar day, within `maxTimeDeltaMinutes`.
 */
export function matchPhotos(input: MatchInput, options: MatchOptions): MatchOutcome {
  const stats = emptyMatchStats();
  const skipProcessed = options.skipProcessed ?? true;

  let sources: readonly PhotoRecord[];
  let targets: readonly PhotoRecord[];

  if ("photos" in input) {
    stats.totalPhotos = input.photos.length;
    ({ sources, targets } = classify(input.photos, skipProcessed, stats));
  } else {
    sources = input.sources;
    targets = input.targets;
    stats.totalPhotos = sources.length + targets.length;
  }

  stats.sources = sources.length;
  const sourcesByDate = groupSourcesByDate(sources);
  stats.sourceDates = sourcesByDate.size;
  log.info({ sources: stats.sources, dates: stats.sourceDates }, "GPS source index built");

  const thresholdMs = Math.max(0, options.maxTimeDeltaMinutes) * 60_000;
  const matches: MatchResult[] = [];
  const unmatched: PhotoRecord[] = [];

  for (const target of targets) {
    const dateKey = dateKeyOf(target);
    if (!target.takenAt || dateKey === null) {
      stats.withoutDatetime++;
      unmatched.push(target);
      continue;
    }

    stats.targets++;
    const candidates = sourcesByDate.get(dateKey);
    const nearest = candidates ? findNearestSource(target, candidates, thresholdMs) : null;

    if (!nearest) {
      stats.unmatched++;
      unmatched.push(target);
      continue;
    }

    matches.push({
      target,
      source: nearest.source,
      timeDeltaMs: takenAtMs(target) - takenAtMs(nearest.source),
      confidence: computeConfidence(nearest.absDeltaMs, thresholdMs),
    });
    stats.matched++;
  }

  if (matches.length > 0) {
    stats.avgConfidence = matches.reduce((sum, m) => sum + m.confidence, 0) / matches.length;
    stats.avgTimeDeltaMinutes =
      matches.reduce((sum, m) => sum + Math.abs(m.timeDeltaMs) / 60_000, 0) / matches.length;
  }

  log.info(
    {
      matched: stats.matched,
      unmatched: stats.unmatched,
      avgConfidence: Number(stats.avgConfidence.toFixed(1)),
      avgDeltaMinutes: Number(stats.avgTimeDeltaMinutes.toFixed(1)),
    },
    "Matching complete"
  );

  return { matches, unmatched, stats };
}
