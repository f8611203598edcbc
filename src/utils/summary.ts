import { PROJECT_NAME } from "../constants";
import { deviceLabel, type MatchResult, type PhotoRecord } from "../photos/types";
import type { MatchStats } from "../pipeline/matcher";

export interface ScanSummary {
  total: number;
  withGps: number;
  withoutGps: number;
  processed: number;
  withDatetime: number;
  eligible: number;
  errors: number;
  devices: string[];
  /** Processed photos without GPS were left out of the eligible targets. */
  skipProcessed: boolean;
}

/** Counts per category; `eligible` equals the matcher's target count under the same `skipProcessed`. */
export function summarizeScan(photos: readonly PhotoRecord[], skipProcessed = true): ScanSummary {
  const devices = new Set<string>();
  const summary: ScanSummary = {
    total: photos.length,
    withGps: 0,
    withoutGps: 0,
    processed: 0,
    withDatetime: 0,
    eligible: 0,
    errors: 0,
    devices: [],
    skipProcessed,
  };

  for (const photo of photos) {
    if (photo.hasGps) summary.withGps++;
    if (photo.takenAt) summary.withDatetime++;
    if (photo.scanError) summary.errors++;
    if (photo.processed) summary.processed++;
    if (!photo.hasGps && !(skipProcessed && photo.processed)) {
      summary.withoutGps++;
      if (photo.takenAt) summary.eligible++;
    }
    const device = deviceLabel(photo);
    if (device) devices.add(device);
  }

  summary.devices = [...devices].sort();
  return summary;
}

const CONFIDENCE_BUCKETS = [
  { label: "90-100%", min: 90 },
  { label: "70-89%", min: 70 },
  { label: "50-69%", min: 50 },
  { label: "< 50%", min: Number.NEGATIVE_INFINITY },
] as const;

/** Match counts per confidence bucket, highest bucket first. */
export function confidenceDistribution(matches: readonly MatchResult[]): Array<{ label: string; count: number }> {
  const counts = CONFIDENCE_BUCKETS.map((bucket) => ({ label: bucket.label, count: 0 }));
  for (const match of matches) {
    const i = CONFIDENCE_BUCKETS.findIndex((bucket) => match.confidence >= bucket.min);
    if (i >= 0) counts[i].count++;
  }
  return counts;
}

const num = (n: number) => String(n).padStart(6);

export function formatScanSummary(summary: ScanSummary): string[] {
  const lines = [
    "Scan results",
    `  Total photos:       ${num(summary.total)}`,
    `    With GPS:         ${num(summary.withGps)}  (usable as GPS sources)`,
    `    Without GPS:      ${num(summary.withoutGps)}  (candidates for enrichment)`,
    `    Already processed:${num(summary.processed)}  (${PROJECT_NAME} tag found)`,
    `    With datetime:    ${num(summary.withDatetime)}`,
    `    Eligible targets: ${num(summary.eligible)}  (${
      summary.skipProcessed ? "no GPS + has datetime + not processed" : "no GPS + has datetime"
    })`,
    `    Scan errors:      ${num(summary.errors)}`,
  ];
  if (summary.devices.length > 0) {
    lines.push(`    Devices:          ${summary.devices.join(", ")}`);
  }
  return lines;
}

export function formatMatchSummary(
  matches: readonly MatchResult[],
  stats: MatchStats,
  cacheSkipped = 0,
  barWidth = 30
): string[] {
  const matchedPct = ((stats.matched / Math.max(stats.targets, 1)) * 100).toFixed(1);
  const lines = [
    "Matching results",
    `  GPS sources:        ${num(stats.sources)}  across ${stats.sourceDates} dates`,
    `  Eligible targets:   ${num(stats.targets)}`,
    `  Already processed:  ${num(stats.alreadyProcessed)}`,
    `  Matched:            ${num(stats.matched)}  (${matchedPct}%)`,
    `  Unmatched:          ${num(stats.unmatched)}`,
    `  No datetime:        ${num(stats.withoutDatetime)}`,
  ];
  if (cacheSkipped > 0) {
    lines.push(`  Cache skipped:      ${num(cacheSkipped)}  (unchanged since last run)`);
  }

  if (matches.length > 0) {
    lines.push("");
    lines.push(`  Avg confidence:     ${stats.avgConfidence.toFixed(1).padStart(6)}%`);
    lines.push(`  Avg time delta:     ${stats.avgTimeDeltaMinutes.toFixed(1).padStart(6)} min`);
    lines.push("");
    lines.push("  Confidence distribution:");
    for (const { label, count } of confidenceDistribution(matches)) {
      const bar = "█".repeat(Math.floor((count / matches.length) * barWidth));
      lines.push(`    ${label.padStart(8)}: ${String(count).padStart(4)}  ${bar}`);
    }
  }
  return lines;
}
