import { basename } from "path";
import type { MatchResult } from "../photos/types";
import { formatTimeDelta } from "./date";

export interface PreviewColumnWidths {
  target: number;
  source: number;
}

const DEFAULT_COLUMN_WIDTHS: PreviewColumnWidths = {
  target: 42,
  source: 35,
};

function truncate(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 3) + "..." : value;
}

/**
 * Table lines for the first `maxShow` matches, with a trailing "... and N more"
 * when the list is longer. Empty when there are no matches.
 */
export function formatMatchPreview(
  matches: readonly MatchResult[],
  maxShow = 20,
  columns: PreviewColumnWidths = DEFAULT_COLUMN_WIDTHS
): string[] {
  if (matches.length === 0) return [];

  const { target: targetWidth, source: sourceWidth } = columns;
  const lines: string[] = [];

  lines.push(`Match preview (first ${Math.min(maxShow, matches.length)} of ${matches.length})`);
  lines.push(`${"Target File".padEnd(targetWidth)} ${"Δ Time".padStart(10)} ${"Conf".padStart(5)}  GPS Source`);
  lines.push("─".repeat(targetWidth + 10 + 5 + sourceWidth + 4));

  for (const match of matches.slice(0, maxShow)) {
    const target = truncate(basename(match.target.path), targetWidth - 2).padEnd(targetWidth);
    const source = truncate(basename(match.source.path), sourceWidth - 2);
    const delta = formatTimeDelta(match.timeDeltaMs).padStart(10);
    const confidence = match.confidence.toFixed(1).padStart(5);
    lines.push(`${target} ${delta} ${confidence}  ${source}`);
  }

  if (matches.length > maxShow) {
    lines.push(`... and ${matches.length - maxShow} more`);
  }
  return lines;
}
