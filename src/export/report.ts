import { writeFileSync } from "fs";
import { createLogger } from "../logger";
import { deviceLabel, timeDeltaMinutes, type MatchResult, type PhotoRecord } from "../photos/types";
import { formatIsoDateTime } from "../utils/date";

const log = createLogger("report");

export const REPORT_HEADER = [
  "Status",
  "Target File",
  "Target DateTime",
  "Target Make/Model",
  "Source File",
  "Source DateTime",
  "Latitude",
  "Longitude",
  "Time Delta (min)",
  "Confidence (%)",
] as const;

/** Quote a field when it contains a comma, quote, CR or LF (RFC 4180). */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function dateCell(date: Date | null): string {
  return date ? formatIsoDateTime(date) : "";
}

function coordinateCell(value: number | null): string {
  return value === null ? "" : value.toFixed(6);
}

function matchedRow(match: MatchResult): string[] {
  return [
    "MATCHED",
    match.target.path,
    dateCell(match.target.takenAt),
    deviceLabel(match.target),
    match.source.path,
    dateCell(match.source.takenAt),
    coordinateCell(match.source.latitude),
    coordinateCell(match.source.longitude),
    timeDeltaMinutes(match).toFixed(1),
    match.confidence.toFixed(1),
  ];
}

function unmatchedRow(photo: PhotoRecord): string[] {
  return ["UNMATCHED", photo.path, dateCell(photo.takenAt), deviceLabel(photo), "", "", "", "", "", ""];
}

/** Report text: header, MATCHED rows, then UNMATCHED rows, CRLF line endings. */
export function buildReport(matches: readonly MatchResult[], unmatched: readonly PhotoRecord[]): string {
  const rows: string[][] = [[...REPORT_HEADER], ...matches.map(matchedRow), ...unmatched.map(unmatchedRow)];
  return rows.map((row) => row.map(escapeCsvField).join(",")).join("\r\n") + "\r\n";
}

export function saveReport(
  matches: readonly MatchResult[],
  unmatched: readonly PhotoRecord[],
  reportPath: string
): void {
  writeFileSync(reportPath, buildReport(matches, unmatched), "utf-8");
  log.info({ reportPath, matched: matches.length, unmatched: unmatched.length }, "Report saved");
}
