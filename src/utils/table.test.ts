import { describe, it, expect } from "vitest";
import { createPhotoRecord, type MatchResult } from "../photos/types";
import { formatMatchPreview } from "./table";

const takenAt = new Date(Date.UTC(2017, 8, 23, 23, 11, 37));

function match(target: string): MatchResult {
  return {
    target: createPhotoRecord(target, { takenAt }),
    source: createPhotoRecord("/lib/phone/IMG_0001.jpg", { takenAt, hasGps: true, latitude: 55.75, longitude: 37.62 }),
    timeDeltaMs: 2_497_000,
    confidence: 65.32,
  };
}

describe("formatMatchPreview", () => {
  it("returns nothing for no matches", () => {
    expect(formatMatchPreview([])).toEqual([]);
  });

  it("truncates long names to the column widths", () => {
    const lines = formatMatchPreview([match("/lib/camera/DSC_0001.jpg")], 20, { target: 12, source: 10 });

    expect(lines).toEqual([
      "Match preview (first 1 of 1)",
      "Target File      Δ Time  Conf  GPS Source",
      "─".repeat(41),
      "DSC_000...      +41m37s  65.3  IMG_0...",
    ]);
  });

  it("notes how many matches were left out", () => {
    const lines = formatMatchPreview([match("/a.jpg"), match("/b.jpg"), match("/c.jpg")], 2);

    expect(lines[0]).toBe("Match preview (first 2 of 3)");
    expect(lines).toHaveLength(6);
    expect(lines[5]).toBe("... and 1 more");
  });
});
