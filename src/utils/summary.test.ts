import { describe, it, expect } from "vitest";
import { createPhotoRecord, type MatchResult, type PhotoRecord } from "../photos/types";
import { emptyMatchStats, matchPhotos } from "../pipeline/matcher";
import { confidenceDistribution, formatMatchSummary, formatScanSummary, summarizeScan } from "./summary";

const day = new Date(Date.UTC(2021, 5, 12, 10, 0, 0));
const sony = { cameraMake: "Sony", cameraModel: "ILCE-7M3" };

function matchWith(confidence: number): MatchResult {
  return {
    target: createPhotoRecord("/t.jpg", { takenAt: day }),
    source: createPhotoRecord("/s.jpg", { takenAt: day, hasGps: true, latitude: 1, longitude: 1 }),
    timeDeltaMs: 0,
    confidence,
  };
}

describe("summarizeScan", () => {
  const photos: PhotoRecord[] = [
    createPhotoRecord("/a.jpg", { takenAt: day, hasGps: true, latitude: 1, longitude: 2, cameraMake: "Apple", cameraModel: "iPhone 12" }),
    createPhotoRecord("/b.jpg", { takenAt: day, ...sony }),
    createPhotoRecord("/c.jpg"),
    createPhotoRecord("/d.jpg", { takenAt: day, processed: true, ...sony }),
    createPhotoRecord("/e.jpg", { scanError: "boom" }),
  ];

  it("counts each category", () => {
    expect(summarizeScan(photos)).toEqual({
      total: 5,
      withGps: 1,
      withoutGps: 3,
      processed: 1,
      withDatetime: 3,
      eligible: 1,
      errors: 1,
      devices: ["Apple iPhone 12", "Sony ILCE-7M3"],
      skipProcessed: true,
    });
  });

  it("counts processed photos as eligible when they are not skipped", () => {
    const summary = summarizeScan(photos, false);

    expect(summary.withoutGps).toBe(4);
    expect(summary.eligible).toBe(2);
    expect(formatScanSummary(summary)[6]).toBe("    Eligible targets:      2  (no GPS + has datetime)");
  });

  it("agrees with the matcher's target count", () => {
    for (const skipProcessed of [true, false]) {
      const { stats } = matchPhotos({ photos }, { maxTimeDeltaMinutes: 120, skipProcessed });
      expect(summarizeScan(photos, skipProcessed).eligible).toBe(stats.targets);
    }
  });

  it("formats aligned lines with the device list last", () => {
    const lines = formatScanSummary(summarizeScan(photos));

    expect(lines[0]).toBe("Scan results");
    expect(lines[1]).toBe("  Total photos:            5");
    expect(lines[6]).toBe("    Eligible targets:      1  (no GPS + has datetime + not processed)");
    expect(lines[lines.length - 1]).toBe("    Devices:          Apple iPhone 12, Sony ILCE-7M3");
  });

  it("omits the device line when no camera is known", () => {
    const lines = formatScanSummary(summarizeScan([createPhotoRecord("/x.jpg")]));
    expect(lines).toHaveLength(8);
  });
});

describe("confidenceDistribution", () => {
  it("buckets by lower bound", () => {
    const matches = [95, 90, 75, 50, 49.9, 0].map(matchWith);
    expect(confidenceDistribution(matches)).toEqual([
      { label: "90-100%", count: 2 },
      { label: "70-89%", count: 1 },
      { label: "50-69%", count: 1 },
      { label: "< 50%", count: 2 },
    ]);
  });
});

describe("formatMatchSummary", () => {
  it("prints counts, averages and a scaled histogram", () => {
    const stats = {
      ...emptyMatchStats(),
      totalPhotos: 5,
      sources: 1,
      sourceDates: 1,
      targets: 4,
      matched: 2,
      unmatched: 2,
      avgConfidence: 75,
      avgTimeDeltaMinutes: 12.5,
    };

    const lines = formatMatchSummary([matchWith(100), matchWith(50)], stats, 3, 10);

    expect(lines).toEqual([
      "Matching results",
      "  GPS sources:             1  across 1 dates",
      "  Eligible targets:        4",
      "  Already processed:       0",
      "  Matched:                 2  (50.0%)",
      "  Unmatched:               2",
      "  No datetime:             0",
      "  Cache skipped:           3  (unchanged since last run)",
      "",
      "  Avg confidence:       75.0%",
      "  Avg time delta:       12.5 min",
      "",
      "  Confidence distribution:",
      "     90-100%:    1  █████",
      "      70-89%:    0  ",
      "      50-69%:    1  █████",
      "       < 50%:    0  ",
    ]);
  });

  it("stops after the counts when nothing matched", () => {
    const lines = formatMatchSummary([], emptyMatchStats());
    expect(lines).toHaveLength(7);
    expect(lines[4]).toBe("  Matched:                 0  (0.0%)");
  });
});
