import { describe, it, expect } from "vitest";
import { createPhotoRecord, type PhotoFields, type PhotoRecord } from "../photos/types";
import { formatTimeDelta } from "../utils/date";
import { computeConfidence, findNearestSource, groupSourcesByDate, matchPhotos } from "./matcher";

function at(day: number, hour: number, minute: number, second = 0): Date {
  return new Date(Date.UTC(2017, 8, day, hour, minute, second));
}

function source(path: string, takenAt: Date | null, fields: PhotoFields = {}): PhotoRecord {
  return createPhotoRecord(path, { takenAt, hasGps: true, latitude: 55.7539, longitude: 37.6208, ...fields });
}

function target(path: string, takenAt: Date | null, fields: PhotoFields = {}): PhotoRecord {
  return createPhotoRecord(path, { takenAt, ...fields });
}

describe("computeConfidence", () => {
  it("falls linearly from 100 to 0 across the threshold", () => {
    const threshold = 120 * 60_000;
    expect(computeConfidence(0, threshold)).toBe(100);
    expect(computeConfidence(60 * 60_000, threshold)).toBe(50);
    expect(computeConfidence(threshold, threshold)).toBe(0);
    expect(computeConfidence(61 * 60_000, threshold)).toBeLessThan(computeConfidence(60 * 60_000, threshold));
  });

  it("clamps beyond the threshold and special-cases a zero threshold", () => {
    expect(computeConfidence(200 * 60_000, 120 * 60_000)).toBe(0);
    expect(computeConfidence(0, 0)).toBe(100);
    expect(computeConfidence(1000, 0)).toBe(0);
  });
});

describe("matchPhotos", () => {
  const phone = source("/lib/phone/IMG_0001.jpg", at(23, 22, 30, 0));
  const camera = target("/lib/camera/DSC_0001.jpg", at(23, 23, 11, 37));

  it("matches a camera photo to a same-day phone photo", () => {
    const { matches, unmatched, stats } = matchPhotos({ photos: [camera, phone] }, { maxTimeDeltaMinutes: 120 });

    expect(matches).toHaveLength(1);
    const [match] = matches;
    expect(match.target).toBe(camera);
    expect(match.source).toBe(phone);
    expect(match.timeDeltaMs).toBe(2497_000);
    expect(formatTimeDelta(match.timeDeltaMs)).toBe("+41m37s");
    expect(match.confidence).toBeCloseTo(65.32, 2);
    expect(unmatched).toEqual([]);
    expect(stats).toMatchObject({
      totalPhotos: 2,
      sources: 1,
      targets: 1,
      sourceDates: 1,
      matched: 1,
      unmatched: 0,
      withoutDatetime: 0,
      alreadyProcessed: 0,
    });
    expect(stats.avgConfidence).toBeCloseTo(65.32, 2);
    expect(stats.avgTimeDeltaMinutes).toBeCloseTo(41.617, 3);
  });

  it("matches nothing at a zero threshold unless the times are identical", () => {
    const none = matchPhotos({ photos: [camera, phone] }, { maxTimeDeltaMinutes: 0 });
    expect(none.matches).toEqual([]);
    expect(none.stats.unmatched).toBe(1);
    expect(none.stats.avgConfidence).toBe(0);
    expect(none.stats.avgTimeDeltaMinutes).toBe(0);

    const twin = target("/lib/camera/DSC_0002.jpg", at(23, 22, 30, 0));
    const exact = matchPhotos({ photos: [twin, phone] }, { maxTimeDeltaMinutes: 0 });
    expect(exact.matches).toHaveLength(1);
    expect(exact.matches[0].confidence).toBe(100);
  });

  it("keeps the sign when the target was taken first", () => {
    const early = target("/lib/camera/DSC_0003.jpg", at(23, 22, 0, 0));
    const { matches } = matchPhotos({ photos: [early, phone] }, { maxTimeDeltaMinutes: 120 });
    expect(matches[0].timeDeltaMs).toBe(-30 * 60_000);
    expect(matches[0].confidence).toBe(75);
  });

  it("picks the nearest source and prefers the earlier one on a tie", () => {
    const morning = source("/lib/phone/z_morning.jpg", at(23, 10, 0));
    const noon = source("/lib/phone/a_noon.jpg", at(23, 12, 0));
    const close = source("/lib/phone/m_close.jpg", at(23, 13, 50));

    const tie = target("/lib/camera/tie.jpg", at(23, 11, 0));
    const near = target("/lib/camera/near.jpg", at(23, 13, 40));

    const { matches } = matchPhotos({ photos: [noon, close, tie, morning, near] }, { maxTimeDeltaMinutes: 120 });
    const sourceOf = (path: string) => matches.find((m) => m.target.path === path)?.source.path;

    expect(sourceOf("/lib/camera/tie.jpg")).toBe("/lib/phone/z_morning.jpg");
    expect(sourceOf("/lib/camera/near.jpg")).toBe("/lib/phone/m_close.jpg");
  });

  it("only matches within the same calendar date", () => {
    const lateTarget = target("/lib/camera/late.jpg", at(23, 23, 50));
    const nextDaySource = source("/lib/phone/next.jpg", at(24, 0, 10));

    const { matches, stats } = matchPhotos({ photos: [lateTarget, nextDaySource] }, { maxTimeDeltaMinutes: 120 });

    expect(matches).toEqual([]);
    expect(stats.unmatched).toBe(1);
    expect(stats.sourceDates).toBe(1);
  });

  it("leaves targets outside the threshold unmatched", () => {
    const far = target("/lib/camera/far.jpg", at(23, 19, 0));
    const { matches, unmatched } = matchPhotos({ photos: [far, phone] }, { maxTimeDeltaMinutes: 120 });
    expect(matches).toEqual([]);
    expect(unmatched).toEqual([far]);
  });

  it("classifies processed, undated and GPS-without-time photos", () => {
    const processedTarget = target("/lib/camera/done.jpg", at(23, 22, 40), { processed: true });
    const processedSource = source("/lib/phone/done.jpg", at(23, 9, 0), { processed: true });
    const undated = target("/lib/camera/undated.jpg", null);
    const gpsNoTime = source("/lib/phone/notime.jpg", null);

    const { matches, unmatched, stats } = matchPhotos(
      { photos: [processedTarget, processedSource, undated, gpsNoTime, phone, camera] },
      { maxTimeDeltaMinutes: 120 }
    );

    expect(stats).toMatchObject({
      totalPhotos: 6,
      sources: 2,
      targets: 1,
      alreadyProcessed: 1,
      withoutDatetime: 1,
      matched: 1,
      unmatched: 0,
    });
    expect(matches.map((m) => m.target.path)).toEqual(["/lib/camera/DSC_0001.jpg"]);
    expect(unmatched).toEqual([undated]);
  });

  it("treats processed photos as targets when skipProcessed is off", () => {
    const processedTarget = target("/lib/camera/done.jpg", at(23, 22, 40), { processed: true });

    const { matches, stats } = matchPhotos(
      { photos: [processedTarget, phone] },
      { maxTimeDeltaMinutes: 120, skipProcessed: false }
    );

    expect(stats.alreadyProcessed).toBe(0);
    expect(matches.map((m) => m.target.path)).toEqual(["/lib/camera/done.jpg"]);
  });

  it("accepts explicit source and target lists", () => {
    const { matches, stats } = matchPhotos({ sources: [phone], targets: [camera] }, { maxTimeDeltaMinutes: 120 });
    expect(matches).toHaveLength(1);
    expect(stats.totalPhotos).toBe(2);
    expect(stats.sources).toBe(1);
  });

  it("handles empty input", () => {
    const { matches, unmatched, stats } = matchPhotos({ photos: [] }, { maxTimeDeltaMinutes: 120 });
    expect(matches).toEqual([]);
    expect(unmatched).toEqual([]);
    expect(stats.totalPhotos).toBe(0);
    expect(stats.avgConfidence).toBe(0);
  });
});

describe("groupSourcesByDate", () => {
  it("orders each date's sources by time, then path", () => {
    const b = source("/b.jpg", at(23, 10, 0));
    const a = source("/a.jpg", at(23, 10, 0));
    const early = source("/z.jpg", at(23, 8, 0));
    const other = source("/o.jpg", at(24, 8, 0));

    const groups = groupSourcesByDate([b, other, a, early]);

    expect([...groups.keys()]).toEqual(["2017-09-23", "2017-09-24"]);
    expect(groups.get("2017-09-23")?.map((p) => p.path)).toEqual(["/z.jpg", "/a.jpg", "/b.jpg"]);
  });
});

describe("findNearestSource", () => {
  it("returns null when every candidate is beyond the threshold", () => {
    const candidates = [source("/s.jpg", at(23, 8, 0))];
    expect(findNearestSource(target("/t.jpg", at(23, 12, 0)), candidates, 60 * 60_000)).toBeNull();
  });

  it("accepts a delta equal to the threshold", () => {
    const s = source("/s.jpg", at(23, 11, 0));
    expect(findNearestSource(target("/t.jpg", at(23, 12, 0)), [s], 60 * 60_000)).toEqual({
      source: s,
      absDeltaMs: 60 * 60_000,
    });
  });
});
