import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, it, expect } from "vitest";
import { createPhotoRecord, type MatchResult } from "../photos/types";
import { buildReport, escapeCsvField, saveReport } from "./report";

const source = createPhotoRecord("/lib/phone/IMG_0001.jpg", {
  takenAt: new Date(Date.UTC(2017, 8, 23, 22, 30, 0)),
  hasGps: true,
  latitude: 55.7539,
  longitude: 37.6208,
});

const matched: MatchResult = {
  target: createPhotoRecord("/lib/camera/DSC_0001.jpg", {
    takenAt: new Date(Date.UTC(2017, 8, 23, 23, 11, 37)),
    cameraMake: "Sony",
    cameraModel: "ILCE-7M3",
  }),
  source,
  timeDeltaMs: 2497_000,
  confidence: 65.3194,
};

const HEADER =
  "Status,Target File,Target DateTime,Target Make/Model,Source File,Source DateTime,Latitude,Longitude,Time Delta (min),Confidence (%)";

describe("escapeCsvField", () => {
  it("quotes only when needed and doubles embedded quotes", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });
});

describe("buildReport", () => {
  it("writes the header, matched rows, then unmatched rows", () => {
    const unmatched = createPhotoRecord("/lib/camera/Trip, day 2.jpg", {
      takenAt: new Date(Date.UTC(2017, 8, 24, 9, 0, 0)),
    });

    const lines = buildReport([matched], [unmatched]).split("\r\n");

    expect(lines).toEqual([
      HEADER,
      "MATCHED,/lib/camera/DSC_0001.jpg,2017-09-23T23:11:37,Sony ILCE-7M3,/lib/phone/IMG_0001.jpg,2017-09-23T22:30:00,55.753900,37.620800,41.6,65.3",
      'UNMATCHED,"/lib/camera/Trip, day 2.jpg",2017-09-24T09:00:00,,,,,,,',
      "",
    ]);
  });

  it("writes zero coordinates and blank dates", () => {
    const equator: MatchResult = {
      target: createPhotoRecord("/t.jpg"),
      source: createPhotoRecord("/s.jpg", { hasGps: true, latitude: 0, longitude: 0 }),
      timeDeltaMs: -90_000,
      confidence: 100,
    };

    const [, row] = buildReport([equator], []).split("\r\n");

    expect(row).toBe("MATCHED,/t.jpg,,,/s.jpg,,0.000000,0.000000,-1.5,100.0");
  });
});

describe("saveReport", () => {
  it("writes the report to disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "geosnag-report-"));
    try {
      const path = join(dir, "matches.csv");
      saveReport([matched], [], path);
      expect(readFileSync(path, "utf-8")).toBe(buildReport([matched], []));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
