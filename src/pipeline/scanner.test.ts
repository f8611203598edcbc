import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ScanIndex } from "../db";
import type { MetadataReader, MetadataReadResult } from "../metadata/types";
import type { EnumerateRequest, PhotoEnumerator } from "../sources/types";
import { PhotoScanner, readPhotoRecord, type ScanOptions, type ScanProgress } from "./scanner";

class FakeReader implements MetadataReader {
  calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  failures = new Set<string>();

  async read(path: string): Promise<MetadataReadResult> {
    this.calls.push(path);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight--;

    if (this.failures.has(path)) {
      throw new Error("device busy");
    }
    return {
      takenAt: new Date(Date.UTC(2020, 0, 1, 12, 0, 0)),
      gps: path.endsWith("gps.jpg") ? { latitude: 1, longitude: 2, altitude: null } : null,
      cameraMake: "Fake",
      cameraModel: null,
      processed: false,
      formatMismatch: null,
    };
  }
}

class FixedEnumerator implements PhotoEnumerator {
  name = "fixed";
  constructor(public paths: string[]) {}

  enumerate(_request: EnumerateRequest): string[] {
    return [...this.paths];
  }
}

let dir: string;

function files(...names: string[]): string[] {
  return names.map((name) => {
    const path = join(dir, name);
    writeFileSync(path, name);
    return path;
  });
}

function options(overrides: Partial<ScanOptions> = {}): ScanOptions {
  return {
    directories: [dir],
    extensions: new Set([".jpg"]),
    recursive: true,
    excludePatterns: [],
    workers: 4,
    ...overrides,
  };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "geosnag-scan-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("readPhotoRecord", () => {
  it("turns a read failure into a scan error", async () => {
    const reader = new FakeReader();
    reader.failures.add("/p/a.jpg");

    const record = await readPhotoRecord(reader, "/p/a.jpg");

    expect(record.scanError).toBe("device busy");
    expect(record.takenAt).toBeNull();
  });

  it("copies GPS into the record", async () => {
    const record = await readPhotoRecord(new FakeReader(), "/p/gps.jpg");
    expect(record.hasGps).toBe(true);
    expect([record.latitude, record.longitude, record.altitude]).toEqual([1, 2, null]);
  });
});

describe("PhotoScanner", () => {
  it("reads every file when there is no index, keeping failures in the batch", async () => {
    const paths = files("a.jpg", "b.jpg", "gps.jpg");
    const reader = new FakeReader();
    reader.failures.add(paths[1]);

    const { photos, stats } = await new PhotoScanner(reader, new FixedEnumerator(paths)).scan(options());

    expect(photos.map((p) => p.path).sort()).toEqual([...paths].sort());
    expect(photos.find((p) => p.path === paths[1])?.scanError).toBe("device busy");
    expect(stats).toMatchObject({ found: 3, cached: 0, scanned: 3, errors: 1, pruned: 0 });
  });

  it("serves unchanged files from the index and rereads failed ones", async () => {
    const paths = files("a.jpg", "b.jpg", "gps.jpg");
    const index = new ScanIndex(join(dir, "index.json"));
    const reader = new FakeReader();
    reader.failures.add(paths[1]);
    const scanner = new PhotoScanner(reader, new FixedEnumerator(paths));

    await scanner.scan(options({ index }));
    expect(index.size).toBe(2);

    reader.calls = [];
    reader.failures.clear();
    const second = await scanner.scan(options({ index }));

    expect(reader.calls).toEqual([paths[1]]);
    expect(second.stats).toMatchObject({ found: 3, cached: 2, scanned: 1, errors: 0 });
    expect(second.photos.map((p) => p.path)).toEqual([paths[0], paths[2], paths[1]]);
    expect(index.size).toBe(3);
  });

  it("returns identical records on an unchanged rerun and leaves the index clean", async () => {
    const paths = files("a.jpg", "gps.jpg");
    const index = new ScanIndex(join(dir, "index.json"));
    const scanner = new PhotoScanner(new FakeReader(), new FixedEnumerator(paths));

    const first = await scanner.scan(options({ index }));
    index.save();
    const second = await scanner.scan(options({ index }));

    const byPath = (a: { path: string }, b: { path: string }) => a.path.localeCompare(b.path);
    expect([...second.photos].sort(byPath)).toEqual([...first.photos].sort(byPath));
    expect(index.isDirty).toBe(false);
  });

  it("prunes index entries for files that are gone", async () => {
    const paths = files("a.jpg", "b.jpg");
    const index = new ScanIndex(join(dir, "index.json"));
    const enumerator = new FixedEnumerator(paths);
    const scanner = new PhotoScanner(new FakeReader(), enumerator);
    await scanner.scan(options({ index }));

    enumerator.paths = [paths[0]];
    const { stats } = await scanner.scan(options({ index }));

    expect(stats.pruned).toBe(1);
    expect(index.paths()).toEqual([paths[0]]);
  });

  it("never runs more reads at once than the worker count", async () => {
    const paths = files("1.jpg", "2.jpg", "3.jpg", "4.jpg", "5.jpg");
    const reader = new FakeReader();

    await new PhotoScanner(reader, new FixedEnumerator(paths)).scan(options({ workers: 2 }));

    expect(reader.maxInFlight).toBe(2);
    expect(reader.calls).toHaveLength(5);
  });

  it("reports progress for cached and scanned files", async () => {
    const paths = files("a.jpg", "b.jpg");
    const index = new ScanIndex(join(dir, "index.json"));
    const scanner = new PhotoScanner(new FakeReader(), new FixedEnumerator(paths));
    await scanner.scan(options({ index }));
    writeFileSync(paths[1], "changed content");

    const events: ScanProgress[] = [];
    await scanner.scan(options({ index, onProgress: (progress) => events.push({ ...progress }) }));

    expect(events).toHaveLength(2);
    expect(events[0]).toEqual({ total: 2, processed: 1, cached: 1, errors: 0, currentPhoto: paths[0] });
    expect(events[1]).toEqual({ total: 2, processed: 2, cached: 1, errors: 0, currentPhoto: paths[1] });
  });

  it("finishes queued reads before rejecting when progress handling throws", async () => {
    const paths = files("a.jpg", "b.jpg", "c.jpg");
    const reader = new FakeReader();
    const index = new ScanIndex(join(dir, "index.json"));
    let calls = 0;

    const scan = new PhotoScanner(reader, new FixedEnumerator(paths)).scan(
      options({
        index,
        workers: 1,
        onProgress: () => {
          calls++;
          if (calls === 1) throw new Error("progress sink closed");
        },
      })
    );

    await expect(scan).rejects.toThrow("progress sink closed");
    expect(reader.calls).toHaveLength(3);
    expect(reader.inFlight).toBe(0);
    expect(index.size).toBe(3);
  });

  it("returns nothing for an empty enumeration", async () => {
    const reader = new FakeReader();
    const { photos, stats } = await new PhotoScanner(reader, new FixedEnumerator([])).scan(options());
    expect(photos).toEqual([]);
    expect(stats.found).toBe(0);
    expect(reader.calls).toEqual([]);
  });
});
