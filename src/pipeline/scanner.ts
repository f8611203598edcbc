import Bottleneck from "bottleneck";
import { createLogger } from "../logger";
import type { ScanIndex } from "../db";
import { createPhotoRecord, type PhotoRecord } from "../photos/types";
import type { MetadataReader } from "../metadata/types";
import type { EnumerateRequest, PhotoEnumerator } from "../sources/types";

const log = createLogger("scanner");

export interface ScanProgress {
  total: number;
  processed: number;
  cached: number;
  errors: number;
  currentPhoto: string;
}

export type ProgressCallback = (progress: ScanProgress) => void;

export interface ScanOptions extends EnumerateRequest {
  /** Scan index used for cache lookups and updates; omit to read every file. */
  index?: ScanIndex | null;
  /** Upper bound on concurrent metadata reads. */
  workers: number;
  onProgress?: ProgressCallback;
}

export interface ScanStats {
  found: number;
  cached: number;
  scanned: number;
  errors: number;
  pruned: number;
  durationMs: number;
}

export interface ScanOutcome {
  photos: PhotoRecord[];
  stats: ScanStats;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read one file into a record. Never rejects: a backend failure becomes a
 * record carrying `scanError`.
 */
export async function readPhotoRecord(reader: MetadataReader, path: string): Promise<PhotoRecord> {
  try {
    const result = await reader.read(path);
    return createPhotoRecord(path, {
      takenAt: result.takenAt,
      hasGps: result.gps !== null,
      latitude: result.gps?.latitude ?? null,
      longitude: result.gps?.longitude ?? null,
      altitude: result.gps?.altitude ?? null,
      cameraMake: result.cameraMake,
      cameraModel: result.cameraModel,
      processed: result.processed,
      formatMismatch: result.formatMismatch,
    });
  } catch (error) {
    log.warn({ photo: path, error: errorMessage(error) }, "Failed to read metadata");
    return createPhotoRecord(path, { scanError: errorMessage(error) || "Unknown read error" });
  }
}

/**
 * Enumerates files, serves unchanged ones from the scan index and reads the
 * rest through a bounded pool. Index writes happen only in the result handler,
 * one completion at a time, never inside a read.
 */
export class PhotoScanner {
  private reader: MetadataReader;
  private source: PhotoEnumerator;

  constructor(reader: MetadataReader, source: PhotoEnumerator) {
    this.reader = reader;
    this.source = source;
  }

  async scan(options: ScanOptions): Promise<ScanOutcome> {
    const startedAt = Date.now();
    const index = options.index ?? null;

    log.info({ directories: options.directories.length }, "Collecting file paths");
    const allPaths = this.source.enumerate(options);
    log.info({ found: allPaths.length, ms: Date.now() - startedAt }, "File paths collected");

    const stats: ScanStats = {
      found: allPaths.length,
      cached: 0,
      scanned: 0,
      errors: 0,
      pruned: 0,
      durationMs: 0,
    };

    const cachedPhotos: PhotoRecord[] = [];
    const scannedPhotos: PhotoRecord[] = [];
    const misses: string[] = [];
    let processed = 0;

    const emitProgress = (currentPhoto: string) => {
      options.onProgress?.({
        total: allPaths.length,
        processed,
        cached: stats.cached,
        errors: stats.errors,
        currentPhoto,
      });
    };

    for (const path of allPaths) {
      const cached = index?.lookup(path) ?? null;
      if (cached) {
        cachedPhotos.push(cached);
        stats.cached++;
        processed++;
        emitProgress(path);
      } else {
        misses.push(path);
      }
    }

    if (index) {
      log.info({ hits: stats.cached, misses: misses.length }, "Index lookup complete");
    }

    if (misses.length > 0) {
      const workers = Math.max(1, Math.min(options.workers, misses.length));
      log.info({ files: misses.length, workers }, "Reading metadata");

      const limiter = new Bottleneck({ maxConcurrent: workers });

      const handleResult = (record: PhotoRecord) => {
        scannedPhotos.push(record);
        stats.scanned++;
        processed++;
        if (record.scanError) {
          stats.errors++;
        } else {
          index?.update(record);
        }
        emitProgress(record.path);
      };

      // Let queued reads finish before surfacing a failure, so none outlive scan()
      const settled = await Promise.allSettled(
        misses.map((path) =>
          limiter.schedule(() => readPhotoRecord(this.reader, path)).then(handleResult)
        )
      );
      const failure = settled.find((result) => result.status === "rejected");
      if (failure?.status === "rejected") {
        throw failure.reason;
      }
    }

    if (index) {
      stats.pruned = index.prune(new Set(allPaths));
    }

    stats.durationMs = Date.now() - startedAt;
    log.info(
      { photos: allPaths.length, cached: stats.cached, errors: stats.errors, ms: stats.durationMs },
      "Scan complete"
    );

    return { photos: [...cachedPhotos, ...scannedPhotos], stats };
  }
}
