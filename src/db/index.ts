import { existsSync, mkdirSync, readFileSync, renameSync, statSync, unlinkSync, writeFileSync } from "fs";
import { dirname } from "path";
import { createLogger } from "../logger";
import { IndexSaveError } from "../errors";
import type { PhotoRecord } from "../photos/types";
import {
  INDEX_VERSION,
  entryToRecord,
  indexFileSchema,
  recordToEntry,
  type FileIdentity,
  type IndexEntry,
  type IndexFile,
  type MatchStatus,
} from "./entries";

export { INDEX_VERSION, type MatchStatus, type IndexEntry, type FileIdentity } from "./entries";

const log = createLogger("index");

export interface CachedMatch {
  status: MatchStatus | null;
  sourceFingerprint: string | null;
}

const NO_CACHED_MATCH: CachedMatch = Object.freeze({ status: null, sourceFingerprint: null });

/** Current (mtime, size) of a file, or null when it can't be stat'ed. */
export function statIdentity(path: string): FileIdentity | null {
  try {
    const stats = statSync(path);
    return { mtime: stats.mtimeMs / 1000, size: stats.size };
  } catch {
    return null;
  }
}

/**
 * Persistent per-file metadata cache keyed by absolute path, validated by
 * (mtime, size). Also carries cached match outcomes per target; those are
 * valid only while stamped with the current match generation, so a threshold
 * change invalidates all of them by bumping one counter.
 *
 * Single-owner: mutate only from the orchestrating code path.
 */
export class ScanIndex {
  readonly indexPath: string;
  private entries = new Map<string, IndexEntry>();
  private matchThresholdMinutes: number | null = null;
  private matchGeneration = 0;
  private dirty = false;

  constructor(indexPath: string) {
    this.indexPath = indexPath;
  }

  get size(): number {
    return this.entries.size;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get generation(): number {
    return this.matchGeneration;
  }

  get thresholdMinutes(): number | null {
    return this.matchThresholdMinutes;
  }

  paths(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Load from disk. Never throws: a missing, corrupt or other-version file
   * leaves the index empty. Returns the number of entries loaded.
   */
  load(): number {
    this.reset();

    if (!existsSync(this.indexPath)) {
      log.info({ indexPath: this.indexPath }, "No existing index found, starting fresh");
      return 0;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.indexPath, "utf-8"));
    } catch (error) {
      log.warn({ indexPath: this.indexPath, error: String(error) }, "Corrupt index file, rebuilding");
      return 0;
    }

    const version = typeof raw === "object" && raw !== null && "version" in raw ? raw.version : undefined;
    if (version !== INDEX_VERSION) {
      log.info({ found: version, expected: INDEX_VERSION }, "Index version mismatch, rebuilding");
      return 0;
    }

    const parsed = indexFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(
        { indexPath: this.indexPath, issues: parsed.error.issues.slice(0, 3) },
        "Invalid index file, rebuilding"
      );
      return 0;
    }

    this.entries = new Map(Object.entries(parsed.data.entries));
    this.matchThresholdMinutes = parsed.data.match_threshold_minutes;
    this.matchGeneration = parsed.data.match_generation;
    log.info({ entries: this.entries.size }, "Loaded index");
    return this.entries.size;
  }

  /**
   * Write the whole index atomically: temp file in the same directory, then
   * rename over the destination. No-op when nothing changed.
   */
  save(): void {
    if (!this.dirty) {
      log.debug("Index unchanged, skipping save");
      return;
    }

    const data: IndexFile = {
      version: INDEX_VERSION,
      match_threshold_minutes: this.matchThresholdMinutes,
      match_generation: this.matchGeneration,
      entries: Object.fromEntries(this.entries),
    };

    const tmpPath = `${this.indexPath}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.indexPath), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(data));
      renameSync(tmpPath, this.indexPath);
    } catch (error) {
      try {
        if (existsSync(tmpPath)) unlinkSync(tmpPath);
      } catch (cleanupError) {
        log.debug({ tmpPath, error: String(cleanupError) }, "Failed to remove temp index file");
      }
      throw new IndexSaveError(this.indexPath, error);
    }

    this.dirty = false;
    log.info({ entries: this.entries.size, indexPath: this.indexPath }, "Index saved");
  }

  /**
   * Cached record for `path` if the file's current mtime and size equal the
   * stored ones. Any mismatch, including a vanished file, is a miss.
   */
  lookup(path: string): PhotoRecord | null {
    const entry = this.entries.get(path);
    if (!entry) return null;

    const current = statIdentity(path);
    if (!current) return null;
    if (current.mtime !== entry.mtime || current.size !== entry.size) return null;

    return entryToRecord(path, entry);
  }

  /**
   * Insert or replace the entry for a freshly scanned record, fingerprinted
   * with the file's current identity. Records with a scan error are not stored.
   */
  update(record: PhotoRecord): void {
    if (record.scanError) {
      log.debug({ path: record.path }, "Not indexing record with scan error");
      return;
    }

    const identity = statIdentity(record.path);
    if (!identity) {
      log.debug({ path: record.path }, "File vanished before indexing");
      return;
    }

    this.entries.set(record.path, recordToEntry(record, identity));
    this.dirty = true;
  }

  /** Drop entries whose path is not in `validPaths`. Returns the number removed. */
  prune(validPaths: ReadonlySet<string>): number {
    let removed = 0;
    for (const path of this.entries.keys()) {
      if (!validPaths.has(path)) {
        this.entries.delete(path);
        removed++;
      }
    }
    if (removed > 0) {
      this.dirty = true;
      log.info({ removed }, "Pruned stale entries from index");
    }
    return removed;
  }

  clear(): void {
    this.reset();
    this.dirty = true;
  }

  // ── Match cache ─────────────────────────────────────────────────────────

  getMatchResult(path: string): CachedMatch {
    const entry = this.entries.get(path);
    if (!entry || entry.match_gen !== this.matchGeneration || entry.match_status === null) {
      return NO_CACHED_MATCH;
    }
    return { status: entry.match_status, sourceFingerprint: entry.match_source_fp };
  }

  /** Stamp a match outcome on an existing entry. Unscanned paths are ignored. */
  updateMatchResult(path: string, status: MatchStatus, sourceFingerprint: string): void {
    const entry = this.entries.get(path);
    if (!entry) return;

    if (
      entry.match_status === status &&
      entry.match_source_fp === sourceFingerprint &&
      entry.match_gen === this.matchGeneration
    ) {
      return;
    }

    entry.match_status = status;
    entry.match_source_fp = sourceFingerprint;
    entry.match_gen = this.matchGeneration;
    this.dirty = true;
  }

  /**
   * Returns true when `minutes` equals the stored threshold. Otherwise bumps
   * the match generation, which makes every cached match result stale at once,
   * stores the new threshold and returns false.
   */
  validateMatchThreshold(minutes: number): boolean {
    if (this.matchThresholdMinutes === minutes) return true;

    log.info(
      { previous: this.matchThresholdMinutes, current: minutes, generation: this.matchGeneration + 1 },
      "Match threshold changed, invalidating match cache"
    );
    this.matchGeneration++;
    this.matchThresholdMinutes = minutes;
    this.dirty = true;
    return false;
  }

  private reset(): void {
    this.entries = new Map();
    this.matchThresholdMinutes = null;
    this.matchGeneration = 0;
  }
}
