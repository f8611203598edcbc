import { readdirSync, statSync, type Dirent } from "fs";
import { join, extname, relative } from "path";
import { minimatch } from "minimatch";
import type { EnumerateRequest, PhotoEnumerator } from "./types";
import { createLogger } from "../logger";

const logger = createLogger("local-source");

/** Directory names never descended into (NAS thumbnails, recycle bins, VCS, our own state). */
export const EXCLUDED_DIRS: ReadonlySet<string> = new Set([
  "@eaDir",
  "#recycle",
  ".git",
  "__pycache__",
  ".geosnag",
]);

export const PHOTO_EXTENSIONS: readonly string[] = [
  ".jpg",
  ".jpeg",
  ".arw",
  ".nef",
  ".cr2",
  ".cr3",
  ".dng",
  ".orf",
  ".raf",
  ".rw2",
  ".heic",
  ".heif",
  ".png",
];

const PROGRESS_EVERY_DIRS = 200;

/** A pattern also excludes everything below a directory it matches, so `sub/*` covers `sub/2020/x.jpg`. */
function expandPattern(pattern: string): string[] {
  const trimmed = pattern.replace(/\/+$/, "");
  return trimmed.endsWith("/**") ? [trimmed] : [trimmed, `${trimmed}/**`];
}

function isExcluded(filePath: string, root: string, patterns: string[]): boolean {
  if (patterns.length === 0) return false;
  const relPath = relative(root, filePath);
  return patterns.flatMap(expandPattern).some(
    (pattern) =>
      minimatch(relPath, pattern, { dot: true, matchBase: true }) ||
      minimatch(filePath, pattern, { dot: true, matchBase: true })
  );
}

function isRegularFile(dirPath: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return statSync(join(dirPath, entry.name)).isFile();
  } catch {
    // Dangling link
    return false;
  }
}

export class LocalPhotoSource implements PhotoEnumerator {
  name = "local";
  public walkedDirs = 0;
  public skippedRoots = 0;

  enumerate(request: EnumerateRequest): string[] {
    const paths: string[] = [];
    this.walkedDirs = 0;
    this.skippedRoots = 0;

    for (const root of request.directories) {
      let rootStat;
      try {
        rootStat = statSync(root);
      } catch {
        rootStat = null;
      }
      if (!rootStat?.isDirectory()) {
        logger.warn({ directory: root }, "Directory not found, skipping");
        this.skippedRoots++;
        continue;
      }

      for (const filePath of this.walkDirectory(root, root, request)) {
        paths.push(filePath);
      }
    }

    if (this.walkedDirs >= PROGRESS_EVERY_DIRS) {
      logger.info({ directories: this.walkedDirs, photos: paths.length }, "Walk complete");
    }

    return paths;
  }

  private *walkDirectory(
    dirPath: string,
    root: string,
    request: EnumerateRequest
  ): Generator<string> {
    let entries: Dirent[];
    try {
      entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      logger.warn({ directory: dirPath, error: String(error) }, "Directory not readable, skipping");
      return;
    }

    this.walkedDirs++;
    if (this.walkedDirs % PROGRESS_EVERY_DIRS === 0) {
      logger.info({ directories: this.walkedDirs }, "Walking directories...");
    }

    const files: string[] = [];
    const subdirs: string[] = [];

    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (request.recursive && !EXCLUDED_DIRS.has(entry.name)) {
          subdirs.push(join(dirPath, entry.name));
        }
        continue;
      }

      if (!request.extensions.has(extname(entry.name).toLowerCase())) continue;
      if (!isRegularFile(dirPath, entry)) continue;

      const fullPath = join(dirPath, entry.name);
      if (isExcluded(fullPath, root, request.excludePatterns)) {
        logger.debug({ path: fullPath }, "Excluded by pattern");
        continue;
      }
      files.push(fullPath);
    }

    files.sort();
    yield* files;

    subdirs.sort();
    for (const subdir of subdirs) {
      yield* this.walkDirectory(subdir, root, request);
    }
  }
}

export function normalizeExtensions(extensions: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const ext of extensions) {
    const lower = ext.trim().toLowerCase();
    if (lower) normalized.add(lower.startsWith(".") ? lower : `.${lower}`);
  }
  return normalized;
}
