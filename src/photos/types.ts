import { basename, extname } from "path";
import { toDateKey } from "../utils/date";

/** Real container format detected from a file's leading bytes. */
export type ImageFormat = "JPEG" | "PNG" | "HEIC";

export interface GpsCoordinates {
  latitude: number;
  longitude: number;
  altitude: number | null;
}

/**
 * Metadata for one scanned file. Built by a fresh read or rebuilt from the
 * scan index; never mutated afterwards (a rescan produces a new record).
 */
export interface PhotoRecord {
  readonly path: string;
  readonly filename: string;
  /** Lower-cased, with the leading dot. */
  readonly extension: string;
  readonly takenAt: Date | null;
  readonly hasGps: boolean;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly altitude: number | null;
  readonly cameraMake: string | null;
  readonly cameraModel: string | null;
  /** The processed marker was found in the file. */
  readonly processed: boolean;
  /** Transient; never written to the scan index. */
  readonly scanError: string | null;
  readonly formatMismatch: ImageFormat | null;
}

export type PhotoFields = Partial<Omit<PhotoRecord, "path" | "filename" | "extension">>;

export function createPhotoRecord(path: string, fields: PhotoFields = {}): PhotoRecord {
  return Object.freeze({
    path,
    filename: basename(path),
    extension: extname(path).toLowerCase(),
    takenAt: fields.takenAt ?? null,
    hasGps: fields.hasGps ?? false,
    latitude: fields.latitude ?? null,
    longitude: fields.longitude ?? null,
    altitude: fields.altitude ?? null,
    cameraMake: fields.cameraMake ?? null,
    cameraModel: fields.cameraModel ?? null,
    processed: fields.processed ?? false,
    scanError: fields.scanError ?? null,
    formatMismatch: fields.formatMismatch ?? null,
  });
}

export function dateKeyOf(photo: PhotoRecord): string | null {
  return photo.takenAt ? toDateKey(photo.takenAt) : null;
}

/** A GPS source has coordinates and a capture date. */
export function isGpsSource(photo: PhotoRecord): boolean {
  return photo.hasGps && photo.takenAt !== null;
}

export function isValidCoordinate(latitude: number, longitude: number): boolean {
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    latitude >= -90 &&
    latitude <= 90 &&
    longitude >= -180 &&
    longitude <= 180
  );
}

export function deviceLabel(photo: PhotoRecord): string {
  return `${photo.cameraMake ?? ""} ${photo.cameraModel ?? ""}`.trim();
}

export interface MatchResult {
  target: PhotoRecord;
  source: PhotoRecord;
  /** target.takenAt - source.takenAt; positive when the target was taken later. */
  timeDeltaMs: number;
  /** 0-100, linear in |timeDeltaMs| over the threshold. */
  confidence: number;
}

export function timeDeltaMinutes(match: MatchResult): number {
  return match.timeDeltaMs / 60_000;
}
