import { z } from "zod";
import { createPhotoRecord, type PhotoRecord } from "../photos/types";
import { formatIsoDateTime, parseIsoDateTime } from "../utils/date";

export const INDEX_VERSION = 5;

export const matchStatusSchema = z.enum(["matched", "no_match"]);
export type MatchStatus = z.infer<typeof matchStatusSchema>;

export const indexEntrySchema = z.object({
  mtime: z.number(),
  size: z.number().int().nonnegative(),
  datetime_original: z.string().nullable(),
  has_gps: z.boolean(),
  gps_latitude: z.number().nullable(),
  gps_longitude: z.number().nullable(),
  gps_altitude: z.number().nullable(),
  camera_make: z.string().nullable(),
  camera_model: z.string().nullable(),
  geosnag_processed: z.boolean(),
  format_mismatch: z.enum(["JPEG", "PNG", "HEIC"]).nullable().default(null),
  match_status: matchStatusSchema.nullable().default(null),
  match_source_fp: z.string().nullable().default(null),
  match_gen: z.number().int().nonnegative().default(0),
});

export type IndexEntry = z.infer<typeof indexEntrySchema>;

export const indexFileSchema = z.object({
  version: z.literal(INDEX_VERSION),
  match_threshold_minutes: z.number().int().nullable(),
  match_generation: z.number().int().nonnegative(),
  entries: z.record(indexEntrySchema),
});

export type IndexFile = z.infer<typeof indexFileSchema>;

/** File identity used to detect changes without reading content. */
export interface FileIdentity {
  /** Seconds since the epoch, fractional. */
  mtime: number;
  size: number;
}

/**
 * Serializable subset of a record. The scan error is dropped and the match
 * cache starts empty: a rescanned file has no cached match decision.
 */
export function recordToEntry(record: PhotoRecord, identity: FileIdentity): IndexEntry {
  return {
    mtime: identity.mtime,
    size: identity.size,
    datetime_original: record.takenAt ? formatIsoDateTime(record.takenAt) : null,
    has_gps: record.hasGps,
    gps_latitude: record.latitude,
    gps_longitude: record.longitude,
    gps_altitude: record.altitude,
    camera_make: record.cameraMake,
    camera_model: record.cameraModel,
    geosnag_processed: record.processed,
    format_mismatch: record.formatMismatch,
    match_status: null,
    match_source_fp: null,
    match_gen: 0,
  };
}

export function entryToRecord(path: string, entry: IndexEntry): PhotoRecord {
  return createPhotoRecord(path, {
    takenAt: entry.datetime_original ? parseIsoDateTime(entry.datetime_original) : null,
    hasGps: entry.has_gps,
    latitude: entry.gps_latitude,
    longitude: entry.gps_longitude,
    altitude: entry.gps_altitude,
    cameraMake: entry.camera_make,
    cameraModel: entry.camera_model,
    processed: entry.geosnag_processed,
    formatMismatch: entry.format_mismatch,
  });
}
