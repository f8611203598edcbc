import { extname } from "path";
import { createLogger } from "../logger";
import { MARKER_PREFIX } from "../constants";
import { isValidCoordinate, type GpsCoordinates } from "../photos/types";
import { parseExifDateTime } from "../utils/date";
import { execCommand, type CommandRunner } from "./exec";
import type { BackendCapabilities, MetadataFields } from "./types";

const log = createLogger("decoders");

/** Container families, each served by one decoder. */
export type DecoderFormat = "jpeg" | "tiff" | "heic" | "png" | "raw";

export interface MetadataDecoder {
  name: string;
  decode(path: string): Promise<MetadataFields>;
}

export type DecoderFactory = () => Promise<MetadataDecoder>;

const EXTENSION_DECODER: Readonly<Record<string, DecoderFormat>> = {
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".heic": "heic",
  ".heif": "heic",
  ".png": "png",
  ".tif": "tiff",
  ".tiff": "tiff",
  ".nef": "tiff",
  ".arw": "tiff",
  ".cr2": "tiff",
  ".dng": "tiff",
  ".cr3": "raw",
  ".raf": "raw",
  ".orf": "raw",
  ".rw2": "raw",
};

export function decoderFormatFor(path: string): DecoderFormat | null {
  return EXTENSION_DECODER[extname(path).toLowerCase()] ?? null;
}

/** Run an async initialiser at most once; every caller shares the same promise. */
export function once<T>(init: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | null = null;
  return () => {
    if (!pending) pending = init();
    return pending;
  };
}

/**
 * Decoders keyed by container format. A decoder is only built the first time
 * a file of its format shows up.
 */
export class DecoderRegistry {
  private factories = new Map<DecoderFormat, () => Promise<MetadataDecoder>>();

  register(format: DecoderFormat, factory: DecoderFactory): void {
    this.factories.set(format, once(factory));
  }

  has(format: DecoderFormat): boolean {
    return this.factories.has(format);
  }

  async get(format: DecoderFormat): Promise<MetadataDecoder> {
    const factory = this.factories.get(format);
    if (!factory) {
      throw new Error(`No metadata decoder available for ${format} files`);
    }
    return factory();
  }
}

// ── Tag interpretation ────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.replace(/\0+$/, "").trim();
  return trimmed.length > 0 ? trimmed : null;
}

function asNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  if (value instanceof Uint8Array && value.length > 0) {
    return value[0];
  }
  if (Array.isArray(value) && value.length === 1) return asNumber(value[0]);
  return null;
}

function asDateTime(value: unknown): Date | null {
  if (typeof value === "string") return parseExifDateTime(value);
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    // Revived by a library in local time; keep the wall-clock fields
    return new Date(
      Date.UTC(
        value.getFullYear(),
        value.getMonth(),
        value.getDate(),
        value.getHours(),
        value.getMinutes(),
        value.getSeconds(),
        value.getMilliseconds()
      )
    );
  }
  return null;
}

/** Degrees/minutes/seconds (or plain decimal degrees) to signed decimal degrees. */
export function dmsToDecimal(value: unknown, ref: unknown): number | null {
  let decimal: number | null = null;

  if (Array.isArray(value) && value.length >= 3) {
    const [d, m, s] = value.map(asNumber);
    if (d !== null && m !== null && s !== null) {
      decimal = d + m / 60 + s / 3600;
    }
  } else {
    decimal = asNumber(value);
  }

  if (decimal === null) return null;
  const refText = asText(ref)?.toUpperCase();
  if (refText === "S" || refText === "W") {
    decimal = -Math.abs(decimal);
  }
  return decimal;
}

function firstDateTime(tags: Record<string, unknown>, keys: string[]): Date | null {
  for (const key of keys) {
    const parsed = asDateTime(tags[key]);
    if (parsed) return parsed;
  }
  return null;
}

function altitudeFrom(tags: Record<string, unknown>): number | null {
  const altitude = asNumber(tags.GPSAltitude);
  if (altitude === null) return null;
  return asNumber(tags.GPSAltitudeRef) === 1 ? -Math.abs(altitude) : altitude;
}

function isProcessed(tags: Record<string, unknown>): boolean {
  return asText(tags.Software)?.startsWith(MARKER_PREFIX) ?? false;
}

const DATETIME_TAGS = ["DateTimeOriginal", "CreateDate", "DateTimeDigitized", "ModifyDate", "DateTime"];

/**
 * Interpret a flat tag object: exifr's merged output (raw, unrevived values)
 * or one entry of `exiftool -json -n`, which share tag names.
 */
export function interpretExifTags(tags: Record<string, unknown>): MetadataFields {
  let gps: GpsCoordinates | null = null;

  const latitude =
    dmsToDecimal(tags.GPSLatitude, tags.GPSLatitudeRef) ?? asNumber(tags.latitude);
  const longitude =
    dmsToDecimal(tags.GPSLongitude, tags.GPSLongitudeRef) ?? asNumber(tags.longitude);

  if (latitude !== null && longitude !== null) {
    if (isValidCoordinate(latitude, longitude)) {
      gps = { latitude, longitude, altitude: altitudeFrom(tags) };
    } else {
      log.debug({ latitude, longitude }, "Discarding out-of-range coordinates");
    }
  }

  return {
    takenAt: firstDateTime(tags, DATETIME_TAGS),
    gps,
    cameraMake: asText(tags.Make),
    cameraModel: asText(tags.Model),
    processed: isProcessed(tags),
  };
}

// ── Built-in decoders ─────────────────────────────────────────────────────

const EXIFR_OPTIONS = {
  tiff: true,
  exif: true,
  gps: true,
  xmp: false,
  icc: false,
  iptc: false,
  jfif: false,
  ihdr: true,
  reviveValues: false,
  translateValues: false,
  mergeOutput: true,
};

export const loadExifrDecoder: DecoderFactory = async () => {
  const exifr = await import("exifr");
  log.debug("exifr decoder loaded");

  return {
    name: "exifr",
    async decode(path: string): Promise<MetadataFields> {
      const output: unknown = await exifr.parse(path, EXIFR_OPTIONS);
      return interpretExifTags(isRecord(output) ? output : {});
    },
  };
};

const EXIFTOOL_READ_TIMEOUT_MS = 30_000;

const EXIFTOOL_READ_TAGS = [
  "-DateTimeOriginal",
  "-CreateDate",
  "-ModifyDate",
  "-GPSLatitude",
  "-GPSLatitudeRef",
  "-GPSLongitude",
  "-GPSLongitudeRef",
  "-GPSAltitude",
  "-GPSAltitudeRef",
  "-Make",
  "-Model",
  "-Software",
];

export function exiftoolDecoder(
  exiftool: string,
  runner: CommandRunner = execCommand
): DecoderFactory {
  return async () => ({
    name: "exiftool",
    async decode(path: string): Promise<MetadataFields> {
      const { stdout, stderr, code } = await runner(
        exiftool,
        ["-json", "-n", ...EXIFTOOL_READ_TAGS, path],
        EXIFTOOL_READ_TIMEOUT_MS
      );
      if (code !== 0) {
        throw new Error(stderr.trim().slice(0, 500) || `exiftool exited with code ${code}`);
      }

      const parsed: unknown = JSON.parse(stdout);
      const first = Array.isArray(parsed) ? parsed[0] : undefined;
      return interpretExifTags(isRecord(first) ? first : {});
    },
  });
}

/** exifr for the formats it parses, ExifTool for the remaining RAW containers when present. */
export function createDefaultRegistry(
  capabilities: BackendCapabilities,
  runner: CommandRunner = execCommand
): DecoderRegistry {
  const registry = new DecoderRegistry();
  const exifr = once(loadExifrDecoder);

  for (const format of ["jpeg", "tiff", "heic", "png"] as const) {
    registry.register(format, exifr);
  }
  if (capabilities.exiftool) {
    registry.register("raw", exiftoolDecoder(capabilities.exiftool, runner));
  }
  return registry;
}
