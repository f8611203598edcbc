import type { GpsCoordinates, ImageFormat } from "../photos/types";

/** Which optional tools were found at startup. Passed explicitly to readers and writers. */
export interface BackendCapabilities {
  /** Command used to invoke ExifTool, or null when it is not installed. */
  exiftool: string | null;
}

/** Fields a decoder extracts from one file's embedded metadata. */
export interface MetadataFields {
  takenAt: Date | null;
  gps: GpsCoordinates | null;
  cameraMake: string | null;
  cameraModel: string | null;
  /** The Software tag carries our processed marker. */
  processed: boolean;
}

export interface MetadataReadResult extends MetadataFields {
  formatMismatch: ImageFormat | null;
}

/**
 * Reads one file's metadata. May reject for a single file (corrupt data,
 * unsupported format, I/O failure); callers convert that into a scan error.
 */
export interface MetadataReader {
  read(path: string): Promise<MetadataReadResult>;
}

export type WriteMethod = "exif" | "xmp_sidecar";

export interface WriteResult {
  path: string;
  success: boolean;
  method: WriteMethod;
  error?: string;
}

export interface ExifWriteOptions {
  /** Write the processed marker together with the GPS tags. */
  stamp: boolean;
  /** Real format when the extension lies about the content; written through a renamed temp copy. */
  formatMismatch?: ImageFormat | null;
}

export interface SidecarWriteOptions {
  /** Stamp the processed marker into the original file after the sidecar is written. */
  stamp: boolean;
}

/** Writes never throw: failures come back as WriteResult with success=false. */
export interface GpsWriter {
  writeExif(path: string, gps: GpsCoordinates, options: ExifWriteOptions): Promise<WriteResult>;
  writeSidecar(path: string, gps: GpsCoordinates, options: SidecarWriteOptions): Promise<WriteResult>;
}
