import { copyFile, lstat, rename, unlink, writeFile, constants } from "fs/promises";
import { existsSync } from "fs";
import { basename, dirname, extname, join } from "path";
import { randomBytes } from "crypto";
import { createLogger } from "../logger";
import { MARKER_PREFIX, PROJECT_NAME, VERSION } from "../constants";
import { isValidCoordinate, type GpsCoordinates, type ImageFormat } from "../photos/types";
import { execCommand, type CommandRunner } from "./exec";
import { FORMAT_EXTENSION } from "./format";
import type {
  BackendCapabilities,
  ExifWriteOptions,
  GpsWriter,
  SidecarWriteOptions,
  WriteResult,
} from "./types";

const log = createLogger("writer");

const EXIFTOOL_WRITE_TIMEOUT_MS = 30_000;

export const NO_BACKEND_ERROR =
  "No write backend available. Install ExifTool (e.g. opkg install perl-image-exiftool)";

/** Processed marker: "GeoSnag:v0.2.0:2024-05-01T10:00:00Z". */
export function makeStamp(now: Date = new Date()): string {
  return `${MARKER_PREFIX}v${VERSION}:${now.toISOString().slice(0, 19)}Z`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function refs(gps: GpsCoordinates): { lat: "N" | "S"; lon: "E" | "W" } {
  return {
    lat: gps.latitude >= 0 ? "N" : "S",
    lon: gps.longitude >= 0 ? "E" : "W",
  };
}

/** ExifTool arguments for one GPS write, file path last. */
export function buildExiftoolArgs(path: string, gps: GpsCoordinates, stamp: string | null): string[] {
  const { lat, lon } = refs(gps);
  const args = [
    "-overwrite_original",
    `-GPSLatitude=${Math.abs(gps.latitude)}`,
    `-GPSLatitudeRef=${lat}`,
    `-GPSLongitude=${Math.abs(gps.longitude)}`,
    `-GPSLongitudeRef=${lon}`,
    "-GPSMapDatum=WGS-84",
  ];

  if (gps.altitude !== null) {
    args.push(`-GPSAltitude=${Math.abs(gps.altitude)}`, `-GPSAltitudeRef=${gps.altitude >= 0 ? "0" : "1"}`);
  }
  if (stamp) {
    args.push(`-Software=${stamp}`);
  }

  args.push(path);
  return args;
}

/** XMP GPS coordinate form: "55,45.234000N". */
function xmpCoordinate(value: number, ref: string): string {
  const abs = Math.abs(value);
  const degrees = Math.trunc(abs);
  const minutes = (abs - degrees) * 60;
  return `${degrees},${minutes.toFixed(6)}${ref}`;
}

export function buildXmpSidecar(gps: GpsCoordinates): string {
  const { lat, lon } = refs(gps);

  let altitudeXml = "";
  if (gps.altitude !== null) {
    altitudeXml =
      `\n      <exif:GPSAltitude>${Math.abs(gps.altitude).toFixed(2)}</exif:GPSAltitude>` +
      `\n      <exif:GPSAltitudeRef>${gps.altitude >= 0 ? "0" : "1"}</exif:GPSAltitudeRef>`;
  }

  return `<?xpacket begin='\uFEFF' id='W5M0MpCehiHzreSzNTczkc9d'?>
<x:xmpmeta xmlns:x='adobe:ns:meta/'>
  <rdf:RDF xmlns:rdf='http://www.w3.org/1999/02/22-rdf-syntax-ns#'>
    <rdf:Description rdf:about=''
      xmlns:exif='http://ns.adobe.com/exif/1.0/'
      xmlns:xmp='http://ns.adobe.com/xap/1.0/'>
      <exif:GPSVersionID>2.3.0.0</exif:GPSVersionID>
      <exif:GPSLatitude>${xmpCoordinate(gps.latitude, lat)}</exif:GPSLatitude>
      <exif:GPSLongitude>${xmpCoordinate(gps.longitude, lon)}</exif:GPSLongitude>
      <exif:GPSMapDatum>WGS-84</exif:GPSMapDatum>${altitudeXml}
      <xmp:CreatorTool>${PROJECT_NAME} v${VERSION}</xmp:CreatorTool>
    </rdf:Description>
  </rdf:RDF>
</x:xmpmeta>
<?xpacket end='w'?>`;
}

export function sidecarPath(path: string): string {
  return join(dirname(path), `${basename(path, extname(path))}.xmp`);
}

function tempPathBeside(path: string, suffix: string): string {
  return join(dirname(path), `.geosnag_${randomBytes(6).toString("hex")}${suffix}`);
}

/**
 * GPS writer on top of ExifTool. ExifTool itself writes to a temp file and
 * renames, so a failed write leaves the original untouched.
 */
export class ExifGpsWriter implements GpsWriter {
  private exiftool: string | null;
  private runner: CommandRunner;

  constructor(capabilities: BackendCapabilities, runner: CommandRunner = execCommand) {
    this.exiftool = capabilities.exiftool;
    this.runner = runner;
  }

  async writeExif(path: string, gps: GpsCoordinates, options: ExifWriteOptions): Promise<WriteResult> {
    if (!isValidCoordinate(gps.latitude, gps.longitude)) {
      return {
        path,
        success: false,
        method: "exif",
        error: `Invalid coordinates: (${gps.latitude}, ${gps.longitude})`,
      };
    }
    if (!this.exiftool) {
      return { path, success: false, method: "exif", error: NO_BACKEND_ERROR };
    }

    const stamp = options.stamp ? makeStamp() : null;

    try {
      if (options.formatMismatch) {
        log.info(
          { path, realFormat: options.formatMismatch },
          "Extension does not match content, writing through renamed copy"
        );
        await this.writeThroughRenamedCopy(this.exiftool, path, gps, stamp, options.formatMismatch);
      } else {
        await this.runExiftool(this.exiftool, buildExiftoolArgs(path, gps, stamp));
      }
      log.debug({ path }, "GPS written");
      return { path, success: true, method: "exif" };
    } catch (error) {
      log.error({ path, error: errorMessage(error) }, "GPS write failed");
      return { path, success: false, method: "exif", error: errorMessage(error) };
    }
  }

  async writeSidecar(path: string, gps: GpsCoordinates, options: SidecarWriteOptions): Promise<WriteResult> {
    if (!isValidCoordinate(gps.latitude, gps.longitude)) {
      return {
        path,
        success: false,
        method: "xmp_sidecar",
        error: `Invalid coordinates: (${gps.latitude}, ${gps.longitude})`,
      };
    }

    const xmpPath = sidecarPath(path);
    const tmpPath = tempPathBeside(xmpPath, ".xmp.tmp");

    try {
      if (existsSync(xmpPath)) {
        log.warn({ xmpPath }, "XMP sidecar already exists, overwriting");
      }
      await writeFile(tmpPath, buildXmpSidecar(gps), "utf-8");
      await rename(tmpPath, xmpPath);
      log.debug({ xmpPath }, "XMP sidecar written");
    } catch (error) {
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        log.debug({ tmpPath, error: errorMessage(cleanupError) }, "Temp file cleanup failed");
      });
      log.error({ path, error: errorMessage(error) }, "XMP sidecar write failed");
      return { path, success: false, method: "xmp_sidecar", error: errorMessage(error) };
    }

    if (options.stamp) {
      await this.stampProcessed(path);
    }
    return { path, success: true, method: "xmp_sidecar" };
  }

  /** Write only the processed marker. A failed stamp is logged, not fatal. */
  async stampProcessed(path: string): Promise<boolean> {
    if (!this.exiftool) {
      log.warn({ path }, "No write backend available, cannot stamp processed marker");
      return false;
    }
    try {
      await this.runExiftool(this.exiftool, ["-overwrite_original", `-Software=${makeStamp()}`, path]);
      log.debug({ path }, "Stamped processed marker");
      return true;
    } catch (error) {
      log.warn({ path, error: errorMessage(error) }, "Could not stamp processed marker");
      return false;
    }
  }

  private async runExiftool(exiftool: string, args: string[]): Promise<void> {
    const { stderr, code } = await this.runner(exiftool, args, EXIFTOOL_WRITE_TIMEOUT_MS);
    if (code !== 0) {
      throw new Error(stderr.trim().slice(0, 500) || `exiftool exited with code ${code}`);
    }
  }

  /**
   * ExifTool refuses files whose extension contradicts their content, so copy
   * to a temp file with the right extension beside the original, write there,
   * then rename over the original. The copy is removed on any failure.
   */
  private async writeThroughRenamedCopy(
    exiftool: string,
    path: string,
    gps: GpsCoordinates,
    stamp: string | null,
    realFormat: ImageFormat
  ): Promise<void> {
    const stats = await lstat(path);
    if (stats.isSymbolicLink()) {
      throw new Error(`Refusing to rename-write through symlink: ${path}`);
    }

    const tmpPath = tempPathBeside(path, FORMAT_EXTENSION[realFormat]);
    try {
      await copyFile(path, tmpPath, constants.COPYFILE_EXCL);
      await this.runExiftool(exiftool, buildExiftoolArgs(tmpPath, gps, stamp));
      await rename(tmpPath, path);
    } catch (error) {
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        log.debug({ tmpPath, error: errorMessage(cleanupError) }, "Temp file cleanup failed");
      });
      throw error;
    }
  }
}
