import { open } from "fs/promises";
import type { ImageFormat } from "../photos/types";

/** Extensions whose content is checked against their leading bytes. RAW formats are not. */
export const EXTENSION_FORMAT: Readonly<Record<string, ImageFormat>> = {
  ".jpg": "JPEG",
  ".jpeg": "JPEG",
  ".png": "PNG",
  ".heic": "HEIC",
  ".heif": "HEIC",
};

/** Canonical extension for each real format, used when renaming a mismatched file. */
export const FORMAT_EXTENSION: Readonly<Record<ImageFormat, string>> = {
  JPEG: ".jpg",
  PNG: ".png",
  HEIC: ".heic",
};

export function sniffFormat(header: Uint8Array): ImageFormat | null {
  if (header.length >= 3 && header[0] === 0xff && header[1] === 0xd8 && header[2] === 0xff) {
    return "JPEG";
  }
  if (
    header.length >= 4 &&
    header[0] === 0x89 &&
    header[1] === 0x50 &&
    header[2] === 0x4e &&
    header[3] === 0x47
  ) {
    return "PNG";
  }
  if (
    header.length >= 8 &&
    header[4] === 0x66 && // f
    header[5] === 0x74 && // t
    header[6] === 0x79 && // y
    header[7] === 0x70 //    p
  ) {
    return "HEIC";
  }
  return null;
}

/**
 * Real format of a file whose content disagrees with its extension
 * (e.g. JPEG exports saved as .heic), or null when they agree or it can't be told.
 */
export async function detectFormatMismatch(
  path: string,
  extension: string
): Promise<ImageFormat | null> {
  const expected = EXTENSION_FORMAT[extension.toLowerCase()];
  if (!expected) return null;

  let header: Uint8Array;
  try {
    const handle = await open(path, "r");
    try {
      const buffer = Buffer.alloc(12);
      const { bytesRead } = await handle.read(buffer, 0, 12, 0);
      header = buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  } catch {
    return null;
  }

  const real = sniffFormat(header);
  return real !== null && real !== expected ? real : null;
}
