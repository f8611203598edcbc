import { extname } from "path";
import { createDefaultRegistry, decoderFormatFor, type DecoderRegistry } from "./decoders";
import { detectFormatMismatch } from "./format";
import type { BackendCapabilities, MetadataReader, MetadataReadResult } from "./types";

/**
 * Reads capture time, GPS, camera and processed marker through the decoder
 * registry, plus an extension/content mismatch check. Rejects per file.
 */
export class ExifMetadataReader implements MetadataReader {
  private registry: DecoderRegistry;

  constructor(registry: DecoderRegistry) {
    this.registry = registry;
  }

  static fromCapabilities(capabilities: BackendCapabilities): ExifMetadataReader {
    return new ExifMetadataReader(createDefaultRegistry(capabilities));
  }

  async read(path: string): Promise<MetadataReadResult> {
    const extension = extname(path).toLowerCase();
    const formatMismatch = await detectFormatMismatch(path, extension);

    const format = decoderFormatFor(path);
    if (!format) {
      throw new Error(`Unsupported file extension: ${extension || "(none)"}`);
    }

    const decoder = await this.registry.get(format);
    const fields = await decoder.decode(path);
    return { ...fields, formatMismatch };
  }
}
