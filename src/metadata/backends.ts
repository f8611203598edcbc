import { createLogger } from "../logger";
import { execCommand, type CommandRunner } from "./exec";
import type { BackendCapabilities } from "./types";

const log = createLogger("backends");

export const EXIFTOOL_CANDIDATES = [
  "exiftool",
  "/opt/bin/exiftool",
  "/usr/local/bin/exiftool",
  "/usr/bin/exiftool",
];

const PROBE_TIMEOUT_MS = 5_000;

/**
 * Probe optional tools once at startup. The returned descriptor is handed to
 * the reader and writer; nothing here is cached at module level.
 */
export async function resolveBackends(
  runner: CommandRunner = execCommand,
  candidates: string[] = EXIFTOOL_CANDIDATES
): Promise<BackendCapabilities> {
  for (const candidate of candidates) {
    const result = await runner(candidate, ["-ver"], PROBE_TIMEOUT_MS);
    if (result.code === 0) {
      log.debug({ exiftool: candidate, version: result.stdout.trim() }, "ExifTool found");
      return { exiftool: candidate };
    }
  }

  log.warn({ candidates }, "ExifTool not found; GPS writes and some RAW formats are unavailable");
  return { exiftool: null };
}
