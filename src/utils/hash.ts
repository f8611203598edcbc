import { createHash } from "crypto";

const FINGERPRINT_LENGTH = 16;

/**
 * Order-independent fingerprint of a set of file paths: SHA-256 over the sorted,
 * de-duplicated paths joined by "|", truncated to 16 hex characters.
 * The empty set fingerprints to "".
 */
export function fingerprintPaths(paths: Iterable<string>): string {
  const sorted = [...new Set(paths)].sort();
  if (sorted.length === 0) return "";

  return createHash("sha256")
    .update(sorted.join("|"))
    .digest("hex")
    .slice(0, FINGERPRINT_LENGTH);
}
