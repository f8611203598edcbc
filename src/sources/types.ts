export interface EnumerateRequest {
  directories: string[];
  /** Lower-cased extensions with the leading dot. */
  extensions: ReadonlySet<string>;
  recursive: boolean;
  /** Glob patterns matched against the path relative to its root and the absolute path. */
  excludePatterns: string[];
}

export interface PhotoEnumerator {
  name: string;
  /** Candidate file paths, sorted within each directory, directories visited in sorted order. */
  enumerate(request: EnumerateRequest): string[];
}
