export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** The index could not be written; the previous index file is left as it was. */
export class IndexSaveError extends Error {
  readonly indexPath: string;

  constructor(indexPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to save index ${indexPath}: ${reason}`, { cause });
    this.name = "IndexSaveError";
    this.indexPath = indexPath;
  }
}
