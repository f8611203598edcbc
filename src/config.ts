import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, isAbsolute, join, resolve } from "path";
import { ConfigError } from "./errors";
import { INDEX_FILENAME } from "./constants";
import { PHOTO_EXTENSIONS } from "./sources/local";

const configSchema = z
  .object({
    scanDirs: z.array(z.string()).default([]),
    extensions: z.array(z.string().min(1)).default([...PHOTO_EXTENSIONS]),
    recursive: z.boolean().default(true),
    excludePatterns: z.array(z.string()).default([]),
    writeMode: z.enum(["exif", "xmp_sidecar", "both"]).default("exif"),
    dryRun: z.boolean().default(true),
    skipProcessed: z.boolean().default(true),
    useIndex: z.boolean().default(true),
    workers: z.number().int().min(1).max(64).default(4),
    logLevel: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("warn"),
    logFile: z.string().nullable().default(null),
    matching: z
      .object({
        maxTimeDeltaMinutes: z.number().int().min(0).default(120),
        minConfidence: z.number().min(0).max(100).default(0),
      })
      .strict()
      .default({}),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;
export type WriteMode = Config["writeMode"];

export interface LoadedConfig {
  config: Config;
  /** File the config was read from, or the implicit location when defaults were used. */
  configPath: string;
  /** True when no file existed and every value is a default. */
  isDefault: boolean;
  indexPath: string;
}

const CONFIG_FILENAME = "config.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "geosnag");

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

function expandPath(p: string, baseDir: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return isAbsolute(p) ? p : resolve(baseDir, p);
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/** Local ./config.yaml wins over the global one. */
export function getConfigPath(explicit?: string): string {
  if (explicit) return resolve(explicit);
  const localPath = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate raw parsed YAML and apply defaults. Paths are expanded relative to
 * `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string): Config {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const config = parsed.data;
  config.scanDirs = config.scanDirs.map((dir) => expandPath(dir, baseDir));
  config.extensions = [...new Set(config.extensions.map(normalizeExtension))];
  if (config.logFile) {
    config.logFile = expandPath(config.logFile, baseDir);
  }
  return config;
}

/**
 * Load the config from `explicitPath`, ./config.yaml or the global location.
 * A missing explicit file is an error; a missing implicit one yields defaults.
 */
export function loadConfig(explicitPath?: string): LoadedConfig {
  const configPath = getConfigPath(explicitPath);
  const baseDir = dirname(configPath);
  const indexPath = join(baseDir, INDEX_FILENAME);

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return { config: parseConfig({}, process.cwd()), configPath, isDefault: true, indexPath };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot parse ${configPath}: ${reason}`, { cause: error });
  }

  return { config: parseConfig(raw, baseDir), configPath, isDefault: false, indexPath };
}

export interface ConfigOverrides {
  dryRun?: boolean;
  writeMode?: string;
  maxTimeDeltaMinutes?: number;
  skipProcessed?: boolean;
  workers?: number;
  useIndex?: boolean;
  logLevel?: string;
}

/** Apply command-line overrides and validate the result against the same schema. */
export function withOverrides(config: Config, overrides: ConfigOverrides): Config {
  const { maxTimeDeltaMinutes, ...topLevel } = overrides;
  const defined = Object.fromEntries(Object.entries(topLevel).filter(([, value]) => value !== undefined));

  const parsed = configSchema.safeParse({
    ...config,
    ...defined,
    matching: {
      ...config.matching,
      ...(maxTimeDeltaMinutes !== undefined ? { maxTimeDeltaMinutes } : {}),
    },
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid option: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function getDefaultConfig(): string {
  return `# geosnag configuration

# Directories to scan for photos
scanDirs:
  - ~/Pictures

# File extensions to include (case-insensitive)
extensions: [".jpg", ".jpeg", ".arw", ".nef", ".cr2", ".cr3", ".dng", ".orf", ".raf", ".rw2", ".heic", ".heif", ".png"]

recursive: true

# Glob patterns to skip, matched against relative and absolute paths
excludePatterns: []

matching:
  maxTimeDeltaMinutes: 120  # Same-day sources further away than this are ignored
  minConfidence: 0          # Matches below this confidence (0-100) are not written

writeMode: exif             # "exif", "xmp_sidecar" or "both"
dryRun: true                # Preview only; use --apply to write
skipProcessed: true         # Skip photos already tagged by geosnag

useIndex: true              # Cache metadata between runs (.geosnag-index.json beside this file)
workers: 4                  # Parallel metadata reads (1-64)

logLevel: warn              # trace, debug, info, warn, error, silent
logFile: null
`;
}
