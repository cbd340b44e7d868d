import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { invalidConfig } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/albumdl/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "albumdl",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  concurrency: 2,
  retryAttempts: 2,
  retryDelayMs: 1000,
  timeoutMs: 30000,
  apiBaseUrl: "https://api.imgur.com",
  albumPath: "/post/v1/albums/{id}",
  galleryPath: "/post/v1/posts/{id}",
  logLevel: "warn",
  logJson: false,
} as const;

/** Inclusive bounds shared by config files and command-line overrides */
export const DOWNLOAD_LIMITS = {
  concurrency: { min: 1, max: 16 },
  retryAttempts: { min: 0, max: 10 },
  retryDelayMs: { min: 100, max: 300000 },
  timeoutMs: { min: 1000, max: 600000 },
} as const;

export type DownloadLimit = (typeof DOWNLOAD_LIMITS)[keyof typeof DOWNLOAD_LIMITS];

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const bounded = ({ min, max }: DownloadLimit) => z.number().int().min(min).max(max);

const EndpointPathSchema = z
  .string()
  .startsWith("/")
  .refine((path) => path.includes("{id}"), { message: "must contain {id}" });

/** Schema for transfer settings */
const DownloadSchema = z.object({
  concurrency: bounded(DOWNLOAD_LIMITS.concurrency).optional(),
  retryAttempts: bounded(DOWNLOAD_LIMITS.retryAttempts).optional(),
  retryDelayMs: bounded(DOWNLOAD_LIMITS.retryDelayMs).optional(),
  timeoutMs: bounded(DOWNLOAD_LIMITS.timeoutMs).optional(),
  outputDir: z.string().min(1).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  download: DownloadSchema.optional(),
  api: z
    .object({
      baseUrl: z.string().url().optional(),
      clientId: z.string().min(1).optional(),
      albumPath: EndpointPathSchema.optional(),
      galleryPath: EndpointPathSchema.optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  concurrency: number;
  retryAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  /** Parent directory of the album directory; cwd when absent */
  outputDir?: string;
  apiBaseUrl: string;
  clientId?: string;
  albumPath: string;
  galleryPath: string;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a VALIDATION_CONFIG_INVALID error if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${messageOf(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${messageOf(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const { download, api, logging } = source;

  if (download?.concurrency !== undefined) target.concurrency = download.concurrency;
  if (download?.retryAttempts !== undefined) target.retryAttempts = download.retryAttempts;
  if (download?.retryDelayMs !== undefined) target.retryDelayMs = download.retryDelayMs;
  if (download?.timeoutMs !== undefined) target.timeoutMs = download.timeoutMs;
  if (download?.outputDir !== undefined) target.outputDir = download.outputDir;

  if (api?.baseUrl !== undefined) target.apiBaseUrl = api.baseUrl;
  if (api?.clientId !== undefined) target.clientId = api.clientId;
  if (api?.albumPath !== undefined) target.albumPath = api.albumPath;
  if (api?.galleryPath !== undefined) target.galleryPath = api.galleryPath;

  if (logging?.level !== undefined) target.logLevel = logging.level;
  if (logging?.json !== undefined) target.logJson = logging.json;
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(obj) as Array<keyof T>) {
    if (obj[key] !== undefined) {
      result[key] = obj[key];
    }
  }
  return result;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args / environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    concurrency: CONFIG_DEFAULTS.concurrency,
    retryAttempts: CONFIG_DEFAULTS.retryAttempts,
    retryDelayMs: CONFIG_DEFAULTS.retryDelayMs,
    timeoutMs: CONFIG_DEFAULTS.timeoutMs,
    apiBaseUrl: CONFIG_DEFAULTS.apiBaseUrl,
    albumPath: CONFIG_DEFAULTS.albumPath,
    galleryPath: CONFIG_DEFAULTS.galleryPath,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @param cliOptions - Values from flags and environment, highest precedence
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path replaces both system and user config
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
