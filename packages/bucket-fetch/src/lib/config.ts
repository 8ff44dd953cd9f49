import * as dotenv from "dotenv";
import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { errorMessage, type Logger } from "./logger.js";
import { configIncomplete, configInvalid, configMissing } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide settings path */
export const SYSTEM_CONFIG_PATH = "/etc/bucket-fetch/config.yaml";

/** User-level settings path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "bucket-fetch",
  "config.yaml"
);

export const FAILURE_POLICIES = ["mark-failed", "leave-in-flight"] as const;

export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

/** Default values for all settings */
export const CONFIG_DEFAULTS = {
  workers: 4,
  progressIntervalMs: 2000,
  pollTimeoutMs: 1000,
  joinTimeoutMs: 30000,
  failurePolicy: "mark-failed",
  storageConfigPath: "storage.conf",
} as const;

/** Keys read from the key=value storage credentials file */
export const STORAGE_KEYS = {
  bucket: "SPACES_NAME",
  accessKey: "ACCESS_KEY",
  secretKey: "SECRET_KEY",
  region: "REGION_NAME",
  endpoint: "ENDPOINT",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Schema for the transfer section of the settings file */
const TransferSchema = z.object({
  workers: z.number().int().min(1).max(32).optional(),
  progressIntervalMs: z.number().int().min(100).max(60000).optional(),
  pollTimeoutMs: z.number().int().min(10).max(60000).optional(),
  joinTimeoutMs: z.number().int().min(0).max(3600000).optional(),
  failurePolicy: z.enum(FAILURE_POLICIES).optional(),
});

/** Complete settings file schema */
export const ConfigFileSchema = z.object({
  transfer: TransferSchema.optional(),
  storage: z
    .object({
      configPath: z.string().optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved settings with all defaults applied */
export interface ResolvedConfig {
  workers: number;
  progressIntervalMs: number;
  pollTimeoutMs: number;
  joinTimeoutMs: number;
  failurePolicy: FailurePolicy;
  storageConfigPath: string;
  logLevel: "debug" | "info" | "warn" | "error";
  logJson: boolean;
}

/** Connection settings for the object store */
export const StorageConfigSchema = z.object({
  bucket: z.string().min(1),
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  region: z.string().min(1),
  endpoint: z.string().url().optional(),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// ---------------------------------------------------------------------------
// Settings Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML settings file from disk.
 * Returns undefined if file doesn't exist.
 * Throws CONFIG_INVALID if the file exists but cannot be used.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw configInvalid(path, `Cannot read file: ${errorMessage(err)}`, err);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw configInvalid(path, `Invalid YAML: ${errorMessage(err)}`, err);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw configInvalid(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a settings file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const transfer = source.transfer ?? {};
  if (transfer.workers !== undefined) target.workers = transfer.workers;
  if (transfer.progressIntervalMs !== undefined) {
    target.progressIntervalMs = transfer.progressIntervalMs;
  }
  if (transfer.pollTimeoutMs !== undefined) {
    target.pollTimeoutMs = transfer.pollTimeoutMs;
  }
  if (transfer.joinTimeoutMs !== undefined) {
    target.joinTimeoutMs = transfer.joinTimeoutMs;
  }
  if (transfer.failurePolicy !== undefined) {
    target.failurePolicy = transfer.failurePolicy;
  }
  if (source.storage?.configPath !== undefined) {
    target.storageConfigPath = source.storage.configPath;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    workers: CONFIG_DEFAULTS.workers,
    progressIntervalMs: CONFIG_DEFAULTS.progressIntervalMs,
    pollTimeoutMs: CONFIG_DEFAULTS.pollTimeoutMs,
    joinTimeoutMs: CONFIG_DEFAULTS.joinTimeoutMs,
    failurePolicy: CONFIG_DEFAULTS.failurePolicy,
    storageConfigPath: CONFIG_DEFAULTS.storageConfigPath,
    logLevel: "info",
    logJson: false,
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
 * Load settings from all sources.
 *
 * @param explicitPath - settings file given on the command line; replaces the user file
 * @param cliOptions - values from command-line flags, highest precedence
 * @returns The resolved config and the files that contributed to it
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

// ---------------------------------------------------------------------------
// Storage Credentials (key=value file)
// ---------------------------------------------------------------------------

/**
 * Read the storage credentials file, a dotenv-style `KEY=value` document.
 * A missing file is not fatal: it is logged and yields an empty mapping,
 * which fails later in {@link toStorageConfig}.
 */
export function loadStorageEnv(path: string, logger: Logger): Record<string, string> {
  if (!existsSync(path)) {
    const error = configMissing(path);
    logger.warn(error.message, { code: error.code, path });
    return {};
  }

  return dotenv.parse(readFileSync(path));
}

/**
 * Build validated storage settings from the key=value mapping.
 * `bucketOverride` replaces SPACES_NAME when given.
 */
export function toStorageConfig(
  env: Record<string, string>,
  bucketOverride?: string
): StorageConfig {
  const candidate = {
    bucket: bucketOverride ?? env[STORAGE_KEYS.bucket],
    accessKeyId: env[STORAGE_KEYS.accessKey],
    secretAccessKey: env[STORAGE_KEYS.secretKey],
    region: env[STORAGE_KEYS.region],
    endpoint: env[STORAGE_KEYS.endpoint] || undefined,
  };

  const result = StorageConfigSchema.safeParse(candidate);
  if (!result.success) {
    const fieldToKey: Record<string, string> = {
      bucket: STORAGE_KEYS.bucket,
      accessKeyId: STORAGE_KEYS.accessKey,
      secretAccessKey: STORAGE_KEYS.secretKey,
      region: STORAGE_KEYS.region,
      endpoint: STORAGE_KEYS.endpoint,
    };
    const missing = [
      ...new Set(
        result.error.issues.map((i) => fieldToKey[String(i.path[0])] ?? String(i.path[0]))
      ),
    ];
    throw configIncomplete(missing);
  }

  return result.data;
}
