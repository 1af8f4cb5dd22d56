import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir, tmpdir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { DEFAULT_SEARCH_ENDPOINT } from "./search-client.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/harvest/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "harvest", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  concurrency: 4,
  outputDir: tmpdir(),
  timeoutMs: 30_000,
  endpoint: DEFAULT_SEARCH_ENDPOINT,
  logLevel: "info",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    download: z
      .object({
        outputDir: z.string().min(1).optional(),
        concurrency: z.number().int().min(1).max(64).optional(),
        timeoutMs: z.number().int().min(0).max(600_000).optional(),
      })
      .strict()
      .optional(),
    search: z
      .object({
        endpoint: z.string().url().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type LogLevelName = z.infer<typeof LogLevelSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  concurrency: number;
  outputDir: string;
  timeoutMs: number;
  endpoint: string;
  logLevel: LogLevelName;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validate parsed YAML against the schema.
 * Empty documents count as an empty config.
 */
export function parseConfigFile(path: string, parsed: unknown): ConfigFile {
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  return result.data;
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws CONFIG_INVALID_FILE if it exists but cannot be read or validated.
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

  return parseConfigFile(path, parsed);
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.download?.outputDir !== undefined) {
    target.outputDir = source.download.outputDir;
  }
  if (source.download?.concurrency !== undefined) {
    target.concurrency = source.download.concurrency;
  }
  if (source.download?.timeoutMs !== undefined) {
    target.timeoutMs = source.download.timeoutMs;
  }
  if (source.search?.endpoint !== undefined) {
    target.endpoint = source.search.endpoint;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
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
  const config: ResolvedConfig = { ...CONFIG_DEFAULTS };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }
  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  // Undefined CLI values leave lower layers in place
  return {
    concurrency: cliOptions.concurrency ?? config.concurrency,
    outputDir: cliOptions.outputDir ?? config.outputDir,
    timeoutMs: cliOptions.timeoutMs ?? config.timeoutMs,
    endpoint: cliOptions.endpoint ?? config.endpoint,
    logLevel: cliOptions.logLevel ?? config.logLevel,
    logJson: cliOptions.logJson ?? config.logJson,
  };
}

/**
 * Load configuration from all sources.
 * An explicit path replaces both the system and user files.
 *
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
    if (!existsSync(explicitPath)) {
      throw invalidConfig(explicitPath, ["file does not exist"]);
    }
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
