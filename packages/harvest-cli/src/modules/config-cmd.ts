import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";
import { toHarvestError } from "../lib/errors/catalog.js";

export const EXAMPLE_CONFIG = `# harvest configuration
# Place at ~/.config/harvest/config.yaml (user) or /etc/harvest/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/harvest/config.yaml)
# 3. System config (/etc/harvest/config.yaml)
# 4. Built-in defaults

download:
  # Where files are saved (default: the OS temp directory)
  # outputDir: "/path/to/images"

  # Maximum downloads in flight (1-64)
  concurrency: 4

  # Per-download timeout in milliseconds, 0 disables it
  timeoutMs: 30000

search:
  # Image search endpoint
  endpoint: "https://api.datamarket.azure.com/Bing/Search/Image"

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON log lines
  json: false
`;

export interface ConfigCommandPaths {
  user: string;
  system: string;
}

const DEFAULT_PATHS: ConfigCommandPaths = {
  user: USER_CONFIG_PATH,
  system: SYSTEM_CONFIG_PATH,
};

/** Order and grouping of `config show` */
const SHOW_SECTIONS: Array<{ title: string; keys: Array<keyof ResolvedConfig> }> = [
  { title: "Download", keys: ["outputDir", "concurrency", "timeoutMs"] },
  { title: "Search", keys: ["endpoint"] },
  { title: "Logging", keys: ["logLevel", "logJson"] },
];

const SHOW_LABELS: Record<keyof ResolvedConfig, string> = {
  outputDir: "outputDir",
  concurrency: "concurrency",
  timeoutMs: "timeoutMs",
  endpoint: "endpoint",
  logLevel: "level",
  logJson: "json",
};

/**
 * Problems found in one config file; empty when it is valid.
 */
export function checkConfigFile(path: string): string[] {
  try {
    loadConfigFile(path);
    return [];
  } catch (error) {
    const { message, details } = toHarvestError(error);
    return [message, ...(details ? details.split("\n") : [])];
  }
}

function initConfig(targetPath: string, global: boolean): void {
  if (existsSync(targetPath)) {
    console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
    console.error(chalk.gray("Edit it, or delete it and run init again."));
    process.exitCode = 1;
    return;
  }

  try {
    mkdirSync(dirname(targetPath), { recursive: true });
    writeFileSync(targetPath, EXAMPLE_CONFIG, { encoding: "utf-8", flag: "wx" });
    console.log(chalk.green(`Created config file: ${targetPath}`));
  } catch (error) {
    console.error(chalk.red(`Failed to create config: ${toHarvestError(error).message}`));
    if (global) console.error(chalk.gray("Writing under /etc usually needs root."));
    process.exitCode = 1;
  }
}

function validateConfigs(explicit: string | undefined, paths: ConfigCommandPaths): void {
  if (explicit && !existsSync(explicit)) {
    console.error(chalk.red(`File not found: ${explicit}`));
    process.exitCode = 1;
    return;
  }

  const present = (explicit ? [explicit] : [paths.system, paths.user]).filter((p) => existsSync(p));
  if (present.length === 0) {
    console.log(chalk.yellow("No configuration files found."));
    console.log(chalk.gray("Run 'harvest config init' to create one."));
    return;
  }

  let failed = 0;
  for (const path of present) {
    console.log(chalk.cyan(`Checking ${path}...`));
    const [headline, ...rest] = checkConfigFile(path);
    if (headline === undefined) {
      console.log(chalk.green("  ✓ Valid"));
      continue;
    }
    failed++;
    console.error(chalk.red(`  ✗ ${headline}`));
    for (const line of rest) console.error(chalk.gray(`    ${line}`));
  }

  if (failed > 0) {
    process.exitCode = 1;
  } else {
    console.log(chalk.green("\nAll configuration files are valid."));
  }
}

function showConfig(explicit: string | undefined): void {
  const { config: resolved, sources } = loadConfig(explicit);

  const json: ConfigShowJson = { effective: { ...resolved }, sources };
  if (maybeOutputJson(json)) return;

  console.log(chalk.cyan("Effective Configuration:"));
  console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));
  for (const section of SHOW_SECTIONS) {
    console.log();
    console.log(chalk.bold(`${section.title}:`));
    for (const key of section.keys) {
      console.log(`  ${`${SHOW_LABELS[key]}:`.padEnd(16)}${resolved[key]}`);
    }
  }
}

function showPaths(paths: ConfigCommandPaths): void {
  const status = (path: string) =>
    existsSync(path) ? chalk.green("(exists)") : chalk.gray("(not found)");

  console.log(chalk.cyan("Configuration file locations:"));
  for (const [label, path] of [
    ["User config", paths.user],
    ["System config", paths.system],
  ]) {
    console.log();
    console.log(chalk.bold(`${label}:`));
    console.log(`  ${path} ${status(path)}`);
  }
}

export function registerConfigCommands(
  program: Command,
  paths: ConfigCommandPaths = DEFAULT_PATHS
): void {
  const config = program.command("config").description("Manage harvest configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${paths.system}`)
    .action((options: { global?: boolean }) => {
      initConfig(options.global ? paths.system : paths.user, options.global ?? false);
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => validateConfigs(options.config, paths));

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => showConfig(options.config));

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => showPaths(paths));
}
