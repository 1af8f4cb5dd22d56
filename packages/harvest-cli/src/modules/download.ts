import { Command } from "commander";
import { resolve } from "path";
import chalk from "chalk";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { createLogger, consoleWriter, stderrWriter, type Logger, type LogWriter } from "../lib/logger.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outcomeToJson, outputNdjson } from "../lib/json-output.js";
import { createSpinner, trackProgress, type Spinner } from "../lib/spinner.js";
import { invalidBudget, invalidOption, missingArgument } from "../lib/errors/catalog.js";
import { ConfKeyStore, resolveAccessKey, type KeyStore } from "../lib/credentials.js";
import { createSearchClient, searchDescriptors, type SearchClient, type SearchClientOptions } from "../lib/search-client.js";
import { startPipeline, type DescriptorSource } from "../lib/pipeline/index.js";
import type { OutcomeRecord } from "../lib/outcome.js";
import type { ContentSource } from "../lib/ports/content-source.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import { createHttpContentSource, createProcessSignalHandler } from "../lib/adapters/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  outputDir?: string;
  concurrency?: string;
  timeout?: string;
  config?: string;
}

export interface SearchOptions extends DownloadOptions {
  accessKey?: string;
  endpoint?: string;
}

/**
 * Dependencies for download runs.
 * All have sensible defaults for production use.
 */
export interface DownloadDeps {
  createSource?: (timeoutMs: number) => ContentSource;
  createSearchClient?: (options: SearchClientOptions) => SearchClient;
  keyStore?: KeyStore;
  signalHandler?: SignalHandler;
  env?: NodeJS.ProcessEnv;
  /** Log line sink; stdout/stderr by default */
  logWriter?: LogWriter;
  now?: () => Date;
}

export interface RunSettings {
  config: ResolvedConfig;
  sources: string[];
}

export interface RunSummary {
  /** Fetchers that succeeded */
  fetched: number;
  /** Failure records of any component */
  failed: number;
  /** Paths the Sink wrote */
  files: string[];
  failures: OutcomeRecord[];
  durationMs: number;
  success: boolean;
}

// ---------------------------------------------------------------------------
// Validation (Pure Functions)
// ---------------------------------------------------------------------------

/**
 * Parse the concurrency budget. Non-numbers are option errors; integers
 * below 1 are budget errors.
 */
export function parseConcurrency(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw invalidOption("concurrency", `expected an integer, got "${value}"`);
  }
  const n = parseInt(value, 10);
  if (n < 1) {
    throw invalidBudget(n);
  }
  return n;
}

/**
 * Parse the per-fetch timeout in milliseconds; 0 disables it.
 */
export function parseTimeout(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw invalidOption("timeout", `expected milliseconds (0 or more), got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Merge CLI options over the config files.
 */
export function resolveRunSettings(options: SearchOptions): RunSettings {
  return loadConfig(options.config, {
    concurrency: options.concurrency !== undefined ? parseConcurrency(options.concurrency) : undefined,
    outputDir: options.outputDir !== undefined ? resolve(options.outputDir) : undefined,
    timeoutMs: options.timeout !== undefined ? parseTimeout(options.timeout) : undefined,
    endpoint: options.endpoint,
  });
}

// ---------------------------------------------------------------------------
// Run supervision
// ---------------------------------------------------------------------------

export interface SuperviseOptions {
  logger: Logger;
  json: boolean;
  spinner: Spinner;
  now?: () => Date;
}

/**
 * Read outcome records until the channel closes. Each record is logged, or
 * printed as one NDJSON line in JSON mode.
 */
export async function superviseRun(
  records: AsyncIterable<OutcomeRecord>,
  { logger, json, spinner, now = () => new Date() }: SuperviseOptions
): Promise<Omit<RunSummary, "durationMs">> {
  const progress = trackProgress(spinner, "Downloading");
  const failures: OutcomeRecord[] = [];
  let files: string[] = [];

  for await (const record of records) {
    if (record.componentKind === "Fetcher") {
      progress.record(record.status === "success");
    }
    if (record.status === "failure") {
      failures.push(record);
    }
    if (record.componentKind === "Sink" && record.files) {
      files = [...record.files];
    }

    if (json) {
      outputNdjson(outcomeToJson(record, now()));
      continue;
    }

    const meta: Record<string, unknown> = {};
    if (record.subject !== undefined) meta.subject = record.subject;
    if (record.detail) {
      meta.code = record.detail.code;
      logger.error(`${record.componentKind}: ${record.detail.message}`, meta);
    } else {
      logger.info(`${record.componentKind}: succeeded`, meta);
    }
  }

  return {
    fetched: progress.fetched,
    failed: failures.length,
    files,
    failures,
    success: failures.length === 0,
  };
}

/**
 * Keep log lines from tearing through an active spinner.
 */
function spinnerSafe(write: LogWriter, spinner: Spinner): LogWriter {
  return (level, line) => {
    const spinning = spinner.isSpinning;
    if (spinning) spinner.stop();
    write(level, line);
    if (spinning) spinner.start();
  };
}

/**
 * Run one download: build the pipeline over the descriptors, supervise it
 * until the outcome channel closes, and report a summary. The first
 * SIGINT/SIGTERM cancels the run.
 */
export async function runDownload(
  descriptors: (signal: AbortSignal) => DescriptorSource,
  settings: RunSettings,
  deps: DownloadDeps = {}
): Promise<RunSummary> {
  const { config, sources } = settings;
  const json = isJsonMode();
  const now = deps.now ?? (() => new Date());
  const spinner = createSpinner();
  const baseWriter = deps.logWriter ?? (json ? stderrWriter : consoleWriter);
  const logger = createLogger({
    level: config.logLevel,
    json: config.logJson || json,
    write: spinnerSafe(baseWriter, spinner),
    now,
  });

  if (sources.length > 0) {
    logger.debug("Loaded configuration", { sources });
  }

  const signalHandler = deps.signalHandler ?? createProcessSignalHandler();
  const controller = new AbortController();
  signalHandler.onShutdown(() => {
    logger.warn("Cancelling run; press Ctrl+C again to exit immediately");
    controller.abort();
  });

  const createSource = deps.createSource ?? ((timeoutMs) => createHttpContentSource({ timeoutMs }));
  const startedAt = now().getTime();
  spinner.start("Downloading");

  try {
    const run = startPipeline({
      descriptors: descriptors(controller.signal),
      budget: config.concurrency,
      outputDir: config.outputDir,
      source: createSource(config.timeoutMs),
      signal: controller.signal,
    });

    const result = await superviseRun(run.records, { logger, json, spinner, now });
    const report = await run.done;
    const summary: RunSummary = { ...result, durationMs: now().getTime() - startedAt };

    spinner.stop();
    logger.info("Run complete", {
      fetched: summary.fetched,
      failed: summary.failed,
      files: summary.files.length,
      peakInFlight: report.peakInFlight,
      durationMs: summary.durationMs,
    });

    if (json) {
      outputNdjson({
        type: "summary",
        timestamp: now().toISOString(),
        fetched: summary.fetched,
        failed: summary.failed,
        files: summary.files,
        durationMs: summary.durationMs,
        success: summary.success,
      });
    } else if (summary.success) {
      spinner.succeed(`Saved ${summary.files.length} file(s) to ${config.outputDir}`);
    } else {
      spinner.fail(`${summary.failed} component(s) failed; saved ${summary.files.length} file(s) to ${config.outputDir}`);
    }

    return summary;
  } finally {
    spinner.stop();
    signalHandler.removeAll();
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

function addRunOptions(command: Command): Command {
  return command
    .option("-o, --output-dir <dir>", "Directory to save downloads in (default: OS temp dir)")
    .option("-c, --concurrency <n>", "Maximum number of downloads in flight")
    .option("--timeout <ms>", "Per-download timeout in milliseconds, 0 to disable")
    .option("--config <path>", "Path to configuration file");
}

export function registerDownloadCommands(program: Command, deps: DownloadDeps = {}): void {
  addRunOptions(
    program
      .command("search")
      .description("Search for images and download every result")
      .argument("<query...>", "Search terms")
      .option("-k, --access-key <key>", "Search access key (default: HARVEST_ACCESS_KEY or stored key)")
      .option("--endpoint <url>", "Search endpoint URL")
  )
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  harvest search red panda -o ./pandas
      ${chalk.gray("Download every result for \"red panda\" into ./pandas")}

  harvest search sunset --concurrency 8 --json
      ${chalk.gray("Eight downloads at a time, NDJSON records on stdout")}
`
    )
    .action(async (words: string[], options: SearchOptions) => {
      const query = words.join(" ").trim();
      if (!query) {
        throw missingArgument("a search query", "search");
      }

      const settings = resolveRunSettings(options);
      const { accessKey } = resolveAccessKey({
        flag: options.accessKey,
        env: deps.env ?? process.env,
        store: deps.keyStore ?? new ConfKeyStore(),
      });
      const makeClient = deps.createSearchClient ?? createSearchClient;
      const client = makeClient({ accessKey, endpoint: settings.config.endpoint });

      const summary = await runDownload(
        (signal) => searchDescriptors(client, query, signal),
        settings,
        deps
      );
      if (!summary.success) process.exitCode = 1;
    });

  addRunOptions(
    program
      .command("fetch")
      .description("Download the given URLs")
      .argument("<locators...>", "URLs to download")
  ).action(async (locators: string[], options: DownloadOptions) => {
    if (locators.length === 0) {
      throw missingArgument("at least one URL", "fetch");
    }

    const settings = resolveRunSettings(options);
    const summary = await runDownload(
      () => locators.map((locator) => ({ title: locator, locator })),
      settings,
      deps
    );
    if (!summary.success) process.exitCode = 1;
  });
}
