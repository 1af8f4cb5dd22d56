import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import { Command } from "commander";
import {
  parseConcurrency,
  parseTimeout,
  registerDownloadCommands,
  resolveRunSettings,
  runDownload,
  superviseRun,
  type DownloadDeps,
  type RunSettings,
} from "./download.js";
import { createLogger, type LogLevel } from "../lib/logger.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { httpStatusFailed } from "../lib/errors/catalog.js";
import { failure, success, toOutcomeRecord, type OutcomeRecord } from "../lib/outcome.js";
import type { ContentSource } from "../lib/ports/content-source.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import type { KeyStore, StoredCredentials } from "../lib/credentials.js";

const FIXED_NOW = new Date("2024-03-01T12:00:00.000Z");
const TS = FIXED_NOW.toISOString();

function captureWriter() {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return {
    lines,
    write: (level: LogLevel, line: string) => {
      lines.push({ level, line });
    },
  };
}

function memorySource(entries: Record<string, string>): ContentSource {
  return {
    async fetch(locator) {
      const body = entries[locator];
      if (body === undefined) throw httpStatusFailed(locator, 404, "Not Found");
      return { body: Readable.from([Buffer.from(body)]) };
    },
  };
}

class FakeSignalHandler implements SignalHandler {
  callbacks: Array<() => void> = [];
  removed = false;

  onShutdown(callback: () => void): void {
    this.callbacks.push(callback);
  }

  removeAll(): void {
    this.removed = true;
    this.callbacks = [];
  }

  trigger(): void {
    for (const callback of this.callbacks) callback();
  }
}

class MemoryKeyStore implements KeyStore {
  constructor(private value: StoredCredentials = {}) {}
  getKey() {
    return this.value;
  }
  setKey(accessKey: string) {
    this.value = { accessKey };
  }
  clearKey() {
    this.value = {};
  }
}

async function* fromArray(records: OutcomeRecord[]): AsyncGenerator<OutcomeRecord> {
  yield* records;
}

function settingsFor(outputDir: string, concurrency = 2): RunSettings {
  return {
    config: {
      concurrency,
      outputDir,
      timeoutMs: 0,
      endpoint: "https://search.test/img",
      logLevel: "info",
      logJson: false,
    },
    sources: [],
  };
}

describe("parseConcurrency", () => {
  it("accepts positive integers", () => {
    expect(parseConcurrency("4")).toBe(4);
    expect(parseConcurrency(" 12 ")).toBe(12);
  });

  it("rejects non-numbers as invalid options", () => {
    expect(() => parseConcurrency("four")).toThrow(
      expect.objectContaining({ code: "VALIDATION_INVALID_OPTION" })
    );
    expect(() => parseConcurrency("1.5")).toThrow(
      expect.objectContaining({ code: "VALIDATION_INVALID_OPTION" })
    );
  });

  it.each(["0", "-2"])("rejects %s as an invalid budget", (value) => {
    expect(() => parseConcurrency(value)).toThrow(
      expect.objectContaining({ code: "CONFIG_INVALID_BUDGET" })
    );
  });
});

describe("parseTimeout", () => {
  it("accepts zero and positive values", () => {
    expect(parseTimeout("0")).toBe(0);
    expect(parseTimeout("1500")).toBe(1500);
  });

  it("rejects negative values", () => {
    expect(() => parseTimeout("-1")).toThrow(
      expect.objectContaining({ code: "VALIDATION_INVALID_OPTION" })
    );
  });
});

describe("resolveRunSettings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "harvest-settings-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("layers CLI options over the config file", async () => {
    const configPath = join(dir, "config.yaml");
    await writeFile(configPath, "download:\n  concurrency: 6\n  timeoutMs: 1000\n");

    const { config } = resolveRunSettings({
      config: configPath,
      concurrency: "3",
      outputDir: "/srv/out",
    });

    expect(config.concurrency).toBe(3);
    expect(config.timeoutMs).toBe(1000);
    expect(config.outputDir).toBe("/srv/out");
  });
});

describe("superviseRun", () => {
  beforeEach(() => {
    initContext(["node", "harvest", "--quiet"], {});
  });

  afterEach(() => {
    resetContext();
  });

  it("logs each record and summarizes the run", async () => {
    const capture = captureWriter();
    const logger = createLogger({ level: "info", json: false, write: capture.write, now: () => FIXED_NOW });
    const locator = "https://example.test/a.png";
    const records: OutcomeRecord[] = [
      toOutcomeRecord("Fetcher", success(undefined), { subject: locator }),
      toOutcomeRecord("Fetcher", failure(httpStatusFailed("https://example.test/b.png", 404, "Not Found")), {
        subject: "https://example.test/b.png",
      }),
      toOutcomeRecord("Orchestrator", success(undefined)),
      toOutcomeRecord("Sink", success(1), { files: ["/out/a.png"] }),
    ];

    const summary = await superviseRun(fromArray(records), {
      logger,
      json: false,
      spinner: createSpinner(),
    });

    expect(capture.lines.map((l) => l.line)).toEqual([
      `I: [${TS}] Fetcher: succeeded {"subject":"https://example.test/a.png"}`,
      `E: [${TS}] Fetcher: Request for https://example.test/b.png failed (404 Not Found) {"subject":"https://example.test/b.png","code":"TRANSPORT_HTTP_STATUS"}`,
      `I: [${TS}] Orchestrator: succeeded`,
      `I: [${TS}] Sink: succeeded`,
    ]);
    expect(summary).toEqual({
      fetched: 1,
      failed: 1,
      files: ["/out/a.png"],
      failures: [records[1]],
      success: false,
    });
  });

  it("prints NDJSON records in JSON mode", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const capture = captureWriter();
    const logger = createLogger({ level: "info", json: true, write: capture.write });

    await superviseRun(
      fromArray([
        toOutcomeRecord("Orchestrator", success(undefined)),
        toOutcomeRecord("Sink", success(0), { files: [] }),
      ]),
      { logger, json: true, spinner: createSpinner(), now: () => FIXED_NOW }
    );

    expect(capture.lines).toEqual([]);
    expect(log.mock.calls).toEqual([
      [`{"type":"outcome","timestamp":"${TS}","component":"Orchestrator","status":"success"}`],
      [`{"type":"outcome","timestamp":"${TS}","component":"Sink","status":"success","files":[]}`],
    ]);
  });
});

describe("runDownload", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "harvest-run-"));
    initContext(["node", "harvest", "--quiet"], {});
  });

  afterEach(async () => {
    resetContext();
    await rm(dir, { recursive: true, force: true });
  });

  it("downloads every descriptor and reports success", async () => {
    const capture = captureWriter();
    const signalHandler = new FakeSignalHandler();
    const deps: DownloadDeps = {
      createSource: () =>
        memorySource({
          "https://example.test/a.png": "alpha",
          "https://example.test/b.png": "beta",
        }),
      signalHandler,
      logWriter: capture.write,
      now: () => FIXED_NOW,
    };

    const summary = await runDownload(
      () => [
        { title: "a", locator: "https://example.test/a.png" },
        { title: "b", locator: "https://example.test/b.png" },
      ],
      settingsFor(dir),
      deps
    );

    expect(summary.success).toBe(true);
    expect(summary.fetched).toBe(2);
    expect(summary.durationMs).toBe(0);
    expect([...summary.files].sort()).toEqual([join(dir, "a.png"), join(dir, "b.png")]);
    expect(await readFile(join(dir, "b.png"), "utf8")).toBe("beta");
    expect(signalHandler.removed).toBe(true);
    expect(capture.lines.at(-1)?.line).toBe(
      `I: [${TS}] Run complete {"fetched":2,"failed":0,"files":2,"peakInFlight":2,"durationMs":0}`
    );
  });

  it("reports failure when a fetch fails", async () => {
    const summary = await runDownload(
      () => [
        { title: "a", locator: "https://example.test/a.png" },
        { title: "gone", locator: "https://example.test/gone.png" },
      ],
      settingsFor(dir),
      {
        createSource: () => memorySource({ "https://example.test/a.png": "alpha" }),
        signalHandler: new FakeSignalHandler(),
        logWriter: captureWriter().write,
      }
    );

    expect(summary.success).toBe(false);
    expect(summary.fetched).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.failures[0]?.subject).toBe("https://example.test/gone.png");
    expect(await readdir(dir)).toEqual(["a.png"]);
  });

  it("cancels the run on the first shutdown signal", async () => {
    const signalHandler = new FakeSignalHandler();
    const hanging: ContentSource = {
      fetch: (_locator, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
        }),
    };

    const running = runDownload(
      () => [
        { title: "a", locator: "https://example.test/a.png" },
        { title: "b", locator: "https://example.test/b.png" },
      ],
      settingsFor(dir),
      { createSource: () => hanging, signalHandler, logWriter: captureWriter().write }
    );
    setTimeout(() => signalHandler.trigger(), 5);
    const summary = await running;

    expect(summary.success).toBe(false);
    expect(summary.failures.map((r) => r.detail?.code)).toEqual([
      "CANCELLED",
      "CANCELLED",
      "CANCELLED",
      "CANCELLED",
    ]);
    expect(await readdir(dir)).toEqual([]);
  });
});

describe("registerDownloadCommands", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "harvest-cmd-"));
    configPath = join(dir, "config.yaml");
    await writeFile(configPath, "");
    initContext(["node", "harvest", "--quiet"], {});
  });

  afterEach(async () => {
    process.exitCode = undefined;
    resetContext();
    await rm(dir, { recursive: true, force: true });
  });

  function program(deps: DownloadDeps): Command {
    const root = new Command().name("harvest").exitOverride();
    registerDownloadCommands(root, {
      signalHandler: new FakeSignalHandler(),
      logWriter: captureWriter().write,
      ...deps,
    });
    return root;
  }

  it("fetch downloads the given URLs into the output directory", async () => {
    const out = join(dir, "out");
    const cli = program({
      createSource: () => memorySource({ "https://example.test/cat.png": "meow" }),
    });

    await cli.parseAsync(
      ["fetch", "https://example.test/cat.png", "-o", out, "--config", configPath],
      { from: "user" }
    );

    expect(await readFile(join(out, "cat.png"), "utf8")).toBe("meow");
    expect(process.exitCode).toBeUndefined();
  });

  it("fetch sets exit code 1 when a download fails", async () => {
    const cli = program({ createSource: () => memorySource({}) });

    await cli.parseAsync(
      ["fetch", "https://example.test/missing.png", "-o", dir, "--config", configPath],
      { from: "user" }
    );

    expect(process.exitCode).toBe(1);
  });

  it("search fails with AUTH_MISSING_KEY when no key is available", async () => {
    const cli = program({ env: {}, keyStore: new MemoryKeyStore() });

    await expect(
      cli.parseAsync(["search", "cats", "-o", dir, "--config", configPath], { from: "user" })
    ).rejects.toMatchObject({ code: "AUTH_MISSING_KEY" });
  });

  it("search downloads every result with the resolved key and endpoint", async () => {
    const createSearchClient = vi.fn(() => ({
      search: async () => [{ title: "Tabby", locator: "https://example.test/tabby.jpg" }],
    }));
    const cli = program({
      env: { HARVEST_ACCESS_KEY: "test-secret" },
      keyStore: new MemoryKeyStore(),
      createSearchClient,
      createSource: () => memorySource({ "https://example.test/tabby.jpg": "purr" }),
    });

    await cli.parseAsync(
      ["search", "tabby", "cats", "-o", dir, "--config", configPath, "--endpoint", "https://search.test/img"],
      { from: "user" }
    );

    expect(createSearchClient).toHaveBeenCalledWith({
      accessKey: "test-secret",
      endpoint: "https://search.test/img",
    });
    expect(await readFile(join(dir, "tabby.jpg"), "utf8")).toBe("purr");
    expect(process.exitCode).toBeUndefined();
  });
});
