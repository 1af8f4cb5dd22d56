import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { Command } from "commander";
import { checkConfigFile, EXAMPLE_CONFIG, registerConfigCommands } from "./config-cmd.js";
import { ConfigFileSchema } from "../lib/config.js";
import { parse as parseYaml } from "yaml";
import { initContext, resetContext } from "../lib/cli-context.js";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

describe("config-cmd", () => {
  let dir: string;
  let paths: { user: string; system: string };
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "harvest-config-cmd-"));
    paths = {
      user: join(dir, "home", ".config", "harvest", "config.yaml"),
      system: join(dir, "etc", "harvest", "config.yaml"),
    };
    program = new Command();
    program.exitOverride();
    registerConfigCommands(program, paths);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    process.exitCode = undefined;
    resetContext();
    rmSync(dir, { recursive: true, force: true });
  });

  it("ships an example config that passes validation", () => {
    expect(ConfigFileSchema.safeParse(parseYaml(EXAMPLE_CONFIG)).success).toBe(true);
  });

  describe("checkConfigFile", () => {
    it("returns nothing for a valid file", () => {
      const path = join(dir, "ok.yaml");
      writeFileSync(path, "search:\n  endpoint: https://images.example.test/search\n");

      expect(checkConfigFile(path)).toEqual([]);
    });

    it("returns the headline followed by each issue", () => {
      const path = join(dir, "bad.yaml");
      writeFileSync(path, "logging:\n  level: loud\n  json: false\n  color: true\n");

      const [headline, ...issues] = checkConfigFile(path);

      expect(headline).toBe(`Config file ${path} has errors`);
      expect(issues).toHaveLength(2);
    });
  });

  describe("config init", () => {
    it("creates the user config file when it does not exist", async () => {
      await program.parseAsync(["node", "test", "config", "init"]);

      expect(readFileSync(paths.user, "utf-8")).toBe(EXAMPLE_CONFIG);
      expect(consoleLogSpy).toHaveBeenCalledWith(`Created config file: ${paths.user}`);
    });

    it("creates the system config with --global", async () => {
      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(readFileSync(paths.system, "utf-8")).toBe(EXAMPLE_CONFIG);
    });

    it("does not overwrite an existing config file", async () => {
      mkdirSync(dirname(paths.user), { recursive: true });
      writeFileSync(paths.user, "logging:\n  level: warn\n");

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(readFileSync(paths.user, "utf-8")).toBe("logging:\n  level: warn\n");
      expect(consoleErrorSpy).toHaveBeenCalledWith(`Config file already exists: ${paths.user}`);
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config validate", () => {
    it("reports when no config files exist", async () => {
      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No configuration files found.");
      expect(process.exitCode).toBeUndefined();
    });

    it("accepts a valid file", async () => {
      const path = join(dir, "ok.yaml");
      writeFileSync(path, "download:\n  concurrency: 2\n");

      await program.parseAsync(["node", "test", "config", "validate", "-c", path]);

      expect(consoleLogSpy).toHaveBeenCalledWith("  ✓ Valid");
      expect(process.exitCode).toBeUndefined();
    });

    it("lists the problems in an invalid file", async () => {
      const path = join(dir, "bad.yaml");
      writeFileSync(path, "download:\n  concurrency: 0\n");

      await program.parseAsync(["node", "test", "config", "validate", "-c", path]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(`  ✗ Config file ${path} has errors`);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "    download.concurrency: Number must be greater than or equal to 1"
      );
      expect(process.exitCode).toBe(1);
    });

    it("fails for a missing explicit file", async () => {
      const path = join(dir, "missing.yaml");

      await program.parseAsync(["node", "test", "config", "validate", "-c", path]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(`File not found: ${path}`);
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config show", () => {
    it("prints the effective settings", async () => {
      const path = join(dir, "show.yaml");
      writeFileSync(path, "download:\n  concurrency: 7\n");

      await program.parseAsync(["node", "test", "config", "show", "-c", path]);

      expect(consoleLogSpy).toHaveBeenCalledWith(`Sources: ${path}`);
      expect(consoleLogSpy).toHaveBeenCalledWith("  concurrency:    7");
    });

    it("prints JSON in JSON mode", async () => {
      initContext(["node", "test", "--json"], {});
      const path = join(dir, "show.yaml");
      writeFileSync(path, "download:\n  outputDir: /srv/images\n");

      await program.parseAsync(["node", "test", "config", "show", "-c", path]);

      const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(output.success).toBe(true);
      expect(output.data.effective.outputDir).toBe("/srv/images");
      expect(output.data.sources).toEqual([path]);
    });
  });

  describe("config path", () => {
    it("shows both locations", async () => {
      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy).toHaveBeenCalledWith(`  ${paths.user} (not found)`);
      expect(consoleLogSpy).toHaveBeenCalledWith(`  ${paths.system} (not found)`);
    });
  });
});
