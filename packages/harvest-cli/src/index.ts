#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { initContext } from "./lib/cli-context.js";
import { renderError } from "./lib/errors/renderer.js";
import { registerDownloadCommands } from "./modules/download.js";
import { registerKeyCommands } from "./modules/key.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(fileURLToPath(new URL("../package.json", import.meta.url)), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

export function createProgram(): Command {
  const program = new Command()
    .name("harvest")
    .description("Search for images and download them with bounded concurrency")
    .version(readVersion())
    .option("--json", "Print outcome records as NDJSON")
    .option("-q, --quiet", "Hide spinners and progress")
    .option("--no-input", "Never prompt; fail when input would be needed");

  registerDownloadCommands(program);
  registerKeyCommands(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    renderError(error);
    process.exitCode = 1;
  }
}

void main();
