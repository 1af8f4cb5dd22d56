import chalk from "chalk";
import type { HarvestError } from "./types.js";
import { toHarvestError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";

/**
 * Greedy word wrap; continuation lines get `indent`.
 */
function wrap(text: string, width: number, indent: string): string[] {
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(" ")) {
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.map((l, i) => (i === 0 ? l : indent + l));
}

/**
 * Human-readable error block: headline, dimmed details, then the suggestion.
 */
export function formatError(error: HarvestError, width: number = 80): string[] {
  const [headline = "", ...rest] = wrap(error.message, width - 4, "  ");
  const lines = [
    "",
    `${chalk.red("✗")} ${chalk.red.bold(headline)}`,
    ...rest.map((l) => `  ${chalk.red(l)}`),
  ];

  if (error.details) {
    lines.push("", ...error.details.split("\n").map((d) => `  ${chalk.dim(d)}`));
  }
  if (error.suggestion) {
    lines.push("", `  ${chalk.yellow("→")} ${error.suggestion}`);
  }

  lines.push("");
  return lines;
}

/**
 * JSON shape of an error, without undefined fields.
 */
export function errorToJson(error: HarvestError): Record<string, string> {
  const fields: Record<string, string | undefined> = {
    code: error.code,
    category: error.category,
    message: error.message,
    suggestion: error.suggestion,
    details: error.details,
  };
  const json: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) json[key] = value;
  }
  return json;
}

/**
 * Print an error to stderr, as JSON when --json is active.
 */
export function renderError(error: unknown, json: boolean = isJsonMode()): void {
  const harvestError = toHarvestError(error);

  if (json) {
    console.error(JSON.stringify({ error: true, ...errorToJson(harvestError) }, null, 2));
    return;
  }

  const width = Math.min(process.stderr.columns || 80, 80);
  formatError(harvestError, width).forEach((line) => console.error(line));
}
