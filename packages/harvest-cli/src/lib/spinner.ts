import ora from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

/** The part of an ora spinner the download commands drive */
export interface Spinner {
  start(text?: string): void;
  stop(): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  text: string;
  readonly isSpinning: boolean;
}

export function createSilentSpinner(): Spinner {
  return {
    text: "",
    isSpinning: false,
    start: () => {},
    stop: () => {},
    succeed: () => {},
    fail: () => {},
  };
}

/**
 * An ora spinner on stderr, or a silent one in quiet or JSON mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return createSilentSpinner();
  }
  return ora({ text, stream: process.stderr });
}

export interface RunProgress {
  /** Count a finished fetch and refresh the spinner text */
  record(ok: boolean): void;
  readonly fetched: number;
  readonly failed: number;
}

export function trackProgress(spinner: Spinner, label: string): RunProgress {
  const counts = { fetched: 0, failed: 0 };

  return {
    record(ok) {
      counts[ok ? "fetched" : "failed"]++;
      spinner.text =
        `${label}: ${counts.fetched} fetched` +
        (counts.failed > 0 ? `, ${counts.failed} failed` : "");
    },
    get fetched() {
      return counts.fetched;
    },
    get failed() {
      return counts.failed;
    },
  };
}
