/**
 * Output flags shared by every command, read once before commander parses.
 * Commands reach them through the accessors below instead of threading options.
 */

export interface CLIContext {
  /** NDJSON records on stdout; implies quiet */
  json: boolean;
  /** No spinner */
  quiet: boolean;
  /** Never prompt */
  noInput: boolean;
}

const DEFAULT_CONTEXT: Readonly<CLIContext> = { json: false, quiet: false, noInput: false };

let current: CLIContext = { ...DEFAULT_CONTEXT };

const flagSet = (value: string | undefined) => value === "1" || value === "true";

export function parseContext(argv: readonly string[], env: NodeJS.ProcessEnv): CLIContext {
  const has = (...flags: string[]) => flags.some((flag) => argv.includes(flag));
  const json = has("--json") || flagSet(env.HARVEST_JSON);

  return {
    json,
    quiet: json || has("--quiet", "-q") || flagSet(env.HARVEST_QUIET),
    noInput: has("--no-input") || Boolean(env.CI),
  };
}

export function initContext(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  current = parseContext(argv, env);
  return current;
}

export function isJsonMode(): boolean {
  return current.json;
}

export function isQuietMode(): boolean {
  return current.quiet;
}

/** True under --no-input or CI, or when stdin is not a terminal */
export function isNonInteractive(): boolean {
  return current.noInput || !process.stdin.isTTY;
}

/** For tests */
export function resetContext(): void {
  current = { ...DEFAULT_CONTEXT };
}
