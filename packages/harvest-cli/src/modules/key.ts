import { Command } from "commander";
import chalk from "chalk";
import { ConfKeyStore, maskKey, resolveAccessKey, type KeyStore } from "../lib/credentials.js";
import { isNonInteractive } from "../lib/cli-context.js";
import { maybeOutputJson, type KeyStatusJson } from "../lib/json-output.js";
import { missingArgument } from "../lib/errors/catalog.js";
import { isHarvestError } from "../lib/errors/types.js";
import type { PromptService } from "../lib/ports/prompt.js";
import { interactivePrompts } from "../lib/adapters/index.js";

export interface SetKeyOptions {
  key?: string;
}

export interface KeyDeps {
  store?: KeyStore;
  prompts?: PromptService;
  env?: NodeJS.ProcessEnv;
  nonInteractive?: () => boolean;
}

/**
 * Pick the key to store: --key, else a password prompt.
 */
export async function resolveKeyInput(
  options: SetKeyOptions,
  prompts: PromptService = interactivePrompts,
  nonInteractive: () => boolean = isNonInteractive
): Promise<string> {
  if (options.key?.trim()) return options.key.trim();
  if (nonInteractive()) {
    throw missingArgument("--key", "key set");
  }

  const key = await prompts.password("Paste your search access key");
  if (!key?.trim()) {
    throw missingArgument("an access key", "key set");
  }
  return key.trim();
}

/**
 * Describe which key a search would use right now.
 */
export function keyStatus(store: KeyStore, env: NodeJS.ProcessEnv): KeyStatusJson {
  try {
    const { accessKey, source } = resolveAccessKey({ env, store });
    const savedAt = source === "store" ? store.getKey().savedAt : undefined;
    return {
      configured: true,
      source,
      key: maskKey(accessKey),
      ...(savedAt !== undefined && { savedAt: new Date(savedAt).toISOString() }),
    };
  } catch (error) {
    if (isHarvestError(error) && error.code === "AUTH_MISSING_KEY") {
      return { configured: false };
    }
    throw error;
  }
}

export function registerKeyCommands(program: Command, deps: KeyDeps = {}): void {
  const getStore = () => deps.store ?? new ConfKeyStore();
  const key = program.command("key").description("Manage the stored search access key");

  key
    .command("set")
    .description("Store an access key for future searches")
    .option("--key <key>", "Access key (prompted for when omitted)")
    .action(async (options: SetKeyOptions) => {
      const value = await resolveKeyInput(
        options,
        deps.prompts,
        deps.nonInteractive
      );
      getStore().setKey(value);
      if (!maybeOutputJson({ stored: true, key: maskKey(value) })) {
        console.log(chalk.green(`Access key ${maskKey(value)} saved locally.`));
      }
    });

  key
    .command("clear")
    .description("Remove the stored access key")
    .action(() => {
      getStore().clearKey();
      if (!maybeOutputJson({ cleared: true })) {
        console.log(chalk.green("Stored access key removed."));
      }
    });

  key
    .command("status")
    .description("Show which access key searches will use")
    .action(() => {
      const status = keyStatus(getStore(), deps.env ?? process.env);
      if (maybeOutputJson(status)) return;

      if (!status.configured) {
        console.log(chalk.yellow("No access key configured."));
        console.log(chalk.gray("Run `harvest key set` or set HARVEST_ACCESS_KEY."));
        return;
      }
      console.log(chalk.cyan(`Key:    ${status.key}`));
      console.log(chalk.cyan(`Source: ${status.source}`));
      if (status.savedAt) console.log(chalk.cyan(`Saved:  ${status.savedAt}`));
    });
}
