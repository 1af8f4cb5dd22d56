import prompts from "prompts";
import type { PromptService } from "../ports/prompt.js";

/**
 * Terminal prompts backed by the 'prompts' package.
 * Ctrl-C or Esc resolves to undefined instead of exiting.
 */
export const interactivePrompts: PromptService = {
  async password(message) {
    const answer: { key?: unknown } = await prompts({
      type: "password",
      name: "key",
      message,
      validate: (input: string) => (input.trim() ? true : "The key cannot be blank"),
    });
    return typeof answer.key === "string" ? answer.key : undefined;
  },
};
