/**
 * Reads secrets from the person at the terminal; faked in tests.
 */
export interface PromptService {
  /** Masked input; undefined when the prompt was dismissed */
  password(message: string): Promise<string | undefined>;
}
