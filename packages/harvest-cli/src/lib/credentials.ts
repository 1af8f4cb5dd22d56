import Conf from "conf";
import { missingAccessKey } from "./errors/catalog.js";

export interface StoredCredentials {
  accessKey?: string;
  savedAt?: number;
}

export interface KeyStore {
  getKey(): StoredCredentials;
  setKey(accessKey: string): void;
  clearKey(): void;
}

export class ConfKeyStore implements KeyStore {
  private readonly conf = new Conf<StoredCredentials>({ projectName: "harvest-cli" });

  getKey(): StoredCredentials {
    return {
      accessKey: this.conf.get("accessKey"),
      savedAt: this.conf.get("savedAt"),
    };
  }

  setKey(accessKey: string): void {
    const trimmed = accessKey.trim();
    if (!trimmed) {
      throw new Error("Refusing to store an empty access key.");
    }
    this.conf.set({ accessKey: trimmed, savedAt: Date.now() });
  }

  clearKey(): void {
    this.conf.clear();
  }

  get path(): string {
    return this.conf.path;
  }
}

export type KeySource = "flag" | "env" | "store";

export interface ResolveAccessKeyOptions {
  flag?: string;
  env?: NodeJS.ProcessEnv;
  store?: KeyStore;
}

/**
 * Pick the access key for a search: --access-key, then HARVEST_ACCESS_KEY,
 * then the stored key. Throws AUTH_MISSING_KEY when none is set.
 */
export function resolveAccessKey({
  flag,
  env = process.env,
  store,
}: ResolveAccessKeyOptions): { accessKey: string; source: KeySource } {
  if (flag?.trim()) {
    return { accessKey: flag.trim(), source: "flag" };
  }

  const fromEnv = env.HARVEST_ACCESS_KEY?.trim();
  if (fromEnv) {
    return { accessKey: fromEnv, source: "env" };
  }

  const stored = store?.getKey().accessKey;
  if (stored) {
    return { accessKey: stored, source: "store" };
  }

  throw missingAccessKey();
}

/** Show only the last four characters of a key */
export function maskKey(accessKey: string): string {
  if (accessKey.length <= 4) {
    return "*".repeat(accessKey.length);
  }
  return `${"*".repeat(Math.min(accessKey.length - 4, 8))}${accessKey.slice(-4)}`;
}
