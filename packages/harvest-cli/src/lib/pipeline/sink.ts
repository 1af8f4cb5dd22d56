import { mkdir, open, rm, type FileHandle } from "fs/promises";
import { join } from "path";
import { pipeline } from "stream/promises";
import type { Channel } from "../channel.js";
import type { Supervisor } from "../supervisor.js";
import { resolveAvailablePath } from "../path-naming.js";
import { cancelled, toHarvestError, writeFailed, writesFailed } from "../errors/catalog.js";
import type { HarvestError } from "../errors/types.js";
import { failure, success, type FetchedContent, type Result } from "../outcome.js";

export interface SinkOptions {
  outputDir: string;
  supervisor: Supervisor;
  signal?: AbortSignal;
  /** Path-naming collaborator; must not create the file */
  resolvePath?: (desiredPath: string) => Promise<string>;
}

/** Times a name taken between resolving and opening is resolved again */
const MAX_OPEN_ATTEMPTS = 5;

export interface Sink {
  /** Drain the channel until it is closed, writing each item; never rejects */
  run(content: Channel<FetchedContent>): Promise<void>;
}

/**
 * Create the single writer of fetched content.
 *
 * Registers its emitter immediately so the outcome channel stays open until
 * the Sink reports. Writes happen one at a time in arrival order.
 */
export function createSink(options: SinkOptions): Sink {
  const { outputDir, supervisor, signal, resolvePath = resolveAvailablePath } = options;
  const emitter = supervisor.register("Sink");

  function isNameTaken(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "EEXIST";
  }

  /**
   * Exclusively create a free file. Another writer may take the resolved
   * name before the open, so EEXIST resolves the name again.
   */
  async function openFree(desired: string): Promise<{ target: string; handle: FileHandle }> {
    let lastTarget = desired;
    for (let attempt = 0; attempt < MAX_OPEN_ATTEMPTS; attempt++) {
      const target = await resolvePath(desired);
      try {
        return { target, handle: await open(target, "wx") };
      } catch (error) {
        if (!isNameTaken(error)) throw writeFailed(target, error);
        lastTarget = target;
      }
    }
    throw writeFailed(lastTarget, new Error(`name kept being taken after ${MAX_OPEN_ATTEMPTS} attempts`));
  }

  async function write(item: FetchedContent): Promise<string> {
    let opened: { target: string; handle: FileHandle };
    try {
      opened = await openFree(join(outputDir, item.suggestedName));
    } catch (error) {
      item.body.destroy();
      throw error;
    }

    const { target, handle } = opened;
    try {
      await pipeline(item.body, handle.createWriteStream(), { signal });
    } catch (error) {
      item.body.destroy();
      // Created by this Sink, so the partial file is ours to remove
      await rm(target, { force: true });
      throw signal?.aborted ? cancelled() : writeFailed(target, error);
    }
    return target;
  }

  async function run(content: Channel<FetchedContent>): Promise<void> {
    const written: string[] = [];
    const errors: HarvestError[] = [];
    let writable = true;

    try {
      await mkdir(outputDir, { recursive: true });
    } catch (error) {
      // Nothing can be written; keep draining so no Fetcher blocks forever
      errors.push(writeFailed(outputDir, error));
      writable = false;
    }

    for await (const item of content) {
      if (!writable || signal?.aborted) {
        item.body.destroy();
        continue;
      }
      try {
        written.push(await write(item));
      } catch (error) {
        const harvestError = toHarvestError(error);
        if (harvestError.code !== "CANCELLED") {
          errors.push(harvestError);
        }
      }
    }

    let result: Result<number>;
    if (errors.length > 0) {
      result = failure(writesFailed(errors));
    } else if (signal?.aborted) {
      result = failure(cancelled());
    } else {
      result = success(written.length);
    }

    await emitter.emit(result, { files: written });
  }

  return { run };
}
