import type { GateFactory } from "../admission-gate.js";
import { Channel } from "../channel.js";
import type { FetchedContent, OutcomeRecord } from "../outcome.js";
import type { ContentSource } from "../ports/content-source.js";
import { createSupervisor, type Supervisor } from "../supervisor.js";
import { createOrchestrator, type DescriptorSource, type OrchestratorReport } from "./orchestrator.js";
import { createSink } from "./sink.js";

export { createFetcher } from "./fetcher.js";
export { createOrchestrator } from "./orchestrator.js";
export type { DescriptorSource, Orchestrator, OrchestratorReport } from "./orchestrator.js";
export { createSink } from "./sink.js";
export type { Sink } from "./sink.js";

export interface PipelineOptions {
  descriptors: DescriptorSource;
  /** Concurrency budget for Fetchers */
  budget: number;
  outputDir: string;
  source: ContentSource;
  signal?: AbortSignal;
  supervisor?: Supervisor;
  resolvePath?: (desiredPath: string) => Promise<string>;
  createGate?: GateFactory;
}

export interface PipelineRun {
  /** Every component's outcome; ends after the Sink reported */
  records: AsyncIterable<OutcomeRecord>;
  /** Settles once the Orchestrator and Sink have both finished */
  done: Promise<OrchestratorReport>;
}

/**
 * Wire an Orchestrator, its Fetchers and a Sink together and start them.
 *
 * Both long-lived components register with the supervisor before either
 * starts, so the outcome stream cannot end early. Callers must consume
 * `records` when the supervisor was given a bounded capacity.
 */
export function startPipeline(options: PipelineOptions): PipelineRun {
  const supervisor = options.supervisor ?? createSupervisor();
  const content = new Channel<FetchedContent>(0);

  const orchestrator = createOrchestrator({
    budget: options.budget,
    source: options.source,
    content,
    supervisor,
    signal: options.signal,
    createGate: options.createGate,
  });
  const sink = createSink({
    outputDir: options.outputDir,
    supervisor,
    signal: options.signal,
    resolvePath: options.resolvePath,
  });

  const done = Promise.all([orchestrator.run(options.descriptors), sink.run(content)]).then(
    ([report]) => report
  );

  return { records: supervisor.records(), done };
}

/** Drain a record stream into an array */
export async function collectRecords(records: AsyncIterable<OutcomeRecord>): Promise<OutcomeRecord[]> {
  const collected: OutcomeRecord[] = [];
  for await (const record of records) {
    collected.push(record);
  }
  return collected;
}
