/**
 * cluster-gather: collects cluster state into anonymized records.
 *
 * @example
 * ```typescript
 * import { gather, KubectlSource, DirectoryRecorder } from "cluster-gather";
 *
 * const recorder = new DirectoryRecorder("./out");
 * const reports = await gather({ source: new KubectlSource(), recorder });
 * await recorder.flush();
 * ```
 */

import { loadVocabulary } from "./anonymize/vocabulary.js";
import { GatherAgent } from "./core/agent.js";
import { loadConfig, type GatherConfigInput } from "./core/config.js";
import type { CollectCallbacks } from "./core/context.js";
import type { GatherReport } from "./core/models.js";
import type { GathererName } from "./gatherers/index.js";
import type { Recorder } from "./record/recorder.js";
import type { ClusterSource } from "./source/types.js";

export interface GatherOptions {
  source: ClusterSource;
  recorder: Recorder;
  config?: GatherConfigInput;
  signal?: AbortSignal;
  callbacks?: CollectCallbacks;
  only?: GathererName[];
  /** Overrides the vocabulary file named in the config. */
  vocabulary?: string[];
}

/** Runs one batch. Rejects with CollectError when any gatherer or record failed. */
export async function gather(options: GatherOptions): Promise<GatherReport[]> {
  const config = loadConfig(options.config);
  const vocabulary = options.vocabulary ?? (await loadVocabulary(config.vocabularyFile));
  const agent = new GatherAgent({ source: options.source, config, vocabulary, only: options.only });
  return agent.run(options.recorder, options.signal ?? new AbortController().signal, options.callbacks);
}

export { GatherAgent, type GatherAgentOptions } from "./core/agent.js";
export { collect } from "./core/collect.js";
export { VersionedCache } from "./core/cache.js";
export { CollectContext, type CollectCallbacks } from "./core/context.js";
export { loadConfig, ConfigError, type GatherConfig, type GatherConfigInput } from "./core/config.js";
export { CollectError, FlushError, NotFoundError, SourceError, uniqueSorted, type Failure, type FailureKind } from "./core/errors.js";
export {
  DEFAULT_NAMESPACE,
  type GatherOutcome,
  type GatherReport,
  type GatherReportEntry,
  type Gatherer,
} from "./core/models.js";
export * from "./anonymize/index.js";
export * from "./record/index.js";
export * from "./recorder/index.js";
export { ALL_GATHERERS, createGatherers, isGathererName, type GathererName } from "./gatherers/index.js";
export { KubectlSource, type KubectlOptions } from "./source/kubectl.js";
export type * from "./source/types.js";
export { renderReport, type OutputFormat } from "./report/index.js";
export { logger, LogLevel, setLogHandler, setLogLevel } from "./utils/logger.js";
