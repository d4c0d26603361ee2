import { ObjectEncoder } from "../anonymize/encoders.js";
import { UrlAnonymizer } from "../anonymize/url.js";
import { createGatherers, type GathererName } from "../gatherers/index.js";
import type { Recorder } from "../record/recorder.js";
import type { ClusterSource, ClusterVersion } from "../source/types.js";
import { VersionedCache } from "./cache.js";
import { collect } from "./collect.js";
import type { GatherConfig } from "./config.js";
import { CollectContext, type CollectCallbacks } from "./context.js";
import type { GatherReport, Gatherer } from "./models.js";

export interface GatherAgentOptions {
  source: ClusterSource;
  config: GatherConfig;
  /** Words the URL anonymizer may leave in place. */
  vocabulary: readonly string[];
  only?: readonly GathererName[];
}

/**
 * Owns one gatherer set and the cluster-version cache they share. The cache
 * outlives a single batch so callers can read the last seen version while the
 * next batch runs.
 */
export class GatherAgent {
  readonly clusterVersion = new VersionedCache<ClusterVersion>();
  readonly gatherers: readonly Gatherer[];
  private readonly namespace: string;

  constructor(opts: GatherAgentOptions) {
    const encoder = new ObjectEncoder({
      urls: new UrlAnonymizer(opts.vocabulary),
      trustedKeyDomains: opts.config.trustedKeyDomains,
    });
    this.gatherers = createGatherers(
      {
        source: opts.source,
        encoder,
        clusterVersion: this.clusterVersion,
        allClusterOperators: opts.config.allClusterOperators,
      },
      opts.only,
    );
    this.namespace = opts.config.namespace;
  }

  run(recorder: Recorder, signal: AbortSignal, callbacks?: CollectCallbacks): Promise<GatherReport[]> {
    return collect(signal, recorder, this.gatherers, new CollectContext({ namespace: this.namespace, callbacks }));
  }

  /** The last cluster version observed, if any. */
  lastClusterVersion(): Promise<ClusterVersion | undefined> {
    return this.clusterVersion.get();
  }
}
