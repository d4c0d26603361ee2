import type { ObjectEncoder } from "../anonymize/encoders.js";
import type { VersionedCache } from "../core/cache.js";
import { isNotFound } from "../core/errors.js";
import type { GatherOutcome, Gatherer } from "../core/models.js";
import type { DataRecord } from "../record/record.js";
import type { ClusterSource, ClusterVersion } from "../source/types.js";
import { logger } from "../utils/logger.js";

/**
 * One attempt at a single data source. A missing object yields an empty,
 * successful outcome; any other failure discards whatever was collected and
 * yields exactly one error.
 */
export abstract class BaseGatherer implements Gatherer {
  abstract readonly name: string;

  protected abstract collectRecords(): Promise<DataRecord[]>;

  async gather(): Promise<GatherOutcome> {
    try {
      return { records: await this.collectRecords(), errors: [] };
    } catch (err) {
      if (isNotFound(err)) {
        logger.debug(`${this.name}: ${err.message}, skipping`);
        return { records: [], errors: [] };
      }
      return { records: [], errors: [err instanceof Error ? err : new Error(String(err))] };
    }
  }
}

/** What the gatherers of one agent share. */
export interface GatherDeps {
  source: ClusterSource;
  encoder: ObjectEncoder;
  clusterVersion: VersionedCache<ClusterVersion>;
  allClusterOperators?: boolean;
}
