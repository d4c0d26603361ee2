import { Raw } from "../record/marshal.js";
import { createRecord, type DataRecord } from "../record/record.js";
import { BaseGatherer, type GatherDeps } from "./base.js";

export const CLUSTER_VERSION_NAME = "version";

/** Records the cluster version and publishes it to the shared cache. */
export class ClusterVersionGatherer extends BaseGatherer {
  readonly name = "clusterVersion";

  constructor(private readonly deps: GatherDeps) {
    super();
  }

  protected async collectRecords(): Promise<DataRecord[]> {
    const version = await this.deps.source.getClusterVersion(CLUSTER_VERSION_NAME);
    await this.deps.clusterVersion.update(version);
    return [createRecord("config/version", this.deps.encoder.encode("clusterversion", version))];
  }
}

/** Reads the cluster ID from the cached version; nothing is recorded until one has been seen. */
export class ClusterIDGatherer extends BaseGatherer {
  readonly name = "clusterID";

  constructor(private readonly deps: GatherDeps) {
    super();
  }

  protected async collectRecords(): Promise<DataRecord[]> {
    const version = await this.deps.clusterVersion.get();
    const clusterID = version?.spec?.clusterID;
    if (!clusterID) return [];
    return [createRecord("config/id", new Raw(clusterID))];
  }
}
