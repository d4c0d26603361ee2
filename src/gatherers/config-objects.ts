import type { KindObjects, ObjectEncoder, ObjectKind } from "../anonymize/encoders.js";
import { createRecord, type DataRecord } from "../record/record.js";
import { BaseGatherer } from "./base.js";

/** Cluster-scoped configuration singletons are all named "cluster". */
export const CLUSTER_CONFIG_NAME = "cluster";

export class ConfigObjectGatherer<K extends ObjectKind> extends BaseGatherer {
  constructor(
    readonly name: string,
    private readonly recordName: string,
    private readonly kind: K,
    private readonly fetch: () => Promise<KindObjects[K]>,
    private readonly encoder: ObjectEncoder,
  ) {
    super();
  }

  protected async collectRecords(): Promise<DataRecord[]> {
    const object = await this.fetch();
    return [createRecord(this.recordName, this.encoder.encode(this.kind, object))];
  }
}
