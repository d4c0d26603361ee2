import { createRecord, type DataRecord } from "../record/record.js";
import { BaseGatherer, type GatherDeps } from "./base.js";
import { isHealthyNode } from "./health.js";

export class NodeGatherer extends BaseGatherer {
  readonly name = "nodes";

  constructor(private readonly deps: GatherDeps) {
    super();
  }

  protected async collectRecords(): Promise<DataRecord[]> {
    const nodes = await this.deps.source.listNodes();
    return nodes
      .filter((node) => !isHealthyNode(node))
      .map((node) => createRecord(`config/node/${node.metadata?.name ?? ""}`, this.deps.encoder.encode("node", node)));
  }
}
