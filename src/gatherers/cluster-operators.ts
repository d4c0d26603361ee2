import { createRecord, type DataRecord } from "../record/record.js";
import type { ClusterOperator, Pod } from "../source/types.js";
import { errorMessage } from "../core/errors.js";
import { logger } from "../utils/logger.js";
import { BaseGatherer, type GatherDeps } from "./base.js";
import { isHealthyOperator, isHealthyPod, namespacesForOperator } from "./health.js";

/**
 * Failing cluster operators, plus the failing pods in the namespaces those
 * operators list as related objects.
 */
export class ClusterOperatorGatherer extends BaseGatherer {
  readonly name = "clusterOperators";

  constructor(private readonly deps: GatherDeps) {
    super();
  }

  protected async collectRecords(): Promise<DataRecord[]> {
    const { source, encoder } = this.deps;
    const operators = await source.listClusterOperators();
    const records: DataRecord[] = [];

    for (const operator of operators) {
      if (!this.deps.allClusterOperators && isHealthyOperator(operator)) continue;
      records.push(
        createRecord(`config/clusteroperator/${operator.metadata?.name ?? ""}`, encoder.encode("clusteroperator", operator)),
      );
    }

    const visited = new Set<string>();
    for (const operator of operators) {
      if (isHealthyOperator(operator)) continue;
      for (const namespace of namespacesForOperator(operator)) {
        if (visited.has(namespace)) continue;
        visited.add(namespace);
        records.push(...(await this.failingPods(operator, namespace)));
      }
    }

    return records;
  }

  private async failingPods(operator: ClusterOperator, namespace: string): Promise<DataRecord[]> {
    let pods: Pod[];
    try {
      pods = await this.deps.source.listPods(namespace);
    } catch (err) {
      // Pods are supporting evidence; the operator record is still worth keeping.
      logger.warn(`Unable to list pods in namespace ${namespace} for failing operator ${operator.metadata?.name ?? ""}`, {
        error: errorMessage(err),
      });
      return [];
    }
    return pods
      .filter((pod) => !isHealthyPod(pod))
      .map((pod) =>
        createRecord(
          `config/pod/${pod.metadata?.namespace ?? namespace}/${pod.metadata?.name ?? ""}`,
          this.deps.encoder.encode("pod", pod),
        ),
      );
  }
}
