import type { ClusterOperator, ContainerStatus, Node, Pod } from "../source/types.js";

export function isHealthyOperator(operator: ClusterOperator): boolean {
  for (const condition of operator.status?.conditions ?? []) {
    if (condition.type === "Degraded" && condition.status === "True") return false;
    if (condition.type === "Available" && condition.status === "False") return false;
  }
  return true;
}

/** Namespaces the operator lists as related objects. */
export function namespacesForOperator(operator: ClusterOperator): string[] {
  return (operator.status?.relatedObjects ?? []).filter((ref) => ref.resource === "namespaces").map((ref) => ref.name);
}

export function isHealthyNode(node: Node): boolean {
  for (const condition of node.status?.conditions ?? []) {
    if (condition.type === "Ready" && condition.status !== "True") return false;
  }
  return true;
}

function hasFailedContainer(statuses: readonly ContainerStatus[] | undefined): boolean {
  return (statuses ?? []).some((status) => {
    const last = status.lastState?.terminated;
    const current = status.state?.terminated;
    return (last !== undefined && last.exitCode !== 0) || (current !== undefined && current.exitCode !== 0);
  });
}

export function isHealthyPod(pod: Pod): boolean {
  // A pending pod's status is what explains why it has not been scheduled.
  if (pod.status?.phase === "Pending") return false;
  return !hasFailedContainer(pod.status?.initContainerStatuses) && !hasFailedContainer(pod.status?.containerStatuses);
}
