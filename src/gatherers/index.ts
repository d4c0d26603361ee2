import type { Gatherer } from "../core/models.js";
import type { GatherDeps } from "./base.js";
import { ClusterOperatorGatherer } from "./cluster-operators.js";
import { ClusterIDGatherer, ClusterVersionGatherer } from "./cluster-version.js";
import { CLUSTER_CONFIG_NAME, ConfigObjectGatherer } from "./config-objects.js";
import { NodeGatherer } from "./nodes.js";

export const ALL_GATHERERS = [
  "clusterOperators",
  "nodes",
  "clusterVersion",
  "clusterID",
  "infrastructure",
  "network",
  "authentication",
  "featureGate",
  "oauth",
  "ingress",
  "proxy",
] as const;

export type GathererName = (typeof ALL_GATHERERS)[number];

export function isGathererName(name: string): name is GathererName {
  return (ALL_GATHERERS as readonly string[]).includes(name);
}

/**
 * Builds the gatherers in their fixed run order. clusterID reads what
 * clusterVersion cached, so it must come after it.
 */
export function createGatherers(deps: GatherDeps, only?: readonly GathererName[]): Gatherer[] {
  const { source, encoder } = deps;
  const registry: Record<GathererName, Gatherer> = {
    clusterOperators: new ClusterOperatorGatherer(deps),
    nodes: new NodeGatherer(deps),
    clusterVersion: new ClusterVersionGatherer(deps),
    clusterID: new ClusterIDGatherer(deps),
    infrastructure: new ConfigObjectGatherer("infrastructure", "config/infrastructure", "infrastructure", () =>
      source.getInfrastructure(CLUSTER_CONFIG_NAME), encoder),
    network: new ConfigObjectGatherer("network", "config/network", "generic", () =>
      source.getNetwork(CLUSTER_CONFIG_NAME), encoder),
    authentication: new ConfigObjectGatherer("authentication", "config/authentication", "generic", () =>
      source.getAuthentication(CLUSTER_CONFIG_NAME), encoder),
    featureGate: new ConfigObjectGatherer("featureGate", "config/featuregate", "featuregate", () =>
      source.getFeatureGate(CLUSTER_CONFIG_NAME), encoder),
    oauth: new ConfigObjectGatherer("oauth", "config/oauth", "generic", () =>
      source.getOAuth(CLUSTER_CONFIG_NAME), encoder),
    ingress: new ConfigObjectGatherer("ingress", "config/ingress", "ingress", () =>
      source.getIngress(CLUSTER_CONFIG_NAME), encoder),
    proxy: new ConfigObjectGatherer("proxy", "config/proxy", "proxy", () =>
      source.getProxy(CLUSTER_CONFIG_NAME), encoder),
  };

  const selected = only ? new Set<GathererName>(only) : null;
  return ALL_GATHERERS.filter((name) => !selected || selected.has(name)).map((name) => registry[name]);
}

export { BaseGatherer, type GatherDeps } from "./base.js";
export { isHealthyNode, isHealthyOperator, isHealthyPod, namespacesForOperator } from "./health.js";
