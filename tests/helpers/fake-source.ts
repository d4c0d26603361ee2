import { NotFoundError } from "../../src/core/errors.js";
import type {
  ClusterOperator,
  ClusterSource,
  ClusterVersion,
  FeatureGate,
  GenericObject,
  Infrastructure,
  Ingress,
  Node,
  Pod,
  Proxy,
} from "../../src/source/types.js";

/** In-memory cluster. A missing singleton rejects with NotFoundError; an Error value rejects with it. */
export interface FakeCluster {
  clusterOperators?: ClusterOperator[] | Error;
  nodes?: Node[] | Error;
  pods?: Record<string, Pod[] | Error>;
  clusterVersion?: ClusterVersion | Error;
  infrastructure?: Infrastructure | Error;
  network?: GenericObject | Error;
  authentication?: GenericObject | Error;
  featureGate?: FeatureGate | Error;
  oauth?: GenericObject | Error;
  ingress?: Ingress | Error;
  proxy?: Proxy | Error;
}

async function resolve<T>(value: T | Error | undefined, resource: string, name?: string): Promise<T> {
  if (value instanceof Error) throw value;
  if (value === undefined) throw new NotFoundError(resource, name);
  return value;
}

export class FakeSource implements ClusterSource {
  readonly calls: string[] = [];

  constructor(private readonly cluster: FakeCluster = {}) {}

  listClusterOperators(): Promise<ClusterOperator[]> {
    this.calls.push("clusteroperators");
    return resolve(this.cluster.clusterOperators ?? [], "clusteroperators");
  }

  listNodes(): Promise<Node[]> {
    this.calls.push("nodes");
    return resolve(this.cluster.nodes ?? [], "nodes");
  }

  listPods(namespace: string): Promise<Pod[]> {
    this.calls.push(`pods/${namespace}`);
    return resolve(this.cluster.pods?.[namespace] ?? [], "pods");
  }

  getClusterVersion(name: string): Promise<ClusterVersion> {
    this.calls.push(`clusterversion/${name}`);
    return resolve(this.cluster.clusterVersion, "clusterversions", name);
  }

  getInfrastructure(name: string): Promise<Infrastructure> {
    this.calls.push(`infrastructure/${name}`);
    return resolve(this.cluster.infrastructure, "infrastructures", name);
  }

  getNetwork(name: string): Promise<GenericObject> {
    this.calls.push(`network/${name}`);
    return resolve(this.cluster.network, "networks", name);
  }

  getAuthentication(name: string): Promise<GenericObject> {
    this.calls.push(`authentication/${name}`);
    return resolve(this.cluster.authentication, "authentications", name);
  }

  getFeatureGate(name: string): Promise<FeatureGate> {
    this.calls.push(`featuregate/${name}`);
    return resolve(this.cluster.featureGate, "featuregates", name);
  }

  getOAuth(name: string): Promise<GenericObject> {
    this.calls.push(`oauth/${name}`);
    return resolve(this.cluster.oauth, "oauths", name);
  }

  getIngress(name: string): Promise<Ingress> {
    this.calls.push(`ingress/${name}`);
    return resolve(this.cluster.ingress, "ingresses", name);
  }

  getProxy(name: string): Promise<Proxy> {
    this.calls.push(`proxy/${name}`);
    return resolve(this.cluster.proxy, "proxies", name);
  }
}
