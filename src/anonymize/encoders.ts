import type { Marshalable } from "../record/marshal.js";
import type {
  ClusterOperator,
  ClusterVersion,
  FeatureGate,
  GenericObject,
  Infrastructure,
  Ingress,
  Node,
  Pod,
  Proxy,
} from "../source/types.js";
import { anonymizeCsv, anonymizeList, DEFAULT_TRUSTED_KEY_DOMAINS, isTrustedKey, maskString } from "./strings.js";
import type { UrlAnonymizer } from "./url.js";

export interface KindObjects {
  clusteroperator: ClusterOperator;
  node: Node;
  pod: Pod;
  infrastructure: Infrastructure;
  clusterversion: ClusterVersion;
  featuregate: FeatureGate;
  ingress: Ingress;
  proxy: Proxy;
  generic: GenericObject;
}

export type ObjectKind = keyof KindObjects;

export interface AnonymizeOptions {
  urls: UrlAnonymizer;
  trustedKeyDomains?: readonly string[];
}

type Mutator<T> = (object: T, options: AnonymizeOptions) => void;

const CONFIG_V1 = "config.openshift.io/v1";

const TYPE_META: Partial<Record<ObjectKind, { apiVersion: string; kind: string }>> = {
  clusteroperator: { apiVersion: CONFIG_V1, kind: "ClusterOperator" },
  node: { apiVersion: "v1", kind: "Node" },
  pod: { apiVersion: "v1", kind: "Pod" },
  infrastructure: { apiVersion: CONFIG_V1, kind: "Infrastructure" },
  clusterversion: { apiVersion: CONFIG_V1, kind: "ClusterVersion" },
  featuregate: { apiVersion: CONFIG_V1, kind: "FeatureGate" },
  ingress: { apiVersion: CONFIG_V1, kind: "Ingress" },
  proxy: { apiVersion: CONFIG_V1, kind: "Proxy" },
};

const unchanged: Mutator<unknown> = () => {};

function anonymizeNode(node: Node, { urls, trustedKeyDomains = DEFAULT_TRUSTED_KEY_DOMAINS }: AnonymizeOptions): void {
  const annotations = node.metadata?.annotations;
  if (annotations) {
    for (const key of Object.keys(annotations)) {
      if (!isTrustedKey(key, trustedKeyDomains)) annotations[key] = "";
    }
  }
  const labels = node.metadata?.labels;
  if (labels) {
    for (const [key, value] of Object.entries(labels)) {
      if (!isTrustedKey(key, trustedKeyDomains)) labels[key] = maskString(value);
    }
  }

  const status = node.status;
  if (!status) return;
  for (const address of status.addresses ?? []) {
    address.address = urls.anonymize(address.address);
  }
  const info = status.nodeInfo;
  if (info) {
    if (info.bootID !== undefined) info.bootID = maskString(info.bootID);
    if (info.systemUUID !== undefined) info.systemUUID = maskString(info.systemUUID);
    if (info.machineID !== undefined) info.machineID = maskString(info.machineID);
  }
  // Image lists are unbounded and say little about cluster health.
  delete status.images;
}

function anonymizeInfrastructure(infra: Infrastructure, { urls }: AnonymizeOptions): void {
  const status = infra.status;
  if (!status) return;
  if (status.apiServerURL !== undefined) status.apiServerURL = urls.anonymize(status.apiServerURL);
  if (status.etcdDiscoveryDomain !== undefined) status.etcdDiscoveryDomain = urls.anonymize(status.etcdDiscoveryDomain);
  if (status.infrastructureName !== undefined) status.infrastructureName = urls.anonymize(status.infrastructureName);
  if (status.apiServerInternalURI !== undefined) {
    status.apiServerInternalURI = urls.anonymize(status.apiServerInternalURI);
  }
}

function anonymizeClusterVersion(version: ClusterVersion, { urls }: AnonymizeOptions): void {
  if (version.spec?.upstream !== undefined) version.spec.upstream = urls.anonymize(version.spec.upstream);
}

function anonymizeIngress(ingress: Ingress, { urls }: AnonymizeOptions): void {
  if (ingress.spec?.domain !== undefined) ingress.spec.domain = urls.anonymize(ingress.spec.domain);
}

interface ProxyFields {
  httpProxy?: string;
  httpsProxy?: string;
  noProxy?: string;
}

function anonymizeProxyFields(fields: ProxyFields | undefined, urls: UrlAnonymizer): void {
  if (!fields) return;
  if (fields.httpProxy !== undefined) fields.httpProxy = anonymizeCsv(urls, fields.httpProxy);
  if (fields.httpsProxy !== undefined) fields.httpsProxy = anonymizeCsv(urls, fields.httpsProxy);
  if (fields.noProxy !== undefined) fields.noProxy = anonymizeCsv(urls, fields.noProxy);
}

function anonymizeProxy(proxy: Proxy, { urls }: AnonymizeOptions): void {
  anonymizeProxyFields(proxy.spec, urls);
  if (proxy.spec?.readinessEndpoints) {
    proxy.spec.readinessEndpoints = anonymizeList(urls, proxy.spec.readinessEndpoints);
  }
  anonymizeProxyFields(proxy.status, urls);
}

const MUTATORS: { [K in ObjectKind]: Mutator<KindObjects[K]> } = {
  clusteroperator: unchanged,
  node: anonymizeNode,
  // Pods come from platform namespaces and carry no user data.
  pod: unchanged,
  infrastructure: anonymizeInfrastructure,
  clusterversion: anonymizeClusterVersion,
  featuregate: unchanged,
  ingress: anonymizeIngress,
  proxy: anonymizeProxy,
  generic: unchanged,
};

/**
 * JSON content for one cluster object. The kind's anonymization step runs on a
 * private deep copy at marshal time, so the gathered object is never modified
 * and marshalling twice yields identical bytes.
 */
export class AnonymizedObject<K extends ObjectKind> implements Marshalable {
  readonly extension = "json";

  constructor(
    readonly kind: K,
    private readonly object: KindObjects[K],
    private readonly options: AnonymizeOptions,
  ) {}

  async marshal(signal?: AbortSignal): Promise<Buffer> {
    signal?.throwIfAborted();
    return Buffer.from(JSON.stringify(this.anonymized()), "utf-8");
  }

  /** The object as it will be encoded, with type metadata filled in. */
  anonymized(): GenericObject {
    const copy = structuredClone(this.object);
    const mutate: Mutator<KindObjects[K]> = MUTATORS[this.kind];
    mutate(copy, this.options);

    const encoded: GenericObject = copy;
    const { apiVersion, kind, ...body } = encoded;
    const meta = TYPE_META[this.kind];
    return {
      apiVersion: apiVersion ?? meta?.apiVersion,
      kind: kind ?? meta?.kind,
      ...body,
    };
  }
}

/** Binds anonymizer options once so gatherers only name the kind. */
export class ObjectEncoder {
  constructor(private readonly options: AnonymizeOptions) {}

  encode<K extends ObjectKind>(kind: K, object: KindObjects[K]): AnonymizedObject<K> {
    return new AnonymizedObject(kind, object, this.options);
  }
}
