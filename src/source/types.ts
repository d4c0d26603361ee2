import { z } from "zod";

// Objects carry far more fields than the pipeline reads. Every schema passes
// unknown keys through so the serialized record keeps them.

export const objectMetaSchema = z
  .object({
    name: z.string().optional(),
    namespace: z.string().optional(),
    resourceVersion: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

const conditionSchema = z
  .object({
    type: z.string(),
    status: z.string(),
  })
  .passthrough();

const typeMeta = {
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: objectMetaSchema.optional(),
};

export const genericObjectSchema = z.object(typeMeta).passthrough();

export const clusterOperatorSchema = z
  .object({
    ...typeMeta,
    status: z
      .object({
        conditions: z.array(conditionSchema).optional(),
        relatedObjects: z
          .array(
            z
              .object({
                group: z.string().optional(),
                resource: z.string(),
                name: z.string(),
                namespace: z.string().optional(),
              })
              .passthrough(),
          )
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const clusterVersionSchema = z
  .object({
    ...typeMeta,
    spec: z
      .object({
        clusterID: z.string().optional(),
        upstream: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const infrastructureSchema = z
  .object({
    ...typeMeta,
    status: z
      .object({
        apiServerURL: z.string().optional(),
        apiServerInternalURI: z.string().optional(),
        etcdDiscoveryDomain: z.string().optional(),
        infrastructureName: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const ingressSchema = z
  .object({
    ...typeMeta,
    spec: z.object({ domain: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const proxyFieldsSchema = z
  .object({
    httpProxy: z.string().optional(),
    httpsProxy: z.string().optional(),
    noProxy: z.string().optional(),
  })
  .passthrough();

export const proxySchema = z
  .object({
    ...typeMeta,
    spec: proxyFieldsSchema.extend({ readinessEndpoints: z.array(z.string()).optional() }).optional(),
    status: proxyFieldsSchema.optional(),
  })
  .passthrough();

export const nodeSchema = z
  .object({
    ...typeMeta,
    status: z
      .object({
        conditions: z.array(conditionSchema).optional(),
        addresses: z.array(z.object({ type: z.string(), address: z.string() }).passthrough()).optional(),
        nodeInfo: z
          .object({
            bootID: z.string().optional(),
            systemUUID: z.string().optional(),
            machineID: z.string().optional(),
          })
          .passthrough()
          .optional(),
        images: z.array(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const terminatedSchema = z.object({ exitCode: z.number() }).passthrough();

const containerStateSchema = z
  .object({
    terminated: terminatedSchema.optional(),
  })
  .passthrough();

const containerStatusSchema = z
  .object({
    name: z.string().optional(),
    state: containerStateSchema.optional(),
    lastState: containerStateSchema.optional(),
  })
  .passthrough();

export const podSchema = z
  .object({
    ...typeMeta,
    status: z
      .object({
        phase: z.string().optional(),
        initContainerStatuses: z.array(containerStatusSchema).optional(),
        containerStatuses: z.array(containerStatusSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const listSchema = <T extends z.ZodTypeAny>(item: T) =>
  z
    .object({
      items: z.array(item).default([]),
    })
    .passthrough();

export type ObjectMeta = z.infer<typeof objectMetaSchema>;
export type GenericObject = z.infer<typeof genericObjectSchema>;
export type ClusterOperator = z.infer<typeof clusterOperatorSchema>;
export type ClusterVersion = z.infer<typeof clusterVersionSchema>;
export type Infrastructure = z.infer<typeof infrastructureSchema>;
export type FeatureGate = GenericObject;
export type Ingress = z.infer<typeof ingressSchema>;
export type Proxy = z.infer<typeof proxySchema>;
export type Node = z.infer<typeof nodeSchema>;
export type Pod = z.infer<typeof podSchema>;
export type ContainerStatus = z.infer<typeof containerStatusSchema>;

/**
 * Read access to the cluster objects the gatherers need. A missing object is
 * reported by rejecting with NotFoundError.
 */
export interface ClusterSource {
  listClusterOperators(): Promise<ClusterOperator[]>;
  listNodes(): Promise<Node[]>;
  listPods(namespace: string): Promise<Pod[]>;
  getClusterVersion(name: string): Promise<ClusterVersion>;
  getInfrastructure(name: string): Promise<Infrastructure>;
  getNetwork(name: string): Promise<GenericObject>;
  getAuthentication(name: string): Promise<GenericObject>;
  getFeatureGate(name: string): Promise<FeatureGate>;
  getOAuth(name: string): Promise<GenericObject>;
  getIngress(name: string): Promise<Ingress>;
  getProxy(name: string): Promise<Proxy>;
}
