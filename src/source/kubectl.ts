import type { z } from "zod";
import { NotFoundError, SourceError } from "../core/errors.js";
import { exec, type ExecOptions, type ShellResult } from "../utils/shell.js";
import { logger } from "../utils/logger.js";
import {
  clusterOperatorSchema,
  clusterVersionSchema,
  genericObjectSchema,
  infrastructureSchema,
  ingressSchema,
  listSchema,
  nodeSchema,
  podSchema,
  proxySchema,
  type ClusterOperator,
  type ClusterSource,
  type ClusterVersion,
  type FeatureGate,
  type GenericObject,
  type Infrastructure,
  type Ingress,
  type Node,
  type Pod,
  type Proxy,
} from "./types.js";

export type Runner = (file: string, args: readonly string[], opts?: ExecOptions) => Promise<ShellResult>;

export interface KubectlOptions {
  kubectl?: string;
  kubeconfig?: string;
  context?: string;
  timeoutMs?: number;
}

const CONFIG_GROUP = "config.openshift.io";

const NOT_FOUND_MARKERS = ["(NotFound)", "doesn't have a resource type"];

/** Reads cluster objects by shelling out to `kubectl get -o json`. */
export class KubectlSource implements ClusterSource {
  private readonly kubectl: string;

  constructor(
    private readonly opts: KubectlOptions = {},
    private readonly run: Runner = exec,
  ) {
    this.kubectl = opts.kubectl ?? "kubectl";
  }

  async listClusterOperators(): Promise<ClusterOperator[]> {
    return (await this.get(`clusteroperators.${CONFIG_GROUP}`, listSchema(clusterOperatorSchema))).items;
  }

  async listNodes(): Promise<Node[]> {
    return (await this.get("nodes", listSchema(nodeSchema))).items;
  }

  async listPods(namespace: string): Promise<Pod[]> {
    return (await this.get("pods", listSchema(podSchema), undefined, namespace)).items;
  }

  getClusterVersion(name: string): Promise<ClusterVersion> {
    return this.get(`clusterversions.${CONFIG_GROUP}`, clusterVersionSchema, name);
  }

  getInfrastructure(name: string): Promise<Infrastructure> {
    return this.get(`infrastructures.${CONFIG_GROUP}`, infrastructureSchema, name);
  }

  getNetwork(name: string): Promise<GenericObject> {
    return this.get(`networks.${CONFIG_GROUP}`, genericObjectSchema, name);
  }

  getAuthentication(name: string): Promise<GenericObject> {
    return this.get(`authentications.${CONFIG_GROUP}`, genericObjectSchema, name);
  }

  getFeatureGate(name: string): Promise<FeatureGate> {
    return this.get(`featuregates.${CONFIG_GROUP}`, genericObjectSchema, name);
  }

  getOAuth(name: string): Promise<GenericObject> {
    return this.get(`oauths.${CONFIG_GROUP}`, genericObjectSchema, name);
  }

  getIngress(name: string): Promise<Ingress> {
    return this.get(`ingresses.${CONFIG_GROUP}`, ingressSchema, name);
  }

  getProxy(name: string): Promise<Proxy> {
    return this.get(`proxies.${CONFIG_GROUP}`, proxySchema, name);
  }

  args(resource: string, name?: string, namespace?: string): string[] {
    const args = ["get", resource];
    if (name) args.push(name);
    if (namespace) args.push("--namespace", namespace);
    args.push("--output", "json");
    if (this.opts.kubeconfig) args.push("--kubeconfig", this.opts.kubeconfig);
    if (this.opts.context) args.push("--context", this.opts.context);
    return args;
  }

  private async get<S extends z.ZodTypeAny>(
    resource: string,
    schema: S,
    name?: string,
    namespace?: string,
  ): Promise<z.output<S>> {
    const args = this.args(resource, name, namespace);
    logger.debug(`${this.kubectl} ${args.join(" ")}`);
    const result = await this.run(this.kubectl, args, { timeoutMs: this.opts.timeoutMs });

    if (!result.success) {
      const stderr = result.stderr.trim();
      if (NOT_FOUND_MARKERS.some((marker) => stderr.includes(marker))) {
        throw new NotFoundError(resource, name);
      }
      throw new SourceError(
        `unable to get ${resource}${name ? ` "${name}"` : ""}: ${stderr || `exit code ${result.exitCode}`}`,
        result.exitCode,
        stderr,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (err) {
      throw new SourceError(`unable to decode ${resource}: ${err instanceof Error ? err.message : String(err)}`, 0, "");
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new SourceError(`unexpected ${resource} shape: ${issues}`, 0, "");
    }
    return parsed.data;
  }
}
