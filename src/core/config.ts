import { z } from "zod";
import { DEFAULT_TRUSTED_KEY_DOMAINS } from "../anonymize/strings.js";
import { DEFAULT_VOCABULARY_FILE } from "../anonymize/vocabulary.js";
import { DEFAULT_NAMESPACE } from "./models.js";

export const gatherConfigSchema = z.object({
  namespace: z
    .string()
    .min(1)
    .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, "namespace must be a DNS label")
    .default(DEFAULT_NAMESPACE),
  outputDir: z.string().min(1).default("gather-output"),
  kubeconfig: z.string().min(1).optional(),
  context: z.string().min(1).optional(),
  kubectl: z.string().min(1).default("kubectl"),
  vocabularyFile: z.string().min(1).default(DEFAULT_VOCABULARY_FILE),
  trustedKeyDomains: z.array(z.string().min(1)).default([...DEFAULT_TRUSTED_KEY_DOMAINS]),
  /** Record healthy cluster operators too; only unhealthy ones pull in pods either way. */
  allClusterOperators: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(30_000),
});

export type GatherConfig = z.infer<typeof gatherConfigSchema>;
export type GatherConfigInput = z.input<typeof gatherConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

function fromEnv(env: NodeJS.ProcessEnv): GatherConfigInput {
  const input: GatherConfigInput = {};
  if (env.GATHER_NAMESPACE) input.namespace = env.GATHER_NAMESPACE;
  if (env.GATHER_OUTPUT_DIR) input.outputDir = env.GATHER_OUTPUT_DIR;
  if (env.KUBECONFIG) input.kubeconfig = env.KUBECONFIG;
  return input;
}

function withoutUndefined(input: GatherConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));
}

/** Explicit options win over environment variables, which win over defaults. */
export function loadConfig(overrides: GatherConfigInput = {}, env: NodeJS.ProcessEnv = process.env): GatherConfig {
  const parsed = gatherConfigSchema.safeParse({ ...fromEnv(env), ...withoutUndefined(overrides) });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`));
  }
  return parsed.data;
}
