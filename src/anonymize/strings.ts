import type { UrlAnonymizer } from "./url.js";

export const DEFAULT_TRUSTED_KEY_DOMAINS = ["openshift.io/", "k8s.io/", "kubernetes.io/"] as const;

/** Replaces every character with "x", keeping only the length. */
export function maskString(value: string): string {
  return "x".repeat(value.length);
}

export function anonymizeList(anonymizer: UrlAnonymizer, values: readonly string[]): string[] {
  return values.map((v) => anonymizer.anonymize(v));
}

export function anonymizeCsv(anonymizer: UrlAnonymizer, value: string): string {
  return anonymizeList(anonymizer, value.split(",")).join(",");
}

/** Keys under a platform or vendor domain are known not to carry user data. */
export function isTrustedKey(key: string, domains: readonly string[] = DEFAULT_TRUSTED_KEY_DOMAINS): boolean {
  return domains.some((domain) => key.includes(domain));
}
