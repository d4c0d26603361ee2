import { describe, expect, it } from "vitest";
import { anonymizeCsv, anonymizeList, isTrustedKey, maskString } from "../../src/anonymize/strings.js";
import { UrlAnonymizer } from "../../src/anonymize/url.js";

describe("maskString", () => {
  it("preserves only the length", () => {
    expect(maskString("secret")).toBe("xxxxxx");
    expect(maskString("")).toBe("");
  });

  it("is deterministic", () => {
    expect(maskString("abc-123")).toBe(maskString("abc-123"));
  });

  it("differs in length for inputs of different length", () => {
    expect(maskString("ab").length).not.toBe(maskString("abc").length);
  });
});

describe("isTrustedKey", () => {
  it("trusts platform domains", () => {
    expect(isTrustedKey("node-role.kubernetes.io/worker")).toBe(true);
    expect(isTrustedKey("machine.openshift.io/machine")).toBe(true);
    expect(isTrustedKey("topology.k8s.io/zone")).toBe(true);
  });

  it("does not trust other keys", () => {
    expect(isTrustedKey("team")).toBe(false);
    expect(isTrustedKey("example.com/owner")).toBe(false);
  });

  it("accepts a custom domain list", () => {
    expect(isTrustedKey("example.com/owner", ["example.com/"])).toBe(true);
    expect(isTrustedKey("node-role.kubernetes.io/worker", ["example.com/"])).toBe(false);
  });
});

describe("anonymizeCsv", () => {
  const urls = new UrlAnonymizer(["cluster", "local", "svc"]);

  it("anonymizes each element and keeps the separators", () => {
    const out = anonymizeCsv(urls, ".cluster.local,10.0.0.0/16,.svc");
    expect(out.split(",")).toEqual([".cluster.local", urls.anonymize("10.0.0.0/16"), ".svc"]);
  });

  it("keeps empty input empty", () => {
    expect(anonymizeCsv(urls, "")).toBe("");
  });

  it("anonymizes lists element-wise", () => {
    expect(anonymizeList(urls, ["cluster.local", ""])).toEqual(["cluster.local", ""]);
  });
});
