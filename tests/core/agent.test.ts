import { describe, expect, it } from "vitest";
import { GatherAgent } from "../../src/core/agent.js";
import { loadConfig } from "../../src/core/config.js";
import { CollectError } from "../../src/core/errors.js";
import { gather } from "../../src/index.js";
import { MemoryRecorder } from "../../src/recorder/memory.js";
import type { Node } from "../../src/source/types.js";
import { decode } from "../helpers/records.js";
import { FakeSource } from "../helpers/fake-source.js";

const notReady: Node = {
  metadata: { name: "worker-1", labels: { owner: "ops" } },
  status: { conditions: [{ type: "Ready", status: "False" }], addresses: [{ type: "Hostname", address: "worker-1.local" }] },
};

describe("GatherAgent", () => {
  it("runs a full batch against a cluster", async () => {
    const source = new FakeSource({
      nodes: [notReady],
      clusterVersion: { metadata: { name: "version", resourceVersion: "7" }, spec: { clusterID: "abc" } },
      proxy: { metadata: { name: "cluster" }, spec: { noProxy: ".cluster.local" } },
    });
    const agent = new GatherAgent({
      source,
      config: loadConfig({ namespace: "test-agent" }, {}),
      vocabulary: ["cluster", "local"],
    });
    const recorder = new MemoryRecorder();

    const reports = await agent.run(recorder, new AbortController().signal);

    expect(recorder.names()).toEqual([
      "config/node/worker-1",
      "config/version",
      "config/id",
      "config/proxy",
      "test-agent/gathers",
    ]);
    expect(reports.map((r) => [r.name, r.records])).toEqual([
      ["clusterOperators", 0],
      ["nodes", 1],
      ["clusterVersion", 1],
      ["clusterID", 1],
      ["infrastructure", 0],
      ["network", 0],
      ["authentication", 0],
      ["featureGate", 0],
      ["oauth", 0],
      ["ingress", 0],
      ["proxy", 1],
    ]);
    expect((await agent.lastClusterVersion())?.spec?.clusterID).toBe("abc");

    const node = recorder.get("config/node/worker-1");
    if (!node) throw new Error("node record missing");
    expect(await decode(node.item)).toMatchObject({ metadata: { labels: { owner: "xxx" } } });
  });

  it("reports gatherer failures after recording everything else", async () => {
    const source = new FakeSource({ nodes: new Error("nodes is forbidden"), proxy: new Error("timeout") });
    const agent = new GatherAgent({ source, config: loadConfig({}, {}), vocabulary: [] });
    const recorder = new MemoryRecorder();

    const err = await agent.run(recorder, new AbortController().signal).catch((e: unknown) => e);

    if (!(err instanceof CollectError)) throw new Error("expected CollectError");
    expect(err.message).toBe("nodes is forbidden, timeout");
    expect(recorder.names()).toEqual(["cluster-gather/gathers"]);
  });
});

describe("gather", () => {
  it("loads the bundled vocabulary and runs one batch", async () => {
    const recorder = new MemoryRecorder();
    const source = new FakeSource({ ingress: { metadata: { name: "cluster" }, spec: { domain: "apps.example.com" } } });

    await gather({ source, recorder, config: { namespace: "bundled" }, only: ["ingress"] });

    const ingress = recorder.get("config/ingress");
    if (!ingress) throw new Error("ingress record missing");
    // "apps", "example" and "com" are all in the bundled word list.
    expect(await decode(ingress.item)).toMatchObject({ spec: { domain: "apps.example.com" } });
    expect(recorder.names()).toEqual(["config/ingress", "bundled/gathers"]);
  });
});
