import { describe, expect, it, vi } from "vitest";
import { collect } from "../../src/core/collect.js";
import { CollectContext } from "../../src/core/context.js";
import { CollectError } from "../../src/core/errors.js";
import type { GatherOutcome, Gatherer, GatherReport } from "../../src/core/models.js";
import { Raw } from "../../src/record/marshal.js";
import { createRecord } from "../../src/record/record.js";
import { MemoryRecorder } from "../../src/recorder/memory.js";
import { ArrayRecorder, decode, FailingRecorder } from "../helpers/records.js";

function gatherer(name: string, outcome: Partial<GatherOutcome>): Gatherer {
  return {
    name,
    gather: async () => ({ records: outcome.records ?? [], errors: outcome.errors ?? [] }),
  };
}

function raw(name: string) {
  return createRecord(name, new Raw(name));
}

const signal = () => new AbortController().signal;

async function collectError(promise: Promise<unknown>): Promise<CollectError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CollectError) return err;
    throw err;
  }
  throw new Error("expected collect to reject");
}

describe("collect", () => {
  it("forwards records and the report, and aggregates gatherer errors", async () => {
    const recorder = new ArrayRecorder();
    const gatherers = [
      gatherer("f1", { records: [raw("config/a"), raw("config/b")] }),
      gatherer("f2", { errors: [new Error("x")] }),
    ];

    const err = await collectError(collect(signal(), recorder, gatherers));

    expect(err.message).toBe("x");
    expect(err.failures).toEqual([{ kind: "SourceFailure", message: "x" }]);
    expect(recorder.names()).toEqual(["config/a", "config/b", "cluster-gather/gathers"]);

    const report = await decode(recorder.records[2].item);
    expect(report).toEqual([
      { name: "f1", elapsed: expect.any(Number), report: 2, errors: [] },
      { name: "f2", elapsed: expect.any(Number), report: 0, errors: ["x"] },
    ]);
  });

  it("resolves with the reports when nothing failed", async () => {
    const recorder = new MemoryRecorder();

    const reports = await collect(signal(), recorder, [gatherer("only", { records: [raw("config/id")] })]);

    expect(reports).toEqual([{ name: "only", elapsedMs: expect.any(Number), records: 1, errors: [] }]);
    expect(recorder.names()).toEqual(["config/id", "cluster-gather/gathers"]);
  });

  it("reports elapsed time in nanoseconds truncated to milliseconds", async () => {
    const recorder = new ArrayRecorder();

    await collect(signal(), recorder, [gatherer("g", {})]);

    const [entry] = (await decode(recorder.records[0].item)) as Array<{ elapsed: number }>;
    expect(entry.elapsed % 1_000_000).toBe(0);
  });

  it("names the report after the context namespace", async () => {
    const recorder = new ArrayRecorder();

    await collect(signal(), recorder, [], new CollectContext({ namespace: "insights" }));

    expect(recorder.names()).toEqual(["insights/gathers"]);
    expect(await decode(recorder.records[0].item)).toEqual([]);
  });

  it("keeps going when the recorder fails", async () => {
    const recorder = new FailingRecorder();
    const second = vi.fn(async () => ({ records: [raw("config/c")], errors: [] }));

    const err = await collectError(
      collect(signal(), recorder, [gatherer("g1", { records: [raw("config/a"), raw("config/b")] }), { name: "g2", gather: second }]),
    );

    expect(second).toHaveBeenCalledOnce();
    expect(recorder.attempts).toBe(4);
    expect(err.messages).toEqual([
      "unable to record config/a: disk full",
      "unable to record config/b: disk full",
      "unable to record config/c: disk full",
      "unable to record io status reports: disk full",
    ]);
    expect(err.failures.every((f) => f.kind === "SinkFailure")).toBe(true);
  });

  it("sorts and de-duplicates messages", async () => {
    const err = await collectError(
      collect(signal(), new ArrayRecorder(), [
        gatherer("a", { errors: [new Error("same")] }),
        gatherer("b", { errors: [new Error("other"), new Error("same")] }),
      ]),
    );

    expect(err.messages).toEqual(["other", "same"]);
    expect(err.message).toBe("other, same");
    expect(err.failures).toHaveLength(3);
  });

  it("treats a rejecting gatherer as one failure with no records", async () => {
    const recorder = new ArrayRecorder();
    const broken: Gatherer = {
      name: "broken",
      gather: () => Promise.reject(new Error("connection refused")),
    };

    const err = await collectError(collect(signal(), recorder, [broken]));

    expect(err.messages).toEqual(["connection refused"]);
    expect(err.reports).toEqual([{ name: "broken", elapsedMs: expect.any(Number), records: 0, errors: ["connection refused"] }]);
    expect(recorder.names()).toEqual(["cluster-gather/gathers"]);
  });

  it("stops after the current gatherer when aborted and skips the report", async () => {
    const controller = new AbortController();
    const recorder = new ArrayRecorder();
    const first: Gatherer = {
      name: "first",
      gather: async () => {
        controller.abort(new Error("shutting down"));
        return { records: [raw("config/a")], errors: [new Error("ignored")] };
      },
    };
    const second = vi.fn(async () => ({ records: [], errors: [] }));

    await expect(collect(controller.signal, recorder, [first, { name: "second", gather: second }])).rejects.toThrow(
      "shutting down",
    );

    expect(second).not.toHaveBeenCalled();
    expect(recorder.names()).toEqual(["config/a"]);
  });

  it("runs gatherers in order and reports progress", async () => {
    const order: string[] = [];
    const completed: GatherReport[] = [];
    const ctx = new CollectContext({
      callbacks: {
        onGatherStart: (name) => order.push(name),
        onGatherComplete: (report) => completed.push(report),
      },
    });

    await collect(signal(), new ArrayRecorder(), [gatherer("one", {}), gatherer("two", { records: [raw("x")] })], ctx);

    expect(order).toEqual(["one", "two"]);
    expect(completed.map((r) => [r.name, r.records])).toEqual([
      ["one", 0],
      ["two", 1],
    ]);
  });
});
