import type { Marshalable } from "./marshal.js";

export interface DataRecord {
  /** Path-like identifier, e.g. "config/node/worker-0". */
  readonly name: string;
  readonly captured: Date;
  /** Optional dedup key; empty when unused. */
  readonly fingerprint: string;
  readonly item: Marshalable;
}

export function createRecord(name: string, item: Marshalable, fingerprint = ""): DataRecord {
  return Object.freeze({ name, captured: new Date(), fingerprint, item });
}
