import type { DataRecord } from "../record/record.js";

export interface GatherOutcome {
  records: DataRecord[];
  errors: Error[];
}

/** One attempt at collecting data. Gatherers never retry. */
export interface Gatherer {
  readonly name: string;
  gather(): Promise<GatherOutcome>;
}

export interface GatherReport {
  name: string;
  /** Milliseconds, truncated. */
  elapsedMs: number;
  records: number;
  errors: string[];
}

/** Wire shape of one entry in the "<namespace>/gathers" record. */
export interface GatherReportEntry {
  name: string;
  /** Nanoseconds, truncated to whole milliseconds. */
  elapsed: number;
  report: number;
  errors: string[];
}

export const DEFAULT_NAMESPACE = "cluster-gather";
