import type { GatherReport, GatherReportEntry } from "../core/models.js";

const NANOS_PER_MILLI = 1_000_000;

export function toReportEntries(reports: readonly GatherReport[]): GatherReportEntry[] {
  return reports.map((r) => ({
    name: r.name,
    elapsed: r.elapsedMs * NANOS_PER_MILLI,
    report: r.records,
    errors: [...r.errors],
  }));
}

export function renderJSON(reports: readonly GatherReport[]): string {
  return JSON.stringify(toReportEntries(reports), null, 2);
}
