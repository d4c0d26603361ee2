import type { GatherReport } from "../core/models.js";
import { renderJSON } from "./json.js";
import { renderTerminal } from "./terminal.js";

export type OutputFormat = "terminal" | "json";

/** `startedAt` is when the batch began; the terminal header shows it. */
export function renderReport(reports: readonly GatherReport[], format: OutputFormat, startedAt: Date): string {
  switch (format) {
    case "json":
      return renderJSON(reports);
    case "terminal":
    default:
      return renderTerminal(reports, startedAt);
  }
}

export { renderTerminal } from "./terminal.js";
export { renderJSON, toReportEntries } from "./json.js";
