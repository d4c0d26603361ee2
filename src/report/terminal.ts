import chalk from "chalk";
import type { GatherReport } from "../core/models.js";

function statusTag(report: GatherReport): string {
  return report.errors.length > 0 ? chalk.red.bold("[FAILED]") : chalk.green("[OK    ]");
}

export function renderTerminal(reports: readonly GatherReport[], startedAt: Date): string {
  const lines: string[] = [];
  const width = Math.max(0, ...reports.map((r) => r.name.length));

  lines.push("");
  lines.push(chalk.bold(`Cluster gather — ${startedAt.toUTCString()}`));
  lines.push("");

  if (reports.length === 0) {
    lines.push(chalk.dim("  No gatherers ran."));
    lines.push("");
    return lines.join("\n");
  }

  for (const report of reports) {
    const counts = chalk.dim(`${report.records} record${report.records === 1 ? "" : "s"}, ${report.elapsedMs}ms`);
    lines.push(`  ${statusTag(report)} ${report.name.padEnd(width)}  ${counts}`);
    for (const error of report.errors) {
      lines.push(chalk.dim(`             ${error}`));
    }
  }
  lines.push("");

  const failed = reports.filter((r) => r.errors.length > 0).length;
  const total = reports.reduce((sum, r) => sum + r.records, 0);
  const status = failed > 0 ? chalk.yellow.bold("PARTIAL") : chalk.green.bold("COMPLETE");
  lines.push(
    `Status: ${status} — ${total} record${total === 1 ? "" : "s"} from ${reports.length} gatherers` +
      (failed > 0 ? `, ${chalk.red(`${failed} failed`)}` : ""),
  );
  lines.push("");
  return lines.join("\n");
}
