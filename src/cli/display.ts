import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { CollectCallbacks } from "../core/context.js";
import type { GatherReport } from "../core/models.js";

export function createProgressCallbacks(total: number): CollectCallbacks {
  let spinner: Ora | null = null;
  let completed = 0;

  const prefix = () => chalk.dim(`[${completed + 1}/${total}] `);

  return {
    onGatherStart(name: string) {
      const text = prefix() + `Gathering ${name}`;
      if (spinner) {
        spinner.text = text;
      } else {
        spinner = ora({ text, stream: process.stderr }).start();
      }
    },
    onGatherComplete(report: GatherReport) {
      completed++;
      if (!spinner) return;
      const detail = chalk.dim(`(${report.records} records, ${report.elapsedMs}ms)`);
      if (report.errors.length > 0) {
        spinner.fail(`${report.name} ${detail}`);
      } else {
        spinner.succeed(`${report.name} ${detail}`);
      }
      spinner = null;
    },
  };
}
