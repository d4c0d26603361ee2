import { createRecord } from "../record/record.js";
import { JsonMarshaller } from "../record/marshal.js";
import type { Recorder } from "../record/recorder.js";
import { toReportEntries } from "../report/json.js";
import { logger } from "../utils/logger.js";
import { CollectContext } from "./context.js";
import { CollectError, errorMessage, type Failure } from "./errors.js";
import type { GatherOutcome, GatherReport, Gatherer } from "./models.js";

async function runGatherer(gatherer: Gatherer): Promise<GatherOutcome> {
  try {
    return await gatherer.gather();
  } catch (err) {
    return { records: [], errors: [err instanceof Error ? err : new Error(String(err))] };
  }
}

/**
 * Runs each gatherer in order and forwards its records to the recorder.
 *
 * Gatherer errors and recorder failures do not stop the batch; they are
 * collected and thrown together as a CollectError once the report record has
 * been written. The abort signal is checked after each gatherer and, when set,
 * its reason is thrown as-is without writing the report.
 */
export async function collect(
  signal: AbortSignal,
  recorder: Recorder,
  gatherers: readonly Gatherer[],
  ctx: CollectContext = new CollectContext(),
): Promise<GatherReport[]> {
  const failures: Failure[] = [];
  const reports: GatherReport[] = [];

  for (const gatherer of gatherers) {
    ctx.callbacks.onGatherStart?.(gatherer.name);
    logger.debug(`Gathering ${gatherer.name}`);

    const start = Date.now();
    const { records, errors } = await runGatherer(gatherer);
    const elapsedMs = Math.trunc(Date.now() - start);

    const report: GatherReport = {
      name: gatherer.name,
      elapsedMs,
      records: records.length,
      errors: errors.map(errorMessage),
    };
    reports.push(report);
    logger.debug(`Gather ${gatherer.name} took ${elapsedMs}ms to process ${records.length} records`);
    ctx.callbacks.onGatherComplete?.(report);

    for (const message of report.errors) {
      failures.push({ kind: "SourceFailure", message });
    }
    for (const record of records) {
      try {
        await recorder.record(record);
      } catch (err) {
        failures.push({ kind: "SinkFailure", message: `unable to record ${record.name}: ${errorMessage(err)}` });
      }
    }

    signal.throwIfAborted();
  }

  try {
    await recorder.record(createRecord(ctx.reportName, new JsonMarshaller(toReportEntries(reports))));
  } catch (err) {
    failures.push({ kind: "SinkFailure", message: `unable to record io status reports: ${errorMessage(err)}` });
  }

  if (failures.length > 0) {
    throw new CollectError(failures, reports);
  }
  return reports;
}
