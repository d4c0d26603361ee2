import type { GatherReport } from "./models.js";

export type FailureKind = "SourceFailure" | "SinkFailure";

export interface Failure {
  kind: FailureKind;
  message: string;
}

/** The requested object does not exist. Gatherers treat this as an empty result. */
export class NotFoundError extends Error {
  constructor(
    readonly resource: string,
    readonly objectName?: string,
  ) {
    super(objectName ? `${resource} "${objectName}" not found` : `${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class SourceError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(message);
    this.name = "SourceError";
  }
}

/**
 * Aggregate of every gatherer and recorder failure in one batch. The message is
 * the sorted, de-duplicated failure messages joined with ", ".
 */
export class CollectError extends Error {
  readonly messages: string[];

  constructor(
    readonly failures: Failure[],
    readonly reports: GatherReport[] = [],
  ) {
    const messages = uniqueSorted(failures.map((f) => f.message));
    super(messages.join(", "));
    this.name = "CollectError";
    this.messages = messages;
  }
}

/** Records a flush could not write. They stay buffered for the next flush. */
export class FlushError extends Error {
  constructor(
    readonly failures: string[],
    readonly written: number,
  ) {
    super(`unable to write ${failures.length} of ${failures.length + written} records: ${failures.join(", ")}`);
    this.name = "FlushError";
  }
}

export function isNotFound(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Sorts a copy, then drops adjacent duplicates. */
export function uniqueSorted(values: readonly string[]): string[] {
  const sorted = [...values].sort();
  const out: string[] = [];
  for (const value of sorted) {
    if (out.length > 0 && out[out.length - 1] === value) continue;
    out.push(value);
  }
  return out;
}
