import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, isAbsolute } from "node:path";
import { errorMessage, FlushError } from "../core/errors.js";
import type { DataRecord } from "../record/record.js";
import type { FlushableRecorder } from "../record/recorder.js";
import { logger } from "../utils/logger.js";
import { MemoryRecorder } from "./memory.js";

export function recordPath(dir: string, record: DataRecord): string {
  const file = record.item.extension ? `${record.name}.${record.item.extension}` : record.name;
  const root = resolve(dir);
  const target = resolve(join(root, file));
  const rel = relative(root, target);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
    throw new Error(`record name ${record.name} escapes the output directory`);
  }
  return target;
}

/**
 * Buffers records in memory and writes them under a directory on flush. This
 * is where content is marshalled, and therefore where anonymization runs.
 *
 * A record that fails to marshal or write does not stop the others. Written
 * records leave the buffer; failed ones stay, and flush rejects with a
 * FlushError, so calling flush again retries only what is left.
 */
export class DirectoryRecorder extends MemoryRecorder implements FlushableRecorder {
  constructor(readonly dir: string) {
    super();
  }

  async flush(signal?: AbortSignal): Promise<void> {
    let written = 0;
    const failures: string[] = [];
    for (const record of [...this.records.values()]) {
      signal?.throwIfAborted();
      try {
        await this.write(record, signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        failures.push(`${record.name}: ${errorMessage(err)}`);
        continue;
      }
      this.records.delete(record.name);
      written++;
    }
    logger.info(`Wrote ${written} records to ${this.dir}`);
    if (failures.length > 0) throw new FlushError(failures, written);
  }

  private async write(record: DataRecord, signal?: AbortSignal): Promise<void> {
    const target = recordPath(this.dir, record);
    const bytes = await record.item.marshal(signal);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, bytes);
  }
}
