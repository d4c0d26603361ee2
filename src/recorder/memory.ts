import type { DataRecord } from "../record/record.js";
import type { Recorder } from "../record/recorder.js";

/** Keeps records in arrival order. A later record with the same name replaces the earlier one. */
export class MemoryRecorder implements Recorder {
  protected readonly records = new Map<string, DataRecord>();

  async record(record: DataRecord): Promise<void> {
    this.records.delete(record.name);
    this.records.set(record.name, record);
  }

  get(name: string): DataRecord | undefined {
    return this.records.get(name);
  }

  names(): string[] {
    return [...this.records.keys()];
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }
}
