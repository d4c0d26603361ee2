import type { DataRecord } from "./record.js";

export interface Recorder {
  record(record: DataRecord): Promise<void>;
}

/** A recorder that buffers and needs an explicit finalize step. collect() never flushes. */
export interface FlushableRecorder extends Recorder {
  flush(signal?: AbortSignal): Promise<void>;
}

export function isFlushable(recorder: Recorder): recorder is FlushableRecorder {
  return "flush" in recorder && typeof recorder.flush === "function";
}
