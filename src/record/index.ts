export { Raw, JsonMarshaller, type Marshalable } from "./marshal.js";
export { createRecord, type DataRecord } from "./record.js";
export { isFlushable, type Recorder, type FlushableRecorder } from "./recorder.js";
