export { MemoryRecorder } from "./memory.js";
export { DirectoryRecorder, recordPath } from "./directory.js";
