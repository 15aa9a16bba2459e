export type { IStateStore, StateLoadResult } from "./interfaces.js";
export { FilesystemStateStore, stateFilename } from "./state-store.js";
export { MemoryStateStore } from "./memory-store.js";
export { StateLockedError, acquireLock, releaseLock, isProcessRunning } from "./state-lock.js";
