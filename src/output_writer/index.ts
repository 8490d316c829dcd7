// src/output_writer/index.ts

export { atomicWriteFileSync, errnoCode } from "./atomic_write";
export type { FsyncMode } from "./atomic_write";
export { acquireRunLock, releaseRunLock, LockHeldError } from "./lock";
export type { LockHandle } from "./lock";
export { stableStringify, stableStringifyPretty } from "./stable_stringify";
