export { Flow, BatchFlow, type FlowOptions } from "./flow";
export { AsyncFlow, AsyncBatchFlow, ParallelBatchFlow, type ParallelFlowOptions } from "./async-flow";
export { RunContext, FlowFrame, type ResumePoint } from "./run-context";
export {
    type Checkpoint,
    checkpointSchema,
    checkpointSchemaFor,
    sharedContextSchema,
    serializeCheckpoint,
    parseCheckpoint,
} from "./checkpoint";
export { collectNodes } from "./traversal";
export { type FlowResult, type InvokeConfig } from "./types";
export { BaseStore } from "./store/base-store";
export { StoredRun } from "./store/stored-run";
export { MemoryStore } from "./store/memory-store";
export { SQLiteStore } from "./store/sqlite-store";
export { invokeWithStore, type Resumable, type StoreConfig } from "./store/invoke-with-store";
