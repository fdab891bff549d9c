import { type MaybePromise } from "../../types";
import { type Checkpoint } from "../checkpoint";
import { type FlowResult, type InvokeConfig } from "../types";
import { type BaseStore } from "./base-store";

/**
 * Anything that can be invoked and resumed: {@link Flow} or {@link AsyncFlow}.
 */
export interface Resumable<S extends object> {
    invoke(shared: S, config?: InvokeConfig): MaybePromise<FlowResult<S>>;
    resume(checkpoint: Checkpoint<S>): MaybePromise<FlowResult<S>>;
}

export interface StoreConfig<S extends object> {
    store: BaseStore<S>;
    /** Run to resume or start. Defaults to a fresh cuid. */
    runId?: string;
    /** Delete the stored checkpoint once the run ends. Defaults to true. */
    deleteAfterEnd?: boolean;
}

/**
 * Runs `flow` against a checkpoint store. When the store holds a checkpoint
 * for `runId` the run is resumed from it and `shared` is ignored; otherwise a
 * new run starts from `shared`. A pause saves the checkpoint, an end deletes
 * it.
 *
 * @example
 * ```typescript
 * const store = new MemoryStore<JokeState>();
 * let result = await invokeWithStore(flow, { topic: "cats" }, { store, runId: "jokes" });
 * while (result.exitReason === "pause") {
 *     result = await invokeWithStore(flow, { topic: "cats" }, { store, runId: "jokes" });
 * }
 * ```
 */
export async function invokeWithStore<S extends object>(
    flow: Resumable<S>,
    shared: S,
    config: StoreConfig<S>,
): Promise<FlowResult<S>> {
    const { store, runId, deleteAfterEnd = true } = config;
    const storedRun = runId !== undefined && (await store.exists(runId)) ? store.getStoredRun(runId) : undefined;
    const result = storedRun
        ? await flow.resume(await storedRun.load())
        : await flow.invoke(shared, { runId });

    if (result.exitReason === "pause") {
        await store.save(result.runId, result.checkpoint);
    } else if (deleteAfterEnd && (await store.exists(result.runId))) {
        await store.delete(result.runId);
    }
    return result;
}
