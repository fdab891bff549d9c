import { type SharedContext } from "../../types";
import { type Checkpoint } from "../checkpoint";
import { StoredRun } from "./stored-run";

/**
 * Persists checkpoints of paused runs, keyed by run id, so a run can be
 * resumed by a later process.
 *
 * @example
 * ```typescript
 * class FileStore extends BaseStore<Draft> {
 *     async save(runId: string, checkpoint: Checkpoint<Draft>): Promise<void> {
 *         await writeFile(`${runId}.json`, serializeCheckpoint(checkpoint));
 *     }
 *     async load(runId: string): Promise<Checkpoint<Draft>> {
 *         return parseCheckpoint(await readFile(`${runId}.json`, "utf8"), draftSchema);
 *     }
 *     // ... exists, delete, dispose
 * }
 * ```
 */
export abstract class BaseStore<S extends object = SharedContext> {
    /**
     * Saves the checkpoint of a run, replacing any previous one.
     */
    abstract save(runId: string, checkpoint: Checkpoint<S>): Promise<void>;

    abstract exists(runId: string): Promise<boolean>;

    /**
     * @throws {Error} If the run is not found.
     */
    abstract load(runId: string): Promise<Checkpoint<S>>;

    abstract delete(runId: string): Promise<void>;

    /**
     * Releases the resources held by the store.
     */
    abstract dispose(): Promise<void>;

    /**
     * Gets a StoredRun bound to a single run id.
     *
     * @example
     * ```typescript
     * const storedRun = store.getStoredRun("run-123");
     * if (await storedRun.exists()) {
     *     const checkpoint = await storedRun.load();
     *     console.log(checkpoint.message);
     * }
     * ```
     */
    getStoredRun(runId: string): StoredRun<S> {
        return new StoredRun(runId, this);
    }
}
