import { type Checkpoint } from "../checkpoint";
import { type BaseStore } from "./base-store";

/**
 * A store seen through one run id.
 *
 * @example
 * ```typescript
 * const storedRun = store.getStoredRun(result.runId);
 * if (result.exitReason === "pause") {
 *     await storedRun.save(result.checkpoint);
 * }
 * ```
 */
export class StoredRun<S extends object> {
    constructor(public readonly runId: string, private readonly store: BaseStore<S>) {
    }

    async save(checkpoint: Checkpoint<S>): Promise<void> {
        await this.store.save(this.runId, checkpoint);
    }

    async exists(): Promise<boolean> {
        return await this.store.exists(this.runId);
    }

    /**
     * @throws {Error} If the run does not exist.
     */
    async load(): Promise<Checkpoint<S>> {
        return await this.store.load(this.runId);
    }

    async delete(): Promise<void> {
        await this.store.delete(this.runId);
    }
}
