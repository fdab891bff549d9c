import { type SharedContext } from "../../types";
import { type Checkpoint } from "../checkpoint";
import { BaseStore } from "./base-store";

/**
 * Keeps checkpoints in a map for the life of the process. Checkpoints are
 * cloned on the way in and out, so callers never share them with the store.
 */
export class MemoryStore<S extends object = SharedContext> extends BaseStore<S> {
    private readonly runs = new Map<string, Checkpoint<S>>();

    async save(runId: string, checkpoint: Checkpoint<S>): Promise<void> {
        this.runs.set(runId, structuredClone(checkpoint));
    }

    async exists(runId: string): Promise<boolean> {
        return this.runs.has(runId);
    }

    async load(runId: string): Promise<Checkpoint<S>> {
        const checkpoint = this.runs.get(runId);
        if (!checkpoint) {
            throw new Error(`Run ${runId} not found`);
        }
        return structuredClone(checkpoint);
    }

    async delete(runId: string): Promise<void> {
        this.runs.delete(runId);
    }

    async dispose(): Promise<void> {
        this.runs.clear();
    }
}
