import { type Database } from "better-sqlite3";
import { z } from "zod";
import { type SharedContext } from "../../types";
import { parseCheckpoint, serializeCheckpoint, type Checkpoint } from "../checkpoint";
import { BaseStore } from "./base-store";

const rowSchema = z.object({ checkpoint: z.string() });

/**
 * A store keeping one serialized checkpoint per run in a SQLite table.
 * Loaded checkpoints are validated, with their shared context checked against
 * `shared`.
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 *
 * const store = new SQLiteStore(new Database("runs.db"), draftSchema, "draft_runs");
 * const result = await invokeWithStore(flow, { topic: "cats" }, { store, runId: "draft-1" });
 *
 * // Later, possibly in another process
 * const resumed = await invokeWithStore(flow, { topic: "cats" }, { store, runId: "draft-1" });
 * await store.dispose();
 * ```
 */
export class SQLiteStore<S extends object = SharedContext> extends BaseStore<S> {

    /**
     * Creates the table if it doesn't exist.
     *
     * @param shared - Schema of the shared context, e.g. `sharedContextSchema`
     * @param tableName - Table holding the runs
     */
    constructor(
        private readonly db: Database,
        private readonly shared: z.ZodType<S>,
        private readonly tableName: string = "runs",
    ) {
        super();
        this.db.prepare(`CREATE TABLE IF NOT EXISTS ${this.tableName} (run_id TEXT PRIMARY KEY, checkpoint TEXT NOT NULL)`).run();
    }

    async save(runId: string, checkpoint: Checkpoint<S>): Promise<void> {
        this.db.prepare(
            `INSERT INTO ${this.tableName} (run_id, checkpoint) VALUES (?, ?)
             ON CONFLICT(run_id) DO UPDATE SET checkpoint = excluded.checkpoint`
        ).run(runId, serializeCheckpoint(checkpoint));
    }

    async exists(runId: string): Promise<boolean> {
        const result = this.db.prepare(`SELECT 1 FROM ${this.tableName} WHERE run_id = ?`).get(runId);
        return result !== undefined;
    }

    /**
     * @throws {Error} If the run is not found.
     * @throws {z.ZodError} If the stored checkpoint does not match the schema.
     */
    async load(runId: string): Promise<Checkpoint<S>> {
        const result = this.db.prepare(`SELECT checkpoint FROM ${this.tableName} WHERE run_id = ?`).get(runId);
        if (result === undefined) {
            throw new Error(`Run ${runId} not found`);
        }
        return parseCheckpoint(rowSchema.parse(result).checkpoint, this.shared);
    }

    async delete(runId: string): Promise<void> {
        this.db.prepare(`DELETE FROM ${this.tableName} WHERE run_id = ?`).run(runId);
    }

    /**
     * Closes the database connection.
     */
    async dispose(): Promise<void> {
        this.db.close();
    }
}
