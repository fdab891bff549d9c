import { z } from "zod";
import { type SharedContext } from "../types";

/**
 * Everything needed to continue a paused run in another process.
 *
 * `cursor` lists node ids from the root flow down to the pause node, one
 * segment per nesting level. `shared` is a snapshot of the shared context.
 */
export interface Checkpoint<S extends object = SharedContext> {
    version: 1;
    runId: string;
    cursor: string[];
    /** Action returned by the pause node; selects where the run continues. */
    action?: string;
    message: string;
    shared: S;
}

/**
 * Accepts any plain-object shared context.
 */
export const sharedContextSchema = z.record(z.string(), z.unknown());

/**
 * Schema of a checkpoint whose shared context is validated by `shared`.
 */
export function checkpointSchemaFor<S extends object>(shared: z.ZodType<S>) {
    return z.object({
        version: z.literal(1),
        runId: z.string().min(1),
        cursor: z.array(z.string().min(1)).min(1),
        action: z.string().optional(),
        message: z.string(),
        shared,
    });
}

export const checkpointSchema = checkpointSchemaFor(sharedContextSchema);

export function serializeCheckpoint<S extends object>(checkpoint: Checkpoint<S>): string {
    return JSON.stringify(checkpoint);
}

/**
 * Parses a serialized checkpoint. Pass a schema for the shared context to get
 * it back typed.
 *
 * @throws {SyntaxError} When `json` is not JSON.
 * @throws {z.ZodError} When the value is not a checkpoint.
 *
 * @example
 * ```typescript
 * const checkpoint = parseCheckpoint(readFileSync("run.json", "utf8"), draftSchema);
 * const result = flow.resume(checkpoint);
 * ```
 */
export function parseCheckpoint(json: string): Checkpoint<SharedContext>;
export function parseCheckpoint<S extends object>(json: string, shared: z.ZodType<S>): Checkpoint<S>;
export function parseCheckpoint(json: string, shared: z.ZodType<object> = sharedContextSchema): Checkpoint<object> {
    return checkpointSchemaFor(shared).parse(JSON.parse(json));
}
