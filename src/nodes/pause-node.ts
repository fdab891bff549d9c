import { type RunContext } from "../graphs/run-context";
import { type Action, type NextAction } from "../types";
import { type NodeOptions } from "./base-node";
import { Node } from "./node";

export interface PauseOptions extends NodeOptions {
    /** Reported with the checkpoint, e.g. what input the run waits for. */
    message?: string;
}

/**
 * A node that halts the enclosing flows after its own lifecycle has run.
 *
 * The flow returns a checkpoint holding the path to this node, the action it
 * returned and a snapshot of the shared context. Resuming that checkpoint
 * continues at the successor registered for the action, so the pause node
 * itself does not run again.
 *
 * `post` can be overridden to record something before the run halts, and its
 * action picks where the resumed run goes.
 *
 * @example
 * ```typescript
 * const waitForReview = new PauseNode<Draft>({ id: "wait-for-review", message: "Review the draft" });
 * write.next(waitForReview).next(applyReview);
 *
 * const result = flow.invoke({ topic: "tides" });
 * if (result.exitReason === "pause") {
 *     save(serializeCheckpoint(result.checkpoint));
 * }
 * ```
 */
export class PauseNode<S extends object, P = unknown, E = unknown, A extends Action = Action> extends Node<S, P, E, A> {
    public readonly message: string;

    constructor(options: PauseOptions = {}) {
        const { message, ...rest } = options;
        super(rest);
        this.message = message ?? "";
    }

    override visit(shared: S, run: RunContext): NextAction<A> {
        const action = super.visit(shared, run);
        run.markPaused(this.message, action);
        return action;
    }
}
