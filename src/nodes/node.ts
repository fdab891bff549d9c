import { RunContext } from "../graphs/run-context";
import { type Action, type NextAction } from "../types";
import { BaseNode } from "./base-node";
import { runWithRetry } from "./retry";

/**
 * Synchronous three-phase lifecycle shared by {@link Node} and
 * {@link BatchNode}: `prep` reads the shared context, the execute step works
 * on the prep result only, `post` writes back and picks the action.
 *
 * @template S - Shared context type
 * @template P - Result of `prep`
 * @template E - Result of the execute step
 * @template A - Actions returned by `post`
 */
export abstract class LifecycleNode<S extends object, P, E, A extends Action = Action> extends BaseNode<S, A> {
    readonly isAsync = false;

    /** Reads what the node needs from the shared context. */
    prep(_shared: S): P {
        return undefined as P;
    }

    /** Writes results back and returns the action to follow. */
    post(_shared: S, _prepResult: P, _execResult: E): NextAction<A> {
        return undefined;
    }

    protected abstract execute(prepResult: P, run: RunContext): E;

    visit(shared: S, run: RunContext): NextAction<A> {
        const prepResult = this.prep(shared);
        const execResult = this.execute(prepResult, run);
        return this.post(shared, prepResult, execResult);
    }

    /**
     * Runs this node alone. Successors are not followed; use a flow for that.
     */
    run(shared: S): NextAction<A> {
        const run = new RunContext();
        if (this.successors.size > 0) {
            run.logger.warn(`Node ${this.id} won't run successors. Use Flow.`);
        }
        return this.visit(shared, run);
    }
}

/**
 * A synchronous unit of work with retries and a fallback.
 *
 * `exec` must not touch the shared context: it may be attempted several
 * times. Failed attempts are spaced by `retryInterval` milliseconds (blocking).
 *
 * @example
 * ```typescript
 * type Doc = { text: string; summary?: string };
 *
 * class Summarize extends Node<Doc, string, string> {
 *     prep(shared: Doc) { return shared.text; }
 *     exec(text: string) { return summarizer(text); }
 *     execFallback() { return "(no summary)"; }
 *     post(shared: Doc, _text: string, summary: string) {
 *         shared.summary = summary;
 *         return undefined;
 *     }
 * }
 *
 * new Summarize({ maxRetries: 3, retryInterval: 500 }).run({ text: "..." });
 * ```
 */
export class Node<S extends object, P = unknown, E = unknown, A extends Action = Action> extends LifecycleNode<S, P, E, A> {
    exec(_prepResult: P): E {
        return undefined as E;
    }

    /**
     * Runs once after the last failed attempt. Rethrowing `error` fails the
     * node with a NodeExecutionError.
     */
    execFallback(_prepResult: P, error: unknown): E {
        throw error;
    }

    protected execute(prepResult: P, run: RunContext): E {
        return runWithRetry(
            this.retryTarget(run),
            () => this.exec(prepResult),
            (error) => this.execFallback(prepResult, error),
        );
    }
}

/**
 * A node whose `exec` runs once per item returned by `prep`, in order. Each
 * item is retried on its own; the first item that cannot be recovered fails
 * the node.
 *
 * @template I - Item type
 * @template R - Result per item
 */
export class BatchNode<S extends object, I = unknown, R = unknown, A extends Action = Action> extends LifecycleNode<S, I[], R[], A> {
    override prep(_shared: S): I[] {
        return [];
    }

    exec(_item: I): R {
        return undefined as R;
    }

    execFallback(_item: I, error: unknown): R {
        throw error;
    }

    protected execute(items: I[], run: RunContext): R[] {
        const target = this.retryTarget(run);
        return (items ?? []).map((item) =>
            runWithRetry(
                target,
                () => this.exec(item),
                (error) => this.execFallback(item, error),
            ),
        );
    }
}
