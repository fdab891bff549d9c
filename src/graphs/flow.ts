import { z } from "zod";
import { settings } from "../config";
import { FlowTraversalError } from "../errors";
import { BaseNode, type NodeOptions } from "../nodes/base-node";
import { DEFAULT_ACTION, type NextAction, type Params } from "../types";
import { checkpointSchema, type Checkpoint } from "./checkpoint";
import { RunContext } from "./run-context";
import {
    assertResumed,
    countStep,
    entryPoint,
    nextNode,
    retryTraversal,
    toFlowResult,
    type TraversalSettings,
} from "./traversal";
import { type FlowResult, type InvokeConfig } from "./types";

export const flowOptionsSchema = z.object({
    maxSteps: z.number().int().positive().optional(),
    strictRouting: z.boolean().default(false),
});

export interface FlowOptions extends NodeOptions {
    /** Upper bound on node visits per traversal. Unbounded unless set here or by `RELAYGRAPH_MAX_STEPS`. */
    maxSteps?: number;
    /** Treat an action without a successor as an error instead of the end of the flow. */
    strictRouting?: boolean;
}

/**
 * A graph of synchronous nodes walked from its start node, following the
 * edge each node's action selects until none matches.
 *
 * A flow is itself a node: nested in another flow, its execute step is the
 * whole inner traversal and its action is the last action of that traversal,
 * `"default"` when the last node returned none.
 * Its own `maxRetries` restarts the inner traversal from the start node.
 *
 * Params of the flow are merged under the params of every node it visits.
 *
 * @template S - Shared context type
 * @template P - Result of the flow's own `prep`
 *
 * @example
 * ```typescript
 * const generate = new GenerateJoke({ id: "generate" });
 * const review = new ReviewJoke({ id: "review" });
 * generate.next(review);
 * review.on("disapprove").next(generate);
 * review.on("approve").next(new Publish({ id: "publish" }));
 *
 * const flow = new Flow<JokeState>(generate, { maxSteps: 20 });
 * const action = flow.run({ topic: "cats" });
 * ```
 */
export class Flow<S extends object, P = unknown> extends BaseNode<S> implements TraversalSettings<S> {
    readonly isAsync = false;
    public readonly maxSteps?: number;
    public readonly strictRouting: boolean;
    private _startNode?: BaseNode<S>;

    constructor(start?: BaseNode<S>, options: FlowOptions = {}) {
        const { maxSteps, strictRouting, ...nodeOptions } = options;
        super(nodeOptions);
        const parsed = flowOptionsSchema.parse({ maxSteps: maxSteps ?? settings.maxSteps, strictRouting });
        this.maxSteps = parsed.maxSteps;
        this.strictRouting = parsed.strictRouting;
        this._startNode = start;
    }

    get startNode(): BaseNode<S> | undefined {
        return this._startNode;
    }

    /**
     * Sets the node traversal begins at and returns it for chaining.
     */
    start<N extends BaseNode<S>>(node: N): N {
        this._startNode = node;
        return node;
    }

    prep(_shared: S): P {
        return undefined as P;
    }

    /**
     * Returns the action the flow reports to its caller or parent flow.
     * Defaults to the last action of the traversal.
     */
    post(_shared: S, _prepResult: P, execResult: NextAction): NextAction {
        return execResult;
    }

    visit(shared: S, run: RunContext): NextAction {
        const prepResult = this.prep(shared);
        const action = this.traverse(shared, this.params, run);
        return this.post(shared, prepResult, action);
    }

    /**
     * Walks the graph once with `params` as the inherited params.
     */
    protected traverse(shared: S, params: Readonly<Params>, run: RunContext): NextAction {
        return retryTraversal(this.retryTarget(run), () => this.orchestrate(shared, params, run));
    }

    private orchestrate(shared: S, params: Readonly<Params>, run: RunContext): NextAction {
        const frame = run.enterFlow(this.id);
        try {
            let { current, action } = entryPoint(this, run);
            const resumingInside = run.resuming;
            let steps = 0;
            while (current) {
                steps = countStep(this, steps);
                frame.currentNode = current.id;
                action = this.visitNode(current.withParams(params), shared, run);
                if (resumingInside && steps === 1) {
                    assertResumed(this, current, run);
                }
                if (run.paused) {
                    return action;
                }
                current = nextNode(this, current, action, run.logger);
            }
            return action ?? DEFAULT_ACTION;
        } finally {
            run.exitFlow(frame);
        }
    }

    private visitNode(node: BaseNode<S>, shared: S, run: RunContext): NextAction {
        if (node.isAsync) {
            throw new FlowTraversalError(`Node ${node.id} is asynchronous; run it in an AsyncFlow`, this.id);
        }
        const action = node.visit(shared, run);
        if (action instanceof Promise) {
            throw new FlowTraversalError(`Node ${node.id} returned a promise; run it in an AsyncFlow`, this.id);
        }
        return action;
    }

    /**
     * Runs the flow and returns its final action. A pause halts the run and
     * returns the pause node's action; use {@link invoke} to get the checkpoint.
     */
    run(shared: S): NextAction {
        return this.visit(shared, new RunContext());
    }

    /**
     * Runs the flow and reports how it ended, with a checkpoint when it paused.
     */
    invoke(shared: S, config: InvokeConfig = {}): FlowResult<S> {
        const run = new RunContext(config.runId);
        run.logger.debug("Run started", { flow: this.id });
        const action = this.visit(shared, run);
        return toFlowResult(shared, action, run);
    }

    /**
     * Continues a paused run at the successor of its pause node. The
     * checkpoint is left untouched and can be resumed again.
     *
     * @throws {FlowTraversalError} When the cursor does not match this flow's nodes.
     */
    resume(checkpoint: Checkpoint<S>): FlowResult<S> {
        checkpointSchema.parse(checkpoint);
        const shared = structuredClone(checkpoint.shared);
        const run = new RunContext(checkpoint.runId, { cursor: checkpoint.cursor, action: checkpoint.action });
        const action = this.visit(shared, run);
        return toFlowResult(shared, action, run);
    }
}

/**
 * A flow traversed once per parameter set returned by `prep`, one after the
 * other. Each traversal sees `{ ...flowParams, ...parameterSet }`.
 * Per-traversal actions are not aggregated; results go through the shared
 * context.
 *
 * @example
 * ```typescript
 * class PerFile extends BatchFlow<Corpus> {
 *     override prep(shared: Corpus) {
 *         return shared.files.map((file) => ({ file }));
 *     }
 * }
 * ```
 */
export class BatchFlow<S extends object> extends Flow<S, Params[]> {
    override prep(_shared: S): Params[] {
        return [];
    }

    override post(_shared: S, _prepResult: Params[], _execResult: NextAction): NextAction {
        return undefined;
    }

    override visit(shared: S, run: RunContext): NextAction {
        if (run.resuming) {
            throw new FlowTraversalError(`Cannot resume inside batch flow ${this.id}`, this.id);
        }
        const parameterSets = this.prep(shared) ?? [];
        for (const parameterSet of parameterSets) {
            this.traverse(shared, { ...this.params, ...parameterSet }, run);
            if (run.paused) {
                throw new FlowTraversalError(`Cannot pause inside batch flow ${this.id}`, this.id);
            }
        }
        return this.post(shared, parameterSets, undefined);
    }
}
