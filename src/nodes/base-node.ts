import { z } from "zod";
import { type RunContext } from "../graphs/run-context";
import { logger } from "../logger";
import { DEFAULT_ACTION, type Action, type NextAction, type Params } from "../types";
import { retryPolicySchema, type RetryPolicy, type RetryTarget } from "./retry";

export const nodeOptionsSchema = retryPolicySchema.extend({
    id: z.string().min(1).optional(),
    params: z.record(z.string(), z.unknown()).optional(),
});

/**
 * Options shared by every node and flow.
 */
export interface NodeOptions {
    /** Identity used in checkpoint cursors. Defaults to the class name. */
    id?: string;
    /** Static parameters, frozen at construction. */
    params?: Params;
    /** Attempts of the execute step before the fallback runs. Minimum 1. */
    maxRetries?: number;
    /** Milliseconds to wait between attempts. */
    retryInterval?: number;
}

/**
 * The part of a node a flow needs: identity, params, successors and a way to
 * run one visit.
 *
 * @template S - Shared context type
 * @template A - Actions this node returns
 */
export abstract class BaseNode<S extends object, A extends Action = Action> {
    /** True for nodes whose visit returns a promise. */
    abstract readonly isAsync: boolean;

    public readonly id: string;
    protected readonly retryPolicy: RetryPolicy;
    protected readonly successors = new Map<Action, BaseNode<S>>();
    private _params: Readonly<Params>;
    private retryIndex = 0;

    constructor(options: NodeOptions = {}) {
        const parsed = nodeOptionsSchema.parse(options);
        this.id = parsed.id ?? this.constructor.name;
        this.retryPolicy = { maxRetries: parsed.maxRetries, retryInterval: parsed.retryInterval };
        this._params = Object.freeze({ ...parsed.params });
    }

    get params(): Readonly<Params> {
        return this._params;
    }

    get maxRetries(): number {
        return this.retryPolicy.maxRetries;
    }

    get retryInterval(): number {
        return this.retryPolicy.retryInterval;
    }

    /**
     * Zero-based index of the attempt in progress: of `exec` for nodes, of the
     * whole traversal for flows. Flows record it on the copy they visit, so
     * it belongs to one visit.
     *
     * @example
     * ```typescript
     * exec(prompt: string) {
     *     const lastTry = this.currentRetry === this.maxRetries - 1;
     *     return complete(prompt, { model: lastTry ? "small" : "large" });
     * }
     * ```
     */
    get currentRetry(): number {
        return this.retryIndex;
    }

    /**
     * Replaces the static parameters. Meant for graph construction; running
     * visits never see later changes to an object passed here.
     */
    setParams(params: Params): this {
        this._params = Object.freeze({ ...params });
        return this;
    }

    /**
     * Registers `node` as the successor for `action` and returns `node`.
     * Registering an action twice keeps the last node.
     */
    connect<N extends BaseNode<S>>(action: A | typeof DEFAULT_ACTION, node: N): N {
        if (this.successors.has(action)) {
            logger.warn(`Overwriting successor for action "${action}" of node ${this.id}`);
        }
        this.successors.set(action, node);
        return node;
    }

    /**
     * Chains `node` after this one and returns it.
     *
     * @example
     * ```typescript
     * load.next(transform).next(save);
     * review.next(rewrite, "reject");
     * ```
     */
    next<N extends BaseNode<S>>(node: N, action: A | typeof DEFAULT_ACTION = DEFAULT_ACTION): N {
        return this.connect(action, node);
    }

    /**
     * Fluent form of {@link connect}: `review.on("reject").next(rewrite)`.
     */
    on(action: A | typeof DEFAULT_ACTION): Transition<S, A> {
        return new Transition(this, action);
    }

    /**
     * The successor registered for `action`, or `undefined` when the flow
     * should end here.
     */
    getSuccessor(action: NextAction): BaseNode<S> | undefined {
        return this.successors.get(action ?? DEFAULT_ACTION);
    }

    get actions(): Action[] {
        return [...this.successors.keys()];
    }

    successorNodes(): BaseNode<S>[] {
        return [...this.successors.values()];
    }

    /**
     * A shallow copy of this node for one visit, with `inherited` params merged
     * under its own.
     */
    withParams(inherited: Readonly<Params>): this {
        const copy: this = Object.create(Object.getPrototypeOf(this));
        Object.assign(copy, this);
        copy._params = Object.freeze({ ...inherited, ...this._params });
        return copy;
    }

    /**
     * Retry bookkeeping for this node within `run`.
     */
    protected retryTarget(run: RunContext): RetryTarget {
        return {
            nodeId: this.id,
            policy: this.retryPolicy,
            logger: run.logger,
            onAttempt: (index) => {
                this.retryIndex = index;
            },
        };
    }

    /**
     * Runs one visit: the node's whole lifecycle, returning its action.
     * Flows call this; callers use `run`.
     *
     * @internal
     */
    abstract visit(shared: S, run: RunContext): NextAction<A> | Promise<NextAction<A>>;
}

/**
 * Pending edge created by {@link BaseNode.on}.
 */
export class Transition<S extends object, A extends Action> {
    constructor(
        private readonly source: BaseNode<S, A>,
        private readonly action: A | typeof DEFAULT_ACTION,
    ) { }

    next<N extends BaseNode<S>>(node: N): N {
        return this.source.connect(this.action, node);
    }
}
