import { settings } from "../config";
import { FlowTraversalError } from "../errors";
import { collectOutcomes, concurrencySchema } from "../nodes/async-node";
import { BaseNode } from "../nodes/base-node";
import { DEFAULT_ACTION, type NextAction, type Params } from "../types";
import { settleWithConcurrency } from "../util";
import { checkpointSchema, type Checkpoint } from "./checkpoint";
import { flowOptionsSchema, type FlowOptions } from "./flow";
import { RunContext } from "./run-context";
import {
    assertResumed,
    countStep,
    entryPoint,
    nextNode,
    retryTraversalAsync,
    toFlowResult,
    type TraversalSettings,
} from "./traversal";
import { type FlowResult, type InvokeConfig } from "./types";

/**
 * A flow whose traversal awaits every node. It runs asynchronous and
 * synchronous nodes alike, one at a time.
 *
 * @example
 * ```typescript
 * const flow = new AsyncFlow<Crawl>(fetchPage);
 * fetchPage.on("parse").next(parsePage);
 * const result = await flow.invoke({ url: "https://example.com" });
 * ```
 */
export class AsyncFlow<S extends object, P = unknown> extends BaseNode<S> implements TraversalSettings<S> {
    readonly isAsync = true;
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

    start<N extends BaseNode<S>>(node: N): N {
        this._startNode = node;
        return node;
    }

    async prep(_shared: S): Promise<P> {
        return undefined as P;
    }

    async post(_shared: S, _prepResult: P, execResult: NextAction): Promise<NextAction> {
        return execResult;
    }

    async visit(shared: S, run: RunContext): Promise<NextAction> {
        const prepResult = await this.prep(shared);
        const action = await this.traverse(shared, this.params, run);
        return await this.post(shared, prepResult, action);
    }

    protected async traverse(shared: S, params: Readonly<Params>, run: RunContext): Promise<NextAction> {
        return await retryTraversalAsync(this.retryTarget(run), () => this.orchestrate(shared, params, run));
    }

    private async orchestrate(shared: S, params: Readonly<Params>, run: RunContext): Promise<NextAction> {
        const frame = run.enterFlow(this.id);
        try {
            let { current, action } = entryPoint(this, run);
            const resumingInside = run.resuming;
            let steps = 0;
            while (current) {
                steps = countStep(this, steps);
                frame.currentNode = current.id;
                action = await current.withParams(params).visit(shared, run);
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

    async run(shared: S): Promise<NextAction> {
        return await this.visit(shared, new RunContext());
    }

    async invoke(shared: S, config: InvokeConfig = {}): Promise<FlowResult<S>> {
        const run = new RunContext(config.runId);
        run.logger.debug("Run started", { flow: this.id });
        const action = await this.visit(shared, run);
        return toFlowResult(shared, action, run);
    }

    async resume(checkpoint: Checkpoint<S>): Promise<FlowResult<S>> {
        checkpointSchema.parse(checkpoint);
        const shared = structuredClone(checkpoint.shared);
        const run = new RunContext(checkpoint.runId, { cursor: checkpoint.cursor, action: checkpoint.action });
        const action = await this.visit(shared, run);
        return toFlowResult(shared, action, run);
    }
}

/**
 * {@link BatchFlow} for asynchronous graphs: one awaited traversal per
 * parameter set, in order.
 */
export class AsyncBatchFlow<S extends object> extends AsyncFlow<S, Params[]> {
    override async prep(_shared: S): Promise<Params[]> {
        return [];
    }

    override async post(_shared: S, _prepResult: Params[], _execResult: NextAction): Promise<NextAction> {
        return undefined;
    }

    override async visit(shared: S, run: RunContext): Promise<NextAction> {
        if (run.resuming) {
            throw new FlowTraversalError(`Cannot resume inside batch flow ${this.id}`, this.id);
        }
        const parameterSets = (await this.prep(shared)) ?? [];
        for (const parameterSet of parameterSets) {
            await this.traverse(shared, { ...this.params, ...parameterSet }, run);
            if (run.paused) {
                throw new FlowTraversalError(`Cannot pause inside batch flow ${this.id}`, this.id);
            }
        }
        return await this.post(shared, parameterSets, undefined);
    }
}

export interface ParallelFlowOptions extends FlowOptions {
    /** Traversals in flight at once. Defaults to `RELAYGRAPH_CONCURRENCY`. */
    concurrency?: number;
}

/**
 * Traverses the graph concurrently, once per parameter set, through a
 * bounded worker pool. Each traversal has its own run context and cannot
 * pause.
 *
 * When traversals fail, the flow waits for the others and throws an
 * AggregateBatchError whose `results` hold the actions of the ones that
 * finished. Writes to the shared context from concurrent traversals race;
 * key them per parameter set.
 */
export class ParallelBatchFlow<S extends object> extends AsyncFlow<S, Params[]> {
    public readonly concurrency: number;

    constructor(start?: BaseNode<S>, options: ParallelFlowOptions = {}) {
        const { concurrency, ...rest } = options;
        super(start, rest);
        this.concurrency = concurrencySchema.parse(concurrency ?? settings.concurrency);
    }

    override async prep(_shared: S): Promise<Params[]> {
        return [];
    }

    override async post(_shared: S, _prepResult: Params[], _execResult: NextAction): Promise<NextAction> {
        return undefined;
    }

    override async visit(shared: S, run: RunContext): Promise<NextAction> {
        if (run.resuming) {
            throw new FlowTraversalError(`Cannot resume inside parallel batch flow ${this.id}`, this.id);
        }
        const parameterSets = (await this.prep(shared)) ?? [];
        const outcomes = await settleWithConcurrency(parameterSets, this.concurrency, (parameterSet) =>
            this.withParams(this.params).traverse(shared, { ...this.params, ...parameterSet }, run.fork()),
        );
        collectOutcomes(this.id, outcomes);
        return await this.post(shared, parameterSets, undefined);
    }
}
