import { z } from "zod";
import { settings } from "../config";
import { AggregateBatchError, type BatchFailure } from "../errors";
import { RunContext } from "../graphs/run-context";
import { type Action, type NextAction } from "../types";
import { settleWithConcurrency } from "../util";
import { BaseNode, type NodeOptions } from "./base-node";
import { runWithRetryAsync } from "./retry";

/**
 * Asynchronous counterpart of {@link LifecycleNode}. Every phase may return a
 * promise; the phases of one visit never overlap.
 */
export abstract class AsyncLifecycleNode<S extends object, P, E, A extends Action = Action> extends BaseNode<S, A> {
    readonly isAsync = true;

    async prep(_shared: S): Promise<P> {
        return undefined as P;
    }

    async post(_shared: S, _prepResult: P, _execResult: E): Promise<NextAction<A>> {
        return undefined;
    }

    protected abstract execute(prepResult: P, run: RunContext): Promise<E>;

    async visit(shared: S, run: RunContext): Promise<NextAction<A>> {
        const prepResult = await this.prep(shared);
        const execResult = await this.execute(prepResult, run);
        return await this.post(shared, prepResult, execResult);
    }

    async run(shared: S): Promise<NextAction<A>> {
        const run = new RunContext();
        if (this.successors.size > 0) {
            run.logger.warn(`Node ${this.id} won't run successors. Use AsyncFlow.`);
        }
        return await this.visit(shared, run);
    }
}

/**
 * A node whose phases await external work. Retry waits are timers, so the
 * process stays responsive while a node backs off.
 *
 * @example
 * ```typescript
 * class FetchPage extends AsyncNode<Crawl, string, string> {
 *     async prep(shared: Crawl) { return shared.url; }
 *     async exec(url: string) { return await download(url); }
 *     async post(shared: Crawl, _url: string, html: string) {
 *         shared.html = html;
 *         return html.length > 0 ? "parse" : "skip";
 *     }
 * }
 * ```
 */
export class AsyncNode<S extends object, P = unknown, E = unknown, A extends Action = Action> extends AsyncLifecycleNode<S, P, E, A> {
    async exec(_prepResult: P): Promise<E> {
        return undefined as E;
    }

    async execFallback(_prepResult: P, error: unknown): Promise<E> {
        throw error;
    }

    protected async execute(prepResult: P, run: RunContext): Promise<E> {
        return await runWithRetryAsync(
            this.retryTarget(run),
            () => this.exec(prepResult),
            (error) => this.execFallback(prepResult, error),
        );
    }
}

/**
 * Awaits `exec` for each item in turn, in input order.
 */
export class AsyncBatchNode<S extends object, I = unknown, R = unknown, A extends Action = Action> extends AsyncLifecycleNode<S, I[], R[], A> {
    override async prep(_shared: S): Promise<I[]> {
        return [];
    }

    async exec(_item: I): Promise<R> {
        return undefined as R;
    }

    async execFallback(_item: I, error: unknown): Promise<R> {
        throw error;
    }

    protected async execute(items: I[], run: RunContext): Promise<R[]> {
        const target = this.retryTarget(run);
        const results: R[] = [];
        for (const item of items ?? []) {
            results.push(await runWithRetryAsync(
                target,
                () => this.exec(item),
                (error) => this.execFallback(item, error),
            ));
        }
        return results;
    }
}

export const concurrencySchema = z.custom<number>(
    (value) => value === Infinity || (typeof value === "number" && Number.isInteger(value) && value >= 1),
    "Concurrency must be a positive integer or Infinity",
);

export interface ParallelOptions extends NodeOptions {
    /** Items in flight at once. Defaults to `RELAYGRAPH_CONCURRENCY`. */
    concurrency?: number;
}

/**
 * Starts `exec` for every item through a bounded worker pool. Results keep
 * the input order whatever order the items finish in.
 *
 * Every item runs on its own copy of the node, with its own retries,
 * fallback and `currentRetry`. When some items still fail,
 * the node waits for the rest to settle and throws an
 * {@link AggregateBatchError} carrying the results that did come back.
 * Items writing to the shared context from `exec` would race; they shouldn't.
 */
export class ParallelBatchNode<S extends object, I = unknown, R = unknown, A extends Action = Action> extends AsyncLifecycleNode<S, I[], R[], A> {
    public readonly concurrency: number;

    constructor(options: ParallelOptions = {}) {
        const { concurrency, ...rest } = options;
        super(rest);
        this.concurrency = concurrencySchema.parse(concurrency ?? settings.concurrency);
    }

    override async prep(_shared: S): Promise<I[]> {
        return [];
    }

    async exec(_item: I): Promise<R> {
        return undefined as R;
    }

    async execFallback(_item: I, error: unknown): Promise<R> {
        throw error;
    }

    protected async execute(items: I[], run: RunContext): Promise<R[]> {
        const outcomes = await settleWithConcurrency(items ?? [], this.concurrency, (item) => {
            const itemNode = this.withParams(this.params);
            return runWithRetryAsync(
                itemNode.retryTarget(run),
                () => itemNode.exec(item),
                (error) => itemNode.execFallback(item, error),
            );
        });
        return collectOutcomes(this.id, outcomes);
    }
}

/**
 * Unwraps settled outcomes in index order, or throws an AggregateBatchError
 * when any of them was rejected.
 */
export function collectOutcomes<R>(source: string, outcomes: PromiseSettledResult<R>[]): R[] {
    const failures: BatchFailure[] = [];
    const results: (R | undefined)[] = outcomes.map((outcome, index) => {
        if (outcome.status === "fulfilled") {
            return outcome.value;
        }
        failures.push({ index, error: outcome.reason });
        return undefined;
    });
    if (failures.length > 0) {
        throw new AggregateBatchError<R>(source, failures, results);
    }
    return outcomes.flatMap((outcome) => (outcome.status === "fulfilled" ? [outcome.value] : []));
}
