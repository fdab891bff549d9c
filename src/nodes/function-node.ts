import { type Action, type NextAction } from "../types";
import { AsyncNode } from "./async-node";
import { Node } from "./node";
import { type AsyncFunctionNodeConfig, type FunctionNodeConfig } from "./types";

/**
 * A {@link Node} whose phases are plain functions. Phases left out behave like
 * the defaults of `Node`.
 *
 * @example
 * ```typescript
 * const double = new FunctionNode<{ count: number }, number, number>({
 *     prep: (shared) => shared.count,
 *     exec: (count) => count * 2,
 *     post: (shared, _count, doubled) => {
 *         shared.count = doubled;
 *         return undefined;
 *     },
 * });
 * ```
 */
export class FunctionNode<S extends object, P = unknown, E = unknown, A extends Action = Action> extends Node<S, P, E, A> {
    constructor(private readonly functions: FunctionNodeConfig<S, P, E, A>) {
        super(functions);
    }

    override prep(shared: S): P {
        return this.functions.prep ? this.functions.prep(shared, this.params) : super.prep(shared);
    }

    override exec(prepResult: P): E {
        return this.functions.exec ? this.functions.exec(prepResult, this.params) : super.exec(prepResult);
    }

    override execFallback(prepResult: P, error: unknown): E {
        return this.functions.fallback
            ? this.functions.fallback(prepResult, error, this.params)
            : super.execFallback(prepResult, error);
    }

    override post(shared: S, prepResult: P, execResult: E): NextAction<A> {
        return this.functions.post?.(shared, prepResult, execResult, this.params);
    }
}

/**
 * {@link FunctionNode} for phases that may return promises.
 */
export class AsyncFunctionNode<S extends object, P = unknown, E = unknown, A extends Action = Action> extends AsyncNode<S, P, E, A> {
    constructor(private readonly functions: AsyncFunctionNodeConfig<S, P, E, A>) {
        super(functions);
    }

    override async prep(shared: S): Promise<P> {
        return this.functions.prep ? await this.functions.prep(shared, this.params) : await super.prep(shared);
    }

    override async exec(prepResult: P): Promise<E> {
        return this.functions.exec ? await this.functions.exec(prepResult, this.params) : await super.exec(prepResult);
    }

    override async execFallback(prepResult: P, error: unknown): Promise<E> {
        return this.functions.fallback
            ? await this.functions.fallback(prepResult, error, this.params)
            : await super.execFallback(prepResult, error);
    }

    override async post(shared: S, prepResult: P, execResult: E): Promise<NextAction<A>> {
        return await this.functions.post?.(shared, prepResult, execResult, this.params);
    }
}

/**
 * Builds a synchronous node from functions, inferring its types.
 */
export function makeNode<S extends object, P = unknown, E = unknown, A extends Action = Action>(
    config: FunctionNodeConfig<S, P, E, A>,
): FunctionNode<S, P, E, A> {
    return new FunctionNode(config);
}

export function makeAsyncNode<S extends object, P = unknown, E = unknown, A extends Action = Action>(
    config: AsyncFunctionNodeConfig<S, P, E, A>,
): AsyncFunctionNode<S, P, E, A> {
    return new AsyncFunctionNode(config);
}
