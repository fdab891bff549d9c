import { type Action, type MaybePromise, type NextAction, type Params } from "../types";
import { type NodeOptions } from "./base-node";

/**
 * Phases of a node built from functions. Each phase also receives the
 * effective params of the visit.
 */
export interface NodeFunctions<S extends object, P, E, A extends Action = Action> {
    prep?: (shared: S, params: Readonly<Params>) => P;
    /** Works on the prep result only; it may be attempted several times. */
    exec?: (prepResult: P, params: Readonly<Params>) => E;
    fallback?: (prepResult: P, error: unknown, params: Readonly<Params>) => E;
    post?: (shared: S, prepResult: P, execResult: E, params: Readonly<Params>) => NextAction<A>;
}

export type FunctionNodeConfig<S extends object, P, E, A extends Action = Action> =
    NodeOptions & NodeFunctions<S, P, E, A>;

export interface AsyncNodeFunctions<S extends object, P, E, A extends Action = Action> {
    prep?: (shared: S, params: Readonly<Params>) => MaybePromise<P>;
    exec?: (prepResult: P, params: Readonly<Params>) => MaybePromise<E>;
    fallback?: (prepResult: P, error: unknown, params: Readonly<Params>) => MaybePromise<E>;
    post?: (shared: S, prepResult: P, execResult: E, params: Readonly<Params>) => MaybePromise<NextAction<A>>;
}

export type AsyncFunctionNodeConfig<S extends object, P, E, A extends Action = Action> =
    NodeOptions & AsyncNodeFunctions<S, P, E, A>;
