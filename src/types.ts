/**
 * The object handed by reference to every node of a run.
 * Nodes communicate only through it.
 */
export type SharedContext = Record<string, unknown>;

/**
 * Static, build-time parameters of a node or flow.
 */
export type Params = Record<string, unknown>;

/**
 * Label returned by a node's `post` phase, used to pick the next node.
 */
export type Action = string;

/**
 * `undefined` is routed as {@link DEFAULT_ACTION}.
 */
export type NextAction<A extends Action = Action> = A | undefined;

export const DEFAULT_ACTION = "default";

/**
 * A value or a promise of it.
 */
export type MaybePromise<T> = T | Promise<T>;
