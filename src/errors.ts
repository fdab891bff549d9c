/**
 * Thrown when a node's `exec` failed on every attempt and no fallback
 * produced a result.
 */
export class NodeExecutionError extends Error {
    constructor(
        public readonly nodeId: string,
        public readonly attempts: number,
        cause: unknown,
        message = `Node ${nodeId} failed after ${attempts} attempt(s): ${describe(cause)}`,
    ) {
        super(message, { cause });
        this.name = "NodeExecutionError";
    }
}

/**
 * Thrown when a node's `execFallback` raised an error of its own.
 * `cause` is the fallback's error, `execError` the last error of `exec`.
 */
export class NodeFallbackError extends NodeExecutionError {
    constructor(
        nodeId: string,
        attempts: number,
        public readonly execError: unknown,
        fallbackError: unknown,
    ) {
        super(
            nodeId,
            attempts,
            fallbackError,
            `Fallback of node ${nodeId} failed after ${attempts} attempt(s): ${describe(fallbackError)}`,
        );
        this.name = "NodeFallbackError";
    }
}

export interface BatchFailure {
    index: number;
    error: unknown;
}

/**
 * Thrown by parallel batch nodes and flows once every item has settled and at
 * least one of them failed. `results` holds what the other items produced.
 */
export class AggregateBatchError<R = unknown> extends AggregateError {
    public readonly failures: BatchFailure[];

    constructor(
        public readonly source: string,
        failures: BatchFailure[],
        public readonly results: (R | undefined)[],
    ) {
        super(
            failures.map((failure) => failure.error),
            `${failures.length} of ${results.length} item(s) failed in ${source}: indexes ${failures.map((failure) => failure.index).join(", ")}`,
        );
        this.name = "AggregateBatchError";
        this.failures = failures;
    }
}

export class FlowTraversalError extends Error {
    constructor(message: string, public readonly flowId?: string) {
        super(message);
        this.name = "FlowTraversalError";
    }
}

export class StepLimitExceededError extends FlowTraversalError {
    constructor(flowId: string, public readonly maxSteps: number) {
        super(`Flow ${flowId} exceeded ${maxSteps} step(s)`, flowId);
        this.name = "StepLimitExceededError";
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
