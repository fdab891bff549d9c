import { z } from "zod";
import { FlowTraversalError, NodeExecutionError, NodeFallbackError } from "../errors";
import { type Logger } from "../logger";
import { sleep, sleepSync } from "../util";

export const retryPolicySchema = z.object({
    maxRetries: z.number().int().min(1).default(1),
    retryInterval: z.number().min(0).default(0),
});

export type RetryPolicy = z.infer<typeof retryPolicySchema>;

export interface RetryTarget {
    nodeId: string;
    policy: RetryPolicy;
    logger: Logger;
    /** Called with the zero-based index of each attempt before it starts. */
    onAttempt: (index: number) => void;
}

/**
 * Attempts `attempt` up to `maxRetries` times, then hands the last error to
 * `fallback` once.
 *
 * A fallback that rethrows the error it was given means "no fallback" and
 * surfaces as {@link NodeExecutionError}; any other error it throws surfaces
 * as {@link NodeFallbackError}.
 */
export function runWithRetry<E>(
    target: RetryTarget,
    attempt: () => E,
    fallback: (error: unknown) => E,
): E {
    const { maxRetries, retryInterval } = target.policy;
    for (let attemptNumber = 1; ; attemptNumber++) {
        let result: E;
        try {
            target.onAttempt(attemptNumber - 1);
            result = attempt();
        } catch (error) {
            logAttemptFailure(target, attemptNumber, error);
            if (attemptNumber >= maxRetries) {
                return recover(target, error, () => fallback(error));
            }
            sleepSync(retryInterval);
            continue;
        }
        return assertSynchronous(target, result);
    }
}

/**
 * Async counterpart of {@link runWithRetry}; waits between attempts with a
 * timer instead of blocking.
 */
export async function runWithRetryAsync<E>(
    target: RetryTarget,
    attempt: () => Promise<E>,
    fallback: (error: unknown) => Promise<E>,
): Promise<E> {
    const { maxRetries, retryInterval } = target.policy;
    for (let attemptNumber = 1; ; attemptNumber++) {
        try {
            target.onAttempt(attemptNumber - 1);
            return await attempt();
        } catch (error) {
            logAttemptFailure(target, attemptNumber, error);
            if (attemptNumber >= maxRetries) {
                try {
                    const result = await fallback(error);
                    target.logger.warn(`Node ${target.nodeId} recovered through its fallback`);
                    return result;
                } catch (fallbackError) {
                    throw toNodeError(target, error, fallbackError);
                }
            }
            if (retryInterval > 0) {
                await sleep(retryInterval);
            }
        }
    }
}

function recover<E>(target: RetryTarget, error: unknown, fallback: () => E): E {
    let result: E;
    try {
        result = fallback();
    } catch (fallbackError) {
        throw toNodeError(target, error, fallbackError);
    }
    target.logger.warn(`Node ${target.nodeId} recovered through its fallback`);
    return assertSynchronous(target, result);
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
    return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * Synchronous nodes cannot await: a promise from `exec` or `execFallback`
 * would reach `post` unsettled and skip the retries.
 */
function assertSynchronous<E>(target: RetryTarget, result: E): E {
    if (!isThenable(result)) {
        return result;
    }
    void Promise.resolve(result).catch((error: unknown) => {
        target.logger.warn(`Node ${target.nodeId} rejected a promise nobody awaits`, {
            error: error instanceof Error ? error.message : String(error),
        });
    });
    throw new FlowTraversalError(
        `Node ${target.nodeId} returned a promise from a synchronous phase; use AsyncNode and run it in an AsyncFlow`,
    );
}

function toNodeError(target: RetryTarget, execError: unknown, fallbackError: unknown): NodeExecutionError {
    const attempts = target.policy.maxRetries;
    if (fallbackError === execError) {
        return new NodeExecutionError(target.nodeId, attempts, execError);
    }
    return new NodeFallbackError(target.nodeId, attempts, execError, fallbackError);
}

function logAttemptFailure(target: RetryTarget, attemptNumber: number, error: unknown): void {
    target.logger.warn(`Node ${target.nodeId} exec failed (attempt ${attemptNumber}/${target.policy.maxRetries})`, {
        error: error instanceof Error ? error.message : String(error),
    });
}
