import { FlowTraversalError, StepLimitExceededError } from "../errors";
import { type Logger } from "../logger";
import { type BaseNode } from "../nodes/base-node";
import { type RetryTarget } from "../nodes/retry";
import { type NextAction } from "../types";
import { sleep, sleepSync } from "../util";
import { type RunContext } from "./run-context";
import { type FlowResult } from "./types";

/**
 * What traversal needs to know about the flow it walks.
 */
export interface TraversalSettings<S extends object> {
    readonly id: string;
    readonly startNode?: BaseNode<S>;
    readonly maxSteps?: number;
    readonly strictRouting: boolean;
}

/**
 * Every node reachable from `start` through successor edges, in breadth-first
 * order.
 */
export function collectNodes<S extends object>(start: BaseNode<S>): BaseNode<S>[] {
    const seen = new Set<BaseNode<S>>([start]);
    const queue = [start];
    for (let i = 0; i < queue.length; i++) {
        for (const successor of queue[i].successorNodes()) {
            if (!seen.has(successor)) {
                seen.add(successor);
                queue.push(successor);
            }
        }
    }
    return queue;
}

function requireStart<S extends object>(flow: TraversalSettings<S>): BaseNode<S> {
    if (!flow.startNode) {
        throw new FlowTraversalError(`Flow ${flow.id} has no start node`, flow.id);
    }
    return flow.startNode;
}

export function findNode<S extends object>(flow: TraversalSettings<S>, nodeId: string): BaseNode<S> {
    const matches = collectNodes(requireStart(flow)).filter((node) => node.id === nodeId);
    if (matches.length === 0) {
        throw new FlowTraversalError(`Node ${nodeId} not found in flow ${flow.id}`, flow.id);
    }
    if (matches.length > 1) {
        throw new FlowTraversalError(
            `Node id ${nodeId} is used by ${matches.length} nodes in flow ${flow.id}; give them distinct ids`,
            flow.id,
        );
    }
    return matches[0];
}

/**
 * Successor of `node` for `action`. Without one the flow ends, which is
 * logged when the node has other edges, or rejected under strict routing.
 */
export function nextNode<S extends object>(
    flow: TraversalSettings<S>,
    node: BaseNode<S>,
    action: NextAction,
    logger: Logger,
): BaseNode<S> | undefined {
    const successor = node.getSuccessor(action);
    if (!successor && node.actions.length > 0) {
        const message = `Flow ${flow.id} ends: action "${action ?? "default"}" not found in [${node.actions.join(", ")}] of node ${node.id}`;
        if (flow.strictRouting) {
            throw new FlowTraversalError(message, flow.id);
        }
        logger.warn(message);
    }
    return successor;
}

export interface EntryPoint<S extends object> {
    current?: BaseNode<S>;
    action: NextAction;
}

/**
 * Where a traversal of `flow` begins: its start node, or the place the
 * run's resume cursor points at.
 */
export function entryPoint<S extends object>(flow: TraversalSettings<S>, run: RunContext): EntryPoint<S> {
    const start = requireStart(flow);
    const target = run.takeResumeTarget();
    if (!target) {
        return { current: start, action: undefined };
    }
    const node = findNode(flow, target.nodeId);
    if (!target.isPausePoint) {
        return { current: node, action: undefined };
    }
    run.logger.info("Run resumed", { flow: flow.id, node: node.id });
    return { current: nextNode(flow, node, target.action, run.logger), action: target.action };
}

/**
 * Fails when a node re-entered for resuming did not consume the rest of the
 * cursor, i.e. it was not a flow.
 */
export function assertResumed<S extends object>(flow: TraversalSettings<S>, node: BaseNode<S>, run: RunContext): void {
    if (run.resuming) {
        throw new FlowTraversalError(`Cannot resume inside node ${node.id} of flow ${flow.id}: it is not a flow`, flow.id);
    }
}

export function countStep<S extends object>(flow: TraversalSettings<S>, steps: number): number {
    const next = steps + 1;
    if (flow.maxSteps !== undefined && next > flow.maxSteps) {
        throw new StepLimitExceededError(flow.id, flow.maxSteps);
    }
    return next;
}

/**
 * Retries a whole traversal from its start node. The last error is rethrown
 * unchanged.
 */
export function retryTraversal<T>(target: RetryTarget, traverse: () => T): T {
    const { policy, logger, nodeId: flowId } = target;
    for (let attempt = 1; ; attempt++) {
        try {
            target.onAttempt(attempt - 1);
            return traverse();
        } catch (error) {
            if (attempt >= policy.maxRetries) {
                throw error;
            }
            logger.warn(`Flow ${flowId} failed (attempt ${attempt}/${policy.maxRetries}), restarting`, {
                error: error instanceof Error ? error.message : String(error),
            });
            sleepSync(policy.retryInterval);
        }
    }
}

export async function retryTraversalAsync<T>(target: RetryTarget, traverse: () => Promise<T>): Promise<T> {
    const { policy, logger, nodeId: flowId } = target;
    for (let attempt = 1; ; attempt++) {
        try {
            target.onAttempt(attempt - 1);
            return await traverse();
        } catch (error) {
            if (attempt >= policy.maxRetries) {
                throw error;
            }
            logger.warn(`Flow ${flowId} failed (attempt ${attempt}/${policy.maxRetries}), restarting`, {
                error: error instanceof Error ? error.message : String(error),
            });
            if (policy.retryInterval > 0) {
                await sleep(policy.retryInterval);
            }
        }
    }
}

/**
 * Builds the result of a root traversal, with a checkpoint when it paused.
 */
export function toFlowResult<S extends object>(shared: S, action: NextAction, run: RunContext): FlowResult<S> {
    if (!run.paused) {
        run.logger.debug("Run ended", { action });
        return { runId: run.runId, shared, exitReason: "end", action };
    }
    return {
        runId: run.runId,
        shared,
        exitReason: "pause",
        action,
        message: run.pauseMessage,
        checkpoint: {
            version: 1,
            runId: run.runId,
            cursor: run.cursor,
            action: run.pauseAction,
            message: run.pauseMessage,
            shared: structuredClone(shared),
        },
    };
}
