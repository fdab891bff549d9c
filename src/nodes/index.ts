export { BaseNode, Transition, type NodeOptions } from "./base-node";
export { LifecycleNode, Node, BatchNode } from "./node";
export { AsyncLifecycleNode, AsyncNode, AsyncBatchNode, ParallelBatchNode, type ParallelOptions } from "./async-node";
export { FunctionNode, AsyncFunctionNode, makeNode, makeAsyncNode } from "./function-node";
export { PauseNode, type PauseOptions } from "./pause-node";
export { type RetryPolicy } from "./retry";
export { type FunctionNodeConfig, type AsyncFunctionNodeConfig, type NodeFunctions, type AsyncNodeFunctions } from "./types";
