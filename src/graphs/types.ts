import { type NextAction } from "../types";
import { type Checkpoint } from "./checkpoint";

interface EndResult<S extends object> {
    runId: string;
    shared: S;
    exitReason: "end";
    action: NextAction;
}

interface PauseResult<S extends object> {
    runId: string;
    shared: S;
    exitReason: "pause";
    action: NextAction;
    message: string;
    checkpoint: Checkpoint<S>;
}

export type FlowResult<S extends object> = EndResult<S> | PauseResult<S>;

export interface InvokeConfig {
    runId?: string;
}
