import { createId } from "@paralleldrive/cuid2";
import { FlowTraversalError } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import { type NextAction } from "../types";

/**
 * One entry of the flow stack. Flows push a frame when their traversal starts
 * and record the node they are visiting in it.
 */
export class FlowFrame {
    /**
     * Id of the node this flow is currently visiting.
     */
    public currentNode?: string;

    constructor(
        public readonly flowId: string,
        public readonly depth: number,
    ) { }
}

/**
 * Where a resumed run picks up, as stored in a checkpoint.
 */
export interface ResumePoint {
    cursor: string[];
    action: NextAction;
}

/**
 * The next cursor segment handed to a flow while resuming.
 * `isPausePoint` is true for the last segment: the node that paused.
 */
export interface ResumeTarget {
    nodeId: string;
    isPausePoint: boolean;
    action: NextAction;
}

/**
 * State of a single run shared by every flow it traverses: the stack of flow
 * frames, the pause signal and the pending resume cursor.
 *
 * @example
 * ```typescript
 * const run = new RunContext();
 * const frame = run.enterFlow("outer");
 * frame.currentNode = "review";
 * run.markPaused("waiting for feedback", "default");
 * run.cursor; // ["review"]
 * ```
 */
export class RunContext {
    private readonly frames: FlowFrame[] = [];
    private readonly pendingCursor: string[];
    private readonly resumeAction: NextAction;
    private _paused = false;
    private _pauseMessage = "";
    private _pauseAction: NextAction;

    public readonly logger: Logger;

    /**
     * @param runId - Defaults to a fresh cuid.
     * @param resumeFrom - Cursor and action of a checkpoint to continue from.
     * @param forked - Forked contexts run concurrent sub-traversals and cannot pause.
     */
    constructor(
        public readonly runId: string = createId(),
        resumeFrom?: ResumePoint,
        private readonly forked = false,
    ) {
        this.pendingCursor = [...(resumeFrom?.cursor ?? [])];
        this.resumeAction = resumeFrom?.action;
        this.logger = rootLogger.child({ runId });
    }

    get paused(): boolean {
        return this._paused;
    }

    get pauseMessage(): string {
        return this._pauseMessage;
    }

    get pauseAction(): NextAction {
        return this._pauseAction;
    }

    get resuming(): boolean {
        return this.pendingCursor.length > 0;
    }

    /**
     * Node ids from the root flow down to the node being visited.
     */
    get cursor(): string[] {
        return this.frames.map((frame) => frame.currentNode ?? frame.flowId);
    }

    enterFlow(flowId: string): FlowFrame {
        const frame = new FlowFrame(flowId, this.frames.length);
        this.frames.push(frame);
        return frame;
    }

    /**
     * Pops `frame`. A paused run keeps its frames so the cursor survives.
     */
    exitFlow(frame: FlowFrame): void {
        if (this._paused) {
            return;
        }
        if (this.frames[this.frames.length - 1] === frame) {
            this.frames.pop();
        }
    }

    /**
     * Consumes the next segment of the resume cursor, if any.
     */
    takeResumeTarget(): ResumeTarget | undefined {
        const nodeId = this.pendingCursor.shift();
        if (nodeId === undefined) {
            return undefined;
        }
        const isPausePoint = this.pendingCursor.length === 0;
        return { nodeId, isPausePoint, action: isPausePoint ? this.resumeAction : undefined };
    }

    markPaused(message: string, action: NextAction): void {
        if (this.forked) {
            throw new FlowTraversalError("Cannot pause inside a parallel batch flow");
        }
        this._paused = true;
        this._pauseMessage = message;
        this._pauseAction = action;
        this.logger.info("Run paused", { cursor: this.cursor, message });
    }

    /**
     * A context for one concurrent sub-traversal of this run.
     */
    fork(): RunContext {
        return new RunContext(this.runId, undefined, true);
    }
}
