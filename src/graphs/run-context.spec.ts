import { describe, expect, it } from "vitest";
import { FlowTraversalError } from "../errors";
import { RunContext } from "./run-context";

describe("RunContext", () => {
    it("should build the cursor from the flow stack", () => {
        const run = new RunContext("test-run");
        const outer = run.enterFlow("outer");
        expect(run.cursor).toEqual(["outer"]);
        outer.currentNode = "inner";
        const inner = run.enterFlow("inner");
        inner.currentNode = "wait";
        expect(inner.depth).toBe(1);
        expect(run.cursor).toEqual(["inner", "wait"]);
        run.exitFlow(inner);
        expect(run.cursor).toEqual(["inner"]);
    });

    it("should keep its frames once paused", () => {
        const run = new RunContext("test-run");
        const frame = run.enterFlow("flow");
        frame.currentNode = "wait";
        run.markPaused("waiting", "go");
        run.exitFlow(frame);
        expect(run.cursor).toEqual(["wait"]);
        expect(run.pauseAction).toBe("go");
    });

    it("should hand out the resume cursor one segment at a time", () => {
        const run = new RunContext("test-run", { cursor: ["inner", "wait"], action: "approve" });
        expect(run.resuming).toBe(true);
        expect(run.takeResumeTarget()).toEqual({ nodeId: "inner", isPausePoint: false, action: undefined });
        expect(run.takeResumeTarget()).toEqual({ nodeId: "wait", isPausePoint: true, action: "approve" });
        expect(run.resuming).toBe(false);
        expect(run.takeResumeTarget()).toBeUndefined();
    });

    it("should generate a run id", () => {
        expect(new RunContext().runId).toMatch(/^[a-z0-9]+$/);
    });

    it("should fork contexts that share the run id but cannot pause", () => {
        const fork = new RunContext("test-run").fork();
        expect(fork.runId).toBe("test-run");
        expect(() => fork.markPaused("no", undefined)).toThrow(FlowTraversalError);
    });
});
