import { describe, expect, it } from "vitest";
import { z, ZodError } from "zod";
import { FlowTraversalError } from "../errors";
import { type BaseNode } from "../nodes/base-node";
import { makeNode } from "../nodes/function-node";
import { PauseNode } from "../nodes/pause-node";
import { type Checkpoint, parseCheckpoint, serializeCheckpoint } from "./checkpoint";
import { BatchFlow, Flow } from "./flow";

const jokeSchema = z.object({
    attempts: z.number(),
    joke: z.string().optional(),
    feedback: z.string().optional(),
    published: z.string().optional(),
});
type Joke = z.infer<typeof jokeSchema>;

const visitsSchema = z.object({ visited: z.array(z.string()) });

function buildJokeFlow(): Flow<Joke> {
    const generate = makeNode<Joke>({
        id: "generate",
        post: (shared) => {
            shared.attempts++;
            shared.joke = `joke ${shared.attempts}`;
            return undefined;
        },
    });
    const wait = new PauseNode<Joke>({ id: "wait", message: "Review the joke" });
    const decide = makeNode<Joke>({
        id: "decide",
        post: (shared) => (shared.feedback === "approve" ? "approve" : "disapprove"),
    });
    const publish = makeNode<Joke>({
        id: "publish",
        post: (shared) => {
            shared.published = shared.joke;
            return undefined;
        },
    });
    generate.next(wait).next(decide);
    decide.on("approve").next(publish);
    decide.on("disapprove").next(generate);
    return new Flow(generate, { id: "jokes" });
}

/** Round-trips a checkpoint through JSON, as a separate process would. */
function reload(checkpoint: Checkpoint<Joke>, feedback: string): Checkpoint<Joke> {
    const restored = parseCheckpoint(serializeCheckpoint(checkpoint), jokeSchema);
    restored.shared.feedback = feedback;
    return restored;
}

describe("checkpoints", () => {
    it("should pause with the path to the pause node and a snapshot", () => {
        const result = buildJokeFlow().invoke({ attempts: 0 }, { runId: "test-run" });
        expect(result).toEqual({
            runId: "test-run",
            shared: { attempts: 1, joke: "joke 1" },
            exitReason: "pause",
            action: undefined,
            message: "Review the joke",
            checkpoint: {
                version: 1,
                runId: "test-run",
                cursor: ["wait"],
                action: undefined,
                message: "Review the joke",
                shared: { attempts: 1, joke: "joke 1" },
            },
        });
    });

    it("should snapshot the shared context instead of referencing it", () => {
        const shared: Joke = { attempts: 0 };
        const result = buildJokeFlow().invoke(shared);
        if (result.exitReason !== "pause") {
            throw new Error("expected a pause");
        }
        shared.attempts = 99;
        expect(result.checkpoint.shared.attempts).toBe(1);
    });

    it("should resume at the successor of the pause node until the run ends", () => {
        const flow = buildJokeFlow();
        const first = flow.invoke({ attempts: 0 }, { runId: "test-run" });
        if (first.exitReason !== "pause") {
            throw new Error("expected a pause");
        }

        const second = flow.resume(reload(first.checkpoint, "disapprove"));
        if (second.exitReason !== "pause") {
            throw new Error("expected a second pause");
        }
        expect(second.runId).toBe("test-run");
        expect(second.checkpoint.cursor).toEqual(["wait"]);
        expect(second.shared).toEqual({ attempts: 2, joke: "joke 2", feedback: "disapprove" });

        const third = flow.resume(reload(second.checkpoint, "approve"));
        expect(third).toEqual({
            runId: "test-run",
            shared: { attempts: 2, joke: "joke 2", feedback: "approve", published: "joke 2" },
            exitReason: "end",
            action: "default",
        });
    });

    it("should leave the checkpoint untouched when resuming", () => {
        const flow = buildJokeFlow();
        const paused = flow.invoke({ attempts: 0 });
        if (paused.exitReason !== "pause") {
            throw new Error("expected a pause");
        }
        const checkpoint = reload(paused.checkpoint, "approve");
        flow.resume(checkpoint);
        expect(checkpoint.shared).toEqual({ attempts: 1, joke: "joke 1", feedback: "approve" });
    });

    it("should continue on the action returned by the pause node", () => {
        class Gate extends PauseNode<Joke> {
            override post() {
                return "skip";
            }
        }
        const gate = new Gate({ id: "gate" });
        gate.next(makeNode<Joke>({ id: "never", post: () => "never" }));
        gate.on("skip").next(makeNode<Joke>({ id: "skipped", post: () => "skipped" }));
        const flow = new Flow(gate);

        const paused = flow.invoke({ attempts: 0 });
        if (paused.exitReason !== "pause") {
            throw new Error("expected a pause");
        }
        expect(paused.checkpoint.action).toBe("skip");
        expect(flow.resume(paused.checkpoint).action).toBe("skipped");
    });

    it("should re-enter nested flows on the cursor", () => {
        type Visits = { visited: string[] };
        const step = (id: string) =>
            makeNode<Visits>({
                id,
                post: (shared) => {
                    shared.visited.push(id);
                    return undefined;
                },
            });
        const build = (pause: BaseNode<Visits>) => {
            const step1 = step("step1");
            step1.next(pause).next(step("step2"));
            const prepare = step("prepare");
            prepare.next(new Flow(step1, { id: "inner" })).next(step("finish"));
            return new Flow(prepare, { id: "outer" });
        };

        const outer = build(new PauseNode<Visits>({ id: "pause" }));
        const paused = outer.invoke({ visited: [] });
        if (paused.exitReason !== "pause") {
            throw new Error("expected a pause");
        }
        expect(paused.checkpoint.cursor).toEqual(["inner", "pause"]);
        expect(paused.shared.visited).toEqual(["prepare", "step1"]);

        const resumed = outer.resume(parseCheckpoint(serializeCheckpoint(paused.checkpoint), visitsSchema));
        const uninterrupted = build(makeNode<Visits>({ id: "pause" })).invoke({ visited: [] });
        expect(resumed.exitReason).toBe("end");
        expect(resumed.shared.visited).toEqual(["prepare", "step1", "step2", "finish"]);
        expect(resumed.shared).toEqual(uninterrupted.shared);
        expect(resumed.action).toBe(uninterrupted.action);
    });

    it("should reject a cursor that names no node of the flow", () => {
        const checkpoint: Checkpoint<Joke> = {
            version: 1,
            runId: "test-run",
            cursor: ["missing"],
            message: "",
            shared: { attempts: 0 },
        };
        expect(() => buildJokeFlow().resume(checkpoint)).toThrow(FlowTraversalError);
    });

    it("should reject a cursor that descends into a plain node", () => {
        const checkpoint: Checkpoint<Joke> = {
            version: 1,
            runId: "test-run",
            cursor: ["generate", "wait"],
            message: "",
            shared: { attempts: 0 },
        };
        expect(() => buildJokeFlow().resume(checkpoint)).toThrow(FlowTraversalError);
    });

    it("should refuse to pause inside a batch flow", () => {
        class TwoPasses extends BatchFlow<Joke> {
            override prep() {
                return [{ pass: 1 }, { pass: 2 }];
            }
        }
        const batch = new TwoPasses(new PauseNode<Joke>());
        expect(() => batch.run({ attempts: 0 })).toThrow(FlowTraversalError);
    });

    it("should not parse malformed checkpoints", () => {
        expect(() => parseCheckpoint("{")).toThrow(SyntaxError);
        expect(() => parseCheckpoint(JSON.stringify({ version: 2, runId: "r", cursor: ["a"], message: "", shared: {} }))).toThrow(ZodError);
        expect(() => parseCheckpoint(JSON.stringify({ version: 1, runId: "r", cursor: [], message: "", shared: {} }))).toThrow(ZodError);
        expect(() => parseCheckpoint(
            JSON.stringify({ version: 1, runId: "r", cursor: ["a"], message: "", shared: { attempts: "one" } }),
            jokeSchema,
        )).toThrow(ZodError);
    });

    it("should parse an untyped checkpoint into a record", () => {
        const checkpoint = parseCheckpoint(
            JSON.stringify({ version: 1, runId: "r", cursor: ["a"], action: "go", message: "m", shared: { anything: [1] } }),
        );
        expect(checkpoint).toEqual({ version: 1, runId: "r", cursor: ["a"], action: "go", message: "m", shared: { anything: [1] } });
    });
});
