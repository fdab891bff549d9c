import { describe, expect, it } from "vitest";
import { AggregateBatchError, FlowTraversalError, NodeExecutionError, StepLimitExceededError } from "../errors";
import { makeAsyncNode, makeNode } from "../nodes/function-node";
import { PauseNode } from "../nodes/pause-node";
import { sleep } from "../util";
import { AsyncBatchFlow, AsyncFlow, ParallelBatchFlow } from "./async-flow";
import { Flow } from "./flow";

type Crawl = {
    visited: string[];
    pages: Record<string, number>;
    inFlight: number;
    maxInFlight: number;
};

const fresh = (): Crawl => ({ visited: [], pages: {}, inFlight: 0, maxInFlight: 0 });

const asyncStep = (id: string, action?: string, delay = 0) =>
    makeAsyncNode<Crawl>({
        id,
        post: async (shared) => {
            await sleep(delay);
            shared.visited.push(id);
            return action;
        },
    });

const syncStep = (id: string, action?: string) =>
    makeNode<Crawl>({
        id,
        post: (shared) => {
            shared.visited.push(id);
            return action;
        },
    });

/** Records `params.page` after `params.delay` milliseconds. */
const fetchPage = () =>
    makeAsyncNode<Crawl, string, number>({
        prep: (shared, params) => {
            shared.inFlight++;
            shared.maxInFlight = Math.max(shared.maxInFlight, shared.inFlight);
            return String(params.page);
        },
        exec: async (page, params) => {
            await sleep(Number(params.delay));
            return page.length;
        },
        post: (shared, page, length) => {
            shared.inFlight--;
            shared.pages[page] = length;
            return undefined;
        },
    });

describe("AsyncFlow", () => {
    it("should await asynchronous and synchronous nodes in turn", async () => {
        const start = asyncStep("fetch", "parse", 10);
        start.on("parse").next(syncStep("parse")).next(asyncStep("store", "stored"));
        const shared = fresh();
        await expect(new AsyncFlow(start).run(shared)).resolves.toBe("stored");
        expect(shared.visited).toEqual(["fetch", "parse", "store"]);
    });

    it("should run a synchronous flow as a node", async () => {
        const innerStart = syncStep("inner-a");
        innerStart.next(syncStep("inner-b", "done"));
        const start = asyncStep("outer");
        start.next(new Flow(innerStart)).on("done").next(asyncStep("after"));
        const shared = fresh();
        await new AsyncFlow(start).run(shared);
        expect(shared.visited).toEqual(["outer", "inner-a", "inner-b", "after"]);
    });

    it("should end with the default action when the last node returns none", async () => {
        const flow = new AsyncFlow(asyncStep("only"));
        await expect(flow.run(fresh())).resolves.toBe("default");
        const result = await flow.invoke(fresh());
        expect(result.action).toBe("default");
    });

    it("should restart the traversal when the flow itself retries", async () => {
        let calls = 0;
        const flaky = makeAsyncNode<Crawl>({
            id: "flaky",
            exec: async () => {
                calls++;
                if (calls === 1) {
                    throw new Error("first call fails");
                }
                return calls;
            },
        });
        const first = asyncStep("first");
        first.next(flaky).next(asyncStep("last"));
        const flow = new AsyncFlow(first, { maxRetries: 2, retryInterval: 5 });
        const shared = fresh();
        await flow.run(shared);
        expect(calls).toBe(2);
        expect(flow.currentRetry).toBe(1);
        expect(shared.visited).toEqual(["first", "first", "last"]);
    });

    it("should rethrow the last error once flow retries run out", async () => {
        const failing = makeAsyncNode<Crawl>({
            exec: async () => {
                throw new Error("always");
            },
        });
        await expect(new AsyncFlow(failing, { maxRetries: 2 }).run(fresh())).rejects.toBeInstanceOf(NodeExecutionError);
    });

    it("should stop at maxSteps", async () => {
        const loop = asyncStep("loop");
        loop.next(loop);
        await expect(new AsyncFlow(loop, { maxSteps: 3 }).run(fresh())).rejects.toBeInstanceOf(StepLimitExceededError);
    });

    it("should pause and resume", async () => {
        const start = asyncStep("draft");
        start.next(new PauseNode<Crawl>({ id: "wait", message: "approve the draft" })).next(asyncStep("publish", "published"));
        const flow = new AsyncFlow(start);

        const paused = await flow.invoke(fresh(), { runId: "test-run" });
        if (paused.exitReason !== "pause") {
            throw new Error("expected a pause");
        }
        expect(paused.message).toBe("approve the draft");
        expect(paused.checkpoint.cursor).toEqual(["wait"]);

        const resumed = await flow.resume(paused.checkpoint);
        expect(resumed.exitReason).toBe("end");
        expect(resumed.action).toBe("published");
        expect(resumed.shared.visited).toEqual(["draft", "publish"]);
    });
});

describe("AsyncBatchFlow", () => {
    it("should traverse once per parameter set, one at a time", async () => {
        class Pages extends AsyncBatchFlow<Crawl> {
            override async prep() {
                return [
                    { page: "home", delay: 20 },
                    { page: "about", delay: 0 },
                ];
            }
        }
        const shared = fresh();
        await new Pages(fetchPage()).run(shared);
        expect(shared.pages).toEqual({ home: 4, about: 5 });
        expect(Object.keys(shared.pages)).toEqual(["home", "about"]);
        expect(shared.maxInFlight).toBe(1);
    });

    it("should refuse to pause", async () => {
        class Once extends AsyncBatchFlow<Crawl> {
            override async prep() {
                return [{}];
            }
        }
        await expect(new Once(new PauseNode<Crawl>()).run(fresh())).rejects.toBeInstanceOf(FlowTraversalError);
    });
});

describe("ParallelBatchFlow", () => {
    class Pages extends ParallelBatchFlow<Crawl> {
        override async prep() {
            return [
                { page: "home", delay: 30 },
                { page: "about", delay: 20 },
                { page: "blog", delay: 10 },
                { page: "contact", delay: 0 },
            ];
        }
    }

    it("should traverse every parameter set concurrently", async () => {
        const shared = fresh();
        await new Pages(fetchPage()).run(shared);
        expect(shared.pages).toEqual({ home: 4, about: 5, blog: 4, contact: 7 });
        expect(Object.keys(shared.pages)).toEqual(["contact", "blog", "about", "home"]);
        expect(shared.maxInFlight).toBe(4);
    });

    it("should respect its concurrency bound", async () => {
        const shared = fresh();
        await new Pages(fetchPage(), { concurrency: 2 }).run(shared);
        expect(shared.maxInFlight).toBe(2);
        expect(Object.keys(shared.pages)).toHaveLength(4);
    });

    it("should merge each parameter set over the flow params", async () => {
        const seen: string[] = [];
        const record = makeAsyncNode<Crawl>({
            prep: (_shared, params) => {
                seen.push(`${String(params.site)}/${String(params.page)}`);
                return undefined;
            },
        });
        await new Pages(record, { params: { site: "docs", page: "index" } }).run(fresh());
        expect(seen.sort()).toEqual(["docs/about", "docs/blog", "docs/contact", "docs/home"]);
    });

    it("should wait for every traversal and aggregate failures", async () => {
        const failing = makeAsyncNode<Crawl>({
            prep: (shared, params) => {
                if (params.page === "blog") {
                    throw new Error("blog is down");
                }
                shared.visited.push(String(params.page));
                return undefined;
            },
        });
        const shared = fresh();
        const error = await new Pages(failing).run(shared).catch((reason: unknown) => reason);
        expect(error).toBeInstanceOf(AggregateBatchError);
        expect(error).toHaveProperty("failures.length", 1);
        expect(error).toHaveProperty("failures.0.index", 2);
        expect(error).toHaveProperty("failures.0.error.message", "blog is down");
        expect(shared.visited.sort()).toEqual(["about", "contact", "home"]);
    });

    it("should refuse to pause inside a traversal", async () => {
        const error = await new Pages(new PauseNode<Crawl>()).run(fresh()).catch((reason: unknown) => reason);
        expect(error).toBeInstanceOf(AggregateBatchError);
        expect(error).toHaveProperty("failures.length", 4);
        expect(error).toHaveProperty("failures.0.error.name", "FlowTraversalError");
    });
});
