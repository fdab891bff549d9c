import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "./config";

describe("loadConfig", () => {
    const dir = mkdtempSync(join(tmpdir(), "relaygraph-config-"));

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it("should use defaults for an empty environment", () => {
        expect(loadConfig({ env: {} })).toEqual({
            logLevel: "warn",
            logFormat: "pretty",
            concurrency: 8,
            maxSteps: undefined,
        });
    });

    it("should read every variable", () => {
        const config = loadConfig({
            env: {
                RELAYGRAPH_LOG_LEVEL: "debug",
                RELAYGRAPH_LOG_FORMAT: "json",
                RELAYGRAPH_CONCURRENCY: "3",
                RELAYGRAPH_MAX_STEPS: "100",
            },
        });
        expect(config).toEqual({ logLevel: "debug", logFormat: "json", concurrency: 3, maxSteps: 100 });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it("should accept an unbounded concurrency", () => {
        expect(loadConfig({ env: { RELAYGRAPH_CONCURRENCY: "unbounded" } }).concurrency).toBe(Infinity);
    });

    it.each([
        ["RELAYGRAPH_LOG_LEVEL", "loud"],
        ["RELAYGRAPH_LOG_FORMAT", "xml"],
        ["RELAYGRAPH_CONCURRENCY", "0"],
        ["RELAYGRAPH_MAX_STEPS", "many"],
    ])("should reject %s=%s", (key, value) => {
        expect(() => loadConfig({ env: { [key]: value } })).toThrow(ZodError);
    });

    it("should merge an env file under the environment", () => {
        const envFile = join(dir, ".env");
        writeFileSync(envFile, "RELAYGRAPH_MAX_STEPS=50\nRELAYGRAPH_LOG_LEVEL=debug\n");
        const config = loadConfig({ env: { RELAYGRAPH_LOG_LEVEL: "error" }, envFile });
        expect(config.maxSteps).toBe(50);
        expect(config.logLevel).toBe("error");
    });
});
