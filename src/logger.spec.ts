import { describe, expect, it } from "vitest";
import { createLogger, logger } from "./logger";

describe("createLogger", () => {
    it("should silence every level for silent", () => {
        const silent = createLogger("silent", "pretty");
        expect(silent.silent).toBe(true);
        expect(silent.level).toBe("error");
    });

    it("should log at the configured level", () => {
        const verbose = createLogger("debug", "json");
        expect(verbose.silent).toBe(false);
        expect(verbose.level).toBe("debug");
        expect(verbose.isDebugEnabled()).toBe(true);
    });

    it("should configure the shared logger from the environment", () => {
        expect(logger.silent).toBe(true);
    });
});
