import { readFileSync } from "node:fs";
import dotenv from "dotenv";
import { z } from "zod";

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
    RELAYGRAPH_LOG_LEVEL: z.enum(["silent", "error", "warn", "info", "debug"]).default("warn"),
    RELAYGRAPH_LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
    RELAYGRAPH_CONCURRENCY: z
        .union([z.literal("unbounded").transform(() => Infinity), positiveInt])
        .default(8),
    RELAYGRAPH_MAX_STEPS: positiveInt.optional(),
});

export type LogLevel = z.infer<typeof envSchema>["RELAYGRAPH_LOG_LEVEL"];
export type LogFormat = z.infer<typeof envSchema>["RELAYGRAPH_LOG_FORMAT"];

export interface RuntimeConfig {
    readonly logLevel: LogLevel;
    readonly logFormat: LogFormat;
    /** Default worker count for parallel batch nodes and flows. */
    readonly concurrency: number;
    /** Default step guard for flows; `undefined` leaves traversals unbounded. */
    readonly maxSteps?: number;
}

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    /** A dotenv file merged under `env`. */
    envFile?: string;
}

/**
 * Reads the runtime configuration from environment variables.
 *
 * @throws {z.ZodError} When a variable holds an invalid value.
 *
 * @example
 * ```typescript
 * const config = loadConfig({ envFile: ".env" });
 * config.concurrency; // 8 unless RELAYGRAPH_CONCURRENCY is set
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): RuntimeConfig {
    const fromFile = options.envFile ? dotenv.parse(readFileSync(options.envFile)) : {};
    const env = envSchema.parse({ ...fromFile, ...(options.env ?? process.env) });
    return Object.freeze({
        logLevel: env.RELAYGRAPH_LOG_LEVEL,
        logFormat: env.RELAYGRAPH_LOG_FORMAT,
        concurrency: env.RELAYGRAPH_CONCURRENCY,
        maxSteps: env.RELAYGRAPH_MAX_STEPS,
    });
}

export const settings: RuntimeConfig = loadConfig();
