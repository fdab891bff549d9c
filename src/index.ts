export * from "./nodes";
export * from "./graphs";
export * from "./errors";
export * from "./types";
export { loadConfig, settings, type RuntimeConfig, type LoadConfigOptions, type LogLevel, type LogFormat } from "./config";
export { createLogger, logger, type Logger } from "./logger";
export { sleep, settleWithConcurrency } from "./util";
