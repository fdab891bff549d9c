import winston from "winston";
import { settings, type LogFormat, type LogLevel } from "./config";

const pretty = winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const { component, ...rest } = meta;
    const suffix = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
    return `${String(timestamp)} [${String(component)}] ${level}: ${String(message)}${suffix}`;
});

export function createLogger(level: LogLevel, format: LogFormat): winston.Logger {
    return winston.createLogger({
        level: level === "silent" ? "error" : level,
        silent: level === "silent",
        defaultMeta: { component: "relaygraph" },
        format: winston.format.combine(
            winston.format.timestamp(),
            format === "json" ? winston.format.json() : pretty,
        ),
        transports: [
            new winston.transports.Console({
                stderrLevels: ["error", "warn", "info", "debug"],
            }),
        ],
    });
}

export type Logger = winston.Logger;

export const logger: Logger = createLogger(settings.logLevel, settings.logFormat);
