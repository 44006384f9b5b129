import pino, { type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel, name = "weather-station"): Logger {
    return pino({
        name,
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

// default for components constructed without a logger (mostly tests)
export const silentLogger: Logger = pino({ level: "silent" });
