import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { errorMessage } from "./errors";
import { LOG_LEVELS, type LogLevel } from "./logger";
import { SensorLayout, buildSensorSpecs } from "./sensors/catalog";
import type { SensorSpec } from "./sensors/types";

export const DEFAULT_SENSORS_FILE = fileURLToPath(new URL("../config/sensors.json", import.meta.url));

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
        this.name = "ConfigError";
    }
}

const Millis = z.coerce.number().int().positive();

const EnvSchema = z.object({
    STATION_URL: z.string().url(),
    PORT: z.coerce.number().int().min(0).max(65535).default(8888),
    UPDATE_INTERVAL_MS: Millis.default(3000),
    CACHE_TTL_MS: Millis.default(10_000),
    FETCH_TIMEOUT_MS: Millis.default(9000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    DEBUG: z
        .enum(["true", "false", "1", "0", ""])
        .default("false")
        .transform((v) => v === "true" || v === "1"),
    SENSORS_FILE: z.string().min(1).default(DEFAULT_SENSORS_FILE),
});

export type AppConfig = {
    stationUrl: string;
    port: number;
    updateIntervalMs: number;
    cacheTtlMs: number;
    fetchTimeoutMs: number;
    logLevel: LogLevel;
    sensors: SensorSpec[];
};

function formatIssues(error: z.ZodError, prefix = ""): string[] {
    return error.issues.map((i) => `${prefix}${i.path.join(".") || "(root)"}: ${i.message}`);
}

export function loadSensorLayout(file: string): SensorSpec[] {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(file, "utf8"));
    } catch (e: unknown) {
        throw new ConfigError([`SENSORS_FILE: cannot read ${file}: ${errorMessage(e)}`]);
    }

    const parsed = SensorLayout.safeParse(raw);
    if (!parsed.success) throw new ConfigError(formatIssues(parsed.error, "SENSORS_FILE "));

    try {
        return buildSensorSpecs(parsed.data);
    } catch (e: unknown) {
        throw new ConfigError([`SENSORS_FILE: ${errorMessage(e)}`]);
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));

    const e = parsed.data;
    return {
        stationUrl: e.STATION_URL,
        port: e.PORT,
        updateIntervalMs: e.UPDATE_INTERVAL_MS,
        cacheTtlMs: e.CACHE_TTL_MS,
        fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
        logLevel: e.DEBUG ? "debug" : e.LOG_LEVEL,
        sensors: loadSensorLayout(e.SENSORS_FILE),
    };
}
