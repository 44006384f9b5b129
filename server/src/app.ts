import cors from "cors";
import express from "express";
import { z } from "zod";
import { errorMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { StationMetrics } from "./metrics";
import type { SensorRegistry } from "./sensors/registry";
import type { WeatherCache } from "./weatherCache";

export type AppDeps = {
    registry: SensorRegistry;
    cache: WeatherCache;
    metrics: StationMetrics;
    logger?: Logger;
};

const DEFAULT_INCIDENT_LIMIT = 50;
const MAX_INCIDENT_LIMIT = 80;

// ?limit= outside 1..80 is pulled into range; a missing or non-numeric one falls back to the default
const IncidentLimit = z.coerce
    .number()
    .finite()
    .transform((n) => Math.min(MAX_INCIDENT_LIMIT, Math.max(1, Math.trunc(n))))
    .catch(DEFAULT_INCIDENT_LIMIT);

export function createApp({ registry, cache, metrics, logger = silentLogger }: AppDeps) {
    const log = logger.child({ module: "http" });
    const app = express();
    app.use(cors());

    app.get("/health", (_req, res) => {
        res.json({ status: "ok" });
    });

    app.get("/things", (_req, res) => {
        res.json(registry.things().map((t) => t.describe()));
    });

    app.get("/things/:thingId", (req, res) => {
        const thing = registry.get(req.params.thingId);
        if (!thing) return res.status(404).json({ error: "Thing not found" });
        res.json(thing.describe());
    });

    app.get("/things/:thingId/properties", (req, res) => {
        const thing = registry.get(req.params.thingId);
        if (!thing) return res.status(404).json({ error: "Thing not found" });
        res.json(thing.getValues());
    });

    app.get("/things/:thingId/properties/:propertyName", (req, res) => {
        const thing = registry.get(req.params.thingId);
        if (!thing) return res.status(404).json({ error: "Thing not found" });

        const name = req.params.propertyName;
        if (!thing.hasProperty(name)) return res.status(404).json({ error: "Property not found" });
        res.json({ [name]: thing.getValue(name) ?? null });
    });

    app.get("/api/observation", (_req, res) => {
        res.json(cache.status());
    });

    app.get("/api/metrics", (_req, res) => {
        res.json(metrics.snapshot());
    });

    app.get("/api/incidents", (req, res) => {
        const limit = IncidentLimit.parse(req.query.limit);
        res.json({ items: metrics.recentIncidents(limit) });
    });

    app.use((_req, res) => {
        res.status(404).json({ error: "Not found" });
    });

    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        const msg = errorMessage(err);
        log.error({ err, path: req.path }, "request failed");
        metrics.pushIncident({ source: "server", message: msg, status: 500 });
        res.status(500).json({ error: msg });
    });

    return app;
}
