import "dotenv/config";
import { createServer, type Server } from "node:http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { StationMetrics } from "./metrics";
import { SensorRegistry } from "./sensors/registry";
import { attachThingSocket } from "./socket";
import { StationClient } from "./station";
import { WeatherCache } from "./weatherCache";

function listen(server: Server, port: number) {
    return new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, () => {
            server.off("error", reject);
            resolve();
        });
    });
}

function closeServer(server: Server) {
    return new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);

    const metrics = new StationMetrics();
    const client = new StationClient({
        url: config.stationUrl,
        timeoutMs: config.fetchTimeoutMs,
        metrics,
        logger: logger.child({ module: "station" }),
    });
    const cache = new WeatherCache(client, {
        ttlMs: config.cacheTtlMs,
        metrics,
        logger: logger.child({ module: "weather-cache" }),
    });
    const registry = new SensorRegistry(config.sensors, cache, {
        intervalMs: config.updateIntervalMs,
        logger,
    });

    registry.start();

    const server = createServer(createApp({ registry, cache, metrics, logger }));
    const socket = attachThingSocket(server, registry, logger);

    logger.info("starting the server");
    await listen(server, config.port);
    logger.info({ port: config.port, station: config.stationUrl }, "server listening");

    let stopping = false;
    const shutdown = async (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;

        logger.info({ signal }, "canceling the sensor update loops");
        await registry.stopAll();
        await socket.close();
        logger.info("stopping the server");
        await closeServer(server);
        logger.info("done");
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            void shutdown(signal).then(
                () => process.exit(0),
                (err: unknown) => {
                    logger.error({ err }, "shutdown failed");
                    process.exit(1);
                },
            );
        });
    }
}

main().catch((err: unknown) => {
    createLogger("error").fatal({ err }, "failed to start");
    process.exit(1);
});
