import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StationMetrics } from "./metrics";
import { temperatureSensor } from "./sensors/catalog";
import { SensorRegistry } from "./sensors/registry";
import type { SensorValue } from "./sensors/types";
import { StationClient, type FetchLike } from "./station";
import { WeatherCache } from "./weatherCache";

// response bodies are read through streams; give them a few turns of the real event loop
async function flush() {
    for (let i = 0; i < 5; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
}

function jsonResponse(body: unknown, status = 200) {
    return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("station to sensor", () => {
    beforeEach(() => {
        vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
        vi.setSystemTime(0);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it("goes from unknown to the station's value once the station recovers", async () => {
        const fetchImpl = vi
            .fn<FetchLike>()
            .mockResolvedValueOnce(jsonResponse({ messagesource: "weatherstation", message: "boom" }, 503))
            .mockResolvedValueOnce(
                jsonResponse({
                    "1700000000": { out_temp: 4.5, out_hygro: 88 },
                    "1700000060": { out_temp: 4.2, out_hygro: 90 },
                }),
            );
        const metrics = new StationMetrics();
        const client = new StationClient({ url: "http://station.test/weather.json", fetchImpl, metrics });
        const cache = new WeatherCache(client, { ttlMs: 10_000, metrics });
        const registry = new SensorRegistry([temperatureSensor("outside", "out", true)], cache, { intervalMs: 3000 });

        registry.start();
        const thing = registry.get("outside-temperature-sensor");
        const changes: Array<[string, SensorValue]> = [];
        thing?.subscribe((property, value) => changes.push([property, value]));

        await vi.advanceTimersByTimeAsync(3000);
        await flush();
        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(thing?.getValues()).toEqual({ temperature: null, humidity: null });
        expect(cache.status().lastError).toBe("Station error 503: boom");

        await vi.advanceTimersByTimeAsync(3000);
        await flush();
        expect(fetchImpl).toHaveBeenCalledTimes(2);
        expect(thing?.getValues()).toEqual({ temperature: 4.2, humidity: 90 });
        expect(changes).toEqual([
            ["temperature", 4.2],
            ["humidity", 90],
        ]);

        // still fresh: the next tick is served from the cache
        await vi.advanceTimersByTimeAsync(3000);
        await flush();
        expect(fetchImpl).toHaveBeenCalledTimes(2);
        expect(metrics.snapshot()).toMatchObject({ upstreamCalls: 2, upstreamErrors: 1, cacheHits: 1 });

        await registry.stopAll();
    });
});
