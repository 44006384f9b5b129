import { describe, expect, it } from "vitest";
import { NoDataYetError, TransportError, UpstreamError } from "./errors";
import { StationMetrics } from "./metrics";
import type { ObservationSet } from "./observation";
import type { ObservationFetcher } from "./station";
import { WeatherCache } from "./weatherCache";

const W = 10_000;

function deferred<T>() {
    let resolve: (value: T) => void = () => {};
    let reject: (reason: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

class StubStation implements ObservationFetcher {
    calls = 0;
    private queue: Array<ObservationSet | Error | Promise<ObservationSet>> = [];

    enqueue(...items: Array<ObservationSet | Error | Promise<ObservationSet>>) {
        this.queue.push(...items);
        return this;
    }

    async fetchObservations(): Promise<ObservationSet> {
        this.calls++;
        const next = this.queue.shift();
        if (next === undefined) throw new Error("no response queued");
        if (next instanceof Error) throw next;
        return next;
    }
}

function setup(opts: { metrics?: StationMetrics } = {}) {
    const clock = { now: 0 };
    const station = new StubStation();
    const cache = new WeatherCache(station, { ttlMs: W, now: () => clock.now, ...opts });
    return { clock, station, cache };
}

describe("WeatherCache", () => {
    it("fetches once per freshness window", async () => {
        const { clock, station, cache } = setup();
        station.enqueue({ "1": { t: 1 } }, { "2": { t: 2 } });

        await expect(cache.getLatest()).resolves.toEqual({ t: 1 });
        clock.now = 5_000;
        await expect(cache.getLatest()).resolves.toEqual({ t: 1 });
        clock.now = W - 1;
        await expect(cache.getLatest()).resolves.toEqual({ t: 1 });
        expect(station.calls).toBe(1);

        clock.now = W;
        await expect(cache.getLatest()).resolves.toEqual({ t: 2 });
        expect(station.calls).toBe(2);
    });

    it("serves the stale observation while refreshes fail", async () => {
        const { clock, station, cache } = setup();
        station.enqueue(
            { "100": { t: 1 } },
            new TransportError("Station unreachable: connect ECONNREFUSED"),
            new UpstreamError("Station error 503: boom", 503),
        );

        await cache.getLatest();
        clock.now = W;
        await expect(cache.getLatest()).resolves.toEqual({ t: 1 });
        clock.now = 2 * W - 1;
        await expect(cache.getLatest()).resolves.toEqual({ t: 1 });
        expect(station.calls).toBe(3);
    });

    it("retries on the very next call after a failure", async () => {
        const { clock, station, cache } = setup();
        station.enqueue({ "1": { t: 1 } }, new TransportError("timeout"), { "2": { t: 2 } });

        await cache.getLatest();
        clock.now = W;
        await cache.getLatest();
        clock.now = W + 1;
        await expect(cache.getLatest()).resolves.toEqual({ t: 2 });
        expect(station.calls).toBe(3);

        // the successful retry starts a new window
        clock.now = 2 * W;
        await expect(cache.getLatest()).resolves.toEqual({ t: 2 });
        expect(station.calls).toBe(3);
    });

    it("rejects with NoDataYetError when nothing was ever cached", async () => {
        const { station, cache } = setup();
        const cause = new UpstreamError("Station error 503: boom", 503);
        station.enqueue(cause, { "1": { t: 1 } });

        const err = await cache.getLatest().catch((e: unknown) => e);
        expect(err).toBeInstanceOf(NoDataYetError);
        expect(err).toMatchObject({ code: "NO_DATA_YET", cause });

        await expect(cache.getLatest()).resolves.toEqual({ t: 1 });
    });

    it("selects the reading under the greatest key", async () => {
        const { station, cache } = setup();
        station.enqueue({ "100": { t: 1.0 }, "200": { t: 2.0 } });
        await expect(cache.getLatest()).resolves.toEqual({ t: 2.0 });
    });

    it("shares one fetch between concurrent callers", async () => {
        const { station, cache } = setup();
        const pending = deferred<ObservationSet>();
        station.enqueue(pending.promise);

        const calls = Array.from({ length: 10 }, () => cache.getLatest());
        expect(station.calls).toBe(1);

        pending.resolve({ "1": { t: 7 } });
        const results = await Promise.all(calls);
        expect(results).toHaveLength(10);
        for (const r of results) expect(r).toEqual({ t: 7 });
        expect(station.calls).toBe(1);
    });

    it("shares a failed fetch between concurrent callers", async () => {
        const { station, cache } = setup();
        const pending = deferred<ObservationSet>();
        station.enqueue(pending.promise);

        const calls = Array.from({ length: 3 }, () => cache.getLatest().catch((e: unknown) => e));
        pending.reject(new TransportError("Station unreachable: fetch failed"));

        const results = await Promise.all(calls);
        for (const r of results) expect(r).toBeInstanceOf(NoDataYetError);
        expect(station.calls).toBe(1);
    });

    it("starts a new fetch once the previous one has settled", async () => {
        const { clock, station, cache } = setup();
        station.enqueue({ "1": { t: 1 } }, { "2": { t: 2 } });

        await cache.getLatest();
        clock.now = W;
        const [a, b] = await Promise.all([cache.getLatest(), cache.getLatest()]);
        expect(a).toEqual({ t: 2 });
        expect(b).toEqual({ t: 2 });
        expect(station.calls).toBe(2);
    });

    it("reports its status", async () => {
        const { clock, station, cache } = setup();
        expect(cache.status()).toEqual({ fetchedAt: null, fresh: false, observation: null, lastError: null });

        station.enqueue({ "1": { t: 1 } }, new TransportError("Station unreachable: fetch failed"));
        clock.now = 1_000;
        await cache.getLatest();
        expect(cache.status()).toEqual({
            fetchedAt: "1970-01-01T00:00:01.000Z",
            fresh: true,
            observation: { t: 1 },
            lastError: null,
        });

        clock.now = 1_000 + W;
        await cache.getLatest();
        expect(cache.status()).toEqual({
            fetchedAt: "1970-01-01T00:00:01.000Z",
            fresh: false,
            observation: { t: 1 },
            lastError: "Station unreachable: fetch failed",
        });
    });

    it("counts hits and misses", async () => {
        const metrics = new StationMetrics();
        const { station, cache } = setup({ metrics });
        station.enqueue({ "1": { t: 1 } });

        await cache.getLatest();
        await cache.getLatest();
        await cache.getLatest();

        expect(metrics.cacheMisses).toBe(1);
        expect(metrics.cacheHits).toBe(2);
    });
});
