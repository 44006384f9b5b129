import type { Logger } from "pino";
import { NoDataYetError, errorMessage } from "./errors";
import type { StationMetrics } from "./metrics";
import { latestObservation, type Observation } from "./observation";
import type { ObservationFetcher } from "./station";

/** What a sensor updater needs from the cache. */
export interface ObservationSource {
    getLatest(): Promise<Observation>;
}

export type CacheEntry = {
    readonly observation: Observation;
    readonly fetchedAt: number;
};

export type CacheStatus = {
    fetchedAt: string | null;
    fresh: boolean;
    observation: Observation | null;
    lastError: string | null;
};

export type WeatherCacheOptions = {
    ttlMs?: number;
    now?: () => number;
    metrics?: StationMetrics;
    logger?: Logger;
};

const DEFAULT_TTL_MS = 10_000;

/**
 * Time-bounded cache of the station's latest observation.
 *
 * At most one upstream fetch is in flight; callers arriving meanwhile wait
 * for it and share its outcome. A failed fetch leaves the entry (and its
 * fetchedAt) alone, so the next call retries immediately, and a stale entry
 * is served in place of the error.
 */
export class WeatherCache implements ObservationSource {
    private entry: CacheEntry | null = null;
    private inflight: Promise<Observation> | null = null;
    private lastError: string | null = null;

    private readonly ttlMs: number;
    private readonly now: () => number;

    constructor(
        private readonly fetcher: ObservationFetcher,
        private readonly opts: WeatherCacheOptions = {},
    ) {
        this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
        this.now = opts.now ?? Date.now;
    }

    getLatest(): Promise<Observation> {
        const entry = this.entry;
        if (entry && this.isFresh(entry)) {
            this.opts.metrics?.recordCache(true);
            return Promise.resolve(entry.observation);
        }

        if (this.inflight) return this.inflight;

        this.opts.metrics?.recordCache(false);
        const p = this.refresh().finally(() => {
            this.inflight = null;
        });
        this.inflight = p;
        return p;
    }

    status(): CacheStatus {
        const entry = this.entry;
        return {
            fetchedAt: entry ? new Date(entry.fetchedAt).toISOString() : null,
            fresh: entry ? this.isFresh(entry) : false,
            observation: entry?.observation ?? null,
            lastError: this.lastError,
        };
    }

    private isFresh(entry: CacheEntry): boolean {
        return this.now() - entry.fetchedAt < this.ttlMs;
    }

    private async refresh(): Promise<Observation> {
        try {
            const set = await this.fetcher.fetchObservations();
            const observation = latestObservation(set);
            this.entry = { observation, fetchedAt: this.now() };
            this.lastError = null;
            return observation;
        } catch (e: unknown) {
            this.lastError = errorMessage(e);
            const stale = this.entry;
            if (!stale) {
                this.opts.logger?.error({ err: e }, "weather data not usable, nothing cached yet");
                throw new NoDataYetError({ cause: e });
            }
            this.opts.logger?.warn(
                { err: e, fetchedAt: new Date(stale.fetchedAt).toISOString() },
                "weather data not usable, serving cached observation",
            );
            return stale.observation;
        }
    }
}
