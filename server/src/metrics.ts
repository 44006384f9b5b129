export type Incident = {
    ts: string;
    source: "station" | "server";
    message: string;
    status?: number;
};

const LATENCY_WINDOW = 200;
const MAX_INCIDENTS = 80;

function latencyPercentile(samples: readonly number[], q: number): number {
    if (samples.length === 0) return 0;
    const ordered = [...samples].sort((a, b) => a - b);
    const rank = Math.min(ordered.length - 1, Math.floor(ordered.length * q));
    return Math.round(ordered[rank] ?? 0);
}

export class StationMetrics {
    readonly startedAt: number;

    upstreamCalls = 0;
    upstreamErrors = 0;

    lastLatencyMs = 0;

    cacheHits = 0;
    cacheMisses = 0;

    lastUpstreamAt: string | null = null;

    statusCounts = new Map<string, number>();
    incidents: Incident[] = [];

    // most recent round trips, oldest first
    private latencies: number[] = [];

    constructor(private readonly now: () => number = Date.now) {
        this.startedAt = now();
    }

    /** status is 0 when no HTTP response was received */
    recordUpstream(status: number, ok: boolean) {
        this.upstreamCalls++;
        this.lastUpstreamAt = new Date(this.now()).toISOString();
        const key = status > 0 ? String(status) : "network";
        this.statusCounts.set(key, (this.statusCounts.get(key) ?? 0) + 1);
        if (!ok) this.upstreamErrors++;
    }

    recordCache(hit: boolean) {
        if (hit) this.cacheHits++;
        else this.cacheMisses++;
    }

    recordLatency(ms: number) {
        this.lastLatencyMs = ms;
        this.latencies.push(ms);
        if (this.latencies.length > LATENCY_WINDOW) this.latencies.shift();
    }

    get avgLatencyMs() {
        if (this.latencies.length === 0) return 0;
        let total = 0;
        for (const ms of this.latencies) total += ms;
        return Math.round(total / this.latencies.length);
    }

    get p50LatencyMs() {
        return latencyPercentile(this.latencies, 0.5);
    }

    get p95LatencyMs() {
        return latencyPercentile(this.latencies, 0.95);
    }

    pushIncident(inc: Omit<Incident, "ts">) {
        this.incidents.unshift({ ts: new Date(this.now()).toISOString(), ...inc });
        if (this.incidents.length > MAX_INCIDENTS) this.incidents.length = MAX_INCIDENTS;
    }

    recentIncidents(limit: number): Incident[] {
        return this.incidents.slice(0, limit);
    }

    snapshot() {
        const uptimeSec = Math.floor((this.now() - this.startedAt) / 1000);
        const lookups = this.cacheHits + this.cacheMisses;
        const cacheHitRate = lookups > 0 ? Number((this.cacheHits / lookups).toFixed(3)) : 0;

        return {
            uptimeSec,
            updatedAt: new Date(this.now()).toISOString(),
            lastUpstreamAt: this.lastUpstreamAt,

            upstreamCalls: this.upstreamCalls,
            upstreamErrors: this.upstreamErrors,

            lastLatencyMs: this.lastLatencyMs,
            avgLatencyMs: this.avgLatencyMs,
            p50LatencyMs: this.p50LatencyMs,
            p95LatencyMs: this.p95LatencyMs,

            cacheHits: this.cacheHits,
            cacheMisses: this.cacheMisses,
            cacheHitRate,

            statusCounts: Object.fromEntries(this.statusCounts),
            incidents: this.incidents.length,
        };
    }
}
