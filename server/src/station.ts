import type { Logger } from "pino";
import { TransportError, UpstreamError, errorMessage } from "./errors";
import type { StationMetrics } from "./metrics";
import { parseObservationSet, type ObservationSet } from "./observation";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Anything that can produce a fresh observation set, or throw a StationError. */
export interface ObservationFetcher {
    fetchObservations(): Promise<ObservationSet>;
}

export type StationClientOptions = {
    url: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
    metrics?: StationMetrics;
    logger?: Logger;
};

const DEFAULT_TIMEOUT_MS = 9000;
const JSON_CONTENT_TYPE = /^application\/json/i;

function withTimeout(timeoutMs: number) {
    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), Math.max(1, Math.floor(timeoutMs)));
    return {
        signal: ac.signal,
        cleanup: () => clearTimeout(t),
    };
}

function bodyString(body: unknown, key: string): string | null {
    if (!body || typeof body !== "object" || !(key in body)) return null;
    const value: unknown = Reflect.get(body, key);
    return typeof value === "string" && value.trim() ? value : null;
}

export class StationClient implements ObservationFetcher {
    readonly url: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor(private readonly opts: StationClientOptions) {
        this.url = opts.url;
        this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
    }

    async fetchObservations(): Promise<ObservationSet> {
        this.opts.logger?.debug({ url: this.url }, "fetching station observations");

        const t0 = Date.now();
        const { signal, cleanup } = withTimeout(this.timeoutMs);
        let status = 0;
        try {
            const res = await this.fetchImpl(this.url, {
                signal,
                headers: { Accept: "application/json" },
            });
            status = res.status;
            const text = await res.text();
            this.opts.metrics?.recordLatency(Date.now() - t0);

            const set = this.classify(res, text);
            this.opts.metrics?.recordUpstream(status, true);
            return set;
        } catch (e: unknown) {
            const err = e instanceof UpstreamError
                ? e
                : new TransportError(
                    signal.aborted
                        ? `Station request timed out after ${this.timeoutMs} ms`
                        : `Station unreachable: ${errorMessage(e)}`,
                    { cause: e },
                );
            this.opts.metrics?.recordUpstream(status, false);
            this.opts.metrics?.pushIncident({
                source: "station",
                message: err.message,
                ...(status > 0 ? { status } : {}),
            });
            throw err;
        } finally {
            cleanup();
        }
    }

    private classify(res: Response, text: string): ObservationSet {
        const contentType = res.headers.get("content-type") ?? "";
        if (!JSON_CONTENT_TYPE.test(contentType)) {
            const snippet = text.trim().slice(0, 200);
            throw new UpstreamError(
                `Station returned ${res.status} with non-JSON content${snippet ? `: ${snippet}` : ""}`,
                res.status,
            );
        }

        let body: unknown;
        try {
            body = JSON.parse(text);
        } catch (e: unknown) {
            throw new UpstreamError(`Station returned invalid JSON (${res.status})`, res.status, { cause: e });
        }

        if (res.status >= 400) {
            const msg = bodyString(body, "message");
            const messageSource = bodyString(body, "messagesource");
            throw new UpstreamError(
                msg ? `Station error ${res.status}: ${msg}` : `Station error ${res.status}`,
                res.status,
                messageSource ? { messageSource } : undefined,
            );
        }

        const set = parseObservationSet(body);
        if (Object.keys(set).length === 0) {
            throw new UpstreamError("Station returned an empty observation set", res.status);
        }
        return set;
    }
}
