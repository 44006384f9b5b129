import { FieldMissingError, NoDataYetError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { Observation } from "../observation";
import { ABORTED, sleep, untilAborted } from "../utils/abort";
import type { ObservationSource } from "../weatherCache";
import type { SensorField, SensorSpec, SensorValue, ValueSink } from "./types";

export type SensorUpdaterOptions = {
    intervalMs?: number;
    logger?: Logger;
};

export type UpdaterHandle = {
    /** Cancel the loop; resolves once it has exited. Never rejects. */
    stop(): Promise<void>;
    /** Settles when the loop exits */
    done: Promise<void>;
};

const DEFAULT_INTERVAL_MS = 3000;

export class SensorUpdater {
    private handle: UpdaterHandle | null = null;
    private readonly intervalMs: number;
    private readonly log: Logger;

    constructor(
        readonly spec: SensorSpec,
        private readonly source: ObservationSource,
        private readonly sink: ValueSink,
        opts: SensorUpdaterOptions = {},
    ) {
        this.intervalMs = opts.intervalMs ?? DEFAULT_INTERVAL_MS;
        this.log = (opts.logger ?? silentLogger).child({ module: "sensor", sensor: spec.id });
    }

    get running() {
        return this.handle !== null;
    }

    start(): UpdaterHandle {
        if (this.handle) return this.handle;

        const controller = new AbortController();
        const done = this.run(controller.signal).finally(() => {
            if (this.handle === handle) this.handle = null;
        });
        const handle: UpdaterHandle = {
            done,
            stop: async () => {
                controller.abort();
                await done;
            },
        };
        this.handle = handle;
        return handle;
    }

    async stop(): Promise<void> {
        if (this.handle) await this.handle.stop();
    }

    /**
     * One update: a single cache read, then one write per field. When the
     * signal aborts while waiting on the cache, nothing is written.
     */
    async tick(signal?: AbortSignal): Promise<void> {
        let observation: Observation | null = null;
        try {
            const pending = this.source.getLatest();
            const result = signal ? await untilAborted(pending, signal) : await pending;
            if (result === ABORTED) return;
            observation = result;
        } catch (e: unknown) {
            if (signal?.aborted) return;
            if (e instanceof NoDataYetError) {
                this.log.info("no weather data yet, publishing unknown values");
            } else {
                this.log.warn({ err: e }, "weather data unavailable, publishing unknown values");
            }
        }
        if (signal?.aborted) return;

        for (const field of this.spec.fields) {
            this.publish(field.property, observation ? this.extract(observation, field) : null);
        }
    }

    private async run(signal: AbortSignal): Promise<void> {
        this.log.debug({ intervalMs: this.intervalMs }, "starting update loop");
        while (await sleep(this.intervalMs, signal)) {
            try {
                await this.tick(signal);
            } catch (e: unknown) {
                this.log.error({ err: e }, "sensor update failed");
            }
        }
        this.log.debug("update loop stopped");
    }

    private extract(observation: Observation, field: SensorField): SensorValue {
        if (!Object.hasOwn(observation, field.source)) {
            this.log.debug({ err: new FieldMissingError(this.spec.id, field.source) }, "field missing, publishing unknown");
            return null;
        }
        return observation[field.source] ?? null;
    }

    private publish(property: string, value: SensorValue) {
        this.log.debug({ property, value }, "setting new value");
        try {
            this.sink.publish(property, value);
        } catch (e: unknown) {
            this.log.error({ err: e, property }, "sink rejected value");
        }
    }
}
