import { silentLogger, type Logger } from "../logger";
import type { ObservationSource } from "../weatherCache";
import { SensorThing } from "./thing";
import type { SensorSpec } from "./types";
import { SensorUpdater } from "./updater";

export type SensorRegistryOptions = {
    intervalMs?: number;
    logger?: Logger;
};

type RegisteredSensor = {
    thing: SensorThing;
    updater: SensorUpdater;
};

/** Owns the configured sensors of one deployment and their update loops. */
export class SensorRegistry {
    private sensors: RegisteredSensor[] = [];
    private running = false;
    private readonly log: Logger;

    constructor(
        private readonly specs: readonly SensorSpec[],
        private readonly source: ObservationSource,
        private readonly opts: SensorRegistryOptions = {},
    ) {
        this.log = (opts.logger ?? silentLogger).child({ module: "sensor-registry" });
    }

    get started() {
        return this.running;
    }

    /**
     * Launches every update loop; does not wait for a first tick. Things are
     * built on the first start and kept, with their values, across restarts.
     */
    start() {
        if (this.running) return;
        this.running = true;

        if (this.sensors.length === 0) {
            this.sensors = this.specs.map((spec) => {
                const thing = new SensorThing(spec);
                const updater = new SensorUpdater(spec, this.source, thing, {
                    intervalMs: this.opts.intervalMs,
                    logger: this.opts.logger,
                });
                return { thing, updater };
            });
        }
        for (const { updater } of this.sensors) {
            this.log.debug({ sensor: updater.spec.id }, "starting sensor update loop");
            updater.start();
        }
        this.log.info({ sensors: this.sensors.length }, "sensors started");
    }

    /** Cancels every loop and resolves once all of them have exited. */
    async stopAll(): Promise<void> {
        this.running = false;
        const results = await Promise.allSettled(this.sensors.map(({ updater }) => updater.stop()));
        results.forEach((r, i) => {
            if (r.status === "rejected") {
                this.log.error({ err: r.reason, sensor: this.sensors[i]?.thing.id }, "sensor did not stop cleanly");
            }
        });
        this.log.info("sensors stopped");
    }

    things(): SensorThing[] {
        return this.sensors.map((s) => s.thing);
    }

    get(id: string): SensorThing | undefined {
        return this.sensors.find((s) => s.thing.id === id)?.thing;
    }

    isRunning(id: string): boolean {
        return this.sensors.some((s) => s.thing.id === id && s.updater.running);
    }
}
