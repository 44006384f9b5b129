import { z } from "zod";
import { UpstreamError } from "./errors";

/** One timestamped reading: field name to value. */
export type Observation = Readonly<Record<string, number>>;

/** Raw station payload: timestamp key to reading. */
export type ObservationSet = Readonly<Record<string, Observation>>;

const RawObservationSet = z.record(z.string(), z.record(z.string(), z.unknown()));

// normalize to number | null
export function toNumber(value: unknown): number | null {
    if (typeof value === "number") return Number.isFinite(value) ? value : null;
    if (typeof value !== "string" || value.trim() === "") return null;
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
}

function toObservation(raw: Record<string, unknown>): Observation {
    const out: Record<string, number> = {};
    for (const [field, value] of Object.entries(raw)) {
        const num = toNumber(value);
        if (num !== null) out[field] = num;
    }
    return Object.freeze(out);
}

/**
 * Validate a decoded station body. Readings are kept with their numeric
 * fields only; anything else in a reading reads as absent later on.
 */
export function parseObservationSet(body: unknown): ObservationSet {
    const parsed = RawObservationSet.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length ? ` at ${issue.path.join(".")}` : "";
        throw new UpstreamError(`Malformed observation set${where}: ${issue?.message ?? "invalid body"}`);
    }

    const set: Record<string, Observation> = {};
    for (const [key, raw] of Object.entries(parsed.data)) {
        set[key] = toObservation(raw);
    }
    return Object.freeze(set);
}

const INTEGER_KEY = /^\d+$/;
const NUMERIC_KEY = /^-?\d+(\.\d+)?$/;

// digit strings of any length, without going through a double
function compareIntegerKeys(a: string, b: string): number {
    const x = a.replace(/^0+(?=\d)/, "");
    const y = b.replace(/^0+(?=\d)/, "");
    if (x.length !== y.length) return x.length < y.length ? -1 : 1;
    if (x === y) return 0;
    return x < y ? -1 : 1;
}

/** Numeric keys compare as numbers; anything else compares as strings. */
export function compareTimestampKeys(a: string, b: string): number {
    if (INTEGER_KEY.test(a) && INTEGER_KEY.test(b)) {
        return compareIntegerKeys(a, b);
    }
    if (NUMERIC_KEY.test(a) && NUMERIC_KEY.test(b)) {
        return Math.sign(Number(a) - Number(b));
    }
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

export function latestObservation(set: ObservationSet): Observation {
    let latestKey: string | null = null;
    for (const key of Object.keys(set)) {
        if (latestKey === null || compareTimestampKeys(key, latestKey) > 0) {
            latestKey = key;
        }
    }

    const latest = latestKey === null ? undefined : set[latestKey];
    if (!latest) throw new UpstreamError("Station returned an empty observation set");
    return latest;
}
