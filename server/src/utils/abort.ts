export const ABORTED: unique symbol = Symbol("aborted");
export type Aborted = typeof ABORTED;

/** Resolves true after ms, or false as soon as the signal aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
        const onAbort = () => {
            clearTimeout(t);
            resolve(false);
        };
        const t = setTimeout(() => {
            signal.removeEventListener("abort", onAbort);
            resolve(true);
        }, Math.max(0, ms));
        signal.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Wait for promise unless the signal aborts first. The promise itself keeps
 * running; only this caller stops waiting for it.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | Aborted> {
    let onAbort = () => {};
    const aborted = new Promise<Aborted>((resolve) => {
        onAbort = () => resolve(ABORTED);
        if (signal.aborted) resolve(ABORTED);
        else signal.addEventListener("abort", onAbort, { once: true });
    });

    return Promise.race([aborted, promise]).finally(() => {
        signal.removeEventListener("abort", onAbort);
    });
}
