export type StationErrorCode = "TRANSPORT" | "UPSTREAM" | "NO_DATA_YET" | "FIELD_MISSING";

export class StationError extends Error {
    constructor(
        readonly code: StationErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The station could not be reached (refused, reset, DNS, timeout). */
export class TransportError extends StationError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("TRANSPORT", message, options);
    }
}

/** The station answered, but not with a usable observation set. */
export class UpstreamError extends StationError {
    /** Who wrote the message, when the error body says so (e.g. "weatherstation"). */
    readonly messageSource?: string;

    constructor(
        message: string,
        readonly status?: number,
        options?: { cause?: unknown; messageSource?: string },
    ) {
        super("UPSTREAM", message, options);
        this.messageSource = options?.messageSource;
    }
}

/** Nothing has ever been cached and the latest fetch failed. */
export class NoDataYetError extends StationError {
    constructor(options?: { cause?: unknown }) {
        super("NO_DATA_YET", "No weather observation available yet", options);
    }
}

export class FieldMissingError extends StationError {
    constructor(
        readonly sensorId: string,
        readonly field: string,
    ) {
        super("FIELD_MISSING", `Field "${field}" missing from observation for ${sensorId}`);
    }
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message;
    if (typeof e === "string") return e;
    return "Unknown error";
}
