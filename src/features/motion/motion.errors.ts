export type MotionErrorKind =
    | "InvalidParameter"
    | "InsufficientData"
    | "MalformedTrack"
    | "FormatError"
    | "IOFailure";

export type MotionErrorDetails = {
    /** Parameter that failed validation (InvalidParameter) */
    field?: string;

    /** 1-based line number in a motion file (FormatError) */
    row?: number;

    /** Underlying error, usually a Node fs error (IOFailure) */
    cause?: unknown;
};

/**
 * Every failure of the motion engine surfaces as one of these.
 * Callers switch on `kind`; `message` is meant for humans.
 */
export class MotionError extends Error {
    readonly kind: MotionErrorKind;
    readonly field: string | null;
    readonly row: number | null;

    constructor(kind: MotionErrorKind, message: string, details: MotionErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = "MotionError";
        this.kind = kind;
        this.field = details.field ?? null;
        this.row = details.row ?? null;
    }
}

export function isMotionError(err: unknown, kind?: MotionErrorKind): err is MotionError {
    if (!(err instanceof MotionError)) return false;
    return kind === undefined || err.kind === kind;
}

export const invalidParameter = (field: string, message: string) =>
    new MotionError("InvalidParameter", `${field}: ${message}`, { field });

export const formatError = (row: number, message: string) =>
    new MotionError("FormatError", `row ${row}: ${message}`, { row });

export const ioFailure = (path: string, cause: unknown) => {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new MotionError("IOFailure", `${path}: ${reason}`, { cause });
};

export const malformedTrack = (message: string) => new MotionError("MalformedTrack", message);
