/**
 * Error values shared by codecs and steganographers
 *
 * Validation failures are returned as {@link Result} values rather than thrown.
 * Use {@link unwrap} where an exception is more convenient.
 */

export type BaconErrorKind = "general" | "codec" | "steganographer";

export class BaconError extends Error {
    public readonly name = "BaconError";

    constructor(
        public readonly kind: BaconErrorKind,
        message: string,
    ) {
        super(message);
    }
}

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: BaconError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function err<T>(kind: BaconErrorKind, message: string): Result<T> {
    return { ok: false, error: new BaconError(kind, message) };
}

/**
 * Returns the value of a successful result or throws the carried error
 */
export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}
