/**
 * Common utilities shared between the steganographers
 * Includes the steganographer contract, character classification,
 * delimiter validation and the substitution walk over public text
 */

import type { BaconCodec } from "./codec.ts";
import { err, ok, type Result } from "./errors.ts";

/**
 * Maximum public text length (in characters) accepted by disguise
 */
export const MAX_PUBLIC_LENGTH = 10 * 1024 * 1024;

export interface PublicTextOptions {
    /** Maximum accepted public text length (default: MAX_PUBLIC_LENGTH) */
    maxPublicLength?: number;
}

export interface DisguiseOptions extends PublicTextOptions {
    /**
     * Fail when the public text cannot carry the whole secret (default: true).
     * When false a warning is logged and as much of the secret as fits is hidden.
     */
    strictCapacity?: boolean;
}

/**
 * Hides a secret inside public text by transforming the text according to
 * the symbols a {@link BaconCodec} produces, and reveals it again.
 */
export interface Steganographer {
    disguise<T>(secret: string, publicText: string, codec: BaconCodec<T>): Result<string>;

    reveal<T>(input: string, codec: BaconCodec<T>): Result<string>;
}

export type ParsedElementType = "a" | "b" | "other";

/**
 * A run of disguised text and the symbol it stands for
 */
export interface ParsedElement {
    text: string;
    type: ParsedElementType;
}

const ALPHABETIC = /^\p{Alphabetic}$/u;
const UPPERCASE = /^\p{Uppercase}$/u;

export function isAlphabetic(char: string): boolean {
    return ALPHABETIC.test(char);
}

export function isUppercase(char: string): boolean {
    return UPPERCASE.test(char);
}

export function countAlphabetic(text: string): number {
    let count = 0;
    for (const char of text) {
        if (isAlphabetic(char)) count++;
    }
    return count;
}

/**
 * Number of secret letters the alphabetic characters of a public text can carry
 */
export function calculateCapacity<T>(publicText: string, codec: BaconCodec<T>): number {
    return Math.floor(countAlphabetic(publicText) / codec.encodedGroupSize());
}

/**
 * Rejects public text longer than the configured maximum
 */
export function validatePublicLength(
    publicText: string,
    options?: PublicTextOptions,
): Result<void> {
    const maxPublicLength = options?.maxPublicLength ?? MAX_PUBLIC_LENGTH;
    if (publicText.length > maxPublicLength) {
        return err(
            "steganographer",
            `Public text too long. ${publicText.length} chars, maximum: ${maxPublicLength} chars. ` +
                `Increase maxPublicLength option if needed.`,
        );
    }
    return ok(undefined);
}

/**
 * A pair of optional start/end strings surrounding characters that stand
 * for one symbol
 */
export class Delimiters {
    constructor(
        public readonly start?: string,
        public readonly end?: string,
    ) {}

    /** Start string, or "" when undefined */
    startString(): string {
        return this.start ?? "";
    }

    /** End string, or "" when undefined */
    endString(): string {
        return this.end ?? "";
    }

    /** Both start and end are defined */
    isDefined(): boolean {
        return this.start !== undefined && this.end !== undefined;
    }

    /** Neither start nor end is defined */
    isEmpty(): boolean {
        return this.start === undefined && this.end === undefined;
    }

    toString(): string {
        const show = (value: string | undefined) => value === undefined ? "none" : JSON.stringify(value);
        return `(start: ${show(this.start)}, end: ${show(this.end)})`;
    }
}

function overlaps(left: string, right: string): boolean {
    return left.includes(right) || right.includes(left);
}

/**
 * Validates the A and B delimiters of a delimiter based steganographer.
 *
 * Each side must be either fully defined or empty, at least one side must be
 * defined, defined strings may not be empty, and when both sides are defined
 * no A string may contain or be contained by a B string.
 */
export function validateDelimiters(a: Delimiters, b: Delimiters): Result<void> {
    for (const [side, delimiters] of [["A", a], ["B", b]] as const) {
        if (!delimiters.isDefined() && !delimiters.isEmpty()) {
            return err(
                "steganographer",
                `The ${side} delimiters ${delimiters} must define both a start and an end, or neither`,
            );
        }
        if (delimiters.start === "" || delimiters.end === "") {
            return err(
                "steganographer",
                `The ${side} delimiters ${delimiters} may not contain empty strings`,
            );
        }
    }

    if (a.isEmpty() && b.isEmpty()) {
        return err("steganographer", "At least one of the A and B delimiters must be defined");
    }

    if (a.isDefined() && b.isDefined()) {
        for (const aString of [a.startString(), a.endString()]) {
            for (const bString of [b.startString(), b.endString()]) {
                if (overlaps(aString, bString)) {
                    return err(
                        "steganographer",
                        `Cannot create a steganographer with A delimiters ${a} and B delimiters ${b}: ` +
                            `${JSON.stringify(aString)} and ${JSON.stringify(bString)} overlap`,
                    );
                }
            }
        }
    }

    return ok(undefined);
}

export interface SubstitutionResult {
    text: string;
    /** Encoded symbols applied to the public text */
    consumed: number;
    /** Encoded symbols of the secret */
    total: number;
}

/**
 * Walks the public text and transforms each alphabetic character according
 * to the next symbol of the encoded secret. Other characters pass through
 * and consume nothing, as does everything after the last symbol.
 */
export function substitute<T>(
    secret: string,
    publicText: string,
    codec: BaconCodec<T>,
    onA: (char: string) => string,
    onB: (char: string) => string,
): SubstitutionResult {
    const encoded = codec.encode(secret);

    let text = "";
    let consumed = 0;

    for (const char of publicText) {
        if (!isAlphabetic(char) || consumed >= encoded.length) {
            text += char;
            continue;
        }

        const elem = encoded[consumed];
        if (codec.isA(elem)) {
            text += onA(char);
            consumed++;
        } else if (codec.isB(elem)) {
            text += onB(char);
            consumed++;
        } else {
            text += char;
        }
    }

    return { text, consumed, total: encoded.length };
}

/**
 * Wraps each alphabetic character of the public text in the delimiters of
 * the symbol it carries. With `merge`, adjacent spans of the same symbol are
 * fused by removing every `end + start` sequence.
 */
export function wrapWithDelimiters<T>(
    secret: string,
    publicText: string,
    codec: BaconCodec<T>,
    a: Delimiters,
    b: Delimiters,
    merge: boolean,
): string {
    const { text, consumed, total } = substitute(
        secret,
        publicText,
        codec,
        (char) => a.startString() + char + a.endString(),
        (char) => b.startString() + char + b.endString(),
    );

    if (consumed < total) {
        console.warn(
            `⚠ Public text carries only ${consumed} of ${total} encoded symbols. ` +
                `The revealed secret will be truncated.`,
        );
    }

    if (!merge) return text;

    let merged = text;
    for (const delimiters of [a, b]) {
        if (delimiters.isDefined()) {
            merged = merged.replaceAll(delimiters.endString() + delimiters.startString(), "");
        }
    }
    return merged;
}

/**
 * Maps every alphabetic character of the classified elements to the A or B
 * symbol of the codec, in order. Unclassified elements are skipped.
 */
export function elementsToSymbols<T>(
    elements: readonly ParsedElement[],
    codec: BaconCodec<T>,
): T[] {
    const symbols: T[] = [];
    for (const element of elements) {
        if (element.type === "other") continue;

        const symbol = element.type === "a" ? codec.a() : codec.b();
        for (const char of element.text) {
            if (isAlphabetic(char)) symbols.push(symbol);
        }
    }
    return symbols;
}
