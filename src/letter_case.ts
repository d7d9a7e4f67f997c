/**
 * Letter case steganography
 *
 * Hides a secret in the case of the letters of a public text:
 * a lowercase letter carries the A symbol, an uppercase letter the B symbol.
 */

import type { BaconCodec } from "./codec.ts";
import {
    countAlphabetic,
    type DisguiseOptions,
    isAlphabetic,
    isUppercase,
    type Steganographer,
    substitute,
    validatePublicLength,
} from "./common.ts";
import { err, ok, type Result } from "./errors.ts";

export class LetterCaseSteganographer implements Steganographer {
    constructor(private readonly options: DisguiseOptions = {}) {}

    /**
     * Disguises a secret made of letters and spaces into a public text
     *
     * @param secret - The text to hide
     * @param publicText - The visible text; needs `encodedGroupSize()` letters per secret letter
     * @param codec - Codec producing the symbols to apply
     * @returns The public text with the case of its letters changed
     */
    disguise<T>(secret: string, publicText: string, codec: BaconCodec<T>): Result<string> {
        const lengthCheck = validatePublicLength(publicText, this.options);
        if (!lengthCheck.ok) return lengthCheck;

        for (const char of secret) {
            if (!isAlphabetic(char) && char !== " ") {
                return err(
                    "steganographer",
                    `The secret can contain only alphabetic characters and spaces. Found ${JSON.stringify(char)}`,
                );
            }
        }

        const available = countAlphabetic(publicText);
        const required = countAlphabetic(secret) * codec.encodedGroupSize();

        if (available < required) {
            const message = `The public input should have at least ${required} alphabetic characters. ` +
                `It was found to have ${available}.`;

            if (this.options.strictCapacity ?? true) {
                return err("steganographer", message);
            }
            console.warn(`⚠ ${message} Proceeding anyway...`);
        }

        const { text } = substitute(
            secret,
            publicText,
            codec,
            (char) => char.toLowerCase(),
            (char) => char.toUpperCase(),
        );
        return ok(text);
    }

    reveal<T>(input: string, codec: BaconCodec<T>): Result<string> {
        const symbols: T[] = [];
        for (const char of input) {
            if (isAlphabetic(char)) {
                symbols.push(isUppercase(char) ? codec.b() : codec.a());
            }
        }
        return ok(codec.decode(symbols));
    }
}
