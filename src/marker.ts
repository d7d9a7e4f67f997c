/**
 * Marker steganography
 *
 * Hides a secret by surrounding the letters of a public text with textual
 * markers, for example Markdown emphasis: `*` around letters that carry the
 * A symbol and `**` around letters that carry the B symbol.
 *
 * One of the two markers may be left empty. Its letters are then left
 * unmarked, and on reveal every unmarked character is taken to carry the
 * symbol of the empty marker.
 */

import type { BaconCodec } from "./codec.ts";
import {
    Delimiters,
    elementsToSymbols,
    type ParsedElement,
    type ParsedElementType,
    type PublicTextOptions,
    type Steganographer,
    validateDelimiters,
    validatePublicLength,
    wrapWithDelimiters,
} from "./common.ts";
import { ok, type Result } from "./errors.ts";

/**
 * Start and end strings that surround the letters of one symbol
 */
export class Marker extends Delimiters {
    constructor(startMarker?: string, endMarker?: string) {
        super(startMarker, endMarker);
    }

    static empty(): Marker {
        return new Marker();
    }

    get startMarker(): string | undefined {
        return this.start;
    }

    get endMarker(): string | undefined {
        return this.end;
    }

    startMarkerString(): string {
        return this.startString();
    }

    endMarkerString(): string {
        return this.endString();
    }
}

export class MarkerSteganographer implements Steganographer {
    private constructor(
        private readonly aMarker: Marker,
        private readonly bMarker: Marker,
        private readonly options: PublicTextOptions,
    ) {}

    /**
     * Creates a steganographer after validating the markers.
     * Fails when a marker defines only one of start and end, when both markers
     * are empty, or when a string of one marker overlaps a string of the other.
     */
    static create(
        aMarker: Marker,
        bMarker: Marker,
        options: PublicTextOptions = {},
    ): Result<MarkerSteganographer> {
        const validation = validateDelimiters(aMarker, bMarker);
        if (!validation.ok) return validation;

        return ok(new MarkerSteganographer(aMarker, bMarker, options));
    }

    disguise<T>(secret: string, publicText: string, codec: BaconCodec<T>): Result<string> {
        const lengthCheck = validatePublicLength(publicText, this.options);
        if (!lengthCheck.ok) return lengthCheck;

        return ok(wrapWithDelimiters(secret, publicText, codec, this.aMarker, this.bMarker, true));
    }

    reveal<T>(input: string, codec: BaconCodec<T>): Result<string> {
        return ok(codec.decode(elementsToSymbols(this.parse(input), codec)));
    }

    /**
     * Splits marked text into elements classified by the marker around them.
     *
     * Scans left to right for the nearest start marker, then for the end marker
     * of the same kind. A missing end marker extends the element to the end of
     * the input. When one marker is empty, the text between elements is
     * returned as elements of that marker's symbol.
     */
    parse(input: string): ParsedElement[] {
        const elements: ParsedElement[] = [];
        const unmarkedType = this.unmarkedType();

        // End of the text consumed by the last element, delimiters included
        let consumed = 0;

        const pushUnmarked = (until: number) => {
            if (unmarkedType !== undefined && until > consumed) {
                elements.push({ text: input.substring(consumed, until), type: unmarkedType });
            }
        };

        while (consumed < input.length) {
            const next = this.nextStart(input, consumed);
            if (next === undefined) break;

            const { index, type, marker } = next;
            const contentStart = index + marker.startString().length;
            const endIndex = input.indexOf(marker.endString(), contentStart);

            pushUnmarked(index);

            if (endIndex === -1) {
                if (contentStart < input.length) {
                    elements.push({ text: input.substring(contentStart), type });
                }
                consumed = input.length;
                break;
            }

            elements.push({ text: input.substring(contentStart, endIndex), type });
            consumed = endIndex + marker.endString().length;
        }

        pushUnmarked(input.length);

        return elements;
    }

    /**
     * Finds the nearest start marker at or after `from`.
     * Returns undefined when none is found or both are found at the same index.
     */
    private nextStart(
        input: string,
        from: number,
    ): { index: number; type: "a" | "b"; marker: Marker } | undefined {
        const aIndex = this.aMarker.start === undefined ? -1 : input.indexOf(this.aMarker.start, from);
        const bIndex = this.bMarker.start === undefined ? -1 : input.indexOf(this.bMarker.start, from);

        if (aIndex === bIndex) return undefined;

        if (bIndex === -1 || (aIndex !== -1 && aIndex < bIndex)) {
            return { index: aIndex, type: "a", marker: this.aMarker };
        }
        return { index: bIndex, type: "b", marker: this.bMarker };
    }

    private unmarkedType(): ParsedElementType | undefined {
        if (this.aMarker.isEmpty()) return "a";
        if (this.bMarker.isEmpty()) return "b";
        return undefined;
    }
}
