/**
 * Bacon's cipher codecs
 *
 * Each letter of the Latin alphabet is substituted by a group of five symbols
 * drawn from a two-valued alphabet. The alphabet type is generic: characters,
 * booleans or any other pair of values can stand for the A and B symbols.
 */

/**
 * Group of five symbols written with "a" and "b", indexed by letter
 */
type SubstitutionTable = readonly string[];

const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

const LATIN_LETTER = /^[A-Za-z]$/;

/**
 * First variant of the cipher: 24 distinct groups, I/J and U/V share one
 */
const TABLE_V1: SubstitutionTable = [
    "aaaaa", "aaaab", "aaaba", "aaabb", "aabaa", "aabab", "aabba", "aabbb",
    "abaaa", "abaaa", "abaab", "ababa", "ababb", "abbaa", "abbab", "abbba",
    "abbbb", "baaaa", "baaab", "baaba", "baabb", "baabb", "babaa", "babab",
    "babba", "babbb",
];

/**
 * Second variant of the cipher: every letter has its own group
 */
const TABLE_V2: SubstitutionTable = [
    "aaaaa", "aaaab", "aaaba", "aaabb", "aabaa", "aabab", "aabba", "aabbb",
    "abaaa", "abaab", "ababa", "ababb", "abbaa", "abbab", "abbba", "abbbb",
    "baaaa", "baaab", "baaba", "baabb", "babaa", "babab", "babba", "babbb",
    "bbaaa", "bbaab",
];

/**
 * Content produced when a group of symbols matches no letter
 */
export const UNKNOWN_CONTENT = " ";

export const ENCODED_GROUP_SIZE = 5;

/**
 * A codec that encodes and decodes text based on Bacon's cipher
 */
export interface BaconCodec<T> {
    /**
     * Encodes every letter of the input and concatenates the groups.
     * Characters that are not Latin letters contribute nothing.
     */
    encode(input: string): T[];

    /**
     * Encodes a single character to its group of symbols
     */
    encodeElem(char: string): T[];

    /**
     * Decodes consecutive groups of symbols to uppercase letters.
     * A group that matches no letter, including a short final group,
     * decodes to {@link UNKNOWN_CONTENT}.
     */
    decode(input: readonly T[]): string;

    /**
     * Decodes one group of symbols to one letter
     */
    decodeElems(elems: readonly T[]): string;

    /** The A substitution symbol */
    a(): T;

    /** The B substitution symbol */
    b(): T;

    isA(elem: T): boolean;

    isB(elem: T): boolean;

    /** Number of symbols that represent one letter */
    encodedGroupSize(): number;
}

export type SymbolEquality<T> = (left: T, right: T) => boolean;

function strictEquality<T>(left: T, right: T): boolean {
    return left === right;
}

/**
 * Codec over a substitution table of "a"/"b" patterns
 */
abstract class TableCodec<T> implements BaconCodec<T> {
    private readonly byLetter: Map<string, string>;
    private readonly byPattern: Map<string, string>;

    protected constructor(
        table: SubstitutionTable,
        private readonly elemA: T,
        private readonly elemB: T,
        private readonly equals: SymbolEquality<T>,
    ) {
        this.byLetter = new Map();
        this.byPattern = new Map();
        table.forEach((pattern, index) => {
            const letter = LETTERS[index];
            this.byLetter.set(letter, pattern);
            // Letters sharing a group decode to the first of them
            if (!this.byPattern.has(pattern)) {
                this.byPattern.set(pattern, letter);
            }
        });
    }

    encode(input: string): T[] {
        const encoded: T[] = [];
        for (const char of input) {
            encoded.push(...this.encodeElem(char));
        }
        return encoded;
    }

    encodeElem(char: string): T[] {
        if (!LATIN_LETTER.test(char)) return [];

        const pattern = this.byLetter.get(char.toUpperCase());
        if (pattern === undefined) return [];

        return Array.from(pattern, (symbol) => symbol === "a" ? this.a() : this.b());
    }

    decode(input: readonly T[]): string {
        const size = this.encodedGroupSize();
        let decoded = "";
        for (let i = 0; i < input.length; i += size) {
            decoded += this.decodeElems(input.slice(i, i + size));
        }
        return decoded;
    }

    decodeElems(elems: readonly T[]): string {
        if (elems.length !== this.encodedGroupSize()) return UNKNOWN_CONTENT;

        let pattern = "";
        for (const elem of elems) {
            if (this.isA(elem)) {
                pattern += "a";
            } else if (this.isB(elem)) {
                pattern += "b";
            } else {
                return UNKNOWN_CONTENT;
            }
        }

        return this.byPattern.get(pattern) ?? UNKNOWN_CONTENT;
    }

    a(): T {
        return this.elemA;
    }

    b(): T {
        return this.elemB;
    }

    isA(elem: T): boolean {
        return this.equals(elem, this.elemA);
    }

    isB(elem: T): boolean {
        return this.equals(elem, this.elemB);
    }

    encodedGroupSize(): number {
        return ENCODED_GROUP_SIZE;
    }
}

/**
 * Codec using the first version of Bacon's cipher.
 *
 * @example
 * ```ts
 * const codec = new CharCodec("a", "b");
 * codec.encode("My secret").join("");
 * // "ababbbabbabaaabaabaaaaababaaaaaabaabaaba"
 * ```
 */
export class CharCodec<T> extends TableCodec<T> {
    constructor(elemA: T, elemB: T, equals: SymbolEquality<T> = strictEquality) {
        super(TABLE_V1, elemA, elemB, equals);
    }

    /** A codec substituting with "A" and "B" */
    static default(): CharCodec<string> {
        return new CharCodec("A", "B");
    }
}

/**
 * Codec using the second version of Bacon's cipher, where every letter
 * has a distinct group.
 */
export class CharCodecV2<T> extends TableCodec<T> {
    constructor(elemA: T, elemB: T, equals: SymbolEquality<T> = strictEquality) {
        super(TABLE_V2, elemA, elemB, equals);
    }

    static default(): CharCodecV2<string> {
        return new CharCodecV2("A", "B");
    }
}
