/**
 * Tag steganography
 *
 * Like marker steganography, but the letters are surrounded by HTML-like tags
 * such as `<b>` and `</b>`. Revealing parses the text as an HTML document and
 * classifies each text node by the element that directly contains it.
 */

import { type AnyNode, hasChildren, isTag, isText } from "domhandler";
import { parseDocument } from "htmlparser2";
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
 * Opening and closing tag that surround the letters of one symbol,
 * e.g. `new Tag("<b>", "</b>")`
 */
export class Tag extends Delimiters {
    constructor(startNode?: string, endNode?: string) {
        super(startNode, endNode);
    }

    static empty(): Tag {
        return new Tag();
    }

    get startNode(): string | undefined {
        return this.start;
    }

    get endNode(): string | undefined {
        return this.end;
    }

    startNodeString(): string {
        return this.startString();
    }

    endNodeString(): string {
        return this.endString();
    }
}

export interface TagOptions extends PublicTextOptions {
    /**
     * Merge adjacent tags of the same kind in disguise output,
     * `<b>a</b><b>b</b>` becoming `<b>ab</b>` (default: true)
     */
    optimizeDisguise?: boolean;
}

export class SimpleTagSteganographer implements Steganographer {
    private constructor(
        private readonly aTag: Tag,
        private readonly bTag: Tag,
        private readonly options: TagOptions,
    ) {}

    /**
     * Creates a steganographer after validating the tags, with the same rules
     * as for markers.
     */
    static create(aTag: Tag, bTag: Tag, options: TagOptions = {}): Result<SimpleTagSteganographer> {
        const validation = validateDelimiters(aTag, bTag);
        if (!validation.ok) return validation;

        return ok(new SimpleTagSteganographer(aTag, bTag, options));
    }

    /**
     * Returns a copy that keeps every letter in its own pair of tags
     */
    noOptimizeDisguiseOutput(): SimpleTagSteganographer {
        return new SimpleTagSteganographer(this.aTag, this.bTag, {
            ...this.options,
            optimizeDisguise: false,
        });
    }

    disguise<T>(secret: string, publicText: string, codec: BaconCodec<T>): Result<string> {
        const lengthCheck = validatePublicLength(publicText, this.options);
        if (!lengthCheck.ok) return lengthCheck;

        const merge = this.options.optimizeDisguise ?? true;
        return ok(wrapWithDelimiters(secret, publicText, codec, this.aTag, this.bTag, merge));
    }

    reveal<T>(input: string, codec: BaconCodec<T>): Result<string> {
        return ok(codec.decode(elementsToSymbols(this.parse(input), codec)));
    }

    /**
     * Parses the input as HTML and returns its text nodes, depth first,
     * classified by their parent element. Text outside the A and B tags is
     * returned as the symbol of the empty tag, or dropped when both are defined.
     */
    parse(input: string): ParsedElement[] {
        const document = parseDocument(input);
        const elements: ParsedElement[] = [];
        for (const child of document.children) {
            this.collect(child, "other", elements);
        }
        return elements;
    }

    private collect(node: AnyNode, parentType: ParsedElementType, acc: ParsedElement[]): void {
        if (isText(node)) {
            const type = parentType === "other" ? this.untaggedType() : parentType;
            if (type !== undefined) {
                acc.push({ text: node.data, type });
            }
            return;
        }

        const type = isTag(node) ? this.classify(node.name) : parentType;
        if (hasChildren(node)) {
            for (const child of node.children) {
                this.collect(child, type, acc);
            }
        }
    }

    private classify(name: string): ParsedElementType {
        const tag = `<${name}>`;
        // Element names come out of the parser lowercased
        if (tag === this.aTag.start?.toLowerCase()) return "a";
        if (tag === this.bTag.start?.toLowerCase()) return "b";
        return "other";
    }

    private untaggedType(): ParsedElementType | undefined {
        if (this.aTag.isEmpty()) return "a";
        if (this.bTag.isEmpty()) return "b";
        return undefined;
    }
}
