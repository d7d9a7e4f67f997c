/**
 * bacon-steganography
 *
 * Bacon's cipher and text steganography built on it:
 * - Codecs for both historical variants of the cipher, over any two-valued alphabet
 * - Letter case steganography
 * - Marker steganography (textual delimiters such as Markdown emphasis)
 * - Tag steganography (HTML-like tags, revealed with an HTML parser)
 */

export * from "./src/errors.ts";
export * from "./src/codec.ts";
export * from "./src/common.ts";
export * from "./src/letter_case.ts";
export * from "./src/marker.ts";
export * from "./src/tags.ts";
