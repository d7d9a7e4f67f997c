import { test } from "node:test";
import assert from "node:assert";
import { CharCodec, CharCodecV2, ENCODED_GROUP_SIZE, UNKNOWN_CONTENT } from "../mod.ts";

const ALPHABET = "abcdefghijklmnopqrstuvwxyz";

const ALL_V1 =
    "aaaaaaaaabaaabaaaabbaabaaaababaabbaaabbbabaaaabaaaabaabababaababbabbaaabbababbbaabbbbbaaaabaaabbaababaabbbaabbbabaabababbabbababbb";

const ALL_V2 =
    "aaaaaaaaabaaabaaaabbaabaaaababaabbaaabbbabaaaabaabababaababbabbaaabbababbbaabbbbbaaaabaaabbaababaabbbabaabababbabbababbbbbaaabbaab";

const MY_SECRET = "ababbbabbabaaabaabaaaaababaaaaaabaabaaba";

test("CharCodec - encode chars to a cipher of chars", () => {
    const codec = new CharCodec("a", "b");
    assert.strictEqual(codec.encode("My secret").join(""), MY_SECRET);
});

test("CharCodec - encode MY to two groups", () => {
    const codec = new CharCodec("a", "b");
    assert.deepStrictEqual(codec.encode("MY"), ["a", "b", "a", "b", "b", "b", "a", "b", "b", "a"]);
    assert.strictEqual(codec.decode(["a", "b", "a", "b", "b", "b", "a", "b", "b", "a"]), "MY");
});

test("CharCodec - encode the whole alphabet in both cases", () => {
    const codec = new CharCodec("a", "b");
    assert.strictEqual(codec.encode(ALPHABET).join(""), ALL_V1);
    assert.strictEqual(codec.encode(ALPHABET.toUpperCase()).join(""), ALL_V1);
});

test("CharCodecV2 - encode the whole alphabet in both cases", () => {
    const codec = new CharCodecV2("a", "b");
    assert.strictEqual(codec.encode(ALPHABET).join(""), ALL_V2);
    assert.strictEqual(codec.encode(ALPHABET.toUpperCase()).join(""), ALL_V2);
});

test("CharCodec - decode a cipher of chars", () => {
    const codec = new CharCodec("a", "b");
    assert.strictEqual(codec.decode(Array.from(MY_SECRET)), "MYSECRET");
});

test("CharCodec - letters sharing a group decode to the first of them", () => {
    const codec = new CharCodec("a", "b");
    assert.strictEqual(codec.decode(Array.from(ALL_V1)), "ABCDEFGHIIKLMNOPQRSTUUWXYZ");
});

test("CharCodec - round trip of letters with distinct groups", () => {
    const codec = new CharCodec("a", "b");
    const letters = "abcdefghiklmnopqrstuwxyz";
    assert.strictEqual(codec.decode(codec.encode(letters)), letters.toUpperCase());
});

test("CharCodecV2 - round trip of the whole alphabet", () => {
    const codec = new CharCodecV2("a", "b");
    assert.strictEqual(codec.decode(codec.encode(ALPHABET)), ALPHABET.toUpperCase());
    assert.strictEqual(codec.decode(Array.from(ALL_V2)), ALPHABET.toUpperCase());
});

test("CharCodec - encode to booleans", () => {
    const codec = new CharCodec(false, true);
    const expected = Array.from(MY_SECRET, (symbol) => symbol === "b");
    assert.deepStrictEqual(codec.encode("My secret"), expected);
    assert.strictEqual(codec.decode(expected), "MYSECRET");
});

test("CharCodec - char and boolean alphabets produce the same pattern", () => {
    const chars = new CharCodec("x", "y").encode("Attack at dawn");
    const bools = new CharCodec(false, true).encode("Attack at dawn");
    assert.deepStrictEqual(
        chars.map((symbol) => symbol === "y"),
        bools,
    );
});

test("CharCodec - custom symbol equality", () => {
    const codec = new CharCodec({ bit: 0 }, { bit: 1 }, (left, right) => left.bit === right.bit);
    const encoded = codec.encode("k");
    assert.deepStrictEqual(encoded.map((symbol) => symbol.bit), [0, 1, 0, 0, 1]);
    assert.strictEqual(codec.decode([{ bit: 0 }, { bit: 1 }, { bit: 0 }, { bit: 0 }, { bit: 1 }]), "K");
    assert.ok(codec.isA({ bit: 0 }));
    assert.ok(codec.isB({ bit: 1 }));
});

test("CharCodec - non letters are dropped on encode", () => {
    const codec = new CharCodec("a", "b");
    assert.deepStrictEqual(codec.encodeElem("1"), []);
    assert.deepStrictEqual(codec.encodeElem(" "), []);
    assert.deepStrictEqual(codec.encodeElem("é"), []);
    assert.strictEqual(codec.encode("1 2, 3!").length, 0);
});

test("CharCodec - incomplete final group decodes to the unknown content", () => {
    const codec = new CharCodec("a", "b");
    assert.strictEqual(codec.decode(["a", "b", "a", "b", "b", "b", "a"]), "M" + UNKNOWN_CONTENT);
    assert.strictEqual(codec.decode([]), "");
});

test("CharCodec - unknown symbols decode to the unknown content", () => {
    const codec = new CharCodec("a", "b");
    assert.strictEqual(codec.decodeElems(["a", "a", "a", "a", "c"]), " ");
    assert.strictEqual(codec.decode(["a", "a", "a", "a", "c", "a", "a", "a", "a", "b"]), " B");
});

test("CharCodec - default codec and accessors", () => {
    const codec = CharCodec.default();
    assert.strictEqual(codec.a(), "A");
    assert.strictEqual(codec.b(), "B");
    assert.ok(codec.isA("A"));
    assert.ok(!codec.isA("B"));
    assert.ok(codec.isB("B"));
    assert.strictEqual(codec.encodedGroupSize(), ENCODED_GROUP_SIZE);
    assert.strictEqual(CharCodecV2.default().encode("y").join(""), "BBAAA");
});
