import { suite, test } from "node:test";
import assert from "node:assert";
import { fmtTime, joinNames, splitMessage } from "./format.js";

suite("core/format.ts", () => {
	test("fmtTime pads and pluralizes", () => {
		assert.strictEqual(fmtTime(0), "0 days, 00:00:00");
		assert.strictEqual(fmtTime(90061), "1 day, 01:01:01");
		assert.strictEqual(fmtTime(2 * 86400 + 59), "2 days, 00:00:59");
		assert.strictEqual(fmtTime(-5), "0 days, 00:00:00");
	});

	test("short text stays on one line", () => {
		assert.deepStrictEqual(splitMessage("hello there"), ["hello there"]);
		assert.deepStrictEqual(splitMessage(""), [""]);
	});

	test("long text breaks on the last space before the limit", () => {
		assert.deepStrictEqual(splitMessage("aaa bbb ccc", 8), ["aaa bbb", "ccc"]);
		assert.deepStrictEqual(splitMessage("aaaa bbbb cccc dddd", 10), ["aaaa bbbb", "cccc dddd"]);
	});

	test("a word longer than the limit is cut", () => {
		assert.deepStrictEqual(splitMessage("abcdefghij", 4), ["abcd", "efgh", "ij"]);
	});

	test("every chunk of a 1000 character line fits in 400", () => {
		const words = Array.from({ length: 200 }, (_, i) => `w${i % 10}xx`).join(" ");
		const lines = splitMessage(words);
		assert.ok(lines.length > 1);
		for (const line of lines) assert.ok(line.length <= 400);
		assert.strictEqual(lines.join(" "), words);
	});

	test("joinNames lists names", () => {
		assert.strictEqual(joinNames(["a"]), "a");
		assert.strictEqual(joinNames(["a", "b"]), "a and b");
		assert.strictEqual(joinNames(["a", "b", "c"]), "a, b, and c");
	});
});
