import { suite, test } from "node:test";
import assert from "node:assert";
import { penalty, penaltyFor, PENALTY_KIND } from "./penalty.js";

suite("core/penalty.ts", () => {
	test("level 0 returns the base", () => {
		assert.strictEqual(penalty(200, 0), 200);
		assert.strictEqual(penaltyFor(PENALTY_KIND.KICK, 0), 250);
		assert.strictEqual(penaltyFor(PENALTY_KIND.NICK, 0), 30);
	});

	test("grows by 14% per level and truncates", () => {
		assert.strictEqual(penalty(100, 1), 113);
		assert.strictEqual(penalty(100, 2), 129);
		assert.strictEqual(penalty(20, 10), 74);
	});

	test("is monotonic in level for a fixed base", () => {
		for (const base of [1, 20, 30, 200, 250, 417]) {
			let previous = -1;
			for (let level = 0; level <= 120; level++) {
				const value = penalty(base, level);
				assert.ok(value >= previous, `base ${base} dropped at level ${level}`);
				previous = value;
			}
		}
	});

	test("is never negative", () => {
		assert.strictEqual(penalty(-50, 10), 0);
		assert.strictEqual(penalty(0, 90), 0);
	});

	test("nonzero cap limits every penalty", () => {
		assert.strictEqual(penalty(250, 60, 3600), 3600);
		assert.strictEqual(penalty(10, 0, 3600), 10);
		assert.strictEqual(penaltyFor(PENALTY_KIND.PART, 80, { limitPen: 500 }), 500);
	});

	test("channel messages use their length", () => {
		assert.strictEqual(penaltyFor(PENALTY_KIND.MESSAGE, 0, { messageLength: 42 }), 42);
		assert.strictEqual(penaltyFor(PENALTY_KIND.MESSAGE, 1, { messageLength: 100 }), 113);
	});
});
