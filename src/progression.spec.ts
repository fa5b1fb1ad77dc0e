import { suite, test } from "node:test";
import assert from "node:assert";
import { ProgressionEngine, rollItem } from "./progression.js";
import { PlayerStore } from "./player-store.js";
import { MemoryRecordStore } from "./core/records.js";
import { RNG, ScriptedRandom } from "./core/random.js";
import { BROADCAST_SCOPE } from "./core/broadcast.js";
import { baseTtl } from "./core/player.js";
import { createWorldState } from "./core/world.js";
import type { GameContent } from "./core/content.js";

const NOW = 1_700_000_000_000;

const CONTENT: GameContent = {
	uniqueItems: [
		{
			name: "Test Crown",
			slot: "helm",
			minLevel: 50,
			maxLevel: 74,
			requiredLevel: 25,
			flavor: "It fits.",
		},
	],
	quests: [{ kind: "grid", text: "walk somewhere" }],
	calamity: { items: {}, texts: ["{player} tripped"] },
	godsend: { items: {}, texts: ["{player} found a coin"] },
};

async function storeWith(names: string[], size = 500): Promise<PlayerStore> {
	const store = await PlayerStore.open(new MemoryRecordStore(), {
		random: new RNG(11),
		now: () => NOW,
		passwordSalt: "test-salt",
		mapWidth: size,
		mapHeight: size,
	});
	for (const name of names) {
		await store.create({
			name,
			password: "pw",
			className: "tester",
			network: "alpha",
			session: { nick: name, network: "alpha", channel: "#idle", address: `${name}@example.test` },
		});
	}
	return store;
}

suite("progression.ts", () => {
	suite("rollItem", () => {
		test("below level 25 the highest passing level wins", () => {
			const roll = rollItem(10, new ScriptedRandom([0]), CONTENT);
			assert.deepStrictEqual(roll, { slot: "ring", level: 15 });
		});

		test("unlucky rolls give level 1", () => {
			const roll = rollItem(10, new ScriptedRandom([0.99]), CONTENT);
			assert.deepStrictEqual(roll, { slot: "pair of boots", level: 1 });
		});

		test("unique items are tried first from level 25", () => {
			const roll = rollItem(30, new ScriptedRandom([0]), CONTENT);
			assert.strictEqual(roll.slot, "helm");
			assert.strictEqual(roll.level, 50);
			assert.strictEqual(roll.unique?.name, "Test Crown");
		});
	});

	suite("advance", () => {
		test("online players count down and idle", async () => {
			const store = await storeWith(["Ann"]);
			const engine = new ProgressionEngine({ intervalSeconds: 5, mapWidth: 500, mapHeight: 500, content: CONTENT });
			const report = await store.transaction((table) => engine.advance(table, createWorldState(NOW)));
			assert.strictEqual(report.online.length, 1);
			assert.deepStrictEqual(report.levelled, []);
			const ann = store.findByName("Ann");
			assert.strictEqual(ann?.ttl, 595);
			assert.strictEqual(ann?.idled, 5);
		});

		test("offline players are left alone", async () => {
			const store = await storeWith(["Ann"]);
			await store.create({ name: "Bob", password: "pw", className: "tester", network: "alpha" });
			const engine = new ProgressionEngine({ intervalSeconds: 5, mapWidth: 500, mapHeight: 500, content: CONTENT });
			await store.transaction((table) => engine.advance(table, createWorldState(NOW)));
			assert.strictEqual(store.findByName("Bob")?.ttl, 600);
		});

		test("an expired countdown levels up and finds an item", async () => {
			const store = await storeWith(["Ann"]);
			const ann = store.findByName("Ann");
			assert.ok(ann);
			await store.applyDelta(ann.id, (p) => {
				p.ttl = 3;
			});
			const engine = new ProgressionEngine({ intervalSeconds: 5, mapWidth: 500, mapHeight: 500, content: CONTENT });
			const report = await store.transaction((table) => engine.advance(table, createWorldState(NOW)));
			const after = store.get(ann.id);
			assert.strictEqual(after?.level, 1);
			assert.strictEqual(after?.ttl, baseTtl(1));
			assert.strictEqual(after?.nextTtl, baseTtl(1));
			assert.deepStrictEqual(
				report.levelled.map((p) => p.id),
				[ann.id]
			);
			assert.strictEqual(report.broadcasts.length, 2);
			const [announce, item] = report.broadcasts;
			assert.strictEqual(announce.scope, BROADCAST_SCOPE.ALL);
			assert.ok(announce.text.startsWith("Ann@alpha, the tester, has attained level 1!"));
			assert.strictEqual(item.scope, BROADCAST_SCOPE.NOTICE);
			assert.ok(Object.keys(after?.items ?? {}).length <= 1);
			assert.ok(store.recentEvents().some((e) => e.message === "Ann reached level 1"));
		});
	});

	suite("move", () => {
		test("positions stay on the map", async () => {
			const store = await storeWith(["Ann", "Bob"], 3);
			const engine = new ProgressionEngine({ intervalSeconds: 50, mapWidth: 3, mapHeight: 3, content: CONTENT });
			await store.transaction((table) => engine.advance(table, createWorldState(NOW)));
			for (const player of store.online()) {
				assert.ok(player.x >= 0 && player.x <= 2);
				assert.ok(player.y >= 0 && player.y <= 2);
			}
		});

		test("one collision per cell per step", async () => {
			const store = await storeWith(["Ann", "Bob", "Cid"], 1);
			const engine = new ProgressionEngine({ intervalSeconds: 5, mapWidth: 1, mapHeight: 1, content: CONTENT });
			const report = await store.transaction((table) => engine.advance(table, createWorldState(NOW)));
			assert.strictEqual(report.collisions.length, 5);
			for (const [challenger, opponent] of report.collisions) {
				assert.strictEqual(challenger.name, "Bob");
				assert.strictEqual(opponent.name, "Ann");
			}
		});

		test("grid questers head for their waypoint", async () => {
			const store = await storeWith(["Ann"]);
			const ann = store.findByName("Ann");
			assert.ok(ann);
			await store.applyDelta(ann.id, (p) => {
				p.x = 0;
				p.y = 0;
			});
			const world = createWorldState(NOW);
			world.quest = {
				status: "active",
				kind: "grid",
				text: "walk somewhere",
				questers: [ann.id],
				startedAt: NOW,
				waypoints: [
					{ x: 10, y: 3 },
					{ x: 20, y: 20 },
				],
				stage: 0,
			};
			const engine = new ProgressionEngine({ intervalSeconds: 5, mapWidth: 500, mapHeight: 500, content: CONTENT });
			await store.transaction((table) => engine.advance(table, world));
			const after = store.get(ann.id);
			assert.strictEqual(after?.x, 5);
			assert.strictEqual(after?.y, 3);
		});
	});
});
