import { suite, test } from "node:test";
import assert from "node:assert";
import type { LineSink } from "./core/dispatch.js";
import { EVENT_KIND } from "./core/event.js";
import { ScriptedRandom } from "./core/random.js";
import { MemoryRecordStore } from "./core/records.js";
import { createRealm } from "./realm.js";
import type { TickReport } from "./world-clock.js";

const NOW = 1_700_000_000_000;

class RecordingSink implements LineSink {
	readonly lines: string[] = [];

	sendLine(destination: string, text: string): void {
		this.lines.push(`${destination} ${text}`);
	}

	isConnected(): boolean {
		return true;
	}
}

function realmOn(records: MemoryRecordStore, sink: RecordingSink) {
	return createRealm({
		records,
		game: { name: "test-realm", self_clock: 5, limit_pen: 0, map_width: 500, map_height: 500, admins: [] },
		dispatch: { min_delay_ms: 0, max_queue: 0, max_line_length: 400 },
		passwordSalt: "test-salt",
		networks: [{ name: "alpha", channel: "#idle", sink }],
		// every chance() roll fails, so no random event fires
		random: new ScriptedRandom([0.99]),
		now: () => NOW,
		wait: async () => undefined,
	});
}

async function setup() {
	const sink = new RecordingSink();
	const realm = await realmOn(new MemoryRecordStore(), sink);
	const ann = await realm.store.create({
		name: "Ann",
		password: "pw",
		className: "tester",
		network: "alpha",
		session: { nick: "ann", network: "alpha", channel: "#idle", address: "ann@example.test" },
	});
	const bob = await realm.store.create({ name: "Bob", password: "pw", className: "sleeper", network: "alpha" });
	sink.lines.length = 0;
	return { realm, sink, ann, bob };
}

suite("world-clock.ts", () => {
	test("a tick advances online players only", async () => {
		const { realm, ann, bob } = await setup();
		const reports: TickReport[] = [];
		realm.clock.on("tick", (report: TickReport) => reports.push(report));
		const report = await realm.clock.tick();
		assert.deepStrictEqual(report, { advanced: 1, levelled: 0, broadcasts: 0, events: [] });
		assert.deepStrictEqual(reports, [report]);
		assert.strictEqual(realm.store.get(ann.id)?.ttl, 595);
		assert.strictEqual(realm.store.get(ann.id)?.idled, 5);
		assert.strictEqual(realm.store.get(bob.id)?.ttl, 600);
		assert.strictEqual(realm.world.elapsed, 5);
		await realm.close();
	});

	test("a paused world does not move and does not catch up", async () => {
		const { realm, ann } = await setup();
		realm.world.paused = true;
		const before = realm.store.recentEvents().length;
		for (let i = 0; i < 5; i++) assert.strictEqual(await realm.clock.tick(), undefined);
		assert.strictEqual(realm.store.get(ann.id)?.ttl, 600);
		assert.strictEqual(realm.store.recentEvents().length, before);
		assert.strictEqual(realm.world.elapsed, 0);

		realm.world.paused = false;
		const report = await realm.clock.tick();
		assert.strictEqual(report?.advanced, 1);
		assert.strictEqual(realm.store.get(ann.id)?.ttl, 595);
		assert.strictEqual(realm.world.elapsed, 5);
		await realm.close();
	});

	test("sessions loaded from records do not tick before a join", async () => {
		const records = new MemoryRecordStore();
		const earlier = await realmOn(records, new RecordingSink());
		const ghost = await earlier.store.create({
			name: "Ghost",
			password: "pw",
			className: "wanderer",
			network: "gone",
			session: { nick: "ghost", network: "gone", channel: "#idle", address: "ghost@example.test" },
		});
		await earlier.close();
		assert.strictEqual(records.players.get(ghost.id)?.session?.network, "gone");

		const realm = await realmOn(records, new RecordingSink());
		for (let i = 0; i < 10; i++) {
			const report = await realm.clock.tick();
			assert.strictEqual(report?.advanced, 0);
		}
		assert.strictEqual(realm.store.get(ghost.id)?.ttl, 600);
		assert.deepStrictEqual(realm.store.online(), []);
		await realm.close();
	});

	test("level ups are routed to the channel", async () => {
		const { realm, sink, ann } = await setup();
		await realm.store.applyDelta(ann.id, (player) => {
			player.ttl = 3;
		});
		const report = await realm.clock.tick();
		assert.ok(report);
		assert.strictEqual(report.levelled, 1);
		assert.strictEqual(report.broadcasts, 2);
		assert.strictEqual(report.events[0].kind, EVENT_KIND.LEVELUP);
		assert.strictEqual(realm.store.get(ann.id)?.level, 1);
		await realm.router.drain();
		assert.strictEqual(sink.lines.length, 2);
		assert.ok(sink.lines[0].startsWith("#idle Ann@alpha, the tester, has attained level 1! Next level in "));
		await realm.close();
	});

	test("start and stop manage one timer", async () => {
		const { realm } = await setup();
		assert.strictEqual(realm.clock.started, false);
		realm.clock.start();
		realm.clock.start();
		assert.strictEqual(realm.clock.started, true);
		realm.clock.stop();
		assert.strictEqual(realm.clock.started, false);
		await realm.close();
	});
});
