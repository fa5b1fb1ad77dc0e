import { suite, test } from "node:test";
import assert from "node:assert";
import { toAll } from "./core/broadcast.js";
import type { LineSink } from "./core/dispatch.js";
import { DuplicateNameError, NotFoundError, UnauthorizedError, ValidationError } from "./core/errors.js";
import { EVENT_KIND } from "./core/event.js";
import { RNG } from "./core/random.js";
import { MemoryRecordStore } from "./core/records.js";
import { MUTE_LEVEL } from "./core/world.js";
import { createRealm } from "./realm.js";

const NOW = 1_700_000_000_000;
const DAY = 86400 * 1000;

const sink: LineSink = {
	sendLine: () => undefined,
	isConnected: () => false,
};

async function setup() {
	const clock = { now: NOW };
	const realm = await createRealm({
		records: new MemoryRecordStore(),
		game: { name: "test-realm", self_clock: 5, limit_pen: 0, map_width: 500, map_height: 500, admins: ["Root"] },
		dispatch: { min_delay_ms: 0, max_queue: 0, max_line_length: 400 },
		passwordSalt: "test-salt",
		networks: [{ name: "alpha", channel: "#idle", sink }],
		random: new RNG(3),
		now: () => clock.now,
		wait: async () => undefined,
	});
	const root = await realm.store.create({
		name: "Root",
		password: "pw",
		className: "overseer",
		network: "alpha",
		session: { nick: "root", network: "alpha", channel: "#idle", address: "root@example.test" },
	});
	const bob = await realm.store.create({ name: "Bob", password: "pw", className: "baker", network: "alpha" });
	return { realm, clock, root, bob, admin: realm.admin };
}

suite("admin.ts", () => {
	test("only admins may act", async () => {
		const { realm, admin, root, bob } = await setup();
		assert.strictEqual(root.isAdmin, true);
		assert.strictEqual(bob.isAdmin, false);
		await assert.rejects(admin.togglePause(bob.id), UnauthorizedError);
		assert.strictEqual(realm.world.paused, false);
		await realm.close();
	});

	test("the flag is read at the time of the call", async () => {
		const { realm, admin, root } = await setup();
		await admin.setAdmin(root.id, "Root", false);
		await assert.rejects(admin.togglePause(root.id), UnauthorizedError);
		await realm.close();
	});

	test("PAUSE toggles and is logged", async () => {
		const { realm, admin, root } = await setup();
		assert.deepStrictEqual(await admin.togglePause(root.id), { reply: "Pause mode enabled.", broadcasts: [] });
		assert.strictEqual(realm.world.paused, true);
		assert.deepStrictEqual(await admin.togglePause(root.id), { reply: "Pause mode disabled.", broadcasts: [] });
		const last = realm.store.recentEvents(1)[0];
		assert.strictEqual(last.kind, EVENT_KIND.ADMIN);
		assert.strictEqual(last.message, "Root: PAUSE");
		assert.strictEqual(last.playerId, root.id);
		await realm.close();
	});

	suite("push", () => {
		test("moves the countdown both ways", async () => {
			const { realm, admin, root, bob } = await setup();
			await realm.store.applyDelta(bob.id, (player) => {
				player.ttl = 5000;
			});
			const toward = await admin.push(root.id, "bob", 3600);
			assert.strictEqual(toward.reply, "Bob now reaches level 1 in 0 days, 00:23:20.");
			assert.deepStrictEqual(toward.broadcasts, [
				toAll("Bob@alpha has been pushed 0 days, 01:00:00 towards level 1. Bob reaches next level in 0 days, 00:23:20."),
			]);
			assert.strictEqual(realm.store.get(bob.id)?.ttl, 1400);

			const away = await admin.push(root.id, "Bob", -100);
			assert.deepStrictEqual(away.broadcasts, [
				toAll("Bob@alpha has been pushed 0 days, 00:01:40 away from level 1. Bob reaches next level in 0 days, 00:25:00."),
			]);
			assert.strictEqual(realm.store.get(bob.id)?.ttl, 1500);
			await realm.close();
		});

		test("never goes below zero", async () => {
			const { realm, admin, root, bob } = await setup();
			await admin.push(root.id, "Bob", 99999);
			assert.strictEqual(realm.store.get(bob.id)?.ttl, 0);
			await realm.close();
		});

		test("unknown players", async () => {
			const { realm, admin, root } = await setup();
			await assert.rejects(admin.push(root.id, "Nobody", 10), NotFoundError);
			await realm.close();
		});
	});

	test("SILENT validates its level", async () => {
		const { realm, admin, root } = await setup();
		await assert.rejects(admin.setMuteLevel(root.id, 4), ValidationError);
		assert.strictEqual(realm.world.muteLevel, MUTE_LEVEL.NONE);
		const result = await admin.setMuteLevel(root.id, 1);
		assert.strictEqual(result.reply, "Silent mode 1: channel messages disabled.");
		assert.strictEqual(realm.world.muteLevel, MUTE_LEVEL.CHANNEL);
		await realm.close();
	});

	test("CLEARQ empties one network's queue", async () => {
		const { realm, admin, root } = await setup();
		const queue = realm.router.queue("alpha");
		assert.ok(queue);
		queue.enqueue("#idle", "first");
		queue.enqueue("bob", "second");
		const result = await admin.clearQueue(root.id, "alpha");
		assert.strictEqual(result.reply, "Send queue cleared (2 messages dropped).");
		assert.strictEqual(queue.size, 0);
		await assert.rejects(admin.clearQueue(root.id, "gamma"), NotFoundError);
		await realm.close();
	});

	test("CHPASS replaces the password", async () => {
		const { realm, admin, root } = await setup();
		assert.strictEqual((await admin.changePassword(root.id, "Bob", "fresh")).reply, "Password for Bob changed.");
		await assert.rejects(realm.store.authenticate("Bob", "pw"));
		assert.strictEqual((await realm.store.authenticate("Bob", "fresh")).name, "Bob");
		await realm.close();
	});

	test("CHCLASS", async () => {
		const { realm, admin, root, bob } = await setup();
		const result = await admin.changeClass(root.id, "Bob", "master baker");
		assert.strictEqual(result.reply, "Class for Bob changed to master baker.");
		assert.strictEqual(realm.store.get(bob.id)?.className, "master baker");
		await assert.rejects(admin.changeClass(root.id, "Bob", "x".repeat(31)), ValidationError);
		await realm.close();
	});

	test("CHUSER renames unless the name is taken", async () => {
		const { realm, admin, root, bob } = await setup();
		await assert.rejects(admin.changeName(root.id, "Bob", "root"), DuplicateNameError);
		const result = await admin.changeName(root.id, "Bob", "Robert");
		assert.strictEqual(result.reply, "Bob is now known as Robert.");
		assert.strictEqual(realm.store.findByName("robert")?.id, bob.id);
		assert.strictEqual(realm.store.findByName("Bob"), undefined);
		await realm.close();
	});

	test("DEL removes the account and its items", async () => {
		const { realm, admin, root, bob } = await setup();
		await realm.store.applyDelta(bob.id, (player, table) => {
			table.setItem(player, "ring", 12);
		});
		const result = await admin.deleteAccount(root.id, "bob");
		assert.strictEqual(result.reply, "Account Bob removed.");
		assert.strictEqual(realm.store.get(bob.id), undefined);
		await realm.store.flush();
		await assert.rejects(admin.deleteAccount(root.id, "bob"), NotFoundError);
		await realm.close();
	});

	test("DELOLD removes only offline accounts past the cutoff", async () => {
		const { realm, admin, root, clock } = await setup();
		await assert.rejects(admin.deleteInactive(root.id, 0), ValidationError);
		assert.strictEqual(
			(await admin.deleteInactive(root.id, 30)).reply,
			"No accounts inactive for more than 30 days."
		);
		clock.now = NOW + 31 * DAY;
		const result = await admin.deleteInactive(root.id, 30);
		assert.strictEqual(result.reply, "Deleted 1 account(s) inactive for more than 30 days: Bob.");
		assert.deepStrictEqual(
			realm.store.all().map((player) => player.name),
			["Root"]
		);
		await realm.close();
	});

	test("MKADMIN and DELADMIN", async () => {
		const { realm, admin, root, bob } = await setup();
		assert.strictEqual((await admin.setAdmin(root.id, "bob", true)).reply, "Bob is now an admin.");
		assert.strictEqual(realm.store.get(bob.id)?.isAdmin, true);
		assert.strictEqual((await admin.setAdmin(bob.id, "Bob", false)).reply, "Bob is no longer an admin.");
		assert.strictEqual(realm.store.get(bob.id)?.isAdmin, false);
		await realm.close();
	});

	test("HOG with nobody online", async () => {
		const { realm, admin, root } = await setup();
		await realm.store.setOffline(root.id);
		assert.deepStrictEqual(await admin.handOfGod(root.id), { reply: "Nobody is online.", broadcasts: [] });
		await realm.close();
	});
});
