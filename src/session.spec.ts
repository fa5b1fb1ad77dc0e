import { before, suite, test } from "node:test";
import assert from "node:assert";
import type { LineSink } from "./core/dispatch.js";
import type { InboundEvent } from "./core/irc.js";
import { PENALTY_KIND } from "./core/penalty.js";
import { RNG } from "./core/random.js";
import { MemoryRecordStore } from "./core/records.js";
import { MUTE_LEVEL } from "./core/world.js";
import { loadCommands } from "./package/commands.js";
import { createRealm, type Realm } from "./realm.js";

const NOW = 1_700_000_000_000;

class RecordingSink implements LineSink {
	readonly lines: Array<{ destination: string; text: string; notice: boolean }> = [];

	sendLine(destination: string, text: string, notice = false): void {
		this.lines.push({ destination, text, notice });
	}

	isConnected(): boolean {
		return true;
	}
}

interface Harness {
	realm: Realm;
	alpha: RecordingSink;
	beta: RecordingSink;
	send(network: string, event: InboundEvent): Promise<void>;
	say(network: string, nick: string, text: string): Promise<void>;
}

async function harness(): Promise<Harness> {
	const alpha = new RecordingSink();
	const beta = new RecordingSink();
	const realm = await createRealm({
		records: new MemoryRecordStore(),
		game: { name: "test-realm", self_clock: 5, limit_pen: 0, map_width: 500, map_height: 500, admins: ["Root"] },
		dispatch: { min_delay_ms: 0, max_queue: 0, max_line_length: 400 },
		passwordSalt: "test-salt",
		networks: [
			{ name: "alpha", channel: "#idle", sink: alpha },
			{ name: "beta", channel: "#idle", sink: beta },
		],
		random: new RNG(7),
		now: () => NOW,
		wait: async () => undefined,
	});
	const send = async (network: string, event: InboundEvent) => {
		const session = realm.sessions.get(network);
		if (!session) throw new Error(`no session for ${network}`);
		await session.deliver(event);
		await realm.router.drain();
	};
	const say = (network: string, nick: string, text: string) =>
		send(network, { type: "privateMessage", sender: { nick, address: `${nick}@example.test` }, text });
	return { realm, alpha, beta, send, say };
}

/** Registers Arthur from nick `art` on alpha and forgets the lines it produced. */
async function withArthur(): Promise<Harness> {
	const h = await harness();
	await h.say("alpha", "art", "REGISTER Arthur pw1 Knight of the Round");
	h.alpha.lines.length = 0;
	h.beta.lines.length = 0;
	return h;
}

function arthur(realm: Realm) {
	const player = realm.store.findByName("Arthur");
	assert.ok(player);
	return player;
}

suite("session.ts", () => {
	before(async () => {
		await loadCommands();
	});

	suite("private messages", () => {
		test("REGISTER creates, logs in and announces everywhere", async () => {
			const { realm, alpha, beta, say } = await harness();
			await say("alpha", "art", "REGISTER Arthur pw1 Knight of the Round");
			assert.strictEqual(alpha.lines.length, 2);
			assert.strictEqual(alpha.lines[0].destination, "art");
			assert.ok(
				alpha.lines[0].text.startsWith("Success! Account Arthur created. You have 0 days, 00:10:00 until level 1.")
			);
			const welcome = {
				destination: "#idle",
				text: "Welcome art's new player Arthur@alpha, the Knight of the Round! Next level in 0 days, 00:10:00.",
				notice: false,
			};
			assert.deepStrictEqual(alpha.lines[1], welcome);
			assert.deepStrictEqual(beta.lines, [welcome]);
			const player = arthur(realm);
			assert.strictEqual(player.className, "Knight of the Round");
			assert.strictEqual(player.session?.nick, "art");
			await realm.close();
		});

		test("names are unique across networks regardless of case", async () => {
			const { realm, beta, say } = await withArthur();
			await say("beta", "bob", "REGISTER arthur pw2 Squire");
			assert.deepStrictEqual(beta.lines, [
				{ destination: "bob", text: "Sorry, that character name is already in use.", notice: false },
			]);
			assert.strictEqual(realm.store.size, 1);
			await realm.close();
		});

		test("player commands need a login", async () => {
			const { realm, alpha, say } = await harness();
			await say("alpha", "stranger", "WHOAMI");
			assert.deepStrictEqual(alpha.lines, [{ destination: "stranger", text: "You are not logged in.", notice: true }]);
			await realm.close();
		});

		test("unknown verbs get a hint", async () => {
			const { realm, alpha, say } = await harness();
			await say("alpha", "stranger", "dance wildly");
			assert.deepStrictEqual(alpha.lines, [
				{ destination: "stranger", text: "Unknown command 'dance'. Send HELP for a list of commands.", notice: false },
			]);
			await realm.close();
		});

		test("admin commands refuse ordinary players", async () => {
			const { realm, alpha, say } = await withArthur();
			await say("alpha", "art", "PAUSE");
			assert.deepStrictEqual(alpha.lines, [
				{ destination: "art", text: "You do not have access to admin commands.", notice: false },
			]);
			assert.strictEqual(realm.world.paused, false);
			await realm.close();
		});

		test("WHOAMI answers a logged-in player", async () => {
			const { realm, alpha, say } = await withArthur();
			await say("alpha", "ART", "whoami");
			assert.deepStrictEqual(alpha.lines, [
				{
					destination: "ART",
					text: "You are Arthur, the level 0 Knight of the Round. Next level in 0 days, 00:10:00.",
					notice: false,
				},
			]);
			await realm.close();
		});

		test("LOGOUT then LOGIN", async () => {
			const { realm, alpha, say } = await withArthur();
			await say("alpha", "art", "LOGOUT");
			assert.deepStrictEqual(alpha.lines, [
				{ destination: "art", text: "Penalty of 0 days, 00:00:20 added to your timer for LOGOUT.", notice: true },
				{ destination: "art", text: "You are no longer logged in.", notice: false },
			]);
			assert.strictEqual(arthur(realm).session, undefined);
			assert.strictEqual(arthur(realm).ttl, 620);

			alpha.lines.length = 0;
			await say("alpha", "art", "LOGIN Arthur nope");
			assert.deepStrictEqual(alpha.lines, [{ destination: "art", text: "Wrong password.", notice: false }]);

			alpha.lines.length = 0;
			await say("alpha", "art", "LOGIN Arthur pw1");
			assert.deepStrictEqual(alpha.lines[0], {
				destination: "art",
				text: "Logon successful. Next level in 0 days, 00:10:20.",
				notice: false,
			});
			assert.strictEqual(arthur(realm).session?.network, "alpha");
			await realm.close();
		});
	});

	suite("penalties", () => {
		test("channel messages cost their length", async () => {
			const { realm, alpha, send } = await withArthur();
			await send("alpha", { type: "channelMessage", sender: { nick: "art", address: "art@example.test" }, text: "hello" });
			assert.strictEqual(arthur(realm).ttl, 605);
			assert.strictEqual(arthur(realm).penalties[PENALTY_KIND.MESSAGE], 5);
			assert.deepStrictEqual(alpha.lines, []);
			await realm.close();
		});

		test("channel messages from strangers cost nothing", async () => {
			const { realm, send } = await withArthur();
			await send("alpha", { type: "channelMessage", sender: { nick: "zed", address: "zed@example.test" }, text: "hi" });
			assert.strictEqual(arthur(realm).ttl, 600);
			await realm.close();
		});

		test("a nick change follows the player", async () => {
			const { realm, alpha, send } = await withArthur();
			await send("alpha", { type: "nickChanged", oldNick: "art", newNick: "arty" });
			assert.strictEqual(arthur(realm).ttl, 630);
			assert.strictEqual(arthur(realm).session?.nick, "arty");
			assert.deepStrictEqual(alpha.lines, [
				{ destination: "arty", text: "Penalty of 0 days, 00:00:30 added to your timer for nick change.", notice: true },
			]);
			await realm.close();
		});

		test("parting logs out and is announced on that network only", async () => {
			const { realm, alpha, beta, send } = await withArthur();
			await send("alpha", { type: "parted", sender: { nick: "art", address: "art@example.test" } });
			assert.strictEqual(arthur(realm).ttl, 800);
			assert.strictEqual(arthur(realm).session, undefined);
			assert.deepStrictEqual(alpha.lines, [
				{ destination: "#idle", text: "Arthur@alpha has left #idle. Penalty: 0 days, 00:03:20.", notice: false },
			]);
			assert.deepStrictEqual(beta.lines, []);
			await realm.close();
		});

		test("events on another network do not touch the player", async () => {
			const { realm, send } = await withArthur();
			await send("beta", { type: "quit", sender: { nick: "art", address: "art@example.test" } });
			assert.strictEqual(arthur(realm).ttl, 600);
			assert.strictEqual(arthur(realm).session?.network, "alpha");
			await realm.close();
		});

		test("a kick costs 250 seconds at level 0", async () => {
			const { realm, alpha, send } = await withArthur();
			await send("alpha", { type: "kicked", target: "art" });
			assert.strictEqual(arthur(realm).ttl, 850);
			assert.deepStrictEqual(alpha.lines, [
				{ destination: "#idle", text: "Arthur@alpha has been kicked from #idle. Penalty: 0 days, 00:04:10.", notice: false },
			]);
			await realm.close();
		});
	});

	suite("auto-login", () => {
		test("a WHO match resumes the session under the current nick", async () => {
			const { realm, alpha, beta, send } = await withArthur();
			await send("alpha", { type: "join" });
			assert.strictEqual(arthur(realm).session, undefined);
			assert.strictEqual(arthur(realm).ttl, 600);

			await send("alpha", { type: "whoReply", nick: "arthur_", address: "art@example.test" });
			assert.strictEqual(arthur(realm).session?.nick, "arthur_");
			assert.strictEqual(arthur(realm).session?.channel, "#idle");
			await send("alpha", { type: "whoEnd" });
			assert.deepStrictEqual(alpha.lines, [
				{ destination: "#idle", text: "1 user automatically logged in on alpha.", notice: false },
			]);
			assert.deepStrictEqual(beta.lines, []);
			await realm.close();
		});

		test("players missing from the WHO list stay logged out", async () => {
			const { realm, alpha, send } = await withArthur();
			await send("alpha", { type: "join" });
			await send("alpha", { type: "whoReply", nick: "art", address: "someone@elsewhere.test" });
			await send("alpha", { type: "whoEnd" });
			assert.strictEqual(arthur(realm).session, undefined);
			assert.deepStrictEqual(alpha.lines, []);

			await send("alpha", { type: "whoReply", nick: "art", address: "art@example.test" });
			assert.strictEqual(arthur(realm).session, undefined);
			await realm.close();
		});

		test("a join on another network leaves the session alone", async () => {
			const { realm, send } = await withArthur();
			await send("beta", { type: "join" });
			await send("beta", { type: "whoEnd" });
			assert.strictEqual(arthur(realm).session?.network, "alpha");
			await realm.close();
		});

		test("sessions saved before a restart wait for the WHO list", async () => {
			const first = await withArthur();
			await first.realm.close();
			const saved = first.realm.store.findByName("Arthur");
			assert.ok(saved);

			const session = { nick: "art", network: "alpha", channel: "#idle", address: "art@example.test", since: NOW };
			const records = new MemoryRecordStore({ players: [{ ...saved, session }] });
			const sink = new RecordingSink();
			const realm = await createRealm({
				records,
				game: { name: "test-realm", self_clock: 5, limit_pen: 0, map_width: 500, map_height: 500, admins: [] },
				dispatch: { min_delay_ms: 0, max_queue: 0, max_line_length: 400 },
				passwordSalt: "test-salt",
				networks: [{ name: "alpha", channel: "#idle", sink }],
				random: new RNG(7),
				now: () => NOW,
				wait: async () => undefined,
			});
			assert.strictEqual(arthur(realm).session, undefined);
			assert.deepStrictEqual(realm.store.online(), []);

			const coordinator = realm.sessions.get("alpha");
			assert.ok(coordinator);
			await coordinator.deliver({ type: "join" });
			await coordinator.deliver({ type: "whoReply", nick: "art", address: "art@example.test" });
			assert.strictEqual(arthur(realm).session?.nick, "art");
			await realm.close();
		});
	});

	test("SILENT 2 drops private lines but keeps the channel", async () => {
		const { realm, alpha, say, send } = await withArthur();
		await say("alpha", "root", "REGISTER Root pw3 Overseer");
		alpha.lines.length = 0;

		await say("alpha", "root", "SILENT 2");
		assert.strictEqual(realm.world.muteLevel, MUTE_LEVEL.PRIVATE);
		await say("alpha", "art", "WHOAMI");
		await send("alpha", { type: "parted", sender: { nick: "art", address: "art@example.test" } });

		assert.deepStrictEqual(alpha.lines, [
			{ destination: "#idle", text: "Arthur@alpha has left #idle. Penalty: 0 days, 00:03:20.", notice: false },
		]);
		await realm.close();
	});
});
