/**
 * Composition root of one running world: the player store, the world
 * state, both engines, the admin handler, the broadcast router, one
 * dispatch queue and session coordinator per network, and the clock.
 *
 * The entry point builds a realm from configuration and live connections;
 * tests build one from a {@link MemoryRecordStore} and recording sinks.
 *
 * @module realm
 */

import logger from "./logger.js";
import { DispatchQueue, type LineSink } from "./core/dispatch.js";
import { RNG, type Random } from "./core/random.js";
import type { RecordStore } from "./core/records.js";
import { createWorldState, type WorldState } from "./core/world.js";
import type { DeepReadonly } from "./utils/types.js";
import type { DispatchConfig, GameConfig } from "./registry/config.js";
import type { GameServices } from "./registry/command.js";
import { AdminCommandHandler } from "./admin.js";
import { PlayerStore } from "./player-store.js";
import type { WriteBehindOptions } from "./persistence.js";
import { ProgressionEngine } from "./progression.js";
import { BroadcastRouter } from "./router.js";
import { SessionCoordinator } from "./session.js";
import { WorldClock } from "./world-clock.js";
import { EventEngine } from "./world-events.js";

/** Earliest and latest delay before the first quest may start, in seconds. */
export const FIRST_QUEST_DELAY: readonly [number, number] = [3600, 7200];

export interface RealmNetwork {
	name: string;
	channel: string;
	sink: LineSink;
}

export interface RealmOptions {
	records: RecordStore;
	game: DeepReadonly<GameConfig>;
	dispatch: DeepReadonly<DispatchConfig>;
	passwordSalt: string;
	networks: readonly RealmNetwork[];
	random?: Random;
	/** Epoch ms. */
	now?: () => number;
	/** Replaces the dispatch queues' sleep; tests use it to skip pacing. */
	wait?: (ms: number) => Promise<unknown>;
	writeBehind?: WriteBehindOptions;
}

export interface Realm {
	store: PlayerStore;
	world: WorldState;
	progression: ProgressionEngine;
	events: EventEngine;
	admin: AdminCommandHandler;
	router: BroadcastRouter;
	clock: WorldClock;
	services: GameServices;
	sessions: Map<string, SessionCoordinator>;
	/** Stops the clock and waits for deliveries and record writes. */
	close(): Promise<void>;
}

export async function createRealm(options: RealmOptions): Promise<Realm> {
	const random = options.random ?? new RNG(Date.now());
	const now = options.now ?? Date.now;
	const { game } = options;

	const store = await PlayerStore.open(options.records, {
		random,
		now,
		passwordSalt: options.passwordSalt,
		mapWidth: game.map_width,
		mapHeight: game.map_height,
		admins: game.admins,
		writeBehind: options.writeBehind,
	});
	const world = createWorldState(now() + random.int(...FIRST_QUEST_DELAY) * 1000);
	const progression = new ProgressionEngine({
		intervalSeconds: game.self_clock,
		mapWidth: game.map_width,
		mapHeight: game.map_height,
	});
	const events = new EventEngine({
		intervalSeconds: game.self_clock,
		limitPen: game.limit_pen,
		mapWidth: game.map_width,
		mapHeight: game.map_height,
	});

	const router = new BroadcastRouter();
	for (const network of options.networks) {
		const queue = new DispatchQueue({
			name: network.name,
			sink: network.sink,
			minDelayMs: options.dispatch.min_delay_ms,
			maxSize: options.dispatch.max_queue,
			maxLineLength: options.dispatch.max_line_length,
			muteLevel: () => world.muteLevel,
			now,
			wait: options.wait,
		});
		router.register(network.name, network.channel, queue);
	}

	const admin = new AdminCommandHandler({ store, world, events, router });
	const services: GameServices = { store, world, events, admin, router, limitPen: game.limit_pen, now };
	const sessions = new Map<string, SessionCoordinator>();
	for (const network of options.networks) {
		sessions.set(network.name, new SessionCoordinator({ network: network.name, channel: network.channel, services }));
	}
	const clock = new WorldClock({ store, world, progression, events, router });

	logger.info(`Realm ready: ${store.size} player/s, ${sessions.size} network/s`);
	return {
		store,
		world,
		progression,
		events,
		admin,
		router,
		clock,
		services,
		sessions,
		async close() {
			clock.stop();
			await router.drain();
			await store.flush();
			store.close();
		},
	};
}
