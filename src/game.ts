/**
 * Boots the realm from configuration: the record store, one IRC connection
 * and session coordinator per network, the command set, the world clock,
 * and the dashboard server.
 *
 * Typical usage
 * ```ts
 * import { startGame } from "./game.js";
 *
 * const stopGame = await startGame();
 *
 * // Later, on shutdown
 * await stopGame();
 * ```
 *
 * Notes
 * - Configuration is sourced from `data/config.yaml` (@see {@link package/config}).
 * - Records live under `storage.directory` with the `yaml` driver; the
 *   `memory` driver keeps nothing across restarts.
 *
 * @module game
 */

import { join } from "path";
import logger from "./logger.js";
import { IrcConnection } from "./core/io.js";
import type { InboundEvent } from "./core/irc.js";
import { MemoryRecordStore, type RecordStore } from "./core/records.js";
import { loadConfig } from "./package/config.js";
import { loadCommands } from "./package/commands.js";
import { YamlRecordStore } from "./package/records.js";
import { CONFIG } from "./registry/config.js";
import { getSafeRootDirectory } from "./utils/path.js";
import { createRealm, type Realm } from "./realm.js";
import { buildSnapshot } from "./snapshot.js";
import { SnapshotServer } from "./snapshot-server.js";

/** The record store named by `storage.driver` in the active config. */
export function openRecords(): RecordStore {
	if (CONFIG.storage.driver === "memory") {
		logger.warn("Using the memory storage driver; nothing survives a restart");
		return new MemoryRecordStore();
	}
	const directory = join(getSafeRootDirectory(), CONFIG.storage.directory);
	logger.info(`Records stored under ${directory}`);
	return new YamlRecordStore(directory);
}

function attach(realm: Realm, connection: IrcConnection): void {
	const session = realm.sessions.get(connection.network.name);
	if (!session) throw new Error(`No session coordinator for ${connection.network.name}`);
	connection.on("inbound", (event: InboundEvent) => {
		void session.deliver(event);
	});
	// queued lines wait for the connection; resume them once it is back
	connection.on("connected", () => realm.router.flushAll());
}

/**
 * Load configuration, open records, connect every network and start the
 * world clock. Resolves with a function that shuts everything down.
 */
export async function startGame(): Promise<() => Promise<void>> {
	await loadConfig();
	const config = CONFIG;
	if (config.security.password_salt === "changeme_default_salt_12345") {
		logger.warn("security.password_salt is the default; set your own in data/config.yaml");
	}

	const connections = config.networks.map((network) => new IrcConnection(network));
	const realm = await createRealm({
		records: openRecords(),
		game: config.game,
		dispatch: config.dispatch,
		passwordSalt: config.security.password_salt,
		networks: connections.map((connection) => ({
			name: connection.network.name,
			channel: connection.network.channel,
			sink: connection,
		})),
	});

	await loadCommands();
	for (const connection of connections) {
		attach(realm, connection);
		connection.connect();
	}
	realm.clock.start();

	let snapshotServer: SnapshotServer | undefined;
	if (config.web.enabled) {
		const server = new SnapshotServer({
			host: config.web.host,
			port: config.web.port,
			snapshot: () => buildSnapshot(realm.store, realm.world, Date.now()),
		});
		await server.start();
		realm.clock.on("tick", () => server.push());
		snapshotServer = server;
	}

	logger.info(`${config.game.name} started on ${connections.length} network/s`);

	return async () => {
		logger.info("Stopping game...");
		realm.clock.stop();
		if (snapshotServer) await snapshotServer.stop();
		await realm.close();
		await Promise.all(connections.map((connection) => connection.close()));
		logger.info("Game stopped");
	};
}
