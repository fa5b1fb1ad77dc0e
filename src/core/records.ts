/**
 * Durable record store boundary.
 *
 * The in-memory player table is authoritative while the process runs; a
 * {@link RecordStore} only mirrors it so the world survives restarts.
 *
 * @module core/records
 */

import type { GameEvent } from "./event.js";
import type { Player } from "./player.js";

export interface LoadedRecords {
	players: Player[];
	events: GameEvent[];
}

export interface RecordStore {
	load(): Promise<LoadedRecords>;
	/** Upserts the player together with every item it owns. */
	savePlayer(player: Player): Promise<void>;
	/** Removes the player and its items. Missing ids are not an error. */
	deletePlayer(id: number): Promise<void>;
	appendEvent(event: GameEvent): Promise<void>;
}

/**
 * Keeps records in process memory. Backs the `memory` storage driver and
 * the test suites; `failNext` makes the next writes reject.
 */
export class MemoryRecordStore implements RecordStore {
	readonly players = new Map<number, Player>();
	readonly events: GameEvent[] = [];
	private failures = 0;
	writes = 0;

	constructor(initial?: Partial<LoadedRecords>) {
		for (const player of initial?.players ?? []) this.players.set(player.id, structuredClone(player));
		for (const event of initial?.events ?? []) this.events.push({ ...event });
	}

	/** Makes the next `count` write calls reject. */
	failNext(count = 1): void {
		this.failures += count;
	}

	async load(): Promise<LoadedRecords> {
		return {
			players: [...this.players.values()].map((player) => structuredClone(player)),
			events: this.events.map((event) => ({ ...event })),
		};
	}

	async savePlayer(player: Player): Promise<void> {
		this.checkFailure();
		this.players.set(player.id, structuredClone(player));
	}

	async deletePlayer(id: number): Promise<void> {
		this.checkFailure();
		this.players.delete(id);
	}

	async appendEvent(event: GameEvent): Promise<void> {
		this.checkFailure();
		this.events.push({ ...event });
	}

	private checkFailure(): void {
		this.writes++;
		if (this.failures > 0) {
			this.failures--;
			throw new Error("injected record store failure");
		}
	}
}
