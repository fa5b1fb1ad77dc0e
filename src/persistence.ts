/**
 * Write-behind mirror of the player table.
 *
 * Gameplay never waits on disk: mutations schedule writes here after the
 * writer lock is released. Writes for one player coalesce to the latest
 * copy; failed writes are logged and retried after `retryDelayMs`.
 *
 * @module persistence
 */

import logger from "./logger.js";
import type { GameEvent } from "./core/event.js";
import type { Player } from "./core/player.js";
import type { RecordStore } from "./core/records.js";

type PlayerWrite = { kind: "save"; player: Player } | { kind: "delete"; id: number };

export interface WriteBehindOptions {
	retryDelayMs?: number;
}

export const DEFAULT_RETRY_DELAY_MS = 5000;

export class WriteBehind {
	private readonly players = new Map<number, PlayerWrite>();
	private readonly events: GameEvent[] = [];
	private draining?: Promise<void>;
	private retryTimer?: NodeJS.Timeout;
	private readonly retryDelayMs: number;

	constructor(private readonly records: RecordStore, options: WriteBehindOptions = {}) {
		this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
	}

	/** `player` must already be a private copy. */
	savePlayer(player: Player): void {
		this.players.set(player.id, { kind: "save", player });
		this.schedule();
	}

	deletePlayer(id: number): void {
		this.players.set(id, { kind: "delete", id });
		this.schedule();
	}

	appendEvent(event: GameEvent): void {
		this.events.push(event);
		this.schedule();
	}

	/** Writes still waiting, including ones waiting for a retry. */
	get backlog(): number {
		return this.players.size + this.events.length;
	}

	/**
	 * Resolves once every scheduled write has landed. Retries immediately
	 * instead of waiting for the retry timer; rejects if a write still fails.
	 */
	async flush(): Promise<void> {
		this.cancelRetry();
		await this.drain();
		if (this.backlog > 0) {
			await this.drain();
			if (this.backlog > 0) throw new Error(`${this.backlog} record write/s could not be flushed`);
		}
	}

	/** Stops waiting retries; pending writes stay queued. */
	dispose(): void {
		this.cancelRetry();
	}

	private schedule(): void {
		if (this.retryTimer) return;
		this.drain().catch((error: unknown) => logger.error("Record write loop failed", { error: String(error) }));
	}

	private drain(): Promise<void> {
		if (!this.draining) {
			this.draining = this.run().finally(() => {
				this.draining = undefined;
				// writes scheduled while the loop was finishing
				if (this.backlog > 0 && !this.retryTimer) this.schedule();
			});
		}
		return this.draining;
	}

	private async run(): Promise<void> {
		let failed = false;
		while (!failed && this.backlog > 0) {
			const event = this.events[0];
			if (event) {
				try {
					await this.records.appendEvent(event);
					this.events.shift();
				} catch (error) {
					logger.warn(`Event ${event.id} write failed, will retry`, { error: String(error) });
					failed = true;
				}
				continue;
			}
			const next = this.players.entries().next();
			if (next.done) break;
			const [id, write] = next.value;
			this.players.delete(id);
			try {
				if (write.kind === "save") await this.records.savePlayer(write.player);
				else await this.records.deletePlayer(write.id);
			} catch (error) {
				logger.warn(`Player ${id} ${write.kind} failed, will retry`, { error: String(error) });
				// a newer write for the same player supersedes the failed one
				if (!this.players.has(id)) this.players.set(id, write);
				failed = true;
			}
		}
		if (failed) this.scheduleRetry();
	}

	private scheduleRetry(): void {
		if (this.retryTimer) return;
		this.retryTimer = setTimeout(() => {
			this.retryTimer = undefined;
			this.schedule();
		}, this.retryDelayMs);
		this.retryTimer.unref();
	}

	private cancelRetry(): void {
		if (this.retryTimer) {
			clearTimeout(this.retryTimer);
			this.retryTimer = undefined;
		}
	}
}
