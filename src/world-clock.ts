/**
 * The world clock: the only thing that advances gameplay time.
 *
 * Every `intervalSeconds` it runs progression and then world events over
 * the online players in one player store transaction, routes what they
 * produced, and kicks delivery on every connection. A paused world skips
 * its ticks and does not make them up later.
 *
 * @example
 * ```ts
 * const clock = new WorldClock({ store, world, progression, events, router });
 * clock.on("tick", (report) => logger.debug(`${report.advanced} advanced`));
 * clock.start();
 * ```
 *
 * @module world-clock
 */

import { EventEmitter } from "events";
import logger from "./logger.js";
import type { GameEvent } from "./core/event.js";
import type { WorldState } from "./core/world.js";
import type { PlayerStore } from "./player-store.js";
import type { ProgressionEngine } from "./progression.js";
import type { BroadcastRouter } from "./router.js";
import type { EventEngine } from "./world-events.js";

export interface TickReport {
	/** Online players whose countdown moved. */
	advanced: number;
	levelled: number;
	broadcasts: number;
	events: GameEvent[];
}

export interface WorldClockOptions {
	store: PlayerStore;
	world: WorldState;
	progression: ProgressionEngine;
	events: EventEngine;
	router: BroadcastRouter;
}

/** Emits `tick` with a {@link TickReport} after every pass that ran. */
export class WorldClock extends EventEmitter {
	private readonly options: WorldClockOptions;
	private timer?: NodeJS.Timeout;
	/** Monotonic ms at which the next tick is due. */
	private nextDue = 0;
	private running = false;

	constructor(options: WorldClockOptions) {
		super();
		this.options = options;
	}

	get intervalSeconds(): number {
		return this.options.progression.intervalSeconds;
	}

	get started(): boolean {
		return this.timer !== undefined;
	}

	/**
	 * Ticks every `intervalSeconds` against a fixed schedule: each timeout
	 * is aimed at the next due time, so late timers do not add up.
	 */
	start(): void {
		if (this.timer !== undefined) return;
		this.nextDue = performance.now();
		this.schedule();
		logger.info(`World clock started (${this.intervalSeconds}s ticks)`);
	}

	stop(): void {
		if (this.timer === undefined) return;
		clearTimeout(this.timer);
		this.timer = undefined;
		logger.debug("World clock timer cleared");
	}

	private schedule(): void {
		const interval = this.intervalSeconds * 1000;
		this.nextDue += interval;
		const now = performance.now();
		// after a long stall, skip the missed ticks instead of bursting
		if (this.nextDue < now) this.nextDue = now + interval - ((now - this.nextDue) % interval);
		this.timer = setTimeout(() => {
			this.schedule();
			this.tick().catch((error: unknown) => {
				logger.error("World tick failed", { error: error instanceof Error ? error.stack : String(error) });
			});
		}, this.nextDue - now);
	}

	/**
	 * One pass. Resolves `undefined` when paused or when the previous pass
	 * is still running; that tick is lost.
	 */
	async tick(): Promise<TickReport | undefined> {
		const { store, world, progression, events, router } = this.options;
		if (world.paused) return undefined;
		if (this.running) {
			logger.warn("World tick skipped: previous tick still running");
			return undefined;
		}
		this.running = true;
		try {
			const result = await store.transaction((table) => {
				// the pause flag may have been set while waiting for the writer
				if (world.paused) return undefined;
				const progress = progression.advance(table, world);
				const broadcasts = [...progress.broadcasts, ...events.run(table, world, progress)];
				return { progress, broadcasts, logged: [...table.logged] };
			});
			if (!result) return undefined;
			router.route(result.broadcasts);
			router.flushAll();
			const report: TickReport = {
				advanced: result.progress.online.length,
				levelled: result.progress.levelled.length,
				broadcasts: result.broadcasts.length,
				events: result.logged,
			};
			this.emit("tick", report);
			return report;
		} finally {
			this.running = false;
		}
	}
}
