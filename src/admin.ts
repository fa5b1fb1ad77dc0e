/**
 * Privileged operations behind the admin chat commands.
 *
 * Each operation re-reads the acting character inside the store's writer
 * and refuses with {@link UnauthorizedError} unless it carries the admin
 * flag at that moment.
 *
 * @module admin
 */

import logger from "./logger.js";
import { toAll, type Broadcast } from "./core/broadcast.js";
import { NotFoundError, UnauthorizedError, ValidationError } from "./core/errors.js";
import { EVENT_KIND } from "./core/event.js";
import { fmtTime } from "./core/format.js";
import { isOnline, utag, type Player } from "./core/player.js";
import { isMuteLevel, MUTE_LABELS, type WorldState } from "./core/world.js";
import { validateClassName, type PlayerStore, type PlayerTable } from "./player-store.js";
import type { BroadcastRouter } from "./router.js";
import type { EventEngine } from "./world-events.js";

const DAY_MS = 86400 * 1000;

export interface AdminResult {
	reply: string;
	broadcasts: Broadcast[];
}

export interface AdminCommandHandlerOptions {
	store: PlayerStore;
	world: WorldState;
	events: EventEngine;
	router: BroadcastRouter;
}

function requireAdmin(table: PlayerTable, actorId: number): Player {
	const actor = table.get(actorId);
	if (!actor?.isAdmin) throw new UnauthorizedError("You do not have access to admin commands.");
	return actor;
}

export class AdminCommandHandler {
	private readonly store: PlayerStore;
	private readonly world: WorldState;
	private readonly events: EventEngine;
	private readonly router: BroadcastRouter;

	constructor(options: AdminCommandHandlerOptions) {
		this.store = options.store;
		this.world = options.world;
		this.events = options.events;
		this.router = options.router;
	}

	/**
	 * Runs `operation` as one transaction after the admin check and logs it
	 * as an admin event.
	 */
	private run(
		actorId: number,
		label: string,
		operation: (table: PlayerTable, actor: Player) => AdminResult
	): Promise<AdminResult> {
		return this.store.transaction((table) => {
			const actor = requireAdmin(table, actorId);
			const result = operation(table, actor);
			table.logEvent(EVENT_KIND.ADMIN, `${actor.name}: ${label}`, actor.id);
			logger.info(`Admin ${actor.name} ran ${label}`);
			return result;
		});
	}

	handOfGod(actorId: number): Promise<AdminResult> {
		return this.run(actorId, "HOG", (table) => {
			const broadcasts = this.events.handOfGod(table);
			return { reply: broadcasts.length > 0 ? "The Hand of God has been summoned." : "Nobody is online.", broadcasts };
		});
	}

	/** Ticks that fall while paused are dropped, not replayed. */
	togglePause(actorId: number): Promise<AdminResult> {
		return this.run(actorId, "PAUSE", () => {
			this.world.paused = !this.world.paused;
			return { reply: `Pause mode ${this.world.paused ? "enabled" : "disabled"}.`, broadcasts: [] };
		});
	}

	setMuteLevel(actorId: number, level: number): Promise<AdminResult> {
		return this.run(actorId, `SILENT ${level}`, () => {
			if (!isMuteLevel(level)) throw new ValidationError("Usage: SILENT <0|1|2|3>");
			this.world.muteLevel = level;
			return { reply: `Silent mode ${level}: ${MUTE_LABELS[level]}.`, broadcasts: [] };
		});
	}

	/** Empties the dispatch queue of one network's connection. */
	clearQueue(actorId: number, network: string): Promise<AdminResult> {
		return this.run(actorId, `CLEARQ ${network}`, () => {
			const queue = this.router.queue(network);
			if (!queue) throw new NotFoundError(network, `No such network ${network}.`);
			const dropped = queue.clear();
			return { reply: `Send queue cleared (${dropped} messages dropped).`, broadcasts: [] };
		});
	}

	/**
	 * Moves a countdown by `seconds`: positive toward the next level, never
	 * past zero; negative away from it.
	 */
	push(actorId: number, targetName: string, seconds: number): Promise<AdminResult> {
		return this.run(actorId, `PUSH ${targetName} ${seconds}`, (table) => {
			if (!Number.isInteger(seconds)) throw new ValidationError("Usage: PUSH <name> <seconds>");
			const target = table.requireByName(targetName);
			const applied = Math.min(seconds, target.ttl);
			target.ttl = Math.max(0, target.ttl - applied);
			const direction = applied >= 0 ? "towards" : "away from";
			const message = `${utag(target)} has been pushed ${fmtTime(Math.abs(applied))} ${direction} level ${target.level + 1}. ${target.name} reaches next level in ${fmtTime(target.ttl)}.`;
			return { reply: `${target.name} now reaches level ${target.level + 1} in ${fmtTime(target.ttl)}.`, broadcasts: [toAll(message)] };
		});
	}

	changePassword(actorId: number, targetName: string, password: string): Promise<AdminResult> {
		return this.run(actorId, `CHPASS ${targetName}`, (table) => {
			const target = table.requireByName(targetName);
			table.setPassword(target, password);
			return { reply: `Password for ${target.name} changed.`, broadcasts: [] };
		});
	}

	changeClass(actorId: number, targetName: string, className: string): Promise<AdminResult> {
		return this.run(actorId, `CHCLASS ${targetName}`, (table) => {
			validateClassName(className);
			const target = table.requireByName(targetName);
			target.className = className;
			return { reply: `Class for ${target.name} changed to ${className}.`, broadcasts: [] };
		});
	}

	/** Renames a character; the new name must be free world-wide. */
	changeName(actorId: number, targetName: string, newName: string): Promise<AdminResult> {
		return this.run(actorId, `CHUSER ${targetName} ${newName}`, (table) => {
			const target = table.requireByName(targetName);
			const oldName = target.name;
			table.rename(target, newName);
			return { reply: `${oldName} is now known as ${newName}.`, broadcasts: [] };
		});
	}

	/** Removes the character and its items. */
	deleteAccount(actorId: number, targetName: string): Promise<AdminResult> {
		return this.run(actorId, `DEL ${targetName}`, (table) => {
			const target = table.requireByName(targetName);
			table.remove(target);
			return { reply: `Account ${target.name} removed.`, broadcasts: [] };
		});
	}

	/** Removes every offline character whose last login is older than `days`. */
	deleteInactive(actorId: number, days: number): Promise<AdminResult> {
		return this.run(actorId, `DELOLD ${days}`, (table) => {
			if (!Number.isFinite(days) || days <= 0) throw new ValidationError("Usage: DELOLD <days>");
			const cutoff = table.now - days * DAY_MS;
			const stale = table.all().filter((player) => !isOnline(player) && player.lastLogin < cutoff);
			for (const player of stale) table.remove(player);
			const names = stale.map((player) => player.name);
			const reply =
				names.length === 0
					? `No accounts inactive for more than ${days} days.`
					: `Deleted ${names.length} account(s) inactive for more than ${days} days: ${names.join(", ")}.`;
			return { reply, broadcasts: [] };
		});
	}

	setAdmin(actorId: number, targetName: string, isAdmin: boolean): Promise<AdminResult> {
		return this.run(actorId, `${isAdmin ? "MKADMIN" : "DELADMIN"} ${targetName}`, (table) => {
			const target = table.requireByName(targetName);
			target.isAdmin = isAdmin;
			return {
				reply: isAdmin ? `${target.name} is now an admin.` : `${target.name} is no longer an admin.`,
				broadcasts: [],
			};
		});
	}
}
