/**
 * Per-tick advancement of online players: countdown, level-ups, item
 * drops and movement.
 *
 * The online set is fixed when the tick starts. Countdowns are resolved
 * for everyone before anyone moves, and each movement step computes every
 * new position from the previous step's positions before applying any of
 * them, so results never depend on iteration order.
 *
 * @module progression
 */

import logger from "./logger.js";
import { CONTENT, type GameContent, type UniqueItem } from "./core/content.js";
import { toAll, toNotice, type Broadcast } from "./core/broadcast.js";
import { EVENT_KIND } from "./core/event.js";
import { fmtTime } from "./core/format.js";
import {
	baseTtl,
	ITEM_SLOTS,
	itemLevel,
	utag,
	type ItemSlot,
	type OnlinePlayer,
} from "./core/player.js";
import type { Random } from "./core/random.js";
import { currentWaypoint, type Point, type WorldState } from "./core/world.js";
import type { PlayerTable } from "./player-store.js";

export const UNIQUE_MIN_LEVEL = 25;
export const UNIQUE_CHANCE = 1 / 40;

export interface ProgressionOptions {
	/** Seconds simulated per tick; also the number of movement steps. */
	intervalSeconds: number;
	mapWidth: number;
	mapHeight: number;
	content?: GameContent;
}

export interface ItemRoll {
	slot: ItemSlot;
	level: number;
	unique?: UniqueItem;
}

export interface ProgressReport {
	/** Online players at tick start, id order. */
	online: OnlinePlayer[];
	levelled: OnlinePlayer[];
	/** Pairs that ended a movement step on the same cell. */
	collisions: Array<[OnlinePlayer, OnlinePlayer]>;
	broadcasts: Broadcast[];
}

/**
 * Unique items are tried first from level 25; otherwise the level is the
 * highest `n` in 1..1.5×level that passes a `1/1.4^(n/4)` roll.
 */
export function rollItem(level: number, random: Random, content: GameContent = CONTENT): ItemRoll {
	if (level >= UNIQUE_MIN_LEVEL) {
		for (const unique of content.uniqueItems) {
			if (level >= unique.requiredLevel && random.chance(UNIQUE_CHANCE)) {
				return {
					slot: unique.slot,
					level: random.int(unique.minLevel, unique.maxLevel - 1),
					unique,
				};
			}
		}
	}
	const ceiling = Math.floor(level * 1.5);
	let found = 1;
	for (let n = 1; n <= ceiling; n++) {
		if (random.chance(1 / Math.pow(1.4, n / 4))) found = n;
	}
	return { slot: ITEM_SLOTS[random.int(0, ITEM_SLOTS.length - 1)], level: found };
}

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

export class ProgressionEngine {
	constructor(private readonly options: ProgressionOptions) {}

	get intervalSeconds(): number {
		return this.options.intervalSeconds;
	}

	advance(table: PlayerTable, world: WorldState): ProgressReport {
		const online = table.online();
		const report: ProgressReport = { online, levelled: [], collisions: [], broadcasts: [] };
		for (const player of online) {
			player.idled += this.options.intervalSeconds;
			player.ttl -= this.options.intervalSeconds;
			if (player.ttl <= 0) {
				report.broadcasts.push(...this.levelUp(table, player));
				report.levelled.push(player);
			}
		}
		report.collisions = this.move(table.random, online, world);
		return report;
	}

	levelUp(table: PlayerTable, player: OnlinePlayer): Broadcast[] {
		player.level++;
		player.ttl = baseTtl(player.level);
		player.nextTtl = player.ttl;
		logger.info(`Level up: ${player.name} -> ${player.level}`);
		table.logEvent(EVENT_KIND.LEVELUP, `${player.name} reached level ${player.level}`, player.id);
		return [
			toAll(
				`${utag(player)}, the ${player.className}, has attained level ${player.level}! Next level in ${fmtTime(player.ttl)}.`
			),
			this.findItem(table, player),
		];
	}

	findItem(table: PlayerTable, player: OnlinePlayer): Broadcast {
		const roll = rollItem(player.level, table.random, this.options.content);
		const current = itemLevel(player, roll.slot);
		const { network, nick } = player.session;
		if (roll.level <= current) {
			return toNotice(
				network,
				nick,
				`You found a level ${roll.level} ${roll.slot}. Your current ${roll.slot} is level ${current}, so it seems Luck is against you. You toss the ${roll.slot}.`
			);
		}
		table.setItem(player, roll.slot, roll.level, roll.unique?.name);
		if (roll.unique) {
			table.logEvent(EVENT_KIND.ITEM, `${player.name} found the level ${roll.level} ${roll.unique.name}`, player.id);
			return toNotice(
				network,
				nick,
				`The light of the gods shines down! You found the level ${roll.level} ${roll.unique.name}! ${roll.unique.flavor}`
			);
		}
		return toNotice(
			network,
			nick,
			`You found a level ${roll.level} ${roll.slot}! Your current ${roll.slot} is only level ${current}, so it seems Luck is with you!`
		);
	}

	/**
	 * Takes `intervalSeconds` steps. Grid questers head for their waypoint,
	 * everyone else wanders one cell in any direction, clamped to the map.
	 */
	move(random: Random, online: readonly OnlinePlayer[], world: WorldState): Array<[OnlinePlayer, OnlinePlayer]> {
		const quest = world.quest.status === "active" && world.quest.kind === "grid" ? world.quest : undefined;
		const target: Point | undefined = quest ? currentWaypoint(quest) : undefined;
		const collisions: Array<[OnlinePlayer, OnlinePlayer]> = [];
		const maxX = this.options.mapWidth - 1;
		const maxY = this.options.mapHeight - 1;

		for (let step = 0; step < this.options.intervalSeconds; step++) {
			const next = online.map((player) => {
				let dx: number;
				let dy: number;
				if (target && quest && quest.questers.includes(player.id)) {
					dx = Math.sign(target.x - player.x);
					dy = Math.sign(target.y - player.y);
				} else {
					dx = random.int(-1, 1);
					dy = random.int(-1, 1);
				}
				return { x: clamp(player.x + dx, 0, maxX), y: clamp(player.y + dy, 0, maxY) };
			});

			const cells = new Map<string, OnlinePlayer>();
			const contested = new Set<string>();
			online.forEach((player, index) => {
				player.x = next[index].x;
				player.y = next[index].y;
				const key = `${player.x},${player.y}`;
				const first = cells.get(key);
				if (first === undefined) cells.set(key, player);
				else if (!contested.has(key)) {
					// one duel per cell per step
					contested.add(key);
					collisions.push([player, first]);
				}
			});
		}
		return collisions;
	}
}
