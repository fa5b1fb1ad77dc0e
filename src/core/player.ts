/**
 * Player and item model.
 *
 * A player is one registered character. Being online is modelled by the
 * presence of a {@link PlayerSession}, so an online player always has a
 * nick, a channel and an address. Items are held by slot, one per slot.
 *
 * @module core/player
 */

import { PENALTY_KIND } from "./penalty.js";

export const ITEM_SLOTS = [
	"ring",
	"amulet",
	"charm",
	"weapon",
	"helm",
	"tunic",
	"pair of gloves",
	"shield",
	"set of leggings",
	"pair of boots",
] as const;

export type ItemSlot = (typeof ITEM_SLOTS)[number];

export function isItemSlot(value: unknown): value is ItemSlot {
	return ITEM_SLOTS.some((slot) => slot === value);
}

export const ALIGNMENTS = ["good", "neutral", "evil"] as const;
export type Alignment = (typeof ALIGNMENTS)[number];

export function isAlignment(value: unknown): value is Alignment {
	return ALIGNMENTS.some((alignment) => alignment === value);
}

export interface Item {
	id: number;
	slot: ItemSlot;
	level: number;
	/** Only unique items carry a name. */
	name?: string;
}

export interface PlayerSession {
	nick: string;
	/** Network the player is currently connected through. */
	network: string;
	channel: string;
	/** user@host of the connection. */
	address: string;
	/** Epoch ms of login. */
	since: number;
}

export type PenaltyTotals = Record<PENALTY_KIND, number>;

export interface Player {
	id: number;
	name: string;
	/** Network the player registered on. */
	network: string;
	passwordHash: string;
	isAdmin: boolean;
	className: string;
	alignment: Alignment;
	level: number;
	/** Seconds until the next level. */
	ttl: number;
	/** Seconds the level took at its start. */
	nextTtl: number;
	/** Total seconds spent online and idle. */
	idled: number;
	x: number;
	y: number;
	penalties: PenaltyTotals;
	items: Partial<Record<ItemSlot, Item>>;
	session?: PlayerSession;
	createdAt: number;
	lastLogin: number;
}

export type OnlinePlayer = Player & { session: PlayerSession };

export function isOnline(player: Player): player is OnlinePlayer {
	return player.session !== undefined;
}

export function emptyPenalties(): PenaltyTotals {
	return {
		[PENALTY_KIND.MESSAGE]: 0,
		[PENALTY_KIND.NICK]: 0,
		[PENALTY_KIND.PART]: 0,
		[PENALTY_KIND.KICK]: 0,
		[PENALTY_KIND.QUIT]: 0,
		[PENALTY_KIND.LOGOUT]: 0,
		[PENALTY_KIND.QUEST]: 0,
	};
}

export const TTL_BASE = 600;
export const TTL_GROWTH = 1.16;
/** Past this level each level costs one extra day. */
export const TTL_LINEAR_LEVEL = 60;

/** Seconds needed to finish `level`. */
export function baseTtl(level: number): number {
	if (level > TTL_LINEAR_LEVEL) {
		return Math.floor(
			TTL_BASE * Math.pow(TTL_GROWTH, TTL_LINEAR_LEVEL) + 86400 * (level - TTL_LINEAR_LEVEL)
		);
	}
	return Math.floor(TTL_BASE * Math.pow(TTL_GROWTH, level));
}

export function itemLevel(player: Player, slot: ItemSlot): number {
	return player.items[slot]?.level ?? 0;
}

export function itemSum(player: Player): number {
	let sum = 0;
	for (const slot of ITEM_SLOTS) sum += itemLevel(player, slot);
	return sum;
}

/** Item sum adjusted for alignment: good +10%, evil -10%. */
export function battlePower(player: Player): number {
	const sum = itemSum(player);
	if (player.alignment === "good") return Math.floor(sum * 1.1);
	if (player.alignment === "evil") return Math.floor(sum * 0.9);
	return sum;
}

export function penaltyTotal(player: Player): number {
	let total = 0;
	for (const value of Object.values(player.penalties)) total += value;
	return total;
}

/** `name@network`, the tag used in every announcement. */
export function utag(player: Pick<Player, "name" | "network">): string {
	return `${player.name}@${player.network}`;
}

export function clonePlayer(player: Player): Player {
	return structuredClone(player);
}
