/**
 * Point-in-time view of the world for the dashboard.
 *
 * Built from the store's private copies, so a snapshot never changes after
 * it is taken and never carries password hashes.
 *
 * @module snapshot
 */

import type { GameEvent } from "./core/event.js";
import { MUTE_LABELS, type MUTE_LEVEL, type Point, type WorldState } from "./core/world.js";
import { isOnline, itemSum, type Alignment, type Player } from "./core/player.js";
import type { PlayerStore } from "./player-store.js";
import { byRank } from "./world-events.js";

export interface LeaderboardEntry {
	rank: number;
	name: string;
	network: string;
	className: string;
	alignment: Alignment;
	level: number;
	ttl: number;
	itemSum: number;
	online: boolean;
	isAdmin: boolean;
}

export interface MapEntry {
	name: string;
	network: string;
	nick: string;
	x: number;
	y: number;
}

export type QuestSnapshot =
	| { status: "idle"; nextAt: number }
	| { status: "active"; kind: "time"; text: string; questers: string[]; endsAt: number }
	| { status: "active"; kind: "grid"; text: string; questers: string[]; waypoints: Point[]; target: Point };

export interface Snapshot {
	takenAt: number;
	paused: boolean;
	muteLevel: MUTE_LEVEL;
	muteLabel: string;
	leaderboard: LeaderboardEntry[];
	online: MapEntry[];
	quest: QuestSnapshot;
	events: GameEvent[];
}

function questSnapshot(world: WorldState, names: Map<number, string>): QuestSnapshot {
	const quest = world.quest;
	if (quest.status === "idle") return { status: "idle", nextAt: quest.nextAt };
	const questers = quest.questers.map((id) => names.get(id) ?? `#${id}`);
	if (quest.kind === "time") {
		return { status: "active", kind: "time", text: quest.text, questers, endsAt: quest.endsAt };
	}
	return {
		status: "active",
		kind: "grid",
		text: quest.text,
		questers,
		waypoints: quest.waypoints.map((point) => ({ ...point })),
		target: { ...quest.waypoints[quest.stage] },
	};
}

function leaderboardEntry(player: Player, index: number): LeaderboardEntry {
	return {
		rank: index + 1,
		name: player.name,
		network: player.network,
		className: player.className,
		alignment: player.alignment,
		level: player.level,
		ttl: player.ttl,
		itemSum: itemSum(player),
		online: isOnline(player),
		isAdmin: player.isAdmin,
	};
}

export function buildSnapshot(store: PlayerStore, world: WorldState, now: number, eventLimit = 50): Snapshot {
	const players = store.all();
	const names = new Map(players.map((player) => [player.id, player.name]));
	return {
		takenAt: now,
		paused: world.paused,
		muteLevel: world.muteLevel,
		muteLabel: MUTE_LABELS[world.muteLevel],
		leaderboard: [...players].sort(byRank).map(leaderboardEntry),
		online: players.filter(isOnline).map((player) => ({
			name: player.name,
			network: player.session.network,
			nick: player.session.nick,
			x: player.x,
			y: player.y,
		})),
		quest: questSnapshot(world, names),
		events: store.recentEvents(eventLimit),
	};
}
