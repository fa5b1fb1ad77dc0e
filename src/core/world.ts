/**
 * World-level singletons shared by the clock, the event engine and the
 * admin commands: pause flag, mute level and the quest.
 *
 * Only code holding the player store's writer lock mutates a WorldState.
 *
 * @module core/world
 */

import type { QuestKind } from "./content.js";

/**
 * Outbound suppression per connection.
 * - NONE: everything is delivered
 * - CHANNEL: channel broadcasts dropped
 * - PRIVATE: private messages and notices dropped
 * - ALL: nothing is delivered
 */
export enum MUTE_LEVEL {
	NONE = 0,
	CHANNEL = 1,
	PRIVATE = 2,
	ALL = 3,
}

export function isMuteLevel(value: number): value is MUTE_LEVEL {
	return Number.isInteger(value) && value >= MUTE_LEVEL.NONE && value <= MUTE_LEVEL.ALL;
}

export const MUTE_LABELS: Readonly<Record<MUTE_LEVEL, string>> = {
	[MUTE_LEVEL.NONE]: "all messages enabled",
	[MUTE_LEVEL.CHANNEL]: "channel messages disabled",
	[MUTE_LEVEL.PRIVATE]: "private messages disabled",
	[MUTE_LEVEL.ALL]: "all messages disabled",
};

export interface Point {
	x: number;
	y: number;
}

export interface IdleQuest {
	status: "idle";
	/** Epoch ms after which a new quest may start. */
	nextAt: number;
}

interface ActiveQuestBase {
	status: "active";
	kind: QuestKind;
	text: string;
	/** Player ids. */
	questers: number[];
	startedAt: number;
}

export interface TimeQuest extends ActiveQuestBase {
	kind: "time";
	endsAt: number;
}

export interface GridQuest extends ActiveQuestBase {
	kind: "grid";
	waypoints: [Point, Point];
	/** Index into `waypoints` of the current target. */
	stage: 0 | 1;
}

export type ActiveQuest = TimeQuest | GridQuest;
export type QuestState = IdleQuest | ActiveQuest;

export interface WorldState {
	paused: boolean;
	muteLevel: MUTE_LEVEL;
	quest: QuestState;
	/** Unpaused seconds simulated so far; drives periodic announcements. */
	elapsed: number;
}

export function createWorldState(firstQuestAt: number): WorldState {
	return {
		paused: false,
		muteLevel: MUTE_LEVEL.NONE,
		quest: { status: "idle", nextAt: firstQuestAt },
		elapsed: 0,
	};
}

export function currentWaypoint(quest: GridQuest): Point {
	return quest.waypoints[quest.stage];
}

export function isQuester(world: WorldState, playerId: number): boolean {
	return world.quest.status === "active" && world.quest.questers.includes(playerId);
}
