/**
 * Append-only world event log entries.
 *
 * @module core/event
 */

export enum EVENT_KIND {
	REGISTER = "register",
	LEVELUP = "levelup",
	ITEM = "item",
	HOG = "hog",
	BATTLE = "battle",
	CRITICAL = "critical",
	STEAL = "steal",
	TEAM_BATTLE = "team_battle",
	CALAMITY = "calamity",
	GODSEND = "godsend",
	QUEST = "quest",
	PENALTY = "penalty",
	ADMIN = "admin",
}

export function isEventKind(value: unknown): value is EVENT_KIND {
	return Object.values(EVENT_KIND).some((kind) => kind === value);
}

export interface GameEvent {
	/** Strictly increasing. */
	id: number;
	kind: EVENT_KIND;
	message: string;
	/** Epoch ms. */
	at: number;
	playerId?: number;
	otherId?: number;
}
