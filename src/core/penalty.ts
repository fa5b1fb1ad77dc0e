/**
 * Penalty calculator.
 *
 * Misbehaving in view of the realm pushes a player's level-up further away.
 * Every penalty grows with level so late-game players feel it as much as
 * new ones.
 *
 * @module core/penalty
 */

export enum PENALTY_KIND {
	MESSAGE = "message",
	NICK = "nick",
	PART = "part",
	KICK = "kick",
	QUIT = "quit",
	LOGOUT = "logout",
	QUEST = "quest",
}

/** Base seconds per kind. Channel messages use their length instead. */
export const PENALTY_BASE: Readonly<Record<Exclude<PENALTY_KIND, PENALTY_KIND.MESSAGE>, number>> = {
	[PENALTY_KIND.NICK]: 30,
	[PENALTY_KIND.PART]: 200,
	[PENALTY_KIND.KICK]: 250,
	[PENALTY_KIND.QUIT]: 20,
	[PENALTY_KIND.LOGOUT]: 20,
	[PENALTY_KIND.QUEST]: 15,
};

export const PENALTY_GROWTH = 1.14;

/**
 * `floor(base * 1.14^level)`, never negative, capped at `limitPen` when
 * the cap is nonzero.
 */
export function penalty(baseSeconds: number, level: number, limitPen = 0): number {
	const raw = Math.floor(Math.max(0, baseSeconds) * Math.pow(PENALTY_GROWTH, Math.max(0, level)));
	return limitPen > 0 ? Math.min(raw, limitPen) : raw;
}

export interface PenaltyOptions {
	/** Length of the offending channel message. */
	messageLength?: number;
	limitPen?: number;
}

export function penaltyFor(kind: PENALTY_KIND, level: number, options: PenaltyOptions = {}): number {
	const base = kind === PENALTY_KIND.MESSAGE ? options.messageLength ?? 0 : PENALTY_BASE[kind];
	return penalty(base, level, options.limitPen ?? 0);
}
