/**
 * Argument helpers shared by command modules.
 *
 * @module commands/_helpers
 */

import type { AdminResult } from "../admin.js";
import { UnauthorizedError, ValidationError } from "../core/errors.js";
import type { Player } from "../core/player.js";
import type { CommandContext } from "../registry/command.js";
import { NOT_LOGGED_IN } from "../session.js";

/** The sender's character; the coordinator only runs player commands for logged-in senders. */
export function actorOf(context: CommandContext): Player {
	if (!context.player) throw new UnauthorizedError(NOT_LOGGED_IN);
	return context.player;
}

export function requireArgs(args: string[], count: number, usage: string): void {
	if (args.length < count) throw new ValidationError(`Usage: ${usage}`);
}

/** Whole number, optionally signed. */
export function parseInteger(value: string | undefined, usage: string): number {
	if (value === undefined || !/^[-+]?\d+$/.test(value)) throw new ValidationError(`Usage: ${usage}`);
	return Number.parseInt(value, 10);
}

/** Delivers an admin operation's reply and broadcasts. */
export function report(context: CommandContext, result: AdminResult): void {
	context.reply(result.reply);
	context.broadcast(...result.broadcasts);
}
