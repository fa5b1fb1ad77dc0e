/**
 * Registry: command - centralized command registry
 *
 * Commands are private-message verbs (`REGISTER`, `PUSH`, ...). The loader
 * in {@link module:package/commands} registers every module under
 * `src/commands`; the session coordinator looks them up by their first word.
 *
 * @module registry/command
 */

import type { Broadcast } from "../core/broadcast.js";
import type { Player } from "../core/player.js";
import type { WorldState } from "../core/world.js";
import type { AdminCommandHandler } from "../admin.js";
import type { PlayerStore } from "../player-store.js";
import type { BroadcastRouter } from "../router.js";
import type { EventEngine } from "../world-events.js";

/** Who may run a command. */
export enum COMMAND_ACCESS {
	/** Anyone, logged in or not. */
	PUBLIC = "public",
	/** Logged-in players. */
	PLAYER = "player",
	/** Logged-in players with the admin flag. */
	ADMIN = "admin",
}

/** A nick and its `user@host` on one network. */
export interface Identity {
	nick: string;
	address: string;
}

/** Shared game services a command may use. */
export interface GameServices {
	store: PlayerStore;
	world: WorldState;
	events: EventEngine;
	admin: AdminCommandHandler;
	router: BroadcastRouter;
	limitPen: number;
	/** Epoch ms. */
	now: () => number;
}

export interface CommandContext {
	network: string;
	channel: string;
	sender: Identity;
	/** Private copy of the sender's character when logged in. */
	player?: Player;
	services: GameServices;
	/** Private message to the sender. */
	reply(text: string): void;
	/** Notice to the sender. */
	notice(text: string): void;
	broadcast(...broadcasts: Broadcast[]): void;
}

export interface CommandObject {
	/** Upper-case verb. */
	name: string;
	aliases?: string[];
	/** Argument synopsis shown by HELP, e.g. `<name> <password>`. */
	usage?: string;
	summary: string;
	access: COMMAND_ACCESS;
	execute(context: CommandContext, args: string[]): void | Promise<void>;
}

/** Registered commands by upper-case verb and alias. */
const commands = new Map<string, CommandObject>();

/**
 * Register a command under its name and aliases. A later registration of
 * the same verb replaces the earlier one.
 */
export function registerCommand(command: CommandObject): void {
	for (const verb of [command.name, ...(command.aliases ?? [])]) {
		commands.set(verb.toUpperCase(), command);
	}
}

export function findCommand(verb: string): CommandObject | undefined {
	return commands.get(verb.toUpperCase());
}

/** Distinct registered commands sorted by name. */
export function getCommands(): CommandObject[] {
	return [...new Set(commands.values())].sort((a, b) => a.name.localeCompare(b.name));
}

export function usageOf(command: CommandObject): string {
	return command.usage ? `${command.name} ${command.usage}` : command.name;
}

/** Commands visible to a sender with the given character (if any). */
export function commandsFor(player?: Player): CommandObject[] {
	return getCommands().filter((command) => {
		if (command.access === COMMAND_ACCESS.ADMIN) return player?.isAdmin === true;
		if (command.access === COMMAND_ACCESS.PLAYER) return player !== undefined;
		return true;
	});
}
