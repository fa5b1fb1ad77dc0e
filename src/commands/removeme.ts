/**
 * Deletes the sender's own character and everything it owns.
 *
 * @module commands/removeme
 */

import { toAll } from "../core/broadcast.js";
import { utag } from "../core/player.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf } from "./_helpers.js";

export default {
	name: "REMOVEME",
	summary: "Delete your character.",
	access: COMMAND_ACCESS.PLAYER,
	async execute(context) {
		const actor = actorOf(context);
		await context.services.store.delete(actor.id);
		context.reply(`Account ${actor.name} removed.`);
		context.broadcast(toAll(`${utag(actor)} has been removed from the realm.`));
	},
} satisfies CommandObject;
