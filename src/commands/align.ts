/**
 * Changes alignment. Good characters hit 10% harder and pray together;
 * evil ones hit 10% softer but steal.
 *
 * @module commands/align
 */

import { toAll } from "../core/broadcast.js";
import { ValidationError } from "../core/errors.js";
import { isAlignment, utag } from "../core/player.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf } from "./_helpers.js";

export default {
	name: "ALIGN",
	usage: "<good|neutral|evil>",
	summary: "Change your alignment.",
	access: COMMAND_ACCESS.PLAYER,
	async execute(context, args) {
		const alignment = args[0]?.toLowerCase();
		if (!isAlignment(alignment)) throw new ValidationError("Usage: ALIGN <good|neutral|evil>");
		const actor = actorOf(context);
		await context.services.store.applyDelta(actor.id, (player) => {
			player.alignment = alignment;
		});
		context.reply(`Your alignment was changed to ${alignment}.`);
		context.broadcast(toAll(`${utag(actor)} has changed alignment to: ${alignment}.`));
	},
} satisfies CommandObject;
