/**
 * @module commands/newpass
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, requireArgs } from "./_helpers.js";

export default {
	name: "NEWPASS",
	usage: "<password>",
	summary: "Change your password.",
	access: COMMAND_ACCESS.PLAYER,
	async execute(context, args) {
		requireArgs(args, 1, "NEWPASS <password>");
		const actor = actorOf(context);
		await context.services.store.applyDelta(actor.id, (player, table) => table.setPassword(player, args[0]));
		context.reply("Your password was changed.");
	},
} satisfies CommandObject;
