/**
 * @module commands/del
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report, requireArgs } from "./_helpers.js";

export default {
	name: "DEL",
	usage: "<name>",
	summary: "Delete a player and their items.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		requireArgs(args, 1, "DEL <name>");
		report(context, await context.services.admin.deleteAccount(actorOf(context).id, args[0]));
	},
} satisfies CommandObject;
