/**
 * @module commands/chpass
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report, requireArgs } from "./_helpers.js";

export default {
	name: "CHPASS",
	usage: "<name> <password>",
	summary: "Change a player's password.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		requireArgs(args, 2, "CHPASS <name> <password>");
		report(context, await context.services.admin.changePassword(actorOf(context).id, args[0], args[1]));
	},
} satisfies CommandObject;
