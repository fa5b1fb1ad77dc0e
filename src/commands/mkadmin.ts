/**
 * @module commands/mkadmin
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report, requireArgs } from "./_helpers.js";

export default {
	name: "MKADMIN",
	usage: "<name>",
	summary: "Grant admin rights.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		requireArgs(args, 1, "MKADMIN <name>");
		report(context, await context.services.admin.setAdmin(actorOf(context).id, args[0], true));
	},
} satisfies CommandObject;
