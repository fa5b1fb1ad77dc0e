/**
 * @module commands/deladmin
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report, requireArgs } from "./_helpers.js";

export default {
	name: "DELADMIN",
	usage: "<name>",
	summary: "Revoke admin rights.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		requireArgs(args, 1, "DELADMIN <name>");
		report(context, await context.services.admin.setAdmin(actorOf(context).id, args[0], false));
	},
} satisfies CommandObject;
