/**
 * Renames a character. The new name must be free on every network.
 *
 * @module commands/chuser
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report, requireArgs } from "./_helpers.js";

export default {
	name: "CHUSER",
	usage: "<name> <new name>",
	summary: "Rename a player.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		requireArgs(args, 2, "CHUSER <name> <new name>");
		report(context, await context.services.admin.changeName(actorOf(context).id, args[0], args[1]));
	},
} satisfies CommandObject;
