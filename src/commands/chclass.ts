/**
 * @module commands/chclass
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report, requireArgs } from "./_helpers.js";

export default {
	name: "CHCLASS",
	usage: "<name> <class>",
	summary: "Change a player's class.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		requireArgs(args, 2, "CHCLASS <name> <class>");
		const [name, ...classWords] = args;
		report(context, await context.services.admin.changeClass(actorOf(context).id, name, classWords.join(" ")));
	},
} satisfies CommandObject;
