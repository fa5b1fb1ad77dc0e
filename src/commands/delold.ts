/**
 * Deletes offline players who have not logged in for the given number of
 * days.
 *
 * @module commands/delold
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, parseInteger, report } from "./_helpers.js";

export default {
	name: "DELOLD",
	usage: "<days>",
	summary: "Delete players inactive for more than N days.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		const days = parseInteger(args[0], "DELOLD <days>");
		report(context, await context.services.admin.deleteInactive(actorOf(context).id, days));
	},
} satisfies CommandObject;
