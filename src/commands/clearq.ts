/**
 * Drops everything waiting in this network's send queue.
 *
 * @module commands/clearq
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report } from "./_helpers.js";

export default {
	name: "CLEARQ",
	summary: "Clear this network's send queue.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context) {
		report(context, await context.services.admin.clearQueue(actorOf(context).id, context.network));
	},
} satisfies CommandObject;
