/**
 * Sets the outbound mute level: 0 everything, 1 no channel messages, 2 no
 * private messages or notices, 3 nothing.
 *
 * @module commands/silent
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, parseInteger, report } from "./_helpers.js";

export default {
	name: "SILENT",
	usage: "<0|1|2|3>",
	summary: "Set the mute level.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		const level = parseInteger(args[0], "SILENT <0|1|2|3>");
		report(context, await context.services.admin.setMuteLevel(actorOf(context).id, level));
	},
} satisfies CommandObject;
