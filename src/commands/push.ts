/**
 * Moves a player's countdown. Positive seconds bring the next level
 * closer, negative push it away.
 *
 * @example
 * ```
 * PUSH Arthur 3600
 * PUSH Arthur -100
 * ```
 *
 * @module commands/push
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, parseInteger, report, requireArgs } from "./_helpers.js";

const USAGE = "PUSH <name> <seconds>";

export default {
	name: "PUSH",
	usage: "<name> <seconds>",
	summary: "Adjust a player's countdown.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context, args) {
		requireArgs(args, 2, USAGE);
		const seconds = parseInteger(args[1], USAGE);
		report(context, await context.services.admin.push(actorOf(context).id, args[0], seconds));
	},
} satisfies CommandObject;
