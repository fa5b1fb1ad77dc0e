/**
 * Toggles pause mode. While paused the world clock skips its ticks and
 * never makes them up.
 *
 * @module commands/pause
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report } from "./_helpers.js";

export default {
	name: "PAUSE",
	summary: "Toggle pause mode.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context) {
		report(context, await context.services.admin.togglePause(actorOf(context).id));
	},
} satisfies CommandObject;
