/**
 * Forces a Hand of God on a random online player.
 *
 * @module commands/hog
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf, report } from "./_helpers.js";

export default {
	name: "HOG",
	summary: "Summon the Hand of God.",
	access: COMMAND_ACCESS.ADMIN,
	async execute(context) {
		report(context, await context.services.admin.handOfGod(actorOf(context).id));
	},
} satisfies CommandObject;
