/**
 * @module commands/whoami
 */

import { fmtTime } from "../core/format.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf } from "./_helpers.js";

export default {
	name: "WHOAMI",
	summary: "Show who you are logged in as.",
	access: COMMAND_ACCESS.PLAYER,
	execute(context) {
		const player = actorOf(context);
		context.reply(
			`You are ${player.name}, the level ${player.level} ${player.className}. Next level in ${fmtTime(player.ttl)}.`
		);
	},
} satisfies CommandObject;
