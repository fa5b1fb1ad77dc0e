/**
 * @module commands/top
 */

import { fmtTime } from "../core/format.js";
import { utag } from "../core/player.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { byRank } from "../world-events.js";

export default {
	name: "TOP",
	summary: "List the top three players.",
	access: COMMAND_ACCESS.PLAYER,
	execute(context) {
		const top = context.services.store.all().sort(byRank).slice(0, 3);
		if (top.length === 0) {
			context.reply("Nobody has registered yet.");
			return;
		}
		top.forEach((player, index) =>
			context.reply(
				`#${index + 1} ${utag(player)}, the level ${player.level} ${player.className}. Next level in ${fmtTime(player.ttl)}.`
			)
		);
	},
} satisfies CommandObject;
