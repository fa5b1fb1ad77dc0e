/**
 * Shows a character sheet, the sender's own or a named one.
 *
 * @module commands/status
 */

import { NotFoundError } from "../core/errors.js";
import { fmtTime } from "../core/format.js";
import { isOnline, itemSum, penaltyTotal } from "../core/player.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { actorOf } from "./_helpers.js";

export default {
	name: "STATUS",
	usage: "[name]",
	summary: "Show a character's status.",
	access: COMMAND_ACCESS.PLAYER,
	execute(context, args) {
		const name = args[0];
		const player = name ? context.services.store.findByName(name) : actorOf(context);
		if (!player) throw new NotFoundError(name ?? "", `No such username ${name}.`);
		const status = isOnline(player) ? `Online as ${player.session.nick}@${player.session.network}` : "Offline";
		context.reply(
			`${player.name}: Level ${player.level} ${player.className}; Status: ${status}; ` +
				`TTL: ${fmtTime(player.ttl)}; Idled: ${fmtTime(player.idled)}; Alignment: ${player.alignment}; ` +
				`Item sum: ${itemSum(player)}; Penalties: ${fmtTime(penaltyTotal(player))}; Position: [${player.x},${player.y}].`
		);
	},
} satisfies CommandObject;
