/**
 * Ends the sender's session at the cost of a logout penalty.
 *
 * @module commands/logout
 */

import { fmtTime } from "../core/format.js";
import { PENALTY_KIND } from "../core/penalty.js";
import { isOnline } from "../core/player.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { applyPenalty, NOT_LOGGED_IN } from "../session.js";
import { actorOf } from "./_helpers.js";

export default {
	name: "LOGOUT",
	summary: "Log out (penalty applies).",
	access: COMMAND_ACCESS.PLAYER,
	async execute(context) {
		const actor = actorOf(context);
		const { services } = context;
		const outcome = await services.store.applyDelta(actor.id, (player, table) => {
			if (!isOnline(player)) return undefined;
			const penalty = applyPenalty(table, services, player, PENALTY_KIND.LOGOUT);
			table.setOffline(player);
			return penalty;
		});
		if (!outcome) {
			context.notice(NOT_LOGGED_IN);
			return;
		}
		context.notice(`Penalty of ${fmtTime(outcome.seconds)} added to your timer for LOGOUT.`);
		context.reply("You are no longer logged in.");
		context.broadcast(...outcome.broadcasts);
	},
} satisfies CommandObject;
