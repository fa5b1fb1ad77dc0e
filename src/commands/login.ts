/**
 * Logs the sender in to an existing character.
 *
 * @module commands/login
 */

import { toAll } from "../core/broadcast.js";
import { ConstraintViolationError } from "../core/errors.js";
import { fmtTime } from "../core/format.js";
import { clonePlayer, utag } from "../core/player.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { requireArgs } from "./_helpers.js";

export default {
	name: "LOGIN",
	usage: "<name> <password>",
	summary: "Log in to your character.",
	access: COMMAND_ACCESS.PUBLIC,
	async execute(context, args) {
		if (context.player) throw new ConstraintViolationError(`You are already logged in as ${context.player.name}.`);
		requireArgs(args, 2, "LOGIN <name> <password>");
		const [name, password] = args;
		const player = await context.services.store.transaction((table) => {
			const found = table.authenticate(name, password);
			table.setOnline(found, {
				nick: context.sender.nick,
				network: context.network,
				channel: context.channel,
				address: context.sender.address,
			});
			return clonePlayer(found);
		});
		context.reply(`Logon successful. Next level in ${fmtTime(player.ttl)}.`);
		context.broadcast(
			toAll(
				`${utag(player)}, the level ${player.level} ${player.className}, is now online from nickname ${context.sender.nick}. Next level in ${fmtTime(player.ttl)}.`
			)
		);
	},
} satisfies CommandObject;
