/**
 * Creates a character and logs the sender in as it.
 *
 * @example
 * ```
 * REGISTER Arthur pw1 Knight of the Round Table
 * ```
 *
 * @module commands/register
 */

import { toAll } from "../core/broadcast.js";
import { ConstraintViolationError } from "../core/errors.js";
import { fmtTime } from "../core/format.js";
import { utag } from "../core/player.js";
import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { requireArgs } from "./_helpers.js";

const USAGE = "REGISTER <name> <password> <class>";

export default {
	name: "REGISTER",
	usage: "<name> <password> <class>",
	summary: "Create a character and log in.",
	access: COMMAND_ACCESS.PUBLIC,
	async execute(context, args) {
		if (context.player) throw new ConstraintViolationError(`You are already logged in as ${context.player.name}.`);
		requireArgs(args, 3, USAGE);
		const [name, password, ...classWords] = args;
		const player = await context.services.store.create({
			name,
			password,
			className: classWords.join(" "),
			network: context.network,
			session: {
				nick: context.sender.nick,
				network: context.network,
				channel: context.channel,
				address: context.sender.address,
			},
		});
		context.reply(
			`Success! Account ${player.name} created. You have ${fmtTime(player.ttl)} until level 1. NOTE: The point of the game is to see who can idle the longest; talking, parting, quitting and changing nicks all add penalties.`
		);
		context.broadcast(
			toAll(`Welcome ${context.sender.nick}'s new player ${utag(player)}, the ${player.className}! Next level in ${fmtTime(player.ttl)}.`)
		);
	},
} satisfies CommandObject;
