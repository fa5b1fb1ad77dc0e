/**
 * Lists the commands the sender may use, or explains one.
 *
 * @example
 * ```
 * HELP
 * HELP push
 * ```
 *
 * @module commands/help
 */

import { NotFoundError } from "../core/errors.js";
import { COMMAND_ACCESS, commandsFor, findCommand, usageOf, type CommandObject } from "../registry/command.js";

export default {
	name: "HELP",
	usage: "[command]",
	summary: "List commands, or explain one.",
	access: COMMAND_ACCESS.PUBLIC,
	execute(context, args) {
		const visible = commandsFor(context.player);
		const verb = args[0];
		if (verb) {
			const command = findCommand(verb);
			if (!command || !visible.includes(command)) throw new NotFoundError(verb, `No help for '${verb}'.`);
			context.reply(`${usageOf(command)}: ${command.summary}`);
			return;
		}
		context.reply(`Commands: ${visible.map((command) => command.name).join(", ")}.`);
	},
} satisfies CommandObject;
