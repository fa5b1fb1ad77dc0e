/**
 * @module commands/quest
 */

import { COMMAND_ACCESS, type CommandObject } from "../registry/command.js";
import { describeQuest } from "../world-events.js";

export default {
	name: "QUEST",
	summary: "Describe the current quest.",
	access: COMMAND_ACCESS.PLAYER,
	execute(context) {
		const { world, store } = context.services;
		const names =
			world.quest.status === "active"
				? world.quest.questers.map((id) => store.get(id)?.name ?? `#${id}`)
				: [];
		context.reply(describeQuest(world.quest, names, context.services.now()));
	},
} satisfies CommandObject;
