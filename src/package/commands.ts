/**
 * Package: commands - dynamic command loader
 *
 * Loads every command module from `src/commands` (or `dist/src/commands`
 * when compiled) at startup. Each file default-exports a
 * {@link CommandObject}; files beginning with `_` are helpers and skipped,
 * as are tests and declaration files.
 *
 * @example
 * // src/commands/whoami.ts
 * export default {
 * 	name: "WHOAMI",
 * 	summary: "Shows your character.",
 * 	access: COMMAND_ACCESS.PLAYER,
 * 	execute(ctx) { ctx.reply(`You are ${ctx.player?.name}.`); },
 * } satisfies CommandObject;
 *
 * @module package/commands
 */

import { readdir } from "fs/promises";
import { join } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import logger from "../logger.js";
import {
	COMMAND_ACCESS,
	getCommands,
	registerCommand,
	type CommandObject,
} from "../registry/command.js";

export const COMMAND_DIRECTORY = fileURLToPath(new URL("../commands/", import.meta.url));

const ACCESS_VALUES: readonly string[] = Object.values(COMMAND_ACCESS);

function isCommandObject(value: unknown): value is CommandObject {
	if (typeof value !== "object" || value === null) return false;
	return (
		"name" in value &&
		typeof value.name === "string" &&
		"summary" in value &&
		typeof value.summary === "string" &&
		"access" in value &&
		typeof value.access === "string" &&
		ACCESS_VALUES.includes(value.access) &&
		"execute" in value &&
		typeof value.execute === "function"
	);
}

export function isCommandFile(file: string): boolean {
	if (file.startsWith("_")) return false;
	if (file.endsWith(".d.ts") || /\.spec\.[jt]s$/.test(file)) return false;
	return file.endsWith(".js") || file.endsWith(".ts");
}

/**
 * Imports and registers every command module. A module that fails to load
 * is logged and skipped; the rest still load.
 */
export async function loadCommands(directory = COMMAND_DIRECTORY): Promise<number> {
	const files = (await readdir(directory)).filter(isCommandFile).sort();
	logger.debug(`Found ${files.length} command file/s in ${directory}`);
	let loaded = 0;
	for (const file of files) {
		try {
			const module: unknown = await import(pathToFileURL(join(directory, file)).href);
			const command = typeof module === "object" && module !== null && "default" in module ? module.default : undefined;
			if (!isCommandObject(command)) {
				logger.warn(`Command file ${file} must default-export a command object`);
				continue;
			}
			registerCommand(command);
			loaded++;
			logger.debug(`Loaded command ${command.name} from ${file}`);
		} catch (error) {
			logger.error(`Failed to load command from ${file}: ${error}`);
		}
	}
	logger.info(`Command loading complete. Total commands registered: ${getCommands().length}`);
	return loaded;
}
