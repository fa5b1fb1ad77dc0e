/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with the defaults if missing) and
 * merges it into the in-memory `CONFIG` object from the config registry.
 *
 * Behavior
 * - Merges only known keys, and only when the value has the default's type
 * - Unknown keys are ignored, mistyped values are logged and skipped
 * - Each `networks` entry is checked on its own; incomplete ones are skipped
 * - If the file is absent, writes the defaults to disk (temp file + rename)
 *
 * @example
 * import { loadConfig } from "./package/config.js";
 * import { CONFIG } from "./registry/config.js";
 * await loadConfig();
 * console.log(CONFIG.game.self_clock);
 *
 * @module package/config
 */
import { dirname, join, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import {
	CONFIG_DEFAULT,
	NETWORK_DEFAULT,
	defaultConfig,
	setConfig,
	type Config,
	type NetworkConfig,
} from "../registry/config.js";

const ROOT_DIRECTORY = getSafeRootDirectory();
export const CONFIG_PATH = join(ROOT_DIRECTORY, "data", "config.yaml");

type Raw = Record<string, unknown>;

function isRaw(value: unknown): value is Raw {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sameShape(expected: unknown, value: unknown): boolean {
	if (Array.isArray(expected)) return Array.isArray(value) && value.every((entry) => typeof entry === "string");
	return typeof value === typeof expected;
}

/**
 * Copies every key of `defaults` whose value in `raw` has the same type.
 */
function mergeSection<T extends object>(section: string, defaults: T, raw: unknown): T {
	const merged: T = { ...defaults };
	if (raw === undefined || raw === null) return merged;
	if (!isRaw(raw)) {
		logger.warn(`Config section ${section} is not a map, using defaults`);
		return merged;
	}
	for (const [key, expected] of Object.entries(defaults)) {
		if (!(key in raw)) continue;
		const value = raw[key];
		if (!sameShape(expected, value)) {
			logger.warn(`Ignoring ${section}.${key}: expected ${typeof expected}`);
			continue;
		}
		if (value === expected) {
			logger.debug(`DEFAULT ${section}.${key} = ${String(value)}`);
			continue;
		}
		Object.assign(merged, { [key]: Array.isArray(value) ? [...value] : value });
		logger.debug(`Set ${section}.${key} = ${section === "security" ? "********" : String(value)}`);
	}
	return merged;
}

function parseNetwork(raw: unknown, index: number): NetworkConfig | undefined {
	if (!isRaw(raw) || typeof raw.name !== "string" || typeof raw.host !== "string") {
		logger.warn(`Skipping networks[${index}]: name and host are required`);
		return undefined;
	}
	const network = mergeSection(`networks[${index}]`, NETWORK_DEFAULT, raw);
	if (typeof raw.nickserv_pass === "string") network.nickserv_pass = raw.nickserv_pass;
	if (typeof raw.server_pass === "string") network.server_pass = raw.server_pass;
	if (!network.channel.startsWith("#")) network.channel = `#${network.channel}`;
	return network;
}

/** Parses a config document over the defaults. */
export function parseConfig(document: unknown): Config {
	const config = defaultConfig();
	if (!isRaw(document)) return config;
	config.game = mergeSection("game", config.game, document.game);
	config.web = mergeSection("web", config.web, document.web);
	config.dispatch = mergeSection("dispatch", config.dispatch, document.dispatch);
	config.storage = mergeSection("storage", config.storage, document.storage);
	config.security = mergeSection("security", config.security, document.security);

	if (config.storage.driver !== "yaml" && config.storage.driver !== "memory") {
		logger.warn(`Unknown storage driver ${String(config.storage.driver)}, using yaml`);
		config.storage.driver = "yaml";
	}
	if (config.game.self_clock < 1) {
		logger.warn("game.self_clock must be at least 1 second");
		config.game.self_clock = CONFIG_DEFAULT.game.self_clock;
	}

	if (Array.isArray(document.networks)) {
		const names = new Set<string>();
		config.networks = [];
		document.networks.forEach((entry: unknown, index: number) => {
			const network = parseNetwork(entry, index);
			if (!network) return;
			if (names.has(network.name)) {
				logger.warn(`Skipping duplicate network ${network.name}`);
				return;
			}
			names.add(network.name);
			config.networks.push(network);
		});
	}
	return config;
}

async function writeDefaultConfig(path: string): Promise<void> {
	const content = YAML.dump(CONFIG_DEFAULT, { noRefs: true, lineWidth: 120 });
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		await writeFile(tempPath, content, "utf-8");
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) =>
			logger.debug(`No temp config to clean up`, { cleanupError: String(cleanupError) })
		);
		throw writeError;
	}
}

/**
 * Reads the config file into `CONFIG`, creating it from the defaults when
 * it does not exist. Returns the loaded config.
 */
export async function loadConfig(path = CONFIG_PATH): Promise<Config> {
	logger.debug(`Loading config from ${relative(ROOT_DIRECTORY, path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		logger.debug(`Config file not found or unreadable, creating default at ${path}`, { error: String(error) });
		await writeDefaultConfig(path);
		const config = defaultConfig();
		setConfig(config);
		return config;
	}
	const config = parseConfig(YAML.load(content));
	setConfig(config);
	logger.info("Config loaded successfully");
	return config;
}
