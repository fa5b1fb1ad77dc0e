/**
 * Registry: config - centralized configuration access
 *
 * Holds the active configuration. The CONFIG object is loaded and updated
 * by the config package.
 *
 * @module registry/config
 */

import { DeepReadonly } from "../utils/types.js";

export { READONLY_CONFIG as CONFIG };

export type GameConfig = {
	name: string;
	/** Seconds between world clock ticks. */
	self_clock: number;
	/** Cap on a single penalty in seconds; 0 means no cap. */
	limit_pen: number;
	map_width: number;
	map_height: number;
	/** Player names granted the admin flag when they register. */
	admins: string[];
};

export type WebConfig = {
	enabled: boolean;
	host: string;
	port: number;
};

export type DispatchConfig = {
	min_delay_ms: number;
	/** 0 for an unbounded queue. */
	max_queue: number;
	max_line_length: number;
};

export type StorageDriver = "yaml" | "memory";

export type StorageConfig = {
	driver: StorageDriver;
	/** Relative to the project root. */
	directory: string;
};

export type SecurityConfig = {
	password_salt: string;
};

export type NetworkConfig = {
	name: string;
	host: string;
	port: number;
	channel: string;
	nick: string;
	use_ssl: boolean;
	nickserv_pass?: string;
	server_pass?: string;
	/** Seconds to wait before reconnecting. */
	reconnect_delay: number;
};

export type Config = {
	game: GameConfig;
	web: WebConfig;
	dispatch: DispatchConfig;
	storage: StorageConfig;
	security: SecurityConfig;
	networks: NetworkConfig[];
};

export const NETWORK_DEFAULT: NetworkConfig = {
	name: "example",
	host: "irc.example.net",
	port: 6667,
	channel: "#idlerealm",
	nick: "IdleRealm",
	use_ssl: false,
	reconnect_delay: 30,
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	game: {
		name: "idle-realm",
		self_clock: 5,
		limit_pen: 0,
		map_width: 500,
		map_height: 500,
		admins: [],
	},
	web: {
		enabled: true,
		host: "0.0.0.0",
		port: 8080,
	},
	dispatch: {
		min_delay_ms: 500,
		max_queue: 0,
		max_line_length: 400,
	},
	storage: {
		driver: "yaml",
		directory: "data",
	},
	security: {
		password_salt: "changeme_default_salt_12345",
	},
	networks: [NETWORK_DEFAULT],
} as const;

/** A mutable deep copy of the defaults. */
export function defaultConfig(): Config {
	return {
		game: { ...CONFIG_DEFAULT.game, admins: [...CONFIG_DEFAULT.game.admins] },
		web: { ...CONFIG_DEFAULT.web },
		dispatch: { ...CONFIG_DEFAULT.dispatch },
		storage: { ...CONFIG_DEFAULT.storage },
		security: { ...CONFIG_DEFAULT.security },
		networks: CONFIG_DEFAULT.networks.map((network) => ({ ...network })),
	};
}

// make a copy of the default, don't reference it directly plz
const CONFIG: Config = defaultConfig();

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.game = config.game;
	CONFIG.web = config.web;
	CONFIG.dispatch = config.dispatch;
	CONFIG.storage = config.storage;
	CONFIG.security = config.security;
	CONFIG.networks = config.networks;
}
