/**
 * Package: records - YAML record store
 *
 * Mirrors the player table and the event log to disk.
 *
 * Layout under the storage directory
 * - `players/<id>.yaml`: one player with every item it owns
 * - `events.yaml`: the event log as a stream of YAML documents, appended
 *
 * Player files are written to a temporary file and renamed into place, so
 * a crash leaves either the old or the new record. Anything that fails to
 * parse at load time raises {@link StorageCorruptionError}.
 *
 * @module package/records
 */
import { join, relative } from "path";
import { appendFile, mkdir, readdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { StorageCorruptionError } from "../core/errors.js";
import { isEventKind, type GameEvent } from "../core/event.js";
import {
	emptyPenalties,
	isAlignment,
	isItemSlot,
	type Item,
	type ItemSlot,
	type Player,
	type PlayerSession,
} from "../core/player.js";
import { PENALTY_KIND } from "../core/penalty.js";
import type { LoadedRecords, RecordStore } from "../core/records.js";

type Raw = Record<string, unknown>;

function isRaw(value: unknown): value is Raw {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value);
}

export class YamlRecordStore implements RecordStore {
	private readonly playerDirectory: string;
	private readonly eventPath: string;

	constructor(private readonly directory: string) {
		this.playerDirectory = join(directory, "players");
		this.eventPath = join(directory, "events.yaml");
	}

	async load(): Promise<LoadedRecords> {
		await mkdir(this.playerDirectory, { recursive: true });
		const players: Player[] = [];
		for (const file of await readdir(this.playerDirectory)) {
			if (!file.endsWith(".yaml")) continue;
			const path = join(this.playerDirectory, file);
			players.push(parsePlayer(await readFile(path, "utf-8"), path));
		}
		players.sort((a, b) => a.id - b.id);
		const events = await this.loadEvents();
		logger.info(`Loaded ${players.length} player/s and ${events.length} event/s from ${this.directory}`);
		return { players, events };
	}

	async savePlayer(player: Player): Promise<void> {
		await mkdir(this.playerDirectory, { recursive: true });
		const filePath = this.playerPath(player.id);
		const tempPath = `${filePath}.tmp`;
		const yaml = YAML.dump(player, { noRefs: true, lineWidth: 120, skipInvalid: true });
		try {
			await writeFile(tempPath, yaml, "utf-8");
			await rename(tempPath, filePath);
			logger.debug(`Saved player file ${relative(this.directory, filePath)} for ${player.name}`);
		} catch (error) {
			await unlink(tempPath).catch((cleanupError: unknown) =>
				logger.debug(`No temp file to clean up at ${tempPath}`, { cleanupError: String(cleanupError) })
			);
			throw error;
		}
	}

	async deletePlayer(id: number): Promise<void> {
		try {
			await unlink(this.playerPath(id));
			logger.debug(`Deleted player file for id ${id}`);
		} catch (error) {
			if (isRaw(error) && error.code === "ENOENT") return;
			throw error;
		}
	}

	async appendEvent(event: GameEvent): Promise<void> {
		await mkdir(this.directory, { recursive: true });
		await appendFile(this.eventPath, `---\n${YAML.dump(event, { noRefs: true, lineWidth: -1, skipInvalid: true })}`, "utf-8");
	}

	private playerPath(id: number): string {
		return join(this.playerDirectory, `${id}.yaml`);
	}

	private async loadEvents(): Promise<GameEvent[]> {
		let content: string;
		try {
			content = await readFile(this.eventPath, "utf-8");
		} catch (error) {
			if (isRaw(error) && error.code === "ENOENT") return [];
			throw error;
		}
		let documents: unknown[];
		try {
			documents = YAML.loadAll(content);
		} catch (error) {
			throw new StorageCorruptionError(this.eventPath, String(error));
		}
		return documents.filter((doc) => doc !== null && doc !== undefined).map((doc) => parseEvent(doc, this.eventPath));
	}
}

function parseSession(value: unknown, path: string): PlayerSession | undefined {
	if (value === undefined || value === null) return undefined;
	if (
		!isRaw(value) ||
		typeof value.nick !== "string" ||
		typeof value.network !== "string" ||
		typeof value.channel !== "string" ||
		typeof value.address !== "string" ||
		!isInteger(value.since)
	)
		throw new StorageCorruptionError(path, "malformed session");
	return {
		nick: value.nick,
		network: value.network,
		channel: value.channel,
		address: value.address,
		since: value.since,
	};
}

function parseItems(value: unknown, path: string): Partial<Record<ItemSlot, Item>> {
	const items: Partial<Record<ItemSlot, Item>> = {};
	if (value === undefined || value === null) return items;
	if (!isRaw(value)) throw new StorageCorruptionError(path, "items must be a map");
	for (const [slot, raw] of Object.entries(value)) {
		if (!isItemSlot(slot)) throw new StorageCorruptionError(path, `unknown item slot "${slot}"`);
		if (!isRaw(raw) || !isInteger(raw.id) || !isInteger(raw.level) || raw.slot !== slot)
			throw new StorageCorruptionError(path, `malformed ${slot}`);
		const item: Item = { id: raw.id, slot, level: raw.level };
		if (typeof raw.name === "string") item.name = raw.name;
		items[slot] = item;
	}
	return items;
}

function parsePenalties(value: unknown, path: string): Player["penalties"] {
	const penalties = emptyPenalties();
	if (value === undefined || value === null) return penalties;
	if (!isRaw(value)) throw new StorageCorruptionError(path, "penalties must be a map");
	for (const kind of Object.values(PENALTY_KIND)) {
		const amount = value[kind];
		if (amount === undefined) continue;
		if (!isInteger(amount)) throw new StorageCorruptionError(path, `malformed ${kind} penalty`);
		penalties[kind] = amount;
	}
	return penalties;
}

export function parsePlayer(content: string, path: string): Player {
	let raw: unknown;
	try {
		raw = YAML.load(content);
	} catch (error) {
		throw new StorageCorruptionError(path, String(error));
	}
	if (!isRaw(raw)) throw new StorageCorruptionError(path, "not a player record");
	const { id, name, network, passwordHash, isAdmin, className, alignment } = raw;
	const { level, ttl, nextTtl, idled, x, y, createdAt, lastLogin } = raw;
	if (
		!isInteger(id) ||
		typeof name !== "string" ||
		typeof network !== "string" ||
		typeof passwordHash !== "string" ||
		typeof isAdmin !== "boolean" ||
		typeof className !== "string" ||
		!isAlignment(alignment) ||
		!isInteger(level) ||
		!isInteger(ttl) ||
		!isInteger(nextTtl) ||
		!isInteger(idled) ||
		!isInteger(x) ||
		!isInteger(y) ||
		!isInteger(createdAt) ||
		!isInteger(lastLogin)
	)
		throw new StorageCorruptionError(path, "missing or mistyped player field");
	const player: Player = {
		id,
		name,
		network,
		passwordHash,
		isAdmin,
		className,
		alignment,
		level,
		ttl,
		nextTtl,
		idled,
		x,
		y,
		penalties: parsePenalties(raw.penalties, path),
		items: parseItems(raw.items, path),
		createdAt,
		lastLogin,
	};
	const session = parseSession(raw.session, path);
	if (session) player.session = session;
	return player;
}

function parseEvent(raw: unknown, path: string): GameEvent {
	if (!isRaw(raw) || !isInteger(raw.id) || !isEventKind(raw.kind) || typeof raw.message !== "string" || !isInteger(raw.at))
		throw new StorageCorruptionError(path, `malformed event ${JSON.stringify(raw)}`);
	const event: GameEvent = { id: raw.id, kind: raw.kind, message: raw.message, at: raw.at };
	if (isInteger(raw.playerId)) event.playerId = raw.playerId;
	if (isInteger(raw.otherId)) event.otherId = raw.otherId;
	return event;
}
