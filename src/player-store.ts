/**
 * Authoritative in-memory player table with a single writer.
 *
 * Every mutation, from a chat event, an admin command or the world clock,
 * runs as a synchronous mutator inside {@link PlayerStore.transaction}.
 * Transactions are serialized by one lock, so each sees the effects of
 * every earlier one and none interleave. Players a transaction touched are
 * copied to the {@link WriteBehind} mirror after the lock is released.
 *
 * Readers outside a transaction get private copies.
 *
 * @example
 * ```ts
 * const store = await PlayerStore.open(records, options);
 * await store.applyDelta(player.id, (p) => {
 * 	p.ttl = Math.max(0, p.ttl - 60);
 * });
 * ```
 *
 * @module player-store
 */

import logger from "./logger.js";
import {
	ConstraintViolationError,
	DuplicateNameError,
	InvalidCredentialsError,
	NotFoundError,
	ValidationError,
} from "./core/errors.js";
import { EVENT_KIND, type GameEvent } from "./core/event.js";
import { hashPassword } from "./core/password.js";
import { PENALTY_KIND } from "./core/penalty.js";
import {
	baseTtl,
	clonePlayer,
	emptyPenalties,
	isItemSlot,
	isOnline,
	type Item,
	type ItemSlot,
	type OnlinePlayer,
	type Player,
	type PlayerSession,
} from "./core/player.js";
import type { Random } from "./core/random.js";
import type { RecordStore } from "./core/records.js";
import { WriteBehind, type WriteBehindOptions } from "./persistence.js";
import { Mutex } from "./utils/mutex.js";

export const MAX_NAME_LENGTH = 16;
export const MAX_CLASS_LENGTH = 30;
export const RECENT_EVENT_LIMIT = 500;

export interface PlayerStoreOptions {
	random: Random;
	/** Epoch ms. */
	now: () => number;
	passwordSalt: string;
	mapWidth: number;
	mapHeight: number;
	/** Names that get the admin flag when registered. */
	admins?: readonly string[];
	writeBehind?: WriteBehindOptions;
}

export interface NewPlayer {
	name: string;
	password: string;
	className: string;
	network: string;
	/** Logs the new player in immediately. */
	session?: Omit<PlayerSession, "since">;
}

export function validateName(name: string): void {
	if (name.length < 1 || name.length > MAX_NAME_LENGTH)
		throw new ValidationError(`Character names must be 1-${MAX_NAME_LENGTH} characters.`);
	if (name.startsWith("#")) throw new ValidationError("Character names may not begin with #.");
	if (/\s/.test(name)) throw new ValidationError("Character names may not contain spaces.");
}

export function validateClassName(className: string): void {
	if (className.trim().length < 1 || className.length > MAX_CLASS_LENGTH)
		throw new ValidationError(`Character classes must be 1-${MAX_CLASS_LENGTH} characters.`);
}

export function validatePassword(password: string): void {
	if (password.length < 1) throw new ValidationError("Passwords may not be empty.");
}

interface TableState {
	readonly players: Map<number, Player>;
	/** lowercase name -> id */
	readonly names: Map<string, number>;
	readonly events: GameEvent[];
	/** Sessions from before a restart or reconnect, waiting for a WHO match. */
	readonly resumable: Map<number, PlayerSession>;
	nextPlayerId: number;
	nextItemId: number;
	nextEventId: number;
}

/**
 * The live player table as seen by one transaction. Every player it hands
 * out is assumed modified and written behind when the transaction ends.
 */
export class PlayerTable {
	readonly touched = new Set<number>();
	readonly deleted = new Set<number>();
	readonly logged: GameEvent[] = [];

	constructor(private readonly state: TableState, private readonly options: PlayerStoreOptions) {}

	get now(): number {
		return this.options.now();
	}

	get random(): Random {
		return this.options.random;
	}

	get(id: number): Player | undefined {
		const player = this.state.players.get(id);
		if (player) this.touched.add(id);
		return player;
	}

	require(id: number): Player {
		const player = this.get(id);
		if (!player) throw new NotFoundError(`#${id}`, "That player no longer exists.");
		return player;
	}

	findByName(name: string): Player | undefined {
		const id = this.state.names.get(name.toLowerCase());
		return id === undefined ? undefined : this.get(id);
	}

	requireByName(name: string): Player {
		const player = this.findByName(name);
		if (!player) throw new NotFoundError(name, `No such username ${name}.`);
		return player;
	}

	findByNick(nick: string, network: string): OnlinePlayer | undefined {
		const wanted = nick.toLowerCase();
		for (const player of this.state.players.values()) {
			if (!isOnline(player)) continue;
			if (player.session.network === network && player.session.nick.toLowerCase() === wanted) {
				this.touched.add(player.id);
				return player;
			}
		}
		return undefined;
	}

	/** Online players in id order. */
	online(): OnlinePlayer[] {
		const online: OnlinePlayer[] = [];
		for (const player of this.state.players.values()) {
			if (!isOnline(player)) continue;
			this.touched.add(player.id);
			online.push(player);
		}
		return online.sort((a, b) => a.id - b.id);
	}

	all(): Player[] {
		const all = [...this.state.players.values()].sort((a, b) => a.id - b.id);
		for (const player of all) this.touched.add(player.id);
		return all;
	}

	create(input: NewPlayer): Player {
		validateName(input.name);
		validateClassName(input.className);
		validatePassword(input.password);
		if (this.state.names.has(input.name.toLowerCase())) throw new DuplicateNameError(input.name);

		const now = this.now;
		const ttl = baseTtl(0);
		const admins = (this.options.admins ?? []).map((name) => name.toLowerCase());
		const player: Player = {
			id: this.state.nextPlayerId++,
			name: input.name,
			network: input.network,
			passwordHash: hashPassword(input.password, this.options.passwordSalt),
			isAdmin: admins.includes(input.name.toLowerCase()),
			className: input.className,
			alignment: "neutral",
			level: 0,
			ttl,
			nextTtl: ttl,
			idled: 0,
			x: this.random.int(0, this.options.mapWidth - 1),
			y: this.random.int(0, this.options.mapHeight - 1),
			penalties: emptyPenalties(),
			items: {},
			createdAt: now,
			lastLogin: now,
		};
		if (input.session) player.session = { ...input.session, since: now };
		this.state.players.set(player.id, player);
		this.state.names.set(player.name.toLowerCase(), player.id);
		this.touched.add(player.id);
		this.deleted.delete(player.id);
		return player;
	}

	authenticate(name: string, password: string): Player {
		const player = this.findByName(name);
		if (!player) throw new InvalidCredentialsError("No such account. Use REGISTER to create one.");
		if (player.passwordHash !== hashPassword(password, this.options.passwordSalt))
			throw new InvalidCredentialsError("Wrong password.");
		return player;
	}

	setPassword(player: Player, password: string): void {
		validatePassword(password);
		player.passwordHash = hashPassword(password, this.options.passwordSalt);
	}

	setOnline(player: Player, session: Omit<PlayerSession, "since">): OnlinePlayer {
		if (isOnline(player)) throw new ConstraintViolationError("You are already logged in.");
		const online: OnlinePlayer = Object.assign(player, { session: { ...session, since: this.now } });
		player.lastLogin = this.now;
		this.state.resumable.delete(player.id);
		return online;
	}

	setOffline(player: Player): void {
		delete player.session;
		this.state.resumable.delete(player.id);
	}

	/**
	 * Ends every session on `network`, keeping each one resumable until
	 * {@link PlayerTable.forgetResumable}. Returns how many are now waiting.
	 */
	suspend(network: string): number {
		for (const player of this.online()) {
			if (player.session.network !== network) continue;
			this.state.resumable.set(player.id, player.session);
			const offline: Player = player;
			delete offline.session;
		}
		return this.resumable(network).length;
	}

	/** Offline players whose last session on `network` may be resumed. */
	resumable(network: string): Array<{ player: Player; session: PlayerSession }> {
		const waiting: Array<{ player: Player; session: PlayerSession }> = [];
		for (const [id, session] of this.state.resumable) {
			if (session.network !== network) continue;
			const player = this.get(id);
			if (player) waiting.push({ player, session });
		}
		return waiting.sort((a, b) => a.player.id - b.player.id);
	}

	/** Logs the player back in under the nick it is now using. */
	resume(player: Player, nick: string, address: string): OnlinePlayer | undefined {
		const previous = this.state.resumable.get(player.id);
		if (!previous || isOnline(player)) return undefined;
		return this.setOnline(player, { nick, address, network: previous.network, channel: previous.channel });
	}

	/** Drops every resumable session on `network`. Returns the names dropped. */
	forgetResumable(network: string): string[] {
		const forgotten = this.resumable(network).map(({ player }) => player);
		for (const player of forgotten) this.state.resumable.delete(player.id);
		return forgotten.map((player) => player.name);
	}

	remove(player: Player): void {
		this.state.resumable.delete(player.id);
		this.state.players.delete(player.id);
		this.state.names.delete(player.name.toLowerCase());
		this.touched.delete(player.id);
		this.deleted.add(player.id);
	}

	rename(player: Player, newName: string): void {
		validateName(newName);
		const owner = this.state.names.get(newName.toLowerCase());
		if (owner !== undefined && owner !== player.id) throw new DuplicateNameError(newName);
		this.state.names.delete(player.name.toLowerCase());
		player.name = newName;
		this.state.names.set(newName.toLowerCase(), player.id);
	}

	/** Replaces whatever the player holds in `slot`. */
	setItem(player: Player, slot: ItemSlot, level: number, name?: string): Item {
		if (!isItemSlot(slot)) throw new ConstraintViolationError(`Invalid item slot: ${String(slot)}`);
		if (!this.state.players.has(player.id))
			throw new ConstraintViolationError(`Item for missing player #${player.id}`);
		const existing = player.items[slot];
		const item: Item = { id: existing?.id ?? this.state.nextItemId++, slot, level: Math.max(0, Math.floor(level)) };
		if (name !== undefined) item.name = name;
		player.items[slot] = item;
		return item;
	}

	/** Adds `seconds` to the countdown and to the per-kind penalty total. */
	addPenalty(player: Player, kind: PENALTY_KIND, seconds: number): void {
		player.ttl += seconds;
		player.penalties[kind] += seconds;
	}

	logEvent(kind: EVENT_KIND, message: string, playerId?: number, otherId?: number): GameEvent {
		const event: GameEvent = { id: this.state.nextEventId++, kind, message, at: this.now };
		if (playerId !== undefined) event.playerId = playerId;
		if (otherId !== undefined) event.otherId = otherId;
		this.state.events.push(event);
		if (this.state.events.length > RECENT_EVENT_LIMIT)
			this.state.events.splice(0, this.state.events.length - RECENT_EVENT_LIMIT);
		this.logged.push(event);
		return event;
	}
}

export class PlayerStore {
	private readonly writer = new Mutex();
	private readonly mirror: WriteBehind;

	private constructor(
		private readonly state: TableState,
		private readonly options: PlayerStoreOptions,
		records: RecordStore
	) {
		this.mirror = new WriteBehind(records, options.writeBehind);
	}

	/** Loads every record into memory. Storage corruption propagates. */
	static async open(records: RecordStore, options: PlayerStoreOptions): Promise<PlayerStore> {
		const loaded = await records.load();
		const state: TableState = {
			players: new Map(),
			names: new Map(),
			events: loaded.events.slice(-RECENT_EVENT_LIMIT),
			resumable: new Map(),
			nextPlayerId: 1,
			nextItemId: 1,
			nextEventId: 1,
		};
		for (const player of loaded.players) {
			const key = player.name.toLowerCase();
			if (state.names.has(key)) {
				logger.warn(`Skipping player #${player.id}: name ${player.name} already loaded`);
				continue;
			}
			// nobody is connected yet; a WHO after joining may resume the session
			if (player.session) {
				state.resumable.set(player.id, player.session);
				delete player.session;
			}
			state.players.set(player.id, player);
			state.names.set(key, player.id);
			state.nextPlayerId = Math.max(state.nextPlayerId, player.id + 1);
			for (const item of Object.values(player.items)) state.nextItemId = Math.max(state.nextItemId, item.id + 1);
		}
		for (const event of loaded.events) state.nextEventId = Math.max(state.nextEventId, event.id + 1);
		logger.info(
			`Player store opened with ${state.players.size} player/s, ${state.resumable.size} session/s to resume`
		);
		return new PlayerStore(state, options, records);
	}

	/**
	 * Runs `mutator` against the whole table while holding the writer lock.
	 * The mutator must be synchronous; the lock is never held across I/O.
	 */
	transaction<T>(mutator: (table: PlayerTable) => T): Promise<T> {
		return this.writer.run(() => {
			const table = new PlayerTable(this.state, this.options);
			try {
				return mutator(table);
			} finally {
				this.persist(table);
			}
		});
	}

	/** The single mutation entry point for one player. */
	applyDelta<T>(playerId: number, mutator: (player: Player, table: PlayerTable) => T): Promise<T> {
		return this.transaction((table) => mutator(table.require(playerId), table));
	}

	async create(input: NewPlayer): Promise<Player> {
		return this.transaction((table) => {
			const player = table.create(input);
			table.logEvent(EVENT_KIND.REGISTER, `${player.name} registered as a ${player.className}`, player.id);
			return clonePlayer(player);
		});
	}

	async authenticate(name: string, password: string): Promise<Player> {
		return this.transaction((table) => clonePlayer(table.authenticate(name, password)));
	}

	async setOnline(playerId: number, session: Omit<PlayerSession, "since">): Promise<Player> {
		return this.applyDelta(playerId, (player, table) => clonePlayer(table.setOnline(player, session)));
	}

	async setOffline(playerId: number): Promise<Player> {
		return this.applyDelta(playerId, (player, table) => {
			table.setOffline(player);
			return clonePlayer(player);
		});
	}

	/** Removes the player and every item it owns. */
	async delete(playerId: number): Promise<void> {
		await this.applyDelta(playerId, (player, table) => table.remove(player));
	}

	async rename(playerId: number, newName: string): Promise<Player> {
		return this.applyDelta(playerId, (player, table) => {
			table.rename(player, newName);
			return clonePlayer(player);
		});
	}

	get(id: number): Player | undefined {
		const player = this.state.players.get(id);
		return player ? clonePlayer(player) : undefined;
	}

	findByName(name: string): Player | undefined {
		const id = this.state.names.get(name.toLowerCase());
		return id === undefined ? undefined : this.get(id);
	}

	findByNick(nick: string, network: string): Player | undefined {
		const wanted = nick.toLowerCase();
		for (const player of this.state.players.values()) {
			if (player.session?.network === network && player.session.nick.toLowerCase() === wanted)
				return clonePlayer(player);
		}
		return undefined;
	}

	online(): Player[] {
		return this.all().filter(isOnline);
	}

	all(): Player[] {
		return [...this.state.players.values()].sort((a, b) => a.id - b.id).map(clonePlayer);
	}

	get size(): number {
		return this.state.players.size;
	}

	/** Most recent events, newest last. */
	recentEvents(limit = 50): GameEvent[] {
		return this.state.events.slice(-limit).map((event) => ({ ...event }));
	}

	/** Writes waiting for the record store. */
	get backlog(): number {
		return this.mirror.backlog;
	}

	/** Waits for every scheduled record write. */
	async flush(): Promise<void> {
		await this.writer.run(() => undefined);
		await this.mirror.flush();
	}

	close(): void {
		this.mirror.dispose();
	}

	private persist(table: PlayerTable): void {
		for (const id of table.deleted) this.mirror.deletePlayer(id);
		for (const id of table.touched) {
			const player = this.state.players.get(id);
			if (!player) continue;
			const saved = clonePlayer(player);
			// a session still waiting to resume stays on record
			const waiting = this.state.resumable.get(id);
			if (waiting && !saved.session) saved.session = { ...waiting };
			this.mirror.savePlayer(saved);
		}
		for (const event of table.logged) this.mirror.appendEvent({ ...event });
	}
}
