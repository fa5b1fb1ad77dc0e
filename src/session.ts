/**
 * Session coordinator: one per network connection.
 *
 * Inbound events are handled strictly one after another in arrival order.
 * Every state change they cause goes through the player store's single
 * writer, so they also serialize against the world clock and against the
 * other networks. Broadcasts are routed only after the writer is released.
 *
 * Game errors become exactly one private reply to the sender; anything
 * else is logged and answered with a generic reply.
 *
 * @module session
 */

import logger from "./logger.js";
import { toNetwork, toNotice, toPrivate, type Broadcast } from "./core/broadcast.js";
import { isGameError, UnauthorizedError } from "./core/errors.js";
import { EVENT_KIND } from "./core/event.js";
import { fmtTime } from "./core/format.js";
import type { InboundEvent } from "./core/irc.js";
import { penaltyFor, PENALTY_KIND } from "./core/penalty.js";
import { utag, type OnlinePlayer } from "./core/player.js";
import type { PlayerTable } from "./player-store.js";
import {
	COMMAND_ACCESS,
	findCommand,
	type CommandContext,
	type GameServices,
	type Identity,
} from "./registry/command.js";

export const NOT_LOGGED_IN = "You are not logged in.";
export const INTERNAL_ERROR = "Something went wrong; the error has been logged.";

export interface SessionCoordinatorOptions {
	network: string;
	channel: string;
	services: GameServices;
}

/**
 * Adds the penalty for `kind` to `player`, logs it, and fails the world
 * quest when the player is on it. Returns the seconds added and the
 * quest broadcasts.
 */
export function applyPenalty(
	table: PlayerTable,
	services: GameServices,
	player: OnlinePlayer,
	kind: PENALTY_KIND,
	messageLength = 0
): { seconds: number; broadcasts: Broadcast[] } {
	const seconds = penaltyFor(kind, player.level, { messageLength, limitPen: services.limitPen });
	table.addPenalty(player, kind, seconds);
	table.logEvent(EVENT_KIND.PENALTY, `${player.name} penalized ${seconds}s for ${kind}`, player.id);
	logger.debug(`Penalty ${kind} of ${seconds}s for ${player.name}`);
	return { seconds, broadcasts: services.events.failQuest(table, services.world, player) };
}

export class SessionCoordinator {
	readonly network: string;
	readonly channel: string;
	private readonly services: GameServices;
	private inbound: Promise<void> = Promise.resolve();
	/** Sessions resumed since the last join. */
	private resumed = 0;

	constructor(options: SessionCoordinatorOptions) {
		this.network = options.network;
		this.channel = options.channel;
		this.services = options.services;
	}

	/**
	 * Queues `event` behind every earlier one from this connection. The
	 * returned promise settles once it is handled and never rejects.
	 */
	deliver(event: InboundEvent): Promise<void> {
		this.inbound = this.inbound
			.then(() => this.handle(event))
			.catch((error: unknown) => {
				logger.error(`Inbound ${event.type} on ${this.network} failed`, { error: String(error) });
			});
		return this.inbound;
	}

	private async handle(event: InboundEvent): Promise<void> {
		const broadcasts = await this.dispatch(event);
		this.services.router.route(broadcasts);
		this.services.router.flushAll();
	}

	private dispatch(event: InboundEvent): Promise<Broadcast[]> {
		switch (event.type) {
			case "join":
				return this.join();
			case "privateMessage":
				return this.privateMessage(event.sender, event.text);
			case "channelMessage":
				return this.channelMessage(event.sender, event.text);
			case "nickChanged":
				return this.nickChanged(event.oldNick, event.newNick);
			case "parted":
				return this.parted(event.sender);
			case "quit":
				return this.quit(event.sender);
			case "kicked":
				return this.kicked(event.target);
			case "whoReply":
				return this.whoReply(event.nick, event.address);
			case "whoEnd":
				return this.whoEnd();
		}
	}

	/**
	 * The bot joined the channel. Sessions on this network are suspended
	 * until the WHO list shows who is still there.
	 */
	async join(): Promise<Broadcast[]> {
		const waiting = await this.services.store.transaction((table) => table.suspend(this.network));
		this.resumed = 0;
		logger.info(`Joined ${this.channel} on ${this.network}; ${waiting} session/s waiting for WHO`);
		return [];
	}

	/** A channel member from the WHO list: resume the session it left at the same `user@host`. */
	async whoReply(nick: string, address: string): Promise<Broadcast[]> {
		const resumed = await this.services.store.transaction((table) => {
			const match = table.resumable(this.network).find(({ session }) => session.address === address);
			if (!match || table.findByNick(nick, this.network)) return undefined;
			return table.resume(match.player, nick, address);
		});
		if (resumed) {
			this.resumed++;
			logger.info(`Auto-login: ${resumed.name} as ${nick} (${address}) on ${this.network}`);
		}
		return [];
	}

	/** End of the WHO list: anyone not seen stays logged out. */
	async whoEnd(): Promise<Broadcast[]> {
		const forgotten = await this.services.store.transaction((table) => table.forgetResumable(this.network));
		for (const name of forgotten) logger.info(`${name} not in ${this.channel} on ${this.network}; logged out`);
		const resumed = this.resumed;
		this.resumed = 0;
		if (resumed === 0) return [];
		return [
			toNetwork(
				this.network,
				`${resumed} user${resumed === 1 ? "" : "s"} automatically logged in on ${this.network}.`
			),
		];
	}

	async channelMessage(sender: Identity, text: string): Promise<Broadcast[]> {
		return this.services.store.transaction((table) => {
			const player = table.findByNick(sender.nick, this.network);
			if (!player) return [];
			return applyPenalty(table, this.services, player, PENALTY_KIND.MESSAGE, text.length).broadcasts;
		});
	}

	async nickChanged(oldNick: string, newNick: string): Promise<Broadcast[]> {
		return this.services.store.transaction((table) => {
			const player = table.findByNick(oldNick, this.network);
			if (!player) return [];
			const { seconds, broadcasts } = applyPenalty(table, this.services, player, PENALTY_KIND.NICK);
			player.session.nick = newNick;
			return [
				toNotice(this.network, newNick, `Penalty of ${fmtTime(seconds)} added to your timer for nick change.`),
				...broadcasts,
			];
		});
	}

	async parted(sender: Identity): Promise<Broadcast[]> {
		return this.leave(sender.nick, PENALTY_KIND.PART, (player, seconds) => [
			toNetwork(this.network, `${utag(player)} has left ${this.channel}. Penalty: ${fmtTime(seconds)}.`),
		]);
	}

	async quit(sender: Identity): Promise<Broadcast[]> {
		return this.leave(sender.nick, PENALTY_KIND.QUIT, () => []);
	}

	async kicked(target: string): Promise<Broadcast[]> {
		return this.leave(target, PENALTY_KIND.KICK, (player, seconds) => [
			toNetwork(this.network, `${utag(player)} has been kicked from ${this.channel}. Penalty: ${fmtTime(seconds)}.`),
		]);
	}

	private leave(
		nick: string,
		kind: PENALTY_KIND,
		announce: (player: OnlinePlayer, seconds: number) => Broadcast[]
	): Promise<Broadcast[]> {
		return this.services.store.transaction((table) => {
			const player = table.findByNick(nick, this.network);
			if (!player) return [];
			const { seconds, broadcasts } = applyPenalty(table, this.services, player, kind);
			table.setOffline(player);
			logger.info(`${player.name} went offline on ${this.network} (${kind})`);
			return [...announce(player, seconds), ...broadcasts];
		});
	}

	/**
	 * `VERB args...` from a private message. Commands other than public
	 * ones need a logged-in sender; an anonymous sender gets one notice and
	 * nothing changes.
	 */
	async privateMessage(sender: Identity, text: string): Promise<Broadcast[]> {
		const [verb, ...args] = text.trim().split(/\s+/);
		if (!verb) return [];
		const broadcasts: Broadcast[] = [];
		const reply = (line: string) => broadcasts.push(toPrivate(this.network, sender.nick, line));
		const notice = (line: string) => broadcasts.push(toNotice(this.network, sender.nick, line));

		const command = findCommand(verb);
		if (!command) {
			reply(`Unknown command '${verb}'. Send HELP for a list of commands.`);
			return broadcasts;
		}

		const player = this.services.store.findByNick(sender.nick, this.network);
		if (command.access !== COMMAND_ACCESS.PUBLIC && !player) {
			notice(NOT_LOGGED_IN);
			return broadcasts;
		}

		const context: CommandContext = {
			network: this.network,
			channel: this.channel,
			sender,
			services: this.services,
			reply,
			notice,
			broadcast: (...more) => broadcasts.push(...more),
		};
		if (player) context.player = player;

		try {
			if (command.access === COMMAND_ACCESS.ADMIN && !player?.isAdmin)
				throw new UnauthorizedError("You do not have access to admin commands.");
			await command.execute(context, args);
		} catch (error) {
			if (isGameError(error)) {
				logger.debug(`${command.name} from ${sender.nick} on ${this.network} refused: ${error.message}`);
				reply(error.message);
			} else {
				logger.error(`${command.name} from ${sender.nick} on ${this.network} failed`, {
					error: error instanceof Error ? error.stack : String(error),
				});
				reply(INTERNAL_ERROR);
			}
		}
		return broadcasts;
	}
}
