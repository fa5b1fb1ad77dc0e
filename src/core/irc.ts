/**
 * IRC line parsing.
 *
 * Turns raw protocol lines into {@link InboundEvent}s for the session
 * coordinator. Only the handful of verbs and WHO numerics the game reacts
 * to are mapped; everything else is `undefined`.
 *
 * @module core/irc
 */

import type { Identity } from "../registry/command.js";

export interface IrcMessage {
	/** `nick!user@host` or a server name. */
	prefix?: string;
	command: string;
	params: string[];
}

export type InboundEvent =
	| { type: "join" }
	| { type: "privateMessage"; sender: Identity; text: string }
	| { type: "channelMessage"; sender: Identity; text: string }
	| { type: "nickChanged"; oldNick: string; newNick: string }
	| { type: "parted"; sender: Identity }
	| { type: "quit"; sender: Identity }
	| { type: "kicked"; target: string }
	/** One member of the game channel, from a WHO reply (352). */
	| { type: "whoReply"; nick: string; address: string }
	/** End of the WHO list (315). */
	| { type: "whoEnd" };

/**
 * Splits one line into prefix, command and parameters. The trailing
 * parameter (after ` :`) may contain spaces.
 *
 * @example
 * parseLine(":ann!a@host PRIVMSG bot :hello there");
 * // { prefix: "ann!a@host", command: "PRIVMSG", params: ["bot", "hello there"] }
 */
export function parseLine(line: string): IrcMessage | undefined {
	let rest = line.replace(/[\r\n]+$/, "");
	let prefix: string | undefined;
	if (rest.startsWith(":")) {
		const space = rest.indexOf(" ");
		if (space < 0) return undefined;
		prefix = rest.slice(1, space);
		rest = rest.slice(space + 1).trimStart();
	}
	const params: string[] = [];
	const trailingAt = rest.indexOf(" :");
	let trailing: string | undefined;
	if (trailingAt >= 0) {
		trailing = rest.slice(trailingAt + 2);
		rest = rest.slice(0, trailingAt);
	}
	const words = rest.split(" ").filter((word) => word.length > 0);
	const command = words.shift();
	if (!command) return undefined;
	params.push(...words);
	if (trailing !== undefined) params.push(trailing);
	const message: IrcMessage = { command: command.toUpperCase(), params };
	if (prefix !== undefined) message.prefix = prefix;
	return message;
}

/** `nick!user@host` split into nick and `user@host`. */
export function identityOf(prefix: string): Identity {
	const bang = prefix.indexOf("!");
	if (bang < 0) return { nick: prefix, address: "" };
	return { nick: prefix.slice(0, bang), address: prefix.slice(bang + 1) };
}

/**
 * Maps a parsed message to a game event as seen by the bot `self` sitting
 * in `channel`. Lines from the bot itself produce only its own join.
 */
export function toInboundEvent(message: IrcMessage, self: string, channel: string): InboundEvent | undefined {
	if (!message.prefix) return undefined;
	const sender = identityOf(message.prefix);
	const fromSelf = sender.nick.toLowerCase() === self.toLowerCase();
	const [target = "", text = ""] = message.params;
	const inChannel = target.toLowerCase() === channel.toLowerCase();

	switch (message.command) {
		case "JOIN":
			return fromSelf && inChannel ? { type: "join" } : undefined;
		case "PRIVMSG":
		case "NOTICE":
			if (fromSelf) return undefined;
			if (inChannel) return { type: "channelMessage", sender, text };
			if (message.command === "PRIVMSG" && target.toLowerCase() === self.toLowerCase())
				return { type: "privateMessage", sender, text };
			return undefined;
		case "PART":
			return !fromSelf && inChannel ? { type: "parted", sender } : undefined;
		case "QUIT":
			return fromSelf ? undefined : { type: "quit", sender };
		case "NICK":
			return fromSelf || !target ? undefined : { type: "nickChanged", oldNick: sender.nick, newNick: target };
		case "KICK": {
			const kicked = message.params[1];
			if (!inChannel || !kicked || kicked.toLowerCase() === self.toLowerCase()) return undefined;
			return { type: "kicked", target: kicked };
		}
		// <self> <channel> <user> <host> <server> <nick> <flags> :<hops> <realname>
		case "352": {
			const [, whoChannel = "", user, host, , nick] = message.params;
			if (whoChannel.toLowerCase() !== channel.toLowerCase() || !user || !host || !nick) return undefined;
			if (nick.toLowerCase() === self.toLowerCase()) return undefined;
			return { type: "whoReply", nick, address: `${user}@${host}` };
		}
		case "315":
			return message.params[1]?.toLowerCase() === channel.toLowerCase() ? { type: "whoEnd" } : undefined;
		default:
			return undefined;
	}
}
