/**
 * One IRC client connection per network.
 *
 * Behavior and events
 * - Registers with PASS/NICK/USER, answers PING, identifies to NickServ and
 *   joins the game channel once the server welcomes it (001).
 * - Asks for `WHO <channel>` once the join is confirmed.
 * - Takes the next free nick (`Nick_`, `Nick__`, ...) when the configured
 *   one is in use (433).
 * - Buffers incoming data and emits `inbound` with an {@link InboundEvent}
 *   for every line the game reacts to.
 * - Emits `connected` after the welcome and `close` when the socket goes
 *   away, then reconnects after `reconnect_delay` seconds unless
 *   {@link IrcConnection.close} was called.
 *
 * Implements {@link LineSink}, so a dispatch queue writes straight to it.
 *
 * @example
 * ```ts
 * const connection = new IrcConnection(network);
 * connection.on("inbound", (event: InboundEvent) => session.deliver(event));
 * connection.connect();
 * ```
 *
 * @module core/io
 */

import { EventEmitter } from "events";
import { connect as connectPlain, type Socket } from "net";
import { connect as connectTls } from "tls";
import logger from "../logger.js";
import type { NetworkConfig } from "../registry/config.js";
import type { DeepReadonly } from "../utils/types.js";
import type { LineSink } from "./dispatch.js";
import { parseLine, toInboundEvent, type IrcMessage } from "./irc.js";

export const LINEBREAK = "\r\n";

/** Strips characters that would end or split a protocol line. */
function clean(text: string): string {
	return text.replace(/[\r\n\0]/g, " ");
}

export class IrcConnection extends EventEmitter implements LineSink {
	readonly network: DeepReadonly<NetworkConfig>;
	private socket?: Socket;
	private buffer = "";
	private nick: string;
	private registered = false;
	private closing = false;
	private reconnectTimer?: NodeJS.Timeout;

	constructor(network: DeepReadonly<NetworkConfig>) {
		super();
		this.network = network;
		this.nick = network.nick;
	}

	toString(): string {
		return `{irc@${this.network.name}}`;
	}

	/** The nick the server currently knows the bot by. */
	get currentNick(): string {
		return this.nick;
	}

	isConnected(): boolean {
		return this.registered && this.socket !== undefined && !this.socket.destroyed;
	}

	connect(): void {
		if (this.socket) return;
		this.closing = false;
		const { host, port, use_ssl } = this.network;
		logger.info(`Connecting to ${this.network.name} (${host}:${port}${use_ssl ? ", tls" : ""})`);
		const socket: Socket = use_ssl ? connectTls({ host, port, servername: host }) : connectPlain({ host, port });
		this.socket = socket;
		this.buffer = "";
		this.nick = this.network.nick;
		socket.setEncoding("utf-8");
		socket.once(use_ssl ? "secureConnect" : "connect", () => this.register());
		socket.on("data", (data: string) => this.handleData(data));
		socket.on("error", (error: Error) => {
			logger.error(`${this.network.name}: socket error: ${error.message}`);
		});
		socket.on("close", () => this.handleClose(socket));
	}

	/** Sends QUIT and stops reconnecting. */
	async close(reason = "Shutting down"): Promise<void> {
		this.closing = true;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = undefined;
		}
		const socket = this.socket;
		if (!socket || socket.destroyed) return;
		await new Promise<void>((resolve) => {
			socket.once("close", () => resolve());
			socket.end(`QUIT :${clean(reason)}${LINEBREAK}`);
			setTimeout(() => socket.destroy(), 2000).unref();
		});
	}

	sendRaw(line: string): void {
		if (!this.socket || this.socket.destroyed) {
			logger.debug(`${this.network.name}: dropping line while disconnected`);
			return;
		}
		this.socket.write(`${clean(line)}${LINEBREAK}`);
	}

	sendLine(destination: string, text: string, notice = false): void {
		this.sendRaw(`${notice ? "NOTICE" : "PRIVMSG"} ${destination} :${text}`);
	}

	private register(): void {
		logger.debug(`${this.network.name}: registering as ${this.nick}`);
		if (this.network.server_pass) this.sendRaw(`PASS ${this.network.server_pass}`);
		this.sendRaw(`NICK ${this.nick}`);
		this.sendRaw(`USER ${this.nick} 0 * :${this.nick}`);
	}

	private handleData(data: string): void {
		this.buffer += data;
		let newlineIndex: number;
		while ((newlineIndex = this.buffer.indexOf("\n")) !== -1) {
			const line = this.buffer.substring(0, newlineIndex).replace(/\r$/, "");
			this.buffer = this.buffer.substring(newlineIndex + 1);
			if (!line) continue;
			const message = parseLine(line);
			if (message) this.handleMessage(message);
		}
	}

	private handleMessage(message: IrcMessage): void {
		switch (message.command) {
			case "PING":
				this.sendRaw(`PONG :${message.params[0] ?? ""}`);
				return;
			case "001":
				this.registered = true;
				if (message.params[0]) this.nick = message.params[0];
				logger.info(`${this.network.name}: registered as ${this.nick}`);
				if (this.network.nickserv_pass) {
					this.sendLine("NickServ", `IDENTIFY ${this.network.nickserv_pass}`);
				}
				this.sendRaw(`JOIN ${this.network.channel}`);
				this.emit("connected");
				return;
			case "433":
				this.nick = `${this.nick}_`;
				logger.warn(`${this.network.name}: nick in use, trying ${this.nick}`);
				this.sendRaw(`NICK ${this.nick}`);
				return;
			case "NICK":
				// the server may rename the bot itself
				if (message.prefix?.split("!")[0].toLowerCase() === this.nick.toLowerCase() && message.params[0]) {
					this.nick = message.params[0];
					return;
				}
				break;
		}
		const event = toInboundEvent(message, this.nick, this.network.channel);
		if (!event) return;
		this.emit("inbound", event);
		// the replies let the session coordinator resume earlier sessions
		if (event.type === "join") this.sendRaw(`WHO ${this.network.channel}`);
	}

	private handleClose(socket: Socket): void {
		if (this.socket !== socket) return;
		this.socket = undefined;
		this.registered = false;
		logger.warn(`${this.network.name}: disconnected`);
		this.emit("close");
		if (this.closing) return;
		const delay = this.network.reconnect_delay * 1000;
		logger.info(`${this.network.name}: reconnecting in ${this.network.reconnect_delay}s`);
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = undefined;
			this.connect();
		}, delay);
	}
}
