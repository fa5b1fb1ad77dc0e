/**
 * Per-connection outbound queue.
 *
 * `enqueue` always accepts, even while muted; the mute level is applied
 * when a message is delivered, and suppressed messages are dropped. This
 * keeps `clear()` meaningful at every mute level.
 *
 * Delivery is paced: at least `minDelayMs` passes between two lines sent
 * to the same connection.
 *
 * @module core/dispatch
 */

import { setTimeout as sleep } from "timers/promises";
import logger from "../logger.js";
import { MAX_LINE_LENGTH, splitMessage } from "./format.js";
import { MUTE_LEVEL } from "./world.js";

export interface OutboundMessage {
	destination: string;
	text: string;
	/** Sent as a NOTICE rather than a PRIVMSG. */
	notice: boolean;
}

/** The connection side of a queue. */
export interface LineSink {
	sendLine(destination: string, text: string, notice?: boolean): void;
	isConnected(): boolean;
}

export interface DispatchQueueOptions {
	/** Label for log lines, usually the network name. */
	name: string;
	sink: LineSink;
	minDelayMs?: number;
	/** 0 keeps every message; otherwise the oldest is dropped to admit a new one. */
	maxSize?: number;
	maxLineLength?: number;
	muteLevel?: () => MUTE_LEVEL;
	/** Channel destinations are subject to channel muting. */
	isChannel?: (destination: string) => boolean;
	now?: () => number;
	wait?: (ms: number) => Promise<unknown>;
}

export function isChannelName(destination: string): boolean {
	return /^[#&+!]/.test(destination);
}

export class DispatchQueue {
	readonly name: string;
	private readonly queue: OutboundMessage[] = [];
	private readonly sink: LineSink;
	private readonly minDelayMs: number;
	private readonly maxSize: number;
	private readonly maxLineLength: number;
	private readonly muteLevel: () => MUTE_LEVEL;
	private readonly isChannel: (destination: string) => boolean;
	private readonly now: () => number;
	private readonly wait: (ms: number) => Promise<unknown>;
	private lastSentAt = Number.NEGATIVE_INFINITY;
	private flushing?: Promise<number>;

	constructor(options: DispatchQueueOptions) {
		this.name = options.name;
		this.sink = options.sink;
		this.minDelayMs = options.minDelayMs ?? 500;
		this.maxSize = options.maxSize ?? 0;
		this.maxLineLength = options.maxLineLength ?? MAX_LINE_LENGTH;
		this.muteLevel = options.muteLevel ?? (() => MUTE_LEVEL.NONE);
		this.isChannel = options.isChannel ?? isChannelName;
		this.now = options.now ?? Date.now;
		this.wait = options.wait ?? sleep;
	}

	get size(): number {
		return this.queue.length;
	}

	/** Queued messages, oldest first. */
	pending(): readonly OutboundMessage[] {
		return [...this.queue];
	}

	enqueue(destination: string, text: string, options: { notice?: boolean } = {}): void {
		for (const line of splitMessage(text, this.maxLineLength)) {
			if (this.maxSize > 0 && this.queue.length >= this.maxSize) {
				const dropped = this.queue.shift();
				logger.warn(`Dispatch queue ${this.name} full, dropped oldest message`, {
					destination: dropped?.destination,
				});
			}
			this.queue.push({ destination, text: line, notice: options.notice ?? false });
		}
	}

	/** Discards everything queued, regardless of mute level. */
	clear(): number {
		const dropped = this.queue.length;
		this.queue.length = 0;
		logger.debug(`Dispatch queue ${this.name} cleared (${dropped} dropped)`);
		return dropped;
	}

	isSuppressed(message: OutboundMessage, level = this.muteLevel()): boolean {
		const channel = !message.notice && this.isChannel(message.destination);
		switch (level) {
			case MUTE_LEVEL.NONE:
				return false;
			case MUTE_LEVEL.CHANNEL:
				return channel;
			case MUTE_LEVEL.PRIVATE:
				return !channel;
			case MUTE_LEVEL.ALL:
				return true;
		}
	}

	/**
	 * Delivers queued messages in order until the queue is empty or the
	 * connection drops. Concurrent calls share one drain. Resolves with the
	 * number of lines sent.
	 */
	flushDeliver(): Promise<number> {
		if (!this.flushing) {
			this.flushing = this.deliver().finally(() => {
				this.flushing = undefined;
			});
		}
		return this.flushing;
	}

	private async deliver(): Promise<number> {
		let sent = 0;
		while (this.queue.length > 0) {
			if (!this.sink.isConnected()) {
				logger.debug(`Dispatch queue ${this.name} holding ${this.queue.length} message/s until reconnect`);
				break;
			}
			const message = this.queue[0];
			if (this.isSuppressed(message)) {
				this.queue.shift();
				continue;
			}
			const delay = this.lastSentAt + this.minDelayMs - this.now();
			if (delay > 0) {
				await this.wait(delay);
				// the queue may have been cleared or muted while waiting
				continue;
			}
			this.queue.shift();
			this.sink.sendLine(message.destination, message.text, message.notice);
			this.lastSentAt = this.now();
			sent++;
		}
		return sent;
	}
}
