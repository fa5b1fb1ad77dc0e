/**
 * Routes broadcasts to the dispatch queue of each network and kicks
 * delivery. Routing happens after the writer lock is released; delivery
 * runs on its own and never blocks the caller.
 *
 * @module router
 */

import logger from "./logger.js";
import { BROADCAST_SCOPE, type Broadcast } from "./core/broadcast.js";
import type { DispatchQueue } from "./core/dispatch.js";

interface Route {
	channel: string;
	queue: DispatchQueue;
}

export class BroadcastRouter {
	private readonly routes = new Map<string, Route>();

	register(network: string, channel: string, queue: DispatchQueue): void {
		this.routes.set(network, { channel, queue });
	}

	queue(network: string): DispatchQueue | undefined {
		return this.routes.get(network)?.queue;
	}

	get networks(): string[] {
		return [...this.routes.keys()];
	}

	route(broadcasts: readonly Broadcast[]): void {
		for (const broadcast of broadcasts) {
			switch (broadcast.scope) {
				case BROADCAST_SCOPE.ALL:
					for (const { channel, queue } of this.routes.values()) queue.enqueue(channel, broadcast.text);
					break;
				case BROADCAST_SCOPE.NETWORK: {
					const route = this.routes.get(broadcast.network);
					if (route) route.queue.enqueue(route.channel, broadcast.text);
					else logger.warn(`No route for network ${broadcast.network}`);
					break;
				}
				case BROADCAST_SCOPE.NOTICE:
				case BROADCAST_SCOPE.PRIVATE: {
					const route = this.routes.get(broadcast.network);
					if (route)
						route.queue.enqueue(broadcast.nick, broadcast.text, {
							notice: broadcast.scope === BROADCAST_SCOPE.NOTICE,
						});
					else logger.warn(`No route for network ${broadcast.network}`);
					break;
				}
			}
		}
	}

	/** Starts delivery on every queue without waiting for it. */
	flushAll(): void {
		this.drain().catch((error: unknown) => logger.error("Delivery failed", { error: String(error) }));
	}

	/** Delivers on every queue; resolves once every drain settles. */
	async drain(): Promise<void> {
		await Promise.all(
			[...this.routes.entries()].map(([network, { queue }]) =>
				queue.flushDeliver().catch((error: unknown) => {
					logger.error(`Delivery to ${network} failed`, { error: String(error) });
					return 0;
				})
			)
		);
	}
}
