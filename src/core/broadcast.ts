/**
 * Outbound messages produced by game logic.
 *
 * Engines never talk to connections; they return broadcasts, and the
 * router turns each one into queue entries once the writer lock is
 * released.
 *
 * @module core/broadcast
 */

export enum BROADCAST_SCOPE {
	/** The game channel on every network. */
	ALL = "all",
	/** The game channel on one network. */
	NETWORK = "network",
	/** A notice to one nick on one network. */
	NOTICE = "notice",
	/** A private message to one nick on one network. */
	PRIVATE = "private",
}

export type Broadcast =
	| { scope: BROADCAST_SCOPE.ALL; text: string }
	| { scope: BROADCAST_SCOPE.NETWORK; network: string; text: string }
	| { scope: BROADCAST_SCOPE.NOTICE | BROADCAST_SCOPE.PRIVATE; network: string; nick: string; text: string };

export function toAll(text: string): Broadcast {
	return { scope: BROADCAST_SCOPE.ALL, text };
}

export function toNetwork(network: string, text: string): Broadcast {
	return { scope: BROADCAST_SCOPE.NETWORK, network, text };
}

export function toNotice(network: string, nick: string, text: string): Broadcast {
	return { scope: BROADCAST_SCOPE.NOTICE, network, nick, text };
}

export function toPrivate(network: string, nick: string, text: string): Broadcast {
	return { scope: BROADCAST_SCOPE.PRIVATE, network, nick, text };
}
