/**
 * Injectable randomness.
 *
 * Game logic never calls `Math.random`; it receives a {@link Random} so
 * tests can replay exact outcomes from a seed.
 *
 * @module core/random
 */

export interface Random {
	/** Uniform float in [0, 1). */
	next(): number;
	/** Uniform integer in [min, max], both ends included. */
	int(min: number, max: number): number;
	/** True with probability `p`. */
	chance(p: number): boolean;
	pick<T>(items: readonly T[]): T | undefined;
	/** Up to `count` distinct elements in random order. */
	sample<T>(items: readonly T[], count: number): T[];
}

/** xorshift32 generator. */
export class RNG implements Random {
	private state: number;

	constructor(seed: number) {
		// xorshift never leaves an all-zero state
		this.state = seed >>> 0 || 0x9e3779b9;
	}

	next(): number {
		let x = this.state;
		x ^= x << 13;
		x ^= x >>> 17;
		x ^= x << 5;
		this.state = x >>> 0;
		return this.state / 0x100000000;
	}

	int(min: number, max: number): number {
		if (max < min) return min;
		return min + Math.floor(this.next() * (max - min + 1));
	}

	chance(p: number): boolean {
		return this.next() < p;
	}

	pick<T>(items: readonly T[]): T | undefined {
		if (items.length === 0) return undefined;
		return items[this.int(0, items.length - 1)];
	}

	sample<T>(items: readonly T[], count: number): T[] {
		const pool = [...items];
		const taken = Math.min(count, pool.length);
		for (let i = 0; i < taken; i++) {
			const j = this.int(i, pool.length - 1);
			[pool[i], pool[j]] = [pool[j], pool[i]];
		}
		return pool.slice(0, taken);
	}
}

/**
 * Replays a fixed list of `next()` values, cycling when exhausted.
 * Used by tests that need one specific outcome.
 */
export class ScriptedRandom extends RNG {
	private index = 0;
	constructor(private readonly values: readonly number[]) {
		super(1);
	}

	override next(): number {
		if (this.values.length === 0) return 0;
		const value = this.values[this.index % this.values.length];
		this.index++;
		return value;
	}
}
