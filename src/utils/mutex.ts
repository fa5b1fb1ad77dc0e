/**
 * Promise-chained mutual exclusion. Tasks run one at a time in call order;
 * a rejected task releases the lock for the next one.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	run<T>(task: () => T | Promise<T>): Promise<T> {
		this.pending++;
		const result = this.tail.then(task);
		this.tail = result.then(
			() => {
				this.pending--;
			},
			() => {
				this.pending--;
			}
		);
		return result;
	}

	/** Tasks queued or running. */
	get size(): number {
		return this.pending;
	}
}
