/**
 * FIFO async lock. Callers queue on a promise chain, so each critical section
 * starts only after the previous one settled (resolved or rejected).
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
		let release: () => void = () => undefined;
		const next = new Promise<void>((resolve) => {
			release = resolve;
		});
		const prev = this.tail;
		this.tail = prev.then(() => next);
		this.pending++;

		await prev;
		try {
			return await fn();
		} finally {
			this.pending--;
			release();
		}
	}

	isLocked(): boolean {
		return this.pending > 0;
	}
}
