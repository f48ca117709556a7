/**
 * Async mutual exclusion lock. Waiters are served in FIFO order.
 * Usage: await mutex.runExclusive(async () => { ... });
 */
export class Mutex {
	private locked = false;
	private waiters: Array<() => void> = [];

	get isLocked(): boolean {
		return this.locked;
	}

	async acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return;
		}
		return new Promise<void>((resolve) => {
			this.waiters.push(resolve);
		});
	}

	release(): void {
		const next = this.waiters.shift();
		if (next) {
			// ownership passes straight to the next waiter
			next();
			return;
		}
		this.locked = false;
	}

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
