/**
 * KeyedLock: serializes async critical sections per key.
 *
 * Each key owns a promise chain; sections for the same key run one after
 * another, sections for different keys run freely. Idle keys are dropped.
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	/** Runs `fn` once every earlier section for `key` has settled. */
	async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await fn();
		} finally {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/** Number of keys with a section running or queued. */
	get activeKeys(): number {
		return this.tails.size;
	}
}
