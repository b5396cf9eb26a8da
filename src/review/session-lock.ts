/**
 * Serializes async work per key. Tasks for one key run one after another in
 * call order; tasks for different keys never wait on each other.
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const result = previous.then(task);

		// The chain only tracks completion; the caller still sees the failure through `result`
		const tail = result.then(
			() => undefined,
			() => undefined
		);
		this.tails.set(key, tail);

		return result.finally(() => {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		});
	}

	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}
