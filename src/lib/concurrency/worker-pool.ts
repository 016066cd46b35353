/**
 * Bounded worker pool: N workers draining one shared queue.
 *
 * Fan-out never exceeds `concurrency` in-flight tasks. A failed task does not
 * stop the others. Once the signal aborts, workers stop taking new items and
 * the untouched ones are reported as skipped.
 */

export type PoolOutcome<T, R> =
	| { readonly item: T; readonly status: "fulfilled"; readonly value: R }
	| { readonly item: T; readonly status: "rejected"; readonly reason: unknown }
	| { readonly item: T; readonly status: "skipped" };

export interface PoolOptions {
	readonly concurrency: number;
	readonly signal?: AbortSignal;
}

/**
 * Runs `task` over every item with at most `concurrency` tasks in flight.
 * Outcomes are returned in input order.
 * @throws RangeError if concurrency is not a positive integer
 */
export async function runPool<T, R>(
	items: readonly T[],
	task: (item: T, index: number) => Promise<R>,
	options: PoolOptions,
): Promise<PoolOutcome<T, R>[]> {
	if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
		throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
	}

	const outcomes = new Map<number, PoolOutcome<T, R>>();
	// one iterator shared by all workers: next() is synchronous, so no item is taken twice
	const queue = items.entries();

	const worker = async (): Promise<void> => {
		for (let step = queue.next(); !step.done; step = queue.next()) {
			const [index, item] = step.value;
			if (options.signal?.aborted) {
				outcomes.set(index, { item, status: "skipped" });
				continue;
			}
			try {
				outcomes.set(index, { item, status: "fulfilled", value: await task(item, index) });
			} catch (reason) {
				outcomes.set(index, { item, status: "rejected", reason });
			}
		}
	};

	const workerCount = Math.min(options.concurrency, items.length);
	await Promise.all(Array.from({ length: workerCount }, () => worker()));

	return items.map(
		(item, index): PoolOutcome<T, R> => outcomes.get(index) ?? { item, status: "skipped" },
	);
}
