/**
 * Bounded parallelism and spawn spacing for the launch loop.
 */

/**
 * Calculate how many milliseconds to wait before the next session start,
 * given the configured stagger delay and when the previous start happened.
 *
 * Returns 0 if no wait is needed (delay is 0, nothing started yet, or
 * enough time has already elapsed).
 *
 * @param now - Current timestamp in ms (injectable for testing)
 */
export function calculateStaggerDelay(
	staggerDelayMs: number,
	lastStartAt: number | null,
	now: number,
): number {
	if (staggerDelayMs <= 0 || lastStartAt === null) {
		return 0;
	}
	const remaining = staggerDelayMs - (now - lastStartAt);
	return remaining > 0 ? remaining : 0;
}

export type Sleep = (ms: number) => Promise<void>;

/**
 * Build a gate that spaces consecutive starts at least `staggerDelayMs` apart.
 *
 * Each call reserves the next start slot synchronously before waiting, so
 * concurrent callers queue up instead of all firing at the same instant.
 */
export function createStaggerGate(
	staggerDelayMs: number,
	sleep: Sleep,
	clock: () => number = Date.now,
): () => Promise<void> {
	let lastSlot: number | null = null;
	return async () => {
		const now = clock();
		const wait = calculateStaggerDelay(staggerDelayMs, lastSlot, now);
		lastSlot = now + wait;
		if (wait > 0) {
			await sleep(wait);
		}
	};
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 * Results keep input order. `fn` is expected to record its own failures;
 * a rejection rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results = new Array<R>(items.length);
	let next = 0;

	const worker = async (): Promise<void> => {
		while (next < items.length) {
			const i = next++;
			const item = items[i];
			if (item === undefined) continue;
			results[i] = await fn(item, i);
		}
	};

	const width = Math.max(1, Math.min(Math.floor(limit), items.length));
	await Promise.all(Array.from({ length: width }, () => worker()));
	return results;
}
