export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export function createLimiter(limit: number | undefined): Limiter {
	const max = limit && limit > 0 ? Math.floor(limit) : Number.POSITIVE_INFINITY;
	let active = 0;
	const waiting: (() => void)[] = [];

	// A released slot passes straight to the next waiter, so `active` never exceeds `max`.
	const release = (): void => {
		const next = waiting.shift();
		if (next) {
			next();
			return;
		}
		active -= 1;
	};

	return async <T>(task: () => Promise<T>): Promise<T> => {
		if (active >= max) {
			await new Promise<void>((resolve) => waiting.push(resolve));
		} else {
			active += 1;
		}
		try {
			return await task();
		} finally {
			release();
		}
	};
}
