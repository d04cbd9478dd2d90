export class TaskLimiter {
	private readonly concurrency: number;
	private running = 0;
	private queue: Array<() => void> = [];

	constructor(concurrency: number) {
		if (!Number.isInteger(concurrency) || concurrency < 1) {
			throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
		}
		this.concurrency = concurrency;
	}

	get active(): number {
		return this.running;
	}

	get pending(): number {
		return this.queue.length;
	}

	/**
	 * Runs `fn` once a slot is free. A task still queued when `signal` aborts
	 * is rejected with the abort reason without being started.
	 */
	public limit<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			const task = () => {
				if (signal?.aborted) {
					reject(signal.reason);
					return;
				}
				this.running++;
				Promise.resolve()
					.then(fn)
					.then(resolve, reject)
					.finally(() => {
						this.running--;
						this.dequeue();
					});
			};
			if (this.running < this.concurrency) {
				task();
			} else {
				this.queue.push(task);
			}
		});
	}

	private dequeue(): void {
		while (this.running < this.concurrency) {
			const next = this.queue.shift();
			if (!next) return;
			next();
		}
	}
}

export function createTaskLimiter(limit = 5) {
	const limiter = new TaskLimiter(limit);
	return <T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> => limiter.limit(fn, signal);
}
