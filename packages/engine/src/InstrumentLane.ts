import type { OverflowPolicy } from "@tickscope/core";
import { RollingBuffer } from "@tickscope/indicators";

export type EnqueueOutcome =
	| "queued"
	/** Queued, but the oldest pending item was discarded to make room. */
	| "dropped-oldest"
	/** Rejected because the queue was full. */
	| "dropped-newest"
	| "closed";

export interface InstrumentLaneOptions<T> {
	depth: number;
	policy: OverflowPolicy;
	apply: (item: T) => void;
	/** Called when apply() throws; the lane moves on to the next item. */
	onError: (error: unknown, item: T) => void;
	batchSize?: number;
	schedule?: (task: () => void) => void;
}

const defaultSchedule = (task: () => void): void => {
	setImmediate(task);
};

/**
 * Bounded FIFO owned by one instrument. Items are applied one at a time on a
 * deferred turn, so enqueue() never runs apply() inline and two items of the
 * same lane are never applied concurrently.
 */
export class InstrumentLane<T extends NonNullable<unknown>> {
	private readonly queue: RollingBuffer<T>;
	private readonly policy: OverflowPolicy;
	private readonly apply: (item: T) => void;
	private readonly onError: (error: unknown, item: T) => void;
	private readonly batchSize: number;
	private readonly schedule: (task: () => void) => void;
	private readonly idleWaiters: Array<() => void> = [];
	private scheduled = false;
	private isClosed = false;
	private appliedCount = 0;

	constructor(options: InstrumentLaneOptions<T>) {
		this.queue = new RollingBuffer<T>(options.depth);
		this.policy = options.policy;
		this.apply = options.apply;
		this.onError = options.onError;
		this.batchSize = Math.max(1, options.batchSize ?? 64);
		this.schedule = options.schedule ?? defaultSchedule;
	}

	get pending(): number {
		return this.queue.length;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	get applied(): number {
		return this.appliedCount;
	}

	enqueue(item: T): EnqueueOutcome {
		if (this.isClosed) {
			return "closed";
		}
		let outcome: EnqueueOutcome = "queued";
		if (this.queue.isFull()) {
			if (this.policy === "drop-newest") {
				return "dropped-newest";
			}
			outcome = "dropped-oldest";
		}
		this.queue.push(item);
		this.scheduleDrain();
		return outcome;
	}

	/** Resolves once nothing is pending. */
	idle(): Promise<void> {
		if (this.queue.isEmpty() && !this.scheduled) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	/**
	 * Stop the lane. Pending items are discarded in one step and nothing is
	 * applied afterwards. Returns the number discarded.
	 */
	close(): number {
		if (this.isClosed) {
			return 0;
		}
		this.isClosed = true;
		const dropped = this.queue.length;
		this.queue.clear();
		this.settleIdle();
		return dropped;
	}

	private scheduleDrain(): void {
		if (this.scheduled) {
			return;
		}
		this.scheduled = true;
		this.schedule(() => this.drain());
	}

	private drain(): void {
		this.scheduled = false;
		let processed = 0;
		while (!this.isClosed && processed < this.batchSize) {
			const item = this.queue.shift();
			if (item === undefined) {
				break;
			}
			processed += 1;
			try {
				this.apply(item);
				this.appliedCount += 1;
			} catch (error) {
				this.onError(error, item);
			}
		}
		if (!this.isClosed && !this.queue.isEmpty()) {
			// yield so other lanes get a turn
			this.scheduleDrain();
			return;
		}
		this.settleIdle();
	}

	private settleIdle(): void {
		const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
		waiters.forEach((resolve) => resolve());
	}
}
