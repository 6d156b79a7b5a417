import { ConfigError } from "@tickscope/core";

/**
 * Fixed-capacity circular buffer holding values in arrival order.
 *
 * - push() is O(1); once full it overwrites the oldest slot and hands the
 *   evicted value back so dependent state can account for the removal
 * - at() addresses by logical position (0 = oldest) in O(1)
 * - toArray() copies oldest → newest and is meant for (re)initialization,
 *   not for the per-tick path
 */
export class RollingBuffer<T extends NonNullable<unknown>> {
	private readonly slots: Array<T | undefined>;
	private head = 0;
	private size = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new ConfigError(
				"InvalidConfig",
				`Rolling buffer capacity must be a positive integer, got ${capacity}`,
				{ capacity }
			);
		}
		this.slots = new Array<T | undefined>(capacity);
	}

	get length(): number {
		return this.size;
	}

	isFull(): boolean {
		return this.size === this.capacity;
	}

	isEmpty(): boolean {
		return this.size === 0;
	}

	/**
	 * Append a value. Returns the evicted (oldest) value when the buffer was
	 * already full, otherwise undefined.
	 */
	push(value: T): T | undefined {
		if (this.size < this.capacity) {
			this.slots[(this.head + this.size) % this.capacity] = value;
			this.size += 1;
			return undefined;
		}
		const evicted = this.slots[this.head];
		this.slots[this.head] = value;
		this.head = (this.head + 1) % this.capacity;
		return evicted;
	}

	/** Remove and return the oldest value. */
	shift(): T | undefined {
		if (this.size === 0) {
			return undefined;
		}
		const value = this.slots[this.head];
		this.slots[this.head] = undefined;
		this.head = (this.head + 1) % this.capacity;
		this.size -= 1;
		return value;
	}

	/** Value at logical position `index` (0 = oldest). */
	at(index: number): T | undefined {
		if (!Number.isInteger(index) || index < 0 || index >= this.size) {
			return undefined;
		}
		return this.slots[(this.head + index) % this.capacity];
	}

	latest(): T | undefined {
		return this.at(this.size - 1);
	}

	/** Ordered copy, oldest → newest. */
	toArray(): T[] {
		const out: T[] = [];
		for (const value of this) {
			out.push(value);
		}
		return out;
	}

	clear(): void {
		this.slots.fill(undefined);
		this.head = 0;
		this.size = 0;
	}

	*[Symbol.iterator](): IterableIterator<T> {
		for (let i = 0; i < this.size; i += 1) {
			const value = this.slots[(this.head + i) % this.capacity];
			if (value !== undefined) {
				yield value;
			}
		}
	}
}
