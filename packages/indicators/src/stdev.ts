import type { SeriesField } from "@tickscope/core";
import { RollingBuffer } from "./RollingBuffer";
import type { IndicatorState } from "./types";
import { assertPeriod } from "./utils/period";
import { replayInto } from "./utils/replay";

export interface RollingStdDevOptions {
	name?: string;
	source?: SeriesField;
	/** Full two-pass recompute after this many updates. */
	recomputeEvery?: number;
}

const DEFAULT_RECOMPUTE_EVERY = 500;

/**
 * Population standard deviation over a fixed window.
 *
 * Owns its window so the departing value is always exact; mean and M2 are
 * maintained with Welford insert/remove steps and rebuilt from the window
 * every `recomputeEvery` updates to cap accumulated rounding error.
 */
export class RollingStdDevState implements IndicatorState {
	readonly name: string;
	readonly source: SeriesField;
	readonly window: number;
	private readonly recomputeEvery: number;
	private readonly values: RollingBuffer<number>;
	private n = 0;
	private mean = 0;
	private m2 = 0;
	private nanInWindow = 0;
	private sinceRecompute = 0;
	private value = Number.NaN;

	constructor(readonly period: number, options: RollingStdDevOptions = {}) {
		this.window = assertPeriod("StdDev", period);
		this.name = options.name ?? `stdev(${period})`;
		this.source = options.source ?? "close";
		this.recomputeEvery = assertPeriod(
			"StdDev recompute",
			options.recomputeEvery ?? DEFAULT_RECOMPUTE_EVERY
		);
		this.values = new RollingBuffer<number>(period);
	}

	update(value: number): number {
		const evicted = this.values.push(value);
		if (evicted !== undefined) {
			this.remove(evicted);
		}
		this.insert(value);

		this.sinceRecompute += 1;
		if (this.sinceRecompute >= this.recomputeEvery) {
			this.recompute();
		}

		if (!this.values.isFull() || this.nanInWindow > 0) {
			this.value = Number.NaN;
		} else {
			this.value = Math.sqrt(Math.max(this.m2, 0) / this.period);
		}
		return this.value;
	}

	initialize(history: readonly number[]): number {
		this.reset();
		return replayInto(this, history);
	}

	current(): number {
		return this.value;
	}

	outputs(): Record<string, number> {
		return { [this.name]: this.value };
	}

	reset(): void {
		this.values.clear();
		this.n = 0;
		this.mean = 0;
		this.m2 = 0;
		this.nanInWindow = 0;
		this.sinceRecompute = 0;
		this.value = Number.NaN;
	}

	private insert(x: number): void {
		if (Number.isNaN(x)) {
			this.nanInWindow += 1;
			return;
		}
		this.n += 1;
		const delta = x - this.mean;
		this.mean += delta / this.n;
		this.m2 += delta * (x - this.mean);
	}

	private remove(x: number): void {
		if (Number.isNaN(x)) {
			this.nanInWindow -= 1;
			return;
		}
		this.n -= 1;
		if (this.n === 0) {
			this.mean = 0;
			this.m2 = 0;
			return;
		}
		const delta = x - this.mean;
		this.mean -= delta / this.n;
		this.m2 -= delta * (x - this.mean);
	}

	private recompute(): void {
		this.sinceRecompute = 0;
		let n = 0;
		let sum = 0;
		for (const x of this.values) {
			if (!Number.isNaN(x)) {
				n += 1;
				sum += x;
			}
		}
		const mean = n > 0 ? sum / n : 0;
		let m2 = 0;
		for (const x of this.values) {
			if (!Number.isNaN(x)) {
				m2 += (x - mean) * (x - mean);
			}
		}
		this.n = n;
		this.mean = mean;
		this.m2 = m2;
	}
}
