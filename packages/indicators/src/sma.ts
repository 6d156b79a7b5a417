import type { SeriesField } from "@tickscope/core";
import type { IndicatorState } from "./types";
import { CompensatedSum } from "./utils/compensatedSum";
import { assertPeriod } from "./utils/period";
import { replayInto } from "./utils/replay";

/**
 * Simple moving average over the last `period` values.
 *
 * Keeps a running sum; the caller passes the value leaving the window so
 * the update never rescans history. NaN inputs are counted while they sit
 * inside the window and force a NaN output until they leave it.
 */
export class SmaState implements IndicatorState {
	readonly window: number;
	private readonly sum = new CompensatedSum();
	private count = 0;
	private nanInWindow = 0;
	private value = Number.NaN;

	constructor(
		readonly period: number,
		readonly name = `sma(${period})`,
		readonly source: SeriesField = "close"
	) {
		this.window = assertPeriod("SMA", period);
	}

	update(value: number, departing?: number): number {
		this.count += 1;
		if (Number.isNaN(value)) {
			this.nanInWindow += 1;
		} else {
			this.sum.add(value);
		}

		if (this.count > this.period) {
			if (departing === undefined) {
				throw new RangeError(
					`${this.name} needs the departing value once its window is full`
				);
			}
			if (Number.isNaN(departing)) {
				this.nanInWindow -= 1;
			} else {
				this.sum.subtract(departing);
			}
		}

		if (this.count < this.period) {
			this.value = Number.NaN;
		} else {
			this.value =
				this.nanInWindow > 0
					? Number.NaN
					: this.sum.value / Math.min(this.count, this.period);
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
		this.sum.reset();
		this.count = 0;
		this.nanInWindow = 0;
		this.value = Number.NaN;
	}
}
