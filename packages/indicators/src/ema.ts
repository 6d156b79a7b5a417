import type { SeriesField } from "@tickscope/core";
import type { IndicatorState } from "./types";
import { assertPeriod } from "./utils/period";
import { replayInto } from "./utils/replay";

/**
 * Exponential moving average, alpha = 2 / (period + 1).
 *
 * Seeded with the arithmetic mean of the first `period` values. Departing
 * values are ignored: the exponential decay already discounts old data.
 */
export class EmaState implements IndicatorState {
	readonly window: number;
	readonly alpha: number;
	private count = 0;
	private seedSum = 0;
	private value = Number.NaN;

	constructor(
		readonly period: number,
		readonly name = `ema(${period})`,
		readonly source: SeriesField = "close"
	) {
		this.window = assertPeriod("EMA", period);
		this.alpha = 2 / (period + 1);
	}

	get seeded(): boolean {
		return this.count >= this.period;
	}

	update(value: number): number {
		this.count += 1;
		if (this.count < this.period) {
			this.seedSum += value;
			return this.value;
		}
		if (this.count === this.period) {
			this.seedSum += value;
			this.value = this.seedSum / this.period;
			return this.value;
		}
		this.value = this.alpha * value + (1 - this.alpha) * this.value;
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
		this.count = 0;
		this.seedSum = 0;
		this.value = Number.NaN;
	}
}
