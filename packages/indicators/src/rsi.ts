import { DEFAULT_RSI_PERIOD, type SeriesField } from "@tickscope/core";
import type { IndicatorState } from "./types";
import { assertPeriod } from "./utils/period";
import { replayInto } from "./utils/replay";

export const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0 && avgGain > 0) {
		return 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Wilder RSI. The first `period` deltas are averaged, later ones use
 * Wilder smoothing (avg * (period - 1) + current) / period. Needs
 * period + 1 closes before the first value.
 */
export class RsiState implements IndicatorState {
	readonly window: number;
	private count = 0;
	private prevClose = Number.NaN;
	private gainSum = 0;
	private lossSum = 0;
	private avgGain = Number.NaN;
	private avgLoss = Number.NaN;
	private value = Number.NaN;

	constructor(
		readonly period: number = DEFAULT_RSI_PERIOD,
		readonly name = `rsi(${period})`,
		readonly source: SeriesField = "close"
	) {
		this.window = assertPeriod("RSI", period) + 1;
	}

	update(value: number): number {
		this.count += 1;
		if (this.count === 1) {
			this.prevClose = value;
			return this.value;
		}

		const delta = value - this.prevClose;
		this.prevClose = value;
		const gain = Math.max(delta, 0);
		const loss = Math.max(-delta, 0);
		const deltas = this.count - 1;

		if (deltas < this.period) {
			this.gainSum += gain;
			this.lossSum += loss;
			return this.value;
		}

		if (deltas === this.period) {
			this.avgGain = (this.gainSum + gain) / this.period;
			this.avgLoss = (this.lossSum + loss) / this.period;
		} else {
			this.avgGain = (this.avgGain * (this.period - 1) + gain) / this.period;
			this.avgLoss = (this.avgLoss * (this.period - 1) + loss) / this.period;
		}

		this.value = rsiFromAverages(this.avgGain, this.avgLoss);
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
		this.prevClose = Number.NaN;
		this.gainSum = 0;
		this.lossSum = 0;
		this.avgGain = Number.NaN;
		this.avgLoss = Number.NaN;
		this.value = Number.NaN;
	}
}
