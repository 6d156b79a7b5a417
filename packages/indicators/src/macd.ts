import { DEFAULT_MACD, type SeriesField } from "@tickscope/core";
import { EmaState } from "./ema";
import type { IndicatorState } from "./types";
import { replayInto } from "./utils/replay";

export interface MacdResult {
	macd: number;
	signal: number;
	histogram: number;
}

export interface MacdOptions {
	fast?: number;
	slow?: number;
	signal?: number;
	name?: string;
	source?: SeriesField;
}

/**
 * MACD built from three EmaStates: the line (fast − slow) starts once the
 * slow EMA is seeded, the signal line is an EMA of the MACD line.
 */
export class MacdState implements IndicatorState {
	readonly name: string;
	readonly source: SeriesField;
	readonly window: number;
	private readonly fastEma: EmaState;
	private readonly slowEma: EmaState;
	private readonly signalEma: EmaState;
	private result: MacdResult = {
		macd: Number.NaN,
		signal: Number.NaN,
		histogram: Number.NaN,
	};

	constructor(options: MacdOptions = {}) {
		const fast = options.fast ?? DEFAULT_MACD.fast;
		const slow = options.slow ?? DEFAULT_MACD.slow;
		const signal = options.signal ?? DEFAULT_MACD.signal;
		this.fastEma = new EmaState(fast);
		this.slowEma = new EmaState(slow);
		this.signalEma = new EmaState(signal);
		this.window = slow + signal - 1;
		this.name = options.name ?? `macd(${fast},${slow},${signal})`;
		this.source = options.source ?? "close";
	}

	update(value: number): number {
		const fast = this.fastEma.update(value);
		const slow = this.slowEma.update(value);
		if (!this.slowEma.seeded) {
			return this.result.macd;
		}
		const macd = fast - slow;
		const signal = this.signalEma.update(macd);
		this.result = { macd, signal, histogram: macd - signal };
		return macd;
	}

	read(): MacdResult {
		return { ...this.result };
	}

	initialize(history: readonly number[]): number {
		this.reset();
		return replayInto(this, history);
	}

	current(): number {
		return this.result.macd;
	}

	outputs(): Record<string, number> {
		return {
			[this.name]: this.result.macd,
			[`${this.name}.signal`]: this.result.signal,
			[`${this.name}.histogram`]: this.result.histogram,
		};
	}

	reset(): void {
		this.fastEma.reset();
		this.slowEma.reset();
		this.signalEma.reset();
		this.result = {
			macd: Number.NaN,
			signal: Number.NaN,
			histogram: Number.NaN,
		};
	}
}
