import { DEFAULT_BOLLINGER, type SeriesField } from "@tickscope/core";
import { SmaState } from "./sma";
import { RollingStdDevState } from "./stdev";
import type { IndicatorState } from "./types";
import { replayInto } from "./utils/replay";

export interface BollingerBands {
	middle: number;
	upper: number;
	lower: number;
}

export interface BollingerOptions {
	period?: number;
	multiplier?: number;
	name?: string;
	source?: SeriesField;
}

export class BollingerState implements IndicatorState {
	readonly name: string;
	readonly source: SeriesField;
	readonly window: number;
	readonly multiplier: number;
	private readonly sma: SmaState;
	private readonly stdev: RollingStdDevState;
	private bands: BollingerBands = {
		middle: Number.NaN,
		upper: Number.NaN,
		lower: Number.NaN,
	};

	constructor(options: BollingerOptions = {}) {
		const period = options.period ?? DEFAULT_BOLLINGER.period;
		this.multiplier = options.multiplier ?? DEFAULT_BOLLINGER.multiplier;
		this.sma = new SmaState(period);
		this.stdev = new RollingStdDevState(period);
		this.window = period;
		this.name = options.name ?? `bollinger(${period},${this.multiplier})`;
		this.source = options.source ?? "close";
	}

	update(value: number, departing?: number): number {
		const middle = this.sma.update(value, departing);
		const width = this.multiplier * this.stdev.update(value);
		this.bands = { middle, upper: middle + width, lower: middle - width };
		return middle;
	}

	read(): BollingerBands {
		return { ...this.bands };
	}

	initialize(history: readonly number[]): number {
		this.reset();
		return replayInto(this, history);
	}

	current(): number {
		return this.bands.middle;
	}

	outputs(): Record<string, number> {
		return {
			[`${this.name}.middle`]: this.bands.middle,
			[`${this.name}.upper`]: this.bands.upper,
			[`${this.name}.lower`]: this.bands.lower,
		};
	}

	reset(): void {
		this.sma.reset();
		this.stdev.reset();
		this.bands = { middle: Number.NaN, upper: Number.NaN, lower: Number.NaN };
	}
}
