import {
	type IndicatorSpec,
	assertSpecFitsCapacity,
	indicatorName,
	parseIndicatorSpec,
} from "@tickscope/core";
import { BollingerState } from "./bollinger";
import { EmaState } from "./ema";
import { MacdState } from "./macd";
import { RsiState } from "./rsi";
import { SmaState } from "./sma";
import { RollingStdDevState } from "./stdev";
import type { IndicatorState } from "./types";

export interface CreateIndicatorOptions {
	/** Buffer capacity the indicator will be fed from; checked when given. */
	capacity?: number;
	/** Full recompute cadence for rolling stdev states. */
	recomputeEvery?: number;
}

/**
 * Build the state for a spec. Specs built in code get the same checks as
 * ones read from config; throws ConfigError.
 */
export const createIndicator = (
	input: IndicatorSpec,
	options: CreateIndicatorOptions = {}
): IndicatorState => {
	const spec = parseIndicatorSpec(input);
	if (options.capacity !== undefined) {
		assertSpecFitsCapacity(spec, options.capacity);
	}
	const name = indicatorName(spec);
	const source = spec.source ?? "close";
	switch (spec.kind) {
		case "sma":
			return new SmaState(spec.period, name, source);
		case "ema":
			return new EmaState(spec.period, name, source);
		case "rsi":
			return new RsiState(spec.period, name, source);
		case "stdev":
			return new RollingStdDevState(spec.period, {
				name,
				source,
				recomputeEvery: options.recomputeEvery,
			});
		case "macd":
			return new MacdState({
				fast: spec.fast,
				slow: spec.slow,
				signal: spec.signal,
				name,
				source,
			});
		case "bollinger":
			return new BollingerState({
				period: spec.period,
				multiplier: spec.multiplier,
				name,
				source,
			});
	}
};
