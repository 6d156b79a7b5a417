import type { SeriesField } from "@tickscope/core";

/**
 * Incrementally updated indicator. One instance belongs to exactly one
 * instrument and is only ever mutated by that instrument's lane.
 */
export interface IndicatorState {
	/** Snapshot key, e.g. "sma(20)". */
	readonly name: string;
	/** Series the indicator consumes. */
	readonly source: SeriesField;
	/** Samples required before every output is defined. */
	readonly window: number;
	/**
	 * Feed the next value. `departing` is the value leaving this indicator's
	 * `window`-sized window, if one is leaving. Returns the primary output or
	 * NaN during warm-up.
	 */
	update(value: number, departing?: number): number;
	/** Reset, then replay an ordered history (oldest → newest). */
	initialize(history: readonly number[]): number;
	current(): number;
	/** Every output keyed by display name; composites emit several. */
	outputs(): Record<string, number>;
	reset(): void;
}
