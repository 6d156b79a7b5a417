import {
	type DepthTick,
	type HistoryBar,
	type IndicatorSpec,
	type Instrument,
	type PriceTick,
	type SeriesField,
	type SeriesPoint,
	DispatchError,
	indicatorName,
	instrumentKey,
} from "@tickscope/core";
import {
	type IndicatorState,
	RollingBuffer,
	createIndicator,
} from "@tickscope/indicators";
import { type DepthMetrics, analyzeDepth } from "./depth";
import type { IndicatorSnapshot } from "./types";

export interface InstrumentStateOptions {
	capacity: number;
	indicators?: IndicatorSpec[];
	recomputeEvery?: number;
}

const SERIES_FIELDS: readonly SeriesField[] = ["close", "high", "low", "volume"];

export const pointFromTick = (tick: PriceTick): SeriesPoint =>
	tick.kind === "ltp"
		? { close: tick.price, high: tick.price, low: tick.price, volume: 0 }
		: { close: tick.ltp, high: tick.high, low: tick.low, volume: tick.volume };

/**
 * Rolling series and indicator states for one instrument.
 *
 * Not safe to share: exactly one lane applies ticks to an instance, and every
 * apply* call leaves it fully updated before returning.
 */
export class InstrumentState {
	readonly key: string;
	readonly capacity: number;
	private readonly series: Record<SeriesField, RollingBuffer<number>>;
	private readonly indicators = new Map<string, IndicatorState>();
	private readonly recomputeEvery?: number;
	private lastTimestamp = Number.NaN;
	private depth: DepthMetrics | null = null;
	private applied = 0;

	constructor(
		readonly instrument: Instrument,
		options: InstrumentStateOptions
	) {
		this.key = instrumentKey(instrument);
		this.capacity = options.capacity;
		this.recomputeEvery = options.recomputeEvery;
		this.series = {
			close: new RollingBuffer<number>(options.capacity),
			high: new RollingBuffer<number>(options.capacity),
			low: new RollingBuffer<number>(options.capacity),
			volume: new RollingBuffer<number>(options.capacity),
		};
		// build every state first so a bad spec leaves nothing half-registered
		const states = (options.indicators ?? []).map((spec) => this.build(spec));
		for (const state of states) {
			if (!this.indicators.has(state.name)) {
				this.indicators.set(state.name, state);
			}
		}
	}

	get length(): number {
		return this.series.close.length;
	}

	get ticksApplied(): number {
		return this.applied;
	}

	indicatorNames(): string[] {
		return [...this.indicators.keys()];
	}

	/**
	 * Register an indicator and warm it from the buffered series. Returns the
	 * existing state when one with the same name is already registered.
	 */
	addIndicator(spec: IndicatorSpec): IndicatorState {
		const existing = this.indicators.get(indicatorName(spec));
		if (existing) {
			return existing;
		}
		const state = this.build(spec);
		state.initialize(this.series[state.source].toArray());
		this.indicators.set(state.name, state);
		return state;
	}

	applyPrice(tick: PriceTick): void {
		this.applyPoint(pointFromTick(tick));
		this.lastTimestamp = tick.timestamp;
		this.applied += 1;
	}

	applyDepth(tick: DepthTick, metrics: DepthMetrics = analyzeDepth(tick)): void {
		this.depth = metrics;
		this.lastTimestamp = tick.timestamp;
		this.applied += 1;
	}

	/**
	 * Load historical bars (oldest → newest) into the series, then rebuild
	 * every indicator from the buffered slice.
	 */
	bootstrap(bars: readonly HistoryBar[]): number {
		if (this.applied > 0) {
			throw new DispatchError(
				"AlreadyStreaming",
				`Instrument ${this.key} already applied live ticks; bootstrap must run first`,
				{ instrument: this.key }
			);
		}
		for (const bar of bars) {
			this.pushPoint({
				close: bar.close,
				high: bar.high,
				low: bar.low,
				volume: bar.volume,
			});
		}
		if (bars.length > 0) {
			const last = bars[bars.length - 1].timestamp;
			this.lastTimestamp = Number.isNaN(this.lastTimestamp)
				? last
				: Math.max(this.lastTimestamp, last);
		}
		for (const state of this.indicators.values()) {
			state.initialize(this.series[state.source].toArray());
		}
		return bars.length;
	}

	/** Ordered copy of one series, oldest → newest. */
	history(field: SeriesField = "close"): number[] {
		return this.series[field].toArray();
	}

	snapshot(): IndicatorSnapshot {
		const indicators: Record<string, number> = {};
		for (const state of this.indicators.values()) {
			Object.assign(indicators, state.outputs());
		}
		return Object.freeze({
			instrument: this.instrument,
			key: this.key,
			timestamp: this.lastTimestamp,
			close: this.series.close.latest() ?? Number.NaN,
			bufferLength: this.length,
			capacity: this.capacity,
			ticksApplied: this.applied,
			indicators: Object.freeze(indicators),
			depth: this.depth ? Object.freeze({ ...this.depth }) : null,
		});
	}

	private build(spec: IndicatorSpec): IndicatorState {
		return createIndicator(spec, {
			capacity: this.capacity,
			recomputeEvery: this.recomputeEvery,
		});
	}

	private applyPoint(point: SeriesPoint): void {
		// departing values are read before the push overwrites the oldest slot
		for (const state of this.indicators.values()) {
			const buffer = this.series[state.source];
			const departing =
				buffer.length >= state.window
					? buffer.at(buffer.length - state.window)
					: undefined;
			state.update(point[state.source], departing);
		}
		this.pushPoint(point);
	}

	private pushPoint(point: SeriesPoint): void {
		for (const field of SERIES_FIELDS) {
			this.series[field].push(point[field]);
		}
	}
}
