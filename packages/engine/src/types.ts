import type {
	Instrument,
	ModuleLogger,
	OverflowPolicy,
	StaleTickPolicy,
	Clock,
	IndicatorSpec,
	Tick,
} from "@tickscope/core";
import type { DepthMetrics } from "./depth";

/** Point-in-time copy of one instrument's state. Frozen. */
export interface IndicatorSnapshot {
	readonly instrument: Instrument;
	readonly key: string;
	/** Timestamp of the last applied tick, NaN before the first one. */
	readonly timestamp: number;
	readonly close: number;
	readonly bufferLength: number;
	readonly capacity: number;
	readonly ticksApplied: number;
	readonly indicators: Readonly<Record<string, number>>;
	readonly depth: Readonly<DepthMetrics> | null;
}

/** Emitted after every applied tick. */
export interface IndicatorUpdate {
	tick: Tick;
	snapshot: IndicatorSnapshot;
}

export type IndicatorUpdateHandler = (
	update: IndicatorUpdate
) => void | Promise<void>;

export interface TickDispatcherOptions {
	bufferCapacity?: number;
	queueDepth?: number;
	overflowPolicy?: OverflowPolicy;
	staleTickPolicy?: StaleTickPolicy;
	/** Used by subscribe() when no specs are passed. */
	defaultIndicators?: IndicatorSpec[];
	/** Ticks applied per lane turn before yielding to other lanes. */
	batchSize?: number;
	recomputeEvery?: number;
	clock?: Clock;
	logger?: ModuleLogger;
	/** Defers lane drains; setImmediate unless overridden. */
	schedule?: (task: () => void) => void;
}

export interface DispatcherStats {
	ticksReceived: number;
	ticksQueued: number;
	ticksApplied: number;
	invalidTicks: number;
	staleTicks: number;
	unknownInstrument: number;
	overflowDrops: number;
	droppedOnUnsubscribe: number;
	laneErrors: number;
	handlerErrors: number;
	activeInstruments: number;
	pendingTicks: number;
}
