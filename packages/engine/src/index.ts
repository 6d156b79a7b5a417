export { TickDispatcher } from "./TickDispatcher";
export type { DispatchOutcome } from "./TickDispatcher";
export { InstrumentState, pointFromTick } from "./InstrumentState";
export type { InstrumentStateOptions } from "./InstrumentState";
export { InstrumentLane } from "./InstrumentLane";
export type { EnqueueOutcome, InstrumentLaneOptions } from "./InstrumentLane";
export {
	MAX_DEPTH_LEVELS,
	normalizeTick,
	parseSourceTimestamp,
	readInstrument,
	resolveTimestamp,
	validateTick,
} from "./normalize";
export type {
	NormalizeContext,
	NormalizeResult,
} from "./normalize";
export { analyzeDepth } from "./depth";
export type { DepthMetrics } from "./depth";
export { formatValue, projectSnapshot } from "./projection";
export type { ProjectedSnapshot, ProjectionOptions } from "./projection";
export type {
	DispatcherStats,
	IndicatorSnapshot,
	IndicatorUpdate,
	IndicatorUpdateHandler,
	TickDispatcherOptions,
} from "./types";
