import type { DepthMetrics } from "./depth";
import type { IndicatorSnapshot } from "./types";

export interface ProjectionOptions {
	/** Digits after the decimal point. */
	precision?: number;
}

export interface ProjectedSnapshot {
	instrument: string;
	timestamp: string | null;
	close: string | null;
	bufferLength: number;
	ticksApplied: number;
	indicators: Record<string, string | null>;
	depth: Record<keyof DepthMetrics, string | null> | null;
}

export const formatValue = (value: number, precision = 4): string | null =>
	Number.isFinite(value) ? value.toFixed(precision) : null;

const formatTimestamp = (value: number): string | null =>
	Number.isFinite(value) ? new Date(value).toISOString() : null;

/** Display form of a snapshot: fixed precision, NaN (warm-up) → null. */
export const projectSnapshot = (
	snapshot: IndicatorSnapshot,
	options: ProjectionOptions = {}
): ProjectedSnapshot => {
	const precision = options.precision ?? 4;
	const indicators: Record<string, string | null> = {};
	for (const [name, value] of Object.entries(snapshot.indicators)) {
		indicators[name] = formatValue(value, precision);
	}
	const depth = snapshot.depth;
	return {
		instrument: snapshot.key,
		timestamp: formatTimestamp(snapshot.timestamp),
		close: formatValue(snapshot.close, precision),
		bufferLength: snapshot.bufferLength,
		ticksApplied: snapshot.ticksApplied,
		indicators,
		depth: depth
			? {
					bestBid: formatValue(depth.bestBid, precision),
					bestAsk: formatValue(depth.bestAsk, precision),
					spread: formatValue(depth.spread, precision),
					midPrice: formatValue(depth.midPrice, precision),
					buySellImbalanceRatio: formatValue(depth.buySellImbalanceRatio, precision),
					spreadBps: formatValue(depth.spreadBps, 2),
					bidQtyTop: formatValue(depth.bidQtyTop, precision),
					askQtyTop: formatValue(depth.askQtyTop, precision),
					levelImbalanceRatio: formatValue(depth.levelImbalanceRatio, precision),
			  }
			: null,
	};
};
