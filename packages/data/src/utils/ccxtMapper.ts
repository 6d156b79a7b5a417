import type { OHLCV } from "ccxt";
import type { HistoryBar } from "@tickscope/core";

/**
 * Map a ccxt OHLCV row to a HistoryBar. Rows with a missing timestamp or a
 * non-positive close are unusable for warm-up and yield undefined.
 */
export const mapOhlcvToBar = (row: OHLCV): HistoryBar | undefined => {
	const [timestamp, open, high, low, close, volume] = row;
	const bar: HistoryBar = {
		timestamp: Number(timestamp ?? Number.NaN),
		open: Number(open ?? close ?? Number.NaN),
		high: Number(high ?? close ?? Number.NaN),
		low: Number(low ?? close ?? Number.NaN),
		close: Number(close ?? Number.NaN),
		volume: Number(volume ?? 0),
	};
	if (!Number.isFinite(bar.timestamp) || !Number.isFinite(bar.close) || bar.close <= 0) {
		return undefined;
	}
	return bar;
};

/** Map, drop unusable rows, sort oldest first and keep one bar per timestamp. */
export const mapOhlcvRows = (rows: readonly OHLCV[]): HistoryBar[] => {
	const byTimestamp = new Map<number, HistoryBar>();
	for (const row of rows) {
		const bar = mapOhlcvToBar(row);
		if (bar) {
			byTimestamp.set(bar.timestamp, bar);
		}
	}
	return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
};
