import type {
	HistoryBar,
	Instrument,
	ModuleLogger,
	RawTickEvent,
} from "@tickscope/core";
import type { OHLCV } from "ccxt";

/** Source of historical bars used to pre-warm an instrument. */
export interface HistoricalDataClient {
	/** Bars ordered oldest → newest, at most `limit`. */
	fetchHistory(
		instrument: Instrument,
		timeframe: string,
		limit: number
	): Promise<HistoryBar[]>;
}

/** The slice of a ccxt exchange the history client calls. */
export interface OhlcvSource {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export type RawEventHandler = (event: RawTickEvent) => void;

/** Transport that produces decoded tick events. */
export interface TickFeed {
	start(): Promise<void>;
	stop(): Promise<void>;
	onEvent(handler: RawEventHandler): () => void;
}

/** Anything that accepts historical bars for an instrument. */
export interface BootstrapTarget {
	bootstrap(instrument: Instrument, bars: readonly HistoryBar[]): number;
}

export type DataLogger = Pick<ModuleLogger, "info" | "warn" | "error">;
