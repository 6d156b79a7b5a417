export interface Instrument {
	readonly exchange: string;
	readonly symbol: string;
}

export type TickKind = "ltp" | "quote" | "depth";

/** Parallel series kept per instrument; every indicator reads one of them. */
export type SeriesField = "close" | "high" | "low" | "volume";

export interface SeriesPoint {
	close: number;
	high: number;
	low: number;
	volume: number;
}

export interface LtpTick {
	kind: "ltp";
	instrument: Instrument;
	price: number;
	timestamp: number;
}

export interface QuoteTick {
	kind: "quote";
	instrument: Instrument;
	open: number;
	high: number;
	low: number;
	close: number;
	ltp: number;
	volume: number;
	timestamp: number;
}

export interface DepthLevel {
	price: number;
	quantity: number;
	orders?: number;
}

export interface DepthTick {
	kind: "depth";
	instrument: Instrument;
	/** Best first (price descending), at most 5 levels. */
	bids: DepthLevel[];
	/** Best first (price ascending), at most 5 levels. */
	asks: DepthLevel[];
	totalBuyQty: number;
	totalSellQty: number;
	timestamp: number;
}

export type Tick = LtpTick | QuoteTick | DepthTick;
export type PriceTick = LtpTick | QuoteTick;

/**
 * Decoded transport event, before validation. Field names follow the common
 * broker feed shapes; numbers may still arrive as strings.
 */
export interface RawDepthLevel {
	price?: unknown;
	quantity?: unknown;
	qty?: unknown;
	orders?: unknown;
}

export interface RawTickEvent {
	exchange?: unknown;
	symbol?: unknown;
	mode?: unknown;
	timestamp?: unknown;
	ltp?: unknown;
	price?: unknown;
	open?: unknown;
	high?: unknown;
	low?: unknown;
	close?: unknown;
	volume?: unknown;
	bids?: unknown;
	asks?: unknown;
	totalBuyQty?: unknown;
	totalSellQty?: unknown;
}

/** Historical OHLCV bar used to pre-warm a rolling buffer. */
export interface HistoryBar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({
	ok: false,
	error,
});

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
