import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import {
	type HistoryBar,
	type Instrument,
	ConfigError,
	createLogger,
	describeError,
	instrumentKey,
} from "@tickscope/core";
import { mapOhlcvRows } from "../utils/ccxtMapper";
import type { DataLogger, HistoricalDataClient, OhlcvSource } from "../types";

export type HistoryExchangeId = "binance" | "mexc";

const EXCHANGE_FACTORIES: Record<HistoryExchangeId, () => Exchange> = {
	binance: () =>
		new ccxt.binance({
			enableRateLimit: true,
			options: { defaultType: "spot" },
		}),
	mexc: () =>
		new ccxt.mexc({
			enableRateLimit: true,
			options: { defaultType: "spot" },
		}),
};

export const isHistoryExchangeId = (value: string): value is HistoryExchangeId =>
	value === "binance" || value === "mexc";

export interface CcxtHistoryClientOptions {
	exchangeId: string;
	/** Injected exchange, mainly for tests; built from exchangeId otherwise. */
	source?: OhlcvSource;
	logger?: DataLogger;
}

/**
 * Historical bars over ccxt's public OHLCV endpoint. Instrument symbols are
 * passed through as ccxt market symbols, e.g. "BTC/USDT".
 */
export class CcxtHistoryClient implements HistoricalDataClient {
	readonly exchangeId: HistoryExchangeId;
	private readonly source: OhlcvSource;
	private readonly logger: DataLogger;

	constructor(options: CcxtHistoryClientOptions) {
		const exchangeId = options.exchangeId.trim().toLowerCase();
		if (!isHistoryExchangeId(exchangeId)) {
			throw new ConfigError(
				"InvalidConfig",
				`Unsupported history exchange "${options.exchangeId}", expected binance or mexc`,
				{ exchangeId: options.exchangeId }
			);
		}
		this.exchangeId = exchangeId;
		this.source = options.source ?? EXCHANGE_FACTORIES[exchangeId]();
		this.logger = options.logger ?? createLogger("data:history");
	}

	async fetchHistory(
		instrument: Instrument,
		timeframe: string,
		limit: number
	): Promise<HistoryBar[]> {
		try {
			const rows = await this.source.fetchOHLCV(
				instrument.symbol,
				timeframe,
				undefined,
				limit
			);
			const bars = mapOhlcvRows(rows).slice(-limit);
			this.logger.info("history_fetched", {
				exchange: this.exchangeId,
				instrument: instrumentKey(instrument),
				timeframe,
				requested: limit,
				received: rows.length,
				bars: bars.length,
			});
			return bars;
		} catch (error) {
			this.logger.error("history_fetch_failed", {
				exchange: this.exchangeId,
				instrument: instrumentKey(instrument),
				timeframe,
				error: describeError(error),
			});
			throw error;
		}
	}
}
