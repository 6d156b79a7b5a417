import { describe, it, expect, vi } from "vitest";
import { type HistoryBar, createInstrument } from "@tickscope/core";
import { bootstrapFromHistory } from "./bootstrapFromHistory";
import type { BootstrapTarget, DataLogger, HistoricalDataClient } from "../types";

const instrument = createInstrument("BINANCE", "BTC/USDT");

const createTestLogger = (): DataLogger => ({
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const bars: HistoryBar[] = [1, 2, 3].map((close) => ({
	timestamp: close * 60_000,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
}));

describe("bootstrapFromHistory", () => {
	it("hands fetched bars to the target", async () => {
		const received: HistoryBar[][] = [];
		const target: BootstrapTarget = {
			bootstrap: (_instrument, incoming) => {
				received.push([...incoming]);
				return incoming.length;
			},
		};
		const client: HistoricalDataClient = { fetchHistory: vi.fn(async () => bars) };
		const logger = createTestLogger();

		const applied = await bootstrapFromHistory(target, client, instrument, {
			timeframe: "1m",
			limit: 3,
			logger,
		});

		expect(applied).toBe(3);
		expect(client.fetchHistory).toHaveBeenCalledWith(instrument, "1m", 3);
		expect(received).toEqual([bars]);
		expect(logger.info).toHaveBeenCalledWith("history_bootstrap_complete", {
			instrument: "BINANCE:BTC/USDT",
			timeframe: "1m",
			bars: 3,
			lastTimestamp: 180_000,
		});
	});

	it("logs and rethrows when the fetch fails", async () => {
		const logger = createTestLogger();
		const target: BootstrapTarget = { bootstrap: vi.fn(() => 0) };
		const client: HistoricalDataClient = {
			fetchHistory: async () => {
				throw new Error("timeout");
			},
		};

		await expect(
			bootstrapFromHistory(target, client, instrument, { timeframe: "1m", limit: 3, logger })
		).rejects.toThrow("timeout");
		expect(target.bootstrap).not.toHaveBeenCalled();
		expect(logger.error).toHaveBeenCalledWith("history_bootstrap_failed", {
			instrument: "BINANCE:BTC/USDT",
			timeframe: "1m",
			error: "timeout",
		});
	});
});
