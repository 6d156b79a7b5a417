import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadEngineConfig, parseEngineConfig } from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");
const FEED = { url: "ws://127.0.0.1:9000/ticks" };

const captureConfigError = (fn: () => unknown): ConfigError => {
	try {
		fn();
	} catch (error) {
		if (error instanceof ConfigError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected a ConfigError");
};

describe("parseEngineConfig", () => {
	it("fills defaults for a minimal profile", () => {
		expect(parseEngineConfig({ feed: FEED }, "test")).toEqual({
			profile: "test",
			bufferCapacity: 200,
			queueDepth: 1024,
			overflowPolicy: "drop-newest",
			staleTickPolicy: "restamp",
			indicators: [],
			instruments: [],
			feed: { url: "ws://127.0.0.1:9000/ticks", mode: "quote", reconnectDelayMs: 1000 },
			history: { enabled: true, exchangeId: "binance", timeframe: "1m", limit: 200 },
			snapshotIntervalMs: 5000,
		});
	});

	it("lets environment overrides win over the file", () => {
		const config = parseEngineConfig({ bufferCapacity: 100, feed: FEED }, "test", {
			BUFFER_CAPACITY: "50",
			FEED_URL: " ws://override/ticks ",
			HISTORY_EXCHANGE: "KRAKEN",
			QUEUE_DEPTH: "",
		});
		expect(config.bufferCapacity).toBe(50);
		expect(config.queueDepth).toBe(1024);
		expect(config.feed.url).toBe("ws://override/ticks");
		expect(config.history).toEqual({
			enabled: true,
			exchangeId: "kraken",
			timeframe: "1m",
			limit: 50,
		});
	});

	it("rejects indicators that need more samples than the buffer holds", () => {
		const error = captureConfigError(() =>
			parseEngineConfig(
				{ bufferCapacity: 10, feed: FEED, indicators: [{ kind: "sma", period: 20 }] },
				"test"
			)
		);
		expect(error.code).toBe("PeriodExceedsCapacity");
		expect(error.details).toEqual({ indicator: "sma(20)", window: 20, capacity: 10 });
	});

	it("checks per-instrument indicators against the overridden capacity", () => {
		const error = captureConfigError(() =>
			parseEngineConfig(
				{
					feed: FEED,
					instruments: [{ exchange: "NSE", symbol: "INFY", indicators: [{ kind: "rsi" }] }],
				},
				"test",
				{ BUFFER_CAPACITY: "14" }
			)
		);
		expect(error.code).toBe("PeriodExceedsCapacity");
		expect(error.details.window).toBe(15);
	});

	it("rejects unknown policies and modes", () => {
		expect(
			captureConfigError(() =>
				parseEngineConfig({ feed: FEED, overflowPolicy: "block" }, "test")
			).message
		).toBe('overflowPolicy must be "drop-newest" or "drop-oldest"');
		expect(
			captureConfigError(() =>
				parseEngineConfig({ feed: FEED, staleTickPolicy: "ignore" }, "test")
			).code
		).toBe("InvalidConfig");
		expect(
			captureConfigError(() =>
				parseEngineConfig({ feed: { ...FEED, mode: "ohlc" } }, "test")
			).message
		).toBe("feed.mode must be ltp, quote or depth");
	});

	it("requires a feed url and positive integers", () => {
		expect(captureConfigError(() => parseEngineConfig({}, "test")).details).toEqual({
			field: "feed.url",
			value: undefined,
		});
		expect(
			captureConfigError(() =>
				parseEngineConfig({ feed: FEED, bufferCapacity: 2.5 }, "test")
			).message
		).toBe("Config field bufferCapacity must be a positive integer, got 2.5");
		expect(
			captureConfigError(() =>
				parseEngineConfig({ feed: FEED }, "test", { QUEUE_DEPTH: "lots" })
			).details
		).toEqual({ field: "QUEUE_DEPTH", value: Number.NaN });
		expect(captureConfigError(() => parseEngineConfig([], "test")).code).toBe(
			"InvalidConfig"
		);
	});
});

describe("loadEngineConfig", () => {
	it("reads a named profile and canonicalizes instruments", () => {
		const config = loadEngineConfig({ configDir: FIXTURE_DIR, profile: "desk", env: {} });
		expect(config.profile).toBe("desk");
		expect(config.bufferCapacity).toBe(30);
		expect(config.overflowPolicy).toBe("drop-oldest");
		expect(config.instruments).toEqual([
			{ instrument: { exchange: "NSE", symbol: "INFY" } },
			{
				instrument: { exchange: "NSE", symbol: "TCS" },
				indicators: [{ kind: "rsi", period: 7 }],
			},
		]);
		expect(config.feed).toEqual({
			url: "ws://127.0.0.1:9001/ticks",
			mode: "depth",
			reconnectDelayMs: 1000,
		});
		expect(config.history.enabled).toBe(false);
		expect(config.history.limit).toBe(30);
	});

	it("falls back to ENGINE_PROFILE", () => {
		const config = loadEngineConfig({
			configDir: FIXTURE_DIR,
			env: { ENGINE_PROFILE: " desk " },
		});
		expect(config.profile).toBe("desk");
	});

	it("reports missing and malformed files", () => {
		const missing = captureConfigError(() =>
			loadEngineConfig({ configDir: FIXTURE_DIR, profile: "absent", env: {} })
		);
		expect(missing.details.path).toBe(path.join(FIXTURE_DIR, "engine", "absent.json"));

		const broken = captureConfigError(() =>
			loadEngineConfig({ configDir: FIXTURE_DIR, profile: "broken", env: {} })
		);
		expect(broken.message).toMatch(/is not valid JSON/);
	});
});
