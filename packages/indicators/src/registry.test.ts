import { describe, it, expect } from "vitest";
import { ConfigError } from "@tickscope/core";
import { createIndicator } from "./registry";
import { EmaState } from "./ema";
import { MacdState } from "./macd";

describe("createIndicator", () => {
	it("builds the state for each kind with its display name", () => {
		expect(createIndicator({ kind: "sma", period: 20 }).name).toBe("sma(20)");
		expect(createIndicator({ kind: "rsi" }).name).toBe("rsi(14)");
		expect(createIndicator({ kind: "stdev", period: 10 }).window).toBe(10);
		expect(createIndicator({ kind: "ema", period: 9 })).toBeInstanceOf(EmaState);
		expect(createIndicator({ kind: "macd" })).toBeInstanceOf(MacdState);
		expect(createIndicator({ kind: "bollinger" }).name).toBe("bollinger(20,2)");
	});

	it("carries a non-close source into the name and state", () => {
		const state = createIndicator({ kind: "sma", period: 5, source: "volume" });
		expect(state.name).toBe("sma(5,volume)");
		expect(state.source).toBe("volume");
	});

	it("rejects indicators that cannot fit the buffer", () => {
		let caught: unknown;
		try {
			createIndicator({ kind: "rsi", period: 14 }, { capacity: 14 });
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(ConfigError);
		expect(caught).toMatchObject({ code: "PeriodExceedsCapacity" });
	});

	it("accepts an indicator whose window equals the capacity", () => {
		const state = createIndicator({ kind: "rsi", period: 14 }, { capacity: 15 });
		expect(state.window).toBe(15);
	});

	it("rejects non-positive periods", () => {
		expect(() => createIndicator({ kind: "sma", period: 0 })).toThrow(
			ConfigError
		);
	});

	it("validates specs built in code", () => {
		expect(() => createIndicator({ kind: "macd", fast: 26, slow: 12 })).toThrow(
			"MACD fast period (26) must be shorter than slow period (12)"
		);
		expect(() => createIndicator({ kind: "macd", fast: 5, slow: 5, signal: 3 })).toThrow(
			ConfigError
		);
		expect(() => createIndicator({ kind: "bollinger", multiplier: 0 })).toThrow(
			"Bollinger multiplier must be a positive number"
		);
	});
});
