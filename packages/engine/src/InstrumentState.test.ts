import { describe, it, expect } from "vitest";
import {
	type HistoryBar,
	type LtpTick,
	type QuoteTick,
	ConfigError,
	createInstrument,
} from "@tickscope/core";
import { InstrumentState } from "./InstrumentState";

const instrument = createInstrument("NSE", "INFY");

const ltp = (price: number, timestamp = price): LtpTick => ({
	kind: "ltp",
	instrument,
	price,
	timestamp,
});

const bar = (close: number): HistoryBar => ({
	timestamp: close * 60_000,
	open: close,
	high: close + 1,
	low: close - 1,
	close,
	volume: close * 10,
});

describe("InstrumentState", () => {
	it("keeps SMA(3) on the last three closes while the buffer evicts", () => {
		const state = new InstrumentState(instrument, {
			capacity: 5,
			indicators: [{ kind: "sma", period: 3 }],
		});
		for (let close = 1; close <= 10; close++) {
			state.applyPrice(ltp(close));
		}
		expect(state.snapshot().indicators["sma(3)"]).toBe(9);

		state.applyPrice(ltp(11));
		const snapshot = state.snapshot();
		expect(snapshot.indicators["sma(3)"]).toBe(10);
		expect(snapshot.bufferLength).toBe(5);
		expect(state.history()).toEqual([7, 8, 9, 10, 11]);
		expect(snapshot.close).toBe(11);
		expect(snapshot.timestamp).toBe(11);
		expect(snapshot.ticksApplied).toBe(11);
	});

	it("pushes ltp ticks as flat bars and quotes as their own fields", () => {
		const state = new InstrumentState(instrument, {
			capacity: 4,
			indicators: [{ kind: "sma", period: 2, source: "volume" }],
		});
		const quote: QuoteTick = {
			kind: "quote",
			instrument,
			open: 10,
			high: 12,
			low: 9,
			close: 11,
			ltp: 11.5,
			volume: 300,
			timestamp: 2,
		};
		state.applyPrice(ltp(10, 1));
		state.applyPrice(quote);

		expect(state.history("close")).toEqual([10, 11.5]);
		expect(state.history("high")).toEqual([10, 12]);
		expect(state.history("low")).toEqual([10, 9]);
		expect(state.history("volume")).toEqual([0, 300]);
		expect(state.snapshot().indicators["sma(2,volume)"]).toBe(150);
	});

	it("rejects a period larger than the buffer without registering anything", () => {
		expect(
			() =>
				new InstrumentState(instrument, {
					capacity: 10,
					indicators: [{ kind: "sma", period: 5 }, { kind: "rsi", period: 10 }],
				})
		).toThrow(ConfigError);

		const state = new InstrumentState(instrument, { capacity: 10 });
		expect(() => state.addIndicator({ kind: "ema", period: 11 })).toThrow(
			"Indicator ema(11) needs 11 samples but the buffer holds 10"
		);
		expect(state.indicatorNames()).toEqual([]);
	});

	it("warms an indicator added later from the buffered series", () => {
		const state = new InstrumentState(instrument, { capacity: 10 });
		[4, 8, 6, 2].forEach((price) => state.applyPrice(ltp(price)));

		state.addIndicator({ kind: "sma", period: 2 });
		expect(state.snapshot().indicators["sma(2)"]).toBe(4);

		state.applyPrice(ltp(10));
		expect(state.snapshot().indicators["sma(2)"]).toBe(6);
	});

	it("returns the existing state when the same indicator is added twice", () => {
		const state = new InstrumentState(instrument, {
			capacity: 10,
			indicators: [{ kind: "ema", period: 3 }],
		});
		const again = state.addIndicator({ kind: "ema", period: 3 });
		expect(again.name).toBe("ema(3)");
		expect(state.indicatorNames()).toEqual(["ema(3)"]);
	});

	it("bootstraps from history and continues incrementally", () => {
		const state = new InstrumentState(instrument, {
			capacity: 3,
			indicators: [{ kind: "sma", period: 3 }],
		});
		state.bootstrap([1, 2, 3, 4, 5].map(bar));

		expect(state.history()).toEqual([3, 4, 5]);
		expect(state.history("high")).toEqual([4, 5, 6]);
		expect(state.snapshot().indicators["sma(3)"]).toBe(4);
		expect(state.snapshot().timestamp).toBe(300_000);

		state.applyPrice(ltp(9, 400_000));
		expect(state.snapshot().indicators["sma(3)"]).toBe(6);
	});

	it("rejects history once live ticks were applied", () => {
		const state = new InstrumentState(instrument, {
			capacity: 3,
			indicators: [{ kind: "sma", period: 2 }],
		});
		state.applyPrice(ltp(100, 1_000_000));

		expect(() => state.bootstrap([1, 2].map(bar))).toThrow(
			"Instrument NSE:INFY already applied live ticks; bootstrap must run first"
		);
		expect(state.history()).toEqual([100]);
		expect(state.snapshot().close).toBe(100);
	});

	it("keeps only the latest depth metrics", () => {
		const state = new InstrumentState(instrument, { capacity: 5 });
		expect(state.snapshot().depth).toBeNull();

		state.applyDepth({
			kind: "depth",
			instrument,
			bids: [{ price: 99.5, quantity: 100 }],
			asks: [{ price: 100, quantity: 50 }],
			totalBuyQty: 1000,
			totalSellQty: 500,
			timestamp: 7,
		});
		const snapshot = state.snapshot();
		expect(snapshot.depth?.spread).toBe(0.5);
		expect(snapshot.bufferLength).toBe(0);
		expect(snapshot.close).toBeNaN();
		expect(snapshot.timestamp).toBe(7);
	});

	it("hands out frozen snapshots", () => {
		const state = new InstrumentState(instrument, {
			capacity: 5,
			indicators: [{ kind: "sma", period: 2 }],
		});
		state.applyPrice(ltp(1));
		const snapshot = state.snapshot();

		expect(Object.isFrozen(snapshot)).toBe(true);
		expect(Object.isFrozen(snapshot.indicators)).toBe(true);
		expect(snapshot.indicators["sma(2)"]).toBeNaN();
	});
});
