import { describe, it, expect } from "vitest";
import { MacdState } from "./macd";
import { macd, randomWalk } from "./__tests__/reference";

describe("MacdState", () => {
	it("starts the MACD line once the slow EMA is seeded", () => {
		const state = new MacdState({ fast: 3, slow: 5, signal: 2 });
		const closes = [1, 2, 3, 4, 5];
		const outputs = closes.map((close) => state.update(close));

		outputs.slice(0, 4).forEach((value) => expect(value).toBeNaN());
		// fast ema(3) at close 5 = 4 (seed 2 → 3 → 4), slow seed = mean(1..5) = 3
		expect(outputs[4]).toBe(1);
		expect(state.read().signal).toBeNaN();
		expect(state.window).toBe(6);
	});

	it("fills signal and histogram after slow + signal - 1 closes", () => {
		const state = new MacdState({ fast: 3, slow: 5, signal: 2 });
		[1, 2, 3, 4, 5, 6].forEach((close) => state.update(close));

		// fast: 5, slow: 3 + (6 - 3) / 3 = 4 → line 1; signal seed mean(1, 1) = 1
		const result = state.read();
		expect(result.macd).toBeCloseTo(1, 12);
		expect(result.signal).toBeCloseTo(1, 12);
		expect(result.histogram).toBeCloseTo(0, 12);
	});

	it("agrees with a batch recomputation", () => {
		const closes = randomWalk(200, 8);
		const state = new MacdState();
		closes.forEach((close) => state.update(close));

		const batch = macd(closes, 12, 26, 9);
		expect(state.read().macd).toBeCloseTo(batch.macd, 8);
		expect(state.read().signal).toBeCloseTo(batch.signal, 8);
	});

	it("publishes line, signal and histogram outputs", () => {
		const state = new MacdState({ fast: 2, slow: 3, signal: 2 });
		expect(Object.keys(state.outputs())).toEqual([
			"macd(2,3,2)",
			"macd(2,3,2).signal",
			"macd(2,3,2).histogram",
		]);
	});
});
