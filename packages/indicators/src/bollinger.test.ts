import { describe, it, expect } from "vitest";
import { BollingerState } from "./bollinger";
import { replayInto } from "./utils/replay";

describe("BollingerState", () => {
	it("places bands multiplier standard deviations around the SMA", () => {
		const state = new BollingerState({ period: 4, multiplier: 2 });
		replayInto(state, [2, 4, 4, 4, 5, 5, 7, 9]);

		// last window [5, 5, 7, 9]: mean 6.5, variance 11 / 4
		const bands = state.read();
		const width = 2 * Math.sqrt(2.75);
		expect(bands.middle).toBe(6.5);
		expect(bands.upper).toBeCloseTo(6.5 + width, 10);
		expect(bands.lower).toBeCloseTo(6.5 - width, 10);
		expect(state.current()).toBe(6.5);
	});

	it("reports NaN bands during warm-up", () => {
		const state = new BollingerState({ period: 3 });
		state.update(1);
		expect(state.outputs()).toEqual({
			"bollinger(3,2).middle": Number.NaN,
			"bollinger(3,2).upper": Number.NaN,
			"bollinger(3,2).lower": Number.NaN,
		});
	});
});
