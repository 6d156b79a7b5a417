import { describe, it, expect } from "vitest";
import { RollingStdDevState } from "./stdev";
import { populationStdDevOfLast, randomWalk } from "./__tests__/reference";

describe("RollingStdDevState", () => {
	it("is NaN until the window is full", () => {
		const state = new RollingStdDevState(3);
		expect(state.update(1)).toBeNaN();
		expect(state.update(2)).toBeNaN();
		expect(state.update(3)).toBeCloseTo(Math.sqrt(2 / 3), 12);
	});

	it("computes the population standard deviation", () => {
		const state = new RollingStdDevState(8);
		[2, 4, 4, 4, 5, 5, 7, 9].forEach((value) => state.update(value));
		expect(state.current()).toBeCloseTo(2, 12);
	});

	it("removes departing values exactly as the window slides", () => {
		const closes = randomWalk(1_500, 17);
		const state = new RollingStdDevState(20, { recomputeEvery: 7 });
		const seen: number[] = [];
		for (const close of closes) {
			seen.push(close);
			const value = state.update(close);
			if (seen.length >= 20) {
				expect(value).toBeCloseTo(populationStdDevOfLast(seen, 20), 8);
			}
		}
	});

	it("stays accurate without periodic recompute on a level series", () => {
		const state = new RollingStdDevState(5, { recomputeEvery: 1_000_000 });
		for (let i = 0; i < 10_000; i++) {
			state.update(1_000_000 + (i % 5));
		}
		// window always holds one each of 0..4 offsets
		expect(state.current()).toBeCloseTo(Math.sqrt(2), 4);
	});

	it("is NaN while a NaN sits in the window", () => {
		const state = new RollingStdDevState(2);
		state.update(1);
		state.update(3);
		expect(state.update(Number.NaN)).toBeNaN();
		expect(state.update(5)).toBeNaN();
		expect(state.update(7)).toBe(1);
	});

	it("clears its window on reset()", () => {
		const state = new RollingStdDevState(2);
		state.update(1);
		state.update(5);
		state.reset();
		expect(state.update(10)).toBeNaN();
		expect(state.update(12)).toBe(1);
	});
});
