import { describe, it, expect } from "vitest";
import { ConfigError } from "@tickscope/core";
import { RollingBuffer } from "./RollingBuffer";

describe("RollingBuffer", () => {
	it("returns undefined from push() until the buffer is full", () => {
		const buffer = new RollingBuffer<number>(3);
		expect(buffer.push(1)).toBeUndefined();
		expect(buffer.push(2)).toBeUndefined();
		expect(buffer.push(3)).toBeUndefined();
		expect(buffer.isFull()).toBe(true);
	});

	it("evicts the oldest value once full", () => {
		const buffer = new RollingBuffer<number>(3);
		[1, 2, 3].forEach((value) => buffer.push(value));

		expect(buffer.push(4)).toBe(1);
		expect(buffer.push(5)).toBe(2);
		expect(buffer.toArray()).toEqual([3, 4, 5]);
	});

	it("keeps exactly the most recent capacity values after capacity + 1 pushes", () => {
		const buffer = new RollingBuffer<number>(5);
		for (let i = 1; i <= 6; i++) {
			buffer.push(i);
		}
		expect(buffer.length).toBe(5);
		expect(buffer.toArray()).toEqual([2, 3, 4, 5, 6]);
	});

	it("never grows beyond capacity", () => {
		const buffer = new RollingBuffer<number>(7);
		for (let i = 0; i < 1_000; i++) {
			buffer.push(i);
			expect(buffer.length).toBeLessThanOrEqual(7);
		}
		expect(buffer.toArray()).toEqual([993, 994, 995, 996, 997, 998, 999]);
	});

	it("addresses values by logical position", () => {
		const buffer = new RollingBuffer<number>(3);
		[10, 20, 30, 40].forEach((value) => buffer.push(value));

		expect(buffer.at(0)).toBe(20);
		expect(buffer.at(2)).toBe(40);
		expect(buffer.at(3)).toBeUndefined();
		expect(buffer.at(-1)).toBeUndefined();
		expect(buffer.latest()).toBe(40);
	});

	it("returns a copy from toArray()", () => {
		const buffer = new RollingBuffer<number>(2);
		buffer.push(1);
		const copy = buffer.toArray();
		copy.push(99);
		expect(buffer.toArray()).toEqual([1]);
	});

	it("shifts the oldest value out in FIFO order", () => {
		const buffer = new RollingBuffer<number>(3);
		[1, 2, 3, 4].forEach((value) => buffer.push(value));

		expect(buffer.shift()).toBe(2);
		buffer.push(5);
		expect(buffer.toArray()).toEqual([3, 4, 5]);
		expect(buffer.shift()).toBe(3);
		expect(buffer.shift()).toBe(4);
		expect(buffer.shift()).toBe(5);
		expect(buffer.shift()).toBeUndefined();
		expect(buffer.length).toBe(0);
	});

	it("starts over after clear()", () => {
		const buffer = new RollingBuffer<number>(2);
		[1, 2, 3].forEach((value) => buffer.push(value));
		buffer.clear();

		expect(buffer.isEmpty()).toBe(true);
		expect(buffer.latest()).toBeUndefined();
		buffer.push(4);
		expect(buffer.toArray()).toEqual([4]);
	});

	it("rejects non-positive capacities", () => {
		expect(() => new RollingBuffer<number>(0)).toThrow(ConfigError);
		expect(() => new RollingBuffer<number>(2.5)).toThrow(ConfigError);
	});
});
