import { describe, expect, it } from "vitest";
import {
	createInstrument,
	instrumentKey,
	parseInstrumentKey,
} from "./instrument";

describe("instrument helpers", () => {
	it("canonicalizes exchange and symbol", () => {
		const instrument = createInstrument(" nse ", "infy");
		expect(instrument).toEqual({ exchange: "NSE", symbol: "INFY" });
		expect(Object.isFrozen(instrument)).toBe(true);
		expect(instrumentKey(instrument)).toBe("NSE:INFY");
	});

	it("keys hand-built instruments the same as canonical ones", () => {
		expect(instrumentKey({ exchange: "nse", symbol: " Infy" })).toBe(
			instrumentKey(createInstrument("NSE", "INFY"))
		);
	});

	it("splits keys on the first separator only", () => {
		expect(parseInstrumentKey("nfo:nifty:fut")).toEqual({
			exchange: "NFO",
			symbol: "NIFTY:FUT",
		});
	});

	it("rejects incomplete instruments", () => {
		expect(() => createInstrument("NSE", "  ")).toThrow(
			'Instrument requires exchange and symbol, got "NSE" / "  "'
		);
		expect(() => parseInstrumentKey(":INFY")).toThrow(
			'Invalid instrument key ":INFY", expected EXCHANGE:SYMBOL'
		);
		expect(() => parseInstrumentKey("INFY")).toThrow(/Invalid instrument key/);
	});
});
