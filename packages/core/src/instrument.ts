import type { Instrument } from "./types";

const KEY_SEPARATOR = ":";

const normalizePart = (value: string): string => value.trim().toUpperCase();

export const createInstrument = (
	exchange: string,
	symbol: string
): Instrument => {
	const normalized = {
		exchange: normalizePart(exchange),
		symbol: normalizePart(symbol),
	};
	if (!normalized.exchange || !normalized.symbol) {
		throw new Error(
			`Instrument requires exchange and symbol, got "${exchange}" / "${symbol}"`
		);
	}
	return Object.freeze(normalized);
};

/** Canonical map key, e.g. "NSE:INFY". */
export const instrumentKey = (instrument: Instrument): string =>
	`${normalizePart(instrument.exchange)}${KEY_SEPARATOR}${normalizePart(
		instrument.symbol
	)}`;

/**
 * Parse "EXCHANGE:SYMBOL". Symbols may themselves contain ":" (some venues use
 * it for derivatives), so only the first separator splits.
 */
export const parseInstrumentKey = (key: string): Instrument => {
	const idx = key.indexOf(KEY_SEPARATOR);
	if (idx <= 0) {
		throw new Error(
			`Invalid instrument key "${key}", expected EXCHANGE${KEY_SEPARATOR}SYMBOL`
		);
	}
	return createInstrument(key.slice(0, idx), key.slice(idx + 1));
};
