import {
	type DepthLevel,
	type DepthTick,
	type Instrument,
	type LtpTick,
	type QuoteTick,
	type Result,
	type StaleTickPolicy,
	type Tick,
	type TickKind,
	IngestError,
	createInstrument,
	err,
	ok,
} from "@tickscope/core";

export const MAX_DEPTH_LEVELS = 5;

export interface NormalizeContext {
	/** Last accepted timestamp for the tick's instrument. */
	lastTimestamp?: number;
	/** Normalization instant in ms epoch. */
	now: number;
	staleTickPolicy?: StaleTickPolicy;
}

export type NormalizeResult = Result<Tick, IngestError>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const missing = (field: string): IngestError =>
	new IngestError("MissingField", `Tick field "${field}" is missing`, { field });

const invalid = (field: string, value: unknown, reason: string): IngestError =>
	new IngestError("InvalidValue", `Tick field "${field}" ${reason}`, {
		field,
		value,
	});

const toNumber = (value: unknown): number | undefined => {
	if (typeof value === "number") {
		return value;
	}
	if (typeof value === "string" && value.trim() !== "") {
		return Number(value);
	}
	return undefined;
};

const readNumber = (
	raw: Record<string, unknown>,
	field: string
): Result<number, IngestError> => {
	const value = raw[field];
	if (value === undefined || value === null) {
		return err(missing(field));
	}
	const parsed = toNumber(value);
	if (parsed === undefined) {
		return err(invalid(field, value, "is not numeric"));
	}
	return ok(parsed);
};

const readPrice = (
	raw: Record<string, unknown>,
	field: string
): Result<number, IngestError> => {
	const result = readNumber(raw, field);
	if (!result.ok) {
		return result;
	}
	if (!Number.isFinite(result.value) || result.value <= 0) {
		return err(invalid(field, raw[field], "must be a finite price above zero"));
	}
	return result;
};

const readQuantity = (
	raw: Record<string, unknown>,
	field: string
): Result<number, IngestError> => {
	const result = readNumber(raw, field);
	if (!result.ok) {
		return result;
	}
	if (!Number.isFinite(result.value) || result.value < 0) {
		return err(invalid(field, raw[field], "must be a finite non-negative number"));
	}
	return result;
};

const readText = (
	raw: Record<string, unknown>,
	field: string
): Result<string, IngestError> => {
	const value = raw[field];
	if (value === undefined || value === null) {
		return err(missing(field));
	}
	if (typeof value !== "string") {
		return err(invalid(field, value, "must be a string"));
	}
	if (value.trim() === "") {
		return err(missing(field));
	}
	return ok(value);
};

const TICK_KINDS: readonly TickKind[] = ["ltp", "quote", "depth"];

const isTickKind = (value: string): value is TickKind =>
	TICK_KINDS.some((kind) => kind === value);

const readMode = (value: unknown): Result<TickKind, IngestError> => {
	if (value === undefined || value === null) {
		return err(missing("mode"));
	}
	const mode = typeof value === "string" ? value.trim().toLowerCase() : "";
	if (isTickKind(mode)) {
		return ok(mode);
	}
	return err(invalid("mode", value, "must be ltp, quote or depth"));
};

/** Source timestamp in ms epoch, or undefined when absent or unreadable. */
export const parseSourceTimestamp = (value: unknown): number | undefined => {
	if (typeof value === "number") {
		return Number.isFinite(value) && value >= 0 ? value : undefined;
	}
	if (typeof value !== "string" || value.trim() === "") {
		return undefined;
	}
	const numeric = Number(value);
	if (Number.isFinite(numeric)) {
		return numeric >= 0 ? numeric : undefined;
	}
	const parsed = Date.parse(value);
	return Number.isNaN(parsed) ? undefined : parsed;
};

/**
 * Pick the canonical timestamp. A source timestamp behind the last accepted one
 * is restamped with the normalization instant (never below the last accepted
 * timestamp) unless the policy is "reject".
 */
export const resolveTimestamp = (
	source: number | undefined,
	context: NormalizeContext
): Result<number, IngestError> => {
	const { lastTimestamp, now } = context;
	if (source !== undefined && (lastTimestamp === undefined || source >= lastTimestamp)) {
		return ok(source);
	}
	if (source !== undefined && context.staleTickPolicy === "reject") {
		return err(
			new IngestError(
				"StaleTimestamp",
				`Tick timestamp ${source} is older than last accepted ${lastTimestamp}`,
				{ timestamp: source, lastTimestamp }
			)
		);
	}
	return ok(lastTimestamp === undefined ? now : Math.max(now, lastTimestamp));
};

const readLevels = (
	raw: Record<string, unknown>,
	field: "bids" | "asks"
): Result<DepthLevel[], IngestError> => {
	const value = raw[field];
	if (value === undefined || value === null) {
		return err(missing(field));
	}
	if (!Array.isArray(value)) {
		return err(invalid(field, value, "must be an array of levels"));
	}

	const levels: DepthLevel[] = [];
	for (let idx = 0; idx < value.length; idx += 1) {
		const entry: unknown = value[idx];
		if (!isRecord(entry)) {
			return err(invalid(`${field}[${idx}]`, entry, "must be an object"));
		}
		const price = toNumber(entry.price);
		const quantity = toNumber(entry.quantity ?? entry.qty);
		if (price === undefined || !Number.isFinite(price)) {
			return err(invalid(`${field}[${idx}].price`, entry.price, "is not a finite number"));
		}
		if (quantity === undefined || !Number.isFinite(quantity)) {
			return err(
				invalid(
					`${field}[${idx}].quantity`,
					entry.quantity ?? entry.qty,
					"is not a finite number"
				)
			);
		}
		// empty book slots arrive as zero price or quantity
		if (price <= 0 || quantity <= 0) {
			continue;
		}
		const orders = toNumber(entry.orders);
		levels.push(
			orders !== undefined && Number.isFinite(orders) && orders >= 0
				? { price, quantity, orders }
				: { price, quantity }
		);
	}

	levels.sort((a, b) => (field === "bids" ? b.price - a.price : a.price - b.price));
	return ok(levels.slice(0, MAX_DEPTH_LEVELS));
};

// feeds send the traded price as either "ltp" or "price"
const ltpField = (raw: Record<string, unknown>): "ltp" | "price" =>
	raw.ltp === undefined && raw.price !== undefined ? "price" : "ltp";

const buildTick = (
	raw: Record<string, unknown>,
	mode: TickKind,
	instrument: Instrument,
	timestamp: number
): NormalizeResult => {
	switch (mode) {
		case "ltp": {
			const price = readPrice(raw, ltpField(raw));
			if (!price.ok) {
				return price;
			}
			const tick: LtpTick = { kind: "ltp", instrument, price: price.value, timestamp };
			return ok(tick);
		}
		case "quote": {
			const open = readPrice(raw, "open");
			if (!open.ok) return open;
			const high = readPrice(raw, "high");
			if (!high.ok) return high;
			const low = readPrice(raw, "low");
			if (!low.ok) return low;
			const close = readPrice(raw, "close");
			if (!close.ok) return close;
			const ltp = readPrice(raw, ltpField(raw));
			if (!ltp.ok) return ltp;
			const volume = readQuantity(raw, "volume");
			if (!volume.ok) return volume;
			const tick: QuoteTick = {
				kind: "quote",
				instrument,
				open: open.value,
				high: high.value,
				low: low.value,
				close: close.value,
				ltp: ltp.value,
				volume: volume.value,
				timestamp,
			};
			return ok(tick);
		}
		case "depth": {
			const bids = readLevels(raw, "bids");
			if (!bids.ok) return bids;
			const asks = readLevels(raw, "asks");
			if (!asks.ok) return asks;
			const totalBuyQty = readQuantity(raw, "totalBuyQty");
			if (!totalBuyQty.ok) return totalBuyQty;
			const totalSellQty = readQuantity(raw, "totalSellQty");
			if (!totalSellQty.ok) return totalSellQty;
			const tick: DepthTick = {
				kind: "depth",
				instrument,
				bids: bids.value,
				asks: asks.value,
				totalBuyQty: totalBuyQty.value,
				totalSellQty: totalSellQty.value,
				timestamp,
			};
			return ok(tick);
		}
	}
};

/** Instrument named by a raw event, without validating the rest of it. */
export const readInstrument = (raw: unknown): Result<Instrument, IngestError> => {
	if (!isRecord(raw)) {
		return err(invalid("event", raw, "must be an object"));
	}
	const exchange = readText(raw, "exchange");
	if (!exchange.ok) {
		return exchange;
	}
	const symbol = readText(raw, "symbol");
	if (!symbol.ok) {
		return symbol;
	}
	return ok(createInstrument(exchange.value, symbol.value));
};

/**
 * Validate a decoded RawTickEvent and turn it into a canonical tick. Pure: the
 * caller supplies the last accepted timestamp and the clock reading.
 */
export const normalizeTick = (
	raw: unknown,
	context: NormalizeContext
): NormalizeResult => {
	if (!isRecord(raw)) {
		return err(invalid("event", raw, "must be an object"));
	}
	const instrument = readInstrument(raw);
	if (!instrument.ok) {
		return instrument;
	}
	const mode = readMode(raw.mode);
	if (!mode.ok) {
		return mode;
	}
	const timestamp = resolveTimestamp(parseSourceTimestamp(raw.timestamp), context);
	if (!timestamp.ok) {
		return timestamp;
	}
	return buildTick(raw, mode.value, instrument.value, timestamp.value);
};

const fieldError = (tick: Tick): IngestError | undefined => {
	const price = (field: string, value: number): IngestError | undefined =>
		Number.isFinite(value) && value > 0
			? undefined
			: invalid(field, value, "must be a finite price above zero");
	const quantity = (field: string, value: number): IngestError | undefined =>
		Number.isFinite(value) && value >= 0
			? undefined
			: invalid(field, value, "must be a finite non-negative number");
	switch (tick.kind) {
		case "ltp":
			return price("price", tick.price);
		case "quote":
			return (
				price("open", tick.open) ??
				price("high", tick.high) ??
				price("low", tick.low) ??
				price("close", tick.close) ??
				price("ltp", tick.ltp) ??
				quantity("volume", tick.volume)
			);
		case "depth": {
			for (const side of ["bids", "asks"] as const) {
				for (let idx = 0; idx < tick[side].length; idx += 1) {
					const level = tick[side][idx];
					const error =
						price(`${side}[${idx}].price`, level.price) ??
						(Number.isFinite(level.quantity) && level.quantity > 0
							? undefined
							: invalid(
									`${side}[${idx}].quantity`,
									level.quantity,
									"must be a finite quantity above zero"
								));
					if (error) {
						return error;
					}
				}
			}
			return (
				quantity("totalBuyQty", tick.totalBuyQty) ??
				quantity("totalSellQty", tick.totalSellQty)
			);
		}
	}
};

/**
 * Re-check a tick built outside normalizeTick. Prices and quantities follow the
 * same rules; an unreadable timestamp counts as missing and is stamped.
 */
export const validateTick = (tick: Tick, context: NormalizeContext): NormalizeResult => {
	const error = fieldError(tick);
	if (error) {
		return err(error);
	}
	const timestamp = resolveTimestamp(parseSourceTimestamp(tick.timestamp), context);
	if (!timestamp.ok) {
		return timestamp;
	}
	return ok(
		timestamp.value === tick.timestamp ? tick : { ...tick, timestamp: timestamp.value }
	);
};
