import { ConfigError } from "./errors";
import type { SeriesField } from "./types";

interface SpecBase {
	/** Series the indicator reads; defaults to "close". */
	source?: SeriesField;
}

export interface SmaSpec extends SpecBase {
	kind: "sma";
	period: number;
}

export interface EmaSpec extends SpecBase {
	kind: "ema";
	period: number;
}

export interface RsiSpec extends SpecBase {
	kind: "rsi";
	period?: number;
}

export interface StdDevSpec extends SpecBase {
	kind: "stdev";
	period: number;
}

export interface MacdSpec extends SpecBase {
	kind: "macd";
	fast?: number;
	slow?: number;
	signal?: number;
}

export interface BollingerSpec extends SpecBase {
	kind: "bollinger";
	period?: number;
	multiplier?: number;
}

export type IndicatorSpec =
	| SmaSpec
	| EmaSpec
	| RsiSpec
	| StdDevSpec
	| MacdSpec
	| BollingerSpec;

export type IndicatorKind = IndicatorSpec["kind"];

export const DEFAULT_RSI_PERIOD = 14;
export const DEFAULT_MACD = { fast: 12, slow: 26, signal: 9 } as const;
export const DEFAULT_BOLLINGER = { period: 20, multiplier: 2 } as const;

const INDICATOR_KINDS: readonly IndicatorKind[] = [
	"sma",
	"ema",
	"rsi",
	"stdev",
	"macd",
	"bollinger",
];

const SERIES_FIELDS: readonly SeriesField[] = ["close", "high", "low", "volume"];

const isIndicatorKind = (value: unknown): value is IndicatorKind =>
	typeof value === "string" &&
	INDICATOR_KINDS.some((kind) => kind === value);

const isSeriesField = (value: unknown): value is SeriesField =>
	typeof value === "string" && SERIES_FIELDS.some((field) => field === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readPeriod = (
	raw: Record<string, unknown>,
	field: string,
	fallback?: number
): number => {
	const value = raw[field] ?? fallback;
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(
			"InvalidConfig",
			`Indicator field "${field}" must be a positive integer, got ${String(value)}`,
			{ field, value }
		);
	}
	return value;
};

const readSource = (raw: Record<string, unknown>): SeriesField | undefined => {
	if (raw.source === undefined) {
		return undefined;
	}
	if (!isSeriesField(raw.source)) {
		throw new ConfigError(
			"InvalidConfig",
			`Indicator source must be one of ${SERIES_FIELDS.join(", ")}`,
			{ source: raw.source }
		);
	}
	return raw.source;
};

const withSource = <T extends IndicatorSpec>(
	spec: T,
	source: SeriesField | undefined
): T => (source ? { ...spec, source } : spec);

/**
 * Validate an indicator spec coming from JSON config or an API caller.
 * Throws ConfigError("InvalidConfig") for malformed specs.
 */
export const parseIndicatorSpec = (raw: unknown): IndicatorSpec => {
	if (!isRecord(raw) || !isIndicatorKind(raw.kind)) {
		throw new ConfigError(
			"InvalidConfig",
			`Indicator spec must have a "kind" among ${INDICATOR_KINDS.join(", ")}`,
			{ spec: raw }
		);
	}
	const kind = raw.kind;
	const source = readSource(raw);
	switch (kind) {
		case "sma":
			return withSource({ kind: "sma", period: readPeriod(raw, "period") }, source);
		case "ema":
			return withSource({ kind: "ema", period: readPeriod(raw, "period") }, source);
		case "stdev":
			return withSource(
				{ kind: "stdev", period: readPeriod(raw, "period") },
				source
			);
		case "rsi":
			return withSource(
				{ kind: "rsi", period: readPeriod(raw, "period", DEFAULT_RSI_PERIOD) },
				source
			);
		case "macd": {
			const fast = readPeriod(raw, "fast", DEFAULT_MACD.fast);
			const slow = readPeriod(raw, "slow", DEFAULT_MACD.slow);
			if (fast >= slow) {
				throw new ConfigError(
					"InvalidConfig",
					`MACD fast period (${fast}) must be shorter than slow period (${slow})`,
					{ fast, slow }
				);
			}
			return withSource(
				{
					kind: "macd",
					fast,
					slow,
					signal: readPeriod(raw, "signal", DEFAULT_MACD.signal),
				},
				source
			);
		}
		case "bollinger": {
			const multiplier = raw.multiplier ?? DEFAULT_BOLLINGER.multiplier;
			if (
				typeof multiplier !== "number" ||
				!Number.isFinite(multiplier) ||
				multiplier <= 0
			) {
				throw new ConfigError(
					"InvalidConfig",
					"Bollinger multiplier must be a positive number",
					{ multiplier }
				);
			}
			return withSource(
				{
					kind: "bollinger",
					period: readPeriod(raw, "period", DEFAULT_BOLLINGER.period),
					multiplier,
				},
				source
			);
		}
	}
};

/**
 * Number of buffered samples an indicator needs before it yields a value.
 * Registration against a buffer smaller than this is a configuration error.
 */
export const requiredWindow = (spec: IndicatorSpec): number => {
	switch (spec.kind) {
		case "sma":
		case "ema":
		case "stdev":
			return spec.period;
		case "rsi":
			return (spec.period ?? DEFAULT_RSI_PERIOD) + 1;
		case "macd":
			return (
				(spec.slow ?? DEFAULT_MACD.slow) + (spec.signal ?? DEFAULT_MACD.signal) - 1
			);
		case "bollinger":
			return spec.period ?? DEFAULT_BOLLINGER.period;
	}
};

/** Display name used as the snapshot key, e.g. "sma(20)" or "ema(9,volume)". */
export const indicatorName = (spec: IndicatorSpec): string => {
	const suffix = spec.source && spec.source !== "close" ? `,${spec.source}` : "";
	switch (spec.kind) {
		case "sma":
		case "ema":
		case "stdev":
			return `${spec.kind}(${spec.period}${suffix})`;
		case "rsi":
			return `rsi(${spec.period ?? DEFAULT_RSI_PERIOD}${suffix})`;
		case "macd":
			return `macd(${spec.fast ?? DEFAULT_MACD.fast},${
				spec.slow ?? DEFAULT_MACD.slow
			},${spec.signal ?? DEFAULT_MACD.signal}${suffix})`;
		case "bollinger":
			return `bollinger(${spec.period ?? DEFAULT_BOLLINGER.period},${
				spec.multiplier ?? DEFAULT_BOLLINGER.multiplier
			}${suffix})`;
	}
};

/** Throws ConfigError("PeriodExceedsCapacity") if the spec cannot fit. */
export const assertSpecFitsCapacity = (
	spec: IndicatorSpec,
	capacity: number
): void => {
	const window = requiredWindow(spec);
	if (window > capacity) {
		throw new ConfigError(
			"PeriodExceedsCapacity",
			`Indicator ${indicatorName(spec)} needs ${window} samples but the buffer holds ${capacity}`,
			{ indicator: indicatorName(spec), window, capacity }
		);
	}
};
