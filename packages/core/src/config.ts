import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "./errors";
import {
	type IndicatorSpec,
	assertSpecFitsCapacity,
	parseIndicatorSpec,
} from "./indicatorSpec";
import { createInstrument } from "./instrument";
import type { Instrument, TickKind } from "./types";

export type OverflowPolicy = "drop-newest" | "drop-oldest";
export type StaleTickPolicy = "restamp" | "reject";

export interface InstrumentConfig {
	instrument: Instrument;
	/** Overrides the engine-wide indicator list when present. */
	indicators?: IndicatorSpec[];
}

export interface FeedConfig {
	url: string;
	mode: TickKind;
	reconnectDelayMs: number;
}

export interface HistoryConfig {
	enabled: boolean;
	exchangeId: string;
	timeframe: string;
	limit: number;
}

export interface EngineConfig {
	profile: string;
	bufferCapacity: number;
	queueDepth: number;
	overflowPolicy: OverflowPolicy;
	staleTickPolicy: StaleTickPolicy;
	indicators: IndicatorSpec[];
	instruments: InstrumentConfig[];
	feed: FeedConfig;
	history: HistoryConfig;
	snapshotIntervalMs: number;
}

export interface EngineConfigLoadOptions {
	configDir?: string;
	profile?: string;
	/** Variables consulted for overrides; defaults to process.env. */
	env?: Record<string, string | undefined>;
}

export const DEFAULT_BUFFER_CAPACITY = 200;
export const DEFAULT_QUEUE_DEPTH = 1024;

const WORKSPACE_SENTINELS = [path.join("config", "engine"), ".git"];

let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError("InvalidConfig", `Config file not found: ${filePath}`, {
			path: filePath,
		});
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(
			"InvalidConfig",
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`,
			{ path: filePath }
		);
	}
};

const ensurePositiveInteger = (value: unknown, field: string): number => {
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(
			"InvalidConfig",
			`Config field ${field} must be a positive integer, got ${String(value)}`,
			{ field, value }
		);
	}
	return value;
};

const ensureString = (value: unknown, field: string): string => {
	if (typeof value !== "string" || value.trim() === "") {
		throw new ConfigError(
			"InvalidConfig",
			`Config field ${field} must be a non-empty string`,
			{ field, value }
		);
	}
	return value.trim();
};

const parseIntegerOverride = (
	value: string | undefined,
	field: string
): number | undefined => {
	if (value === undefined) {
		return undefined;
	}
	return ensurePositiveInteger(Number(value), field);
};

const parseOverflowPolicy = (value: unknown): OverflowPolicy => {
	if (value === undefined) {
		return "drop-newest";
	}
	if (value === "drop-newest" || value === "drop-oldest") {
		return value;
	}
	throw new ConfigError(
		"InvalidConfig",
		`overflowPolicy must be "drop-newest" or "drop-oldest"`,
		{ value }
	);
};

const parseStaleTickPolicy = (value: unknown): StaleTickPolicy => {
	if (value === undefined) {
		return "restamp";
	}
	if (value === "restamp" || value === "reject") {
		return value;
	}
	throw new ConfigError(
		"InvalidConfig",
		`staleTickPolicy must be "restamp" or "reject"`,
		{ value }
	);
};

const parseTickMode = (value: unknown): TickKind => {
	if (value === undefined) {
		return "quote";
	}
	if (value === "ltp" || value === "quote" || value === "depth") {
		return value;
	}
	throw new ConfigError("InvalidConfig", `feed.mode must be ltp, quote or depth`, {
		value,
	});
};

const parseIndicatorList = (
	value: unknown,
	field: string,
	capacity: number
): IndicatorSpec[] => {
	if (!Array.isArray(value)) {
		throw new ConfigError("InvalidConfig", `${field} must be an array`, {
			field,
		});
	}
	return value.map((entry) => {
		const spec = parseIndicatorSpec(entry);
		assertSpecFitsCapacity(spec, capacity);
		return spec;
	});
};

const parseInstrumentList = (
	value: unknown,
	capacity: number
): InstrumentConfig[] => {
	if (value === undefined) {
		return [];
	}
	if (!Array.isArray(value)) {
		throw new ConfigError("InvalidConfig", "instruments must be an array");
	}
	return value.map((entry, idx) => {
		if (!isRecord(entry)) {
			throw new ConfigError(
				"InvalidConfig",
				`instruments[${idx}] must be an object`
			);
		}
		const instrument = createInstrument(
			ensureString(entry.exchange, `instruments[${idx}].exchange`),
			ensureString(entry.symbol, `instruments[${idx}].symbol`)
		);
		if (entry.indicators === undefined) {
			return { instrument };
		}
		return {
			instrument,
			indicators: parseIndicatorList(
				entry.indicators,
				`instruments[${idx}].indicators`,
				capacity
			),
		};
	});
};

/**
 * Parse a raw engine profile. Environment overrides take precedence over
 * the file; every indicator is checked against the buffer capacity.
 */
export const parseEngineConfig = (
	raw: unknown,
	profile: string,
	env: Record<string, string | undefined> = {}
): EngineConfig => {
	if (!isRecord(raw)) {
		throw new ConfigError("InvalidConfig", "Engine config must be an object", {
			profile,
		});
	}
	const pick = (key: string): string | undefined => {
		const value = env[key]?.trim();
		return value ? value : undefined;
	};

	const bufferCapacity =
		parseIntegerOverride(pick("BUFFER_CAPACITY"), "BUFFER_CAPACITY") ??
		ensurePositiveInteger(
			raw.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY,
			"bufferCapacity"
		);
	const queueDepth =
		parseIntegerOverride(pick("QUEUE_DEPTH"), "QUEUE_DEPTH") ??
		ensurePositiveInteger(raw.queueDepth ?? DEFAULT_QUEUE_DEPTH, "queueDepth");

	const feedRaw: Record<string, unknown> = isRecord(raw.feed) ? raw.feed : {};
	const historyRaw: Record<string, unknown> = isRecord(raw.history)
		? raw.history
		: {};

	return {
		profile,
		bufferCapacity,
		queueDepth,
		overflowPolicy: parseOverflowPolicy(raw.overflowPolicy),
		staleTickPolicy: parseStaleTickPolicy(raw.staleTickPolicy),
		indicators: parseIndicatorList(
			raw.indicators ?? [],
			"indicators",
			bufferCapacity
		),
		instruments: parseInstrumentList(raw.instruments, bufferCapacity),
		feed: {
			url: ensureString(pick("FEED_URL") ?? feedRaw.url, "feed.url"),
			mode: parseTickMode(feedRaw.mode),
			reconnectDelayMs: ensurePositiveInteger(
				feedRaw.reconnectDelayMs ?? 1_000,
				"feed.reconnectDelayMs"
			),
		},
		history: {
			enabled: historyRaw.enabled !== false,
			exchangeId: ensureString(
				pick("HISTORY_EXCHANGE") ?? historyRaw.exchangeId ?? "binance",
				"history.exchangeId"
			).toLowerCase(),
			timeframe: ensureString(historyRaw.timeframe ?? "1m", "history.timeframe"),
			limit: ensurePositiveInteger(
				historyRaw.limit ?? bufferCapacity,
				"history.limit"
			),
		},
		snapshotIntervalMs: ensurePositiveInteger(
			raw.snapshotIntervalMs ?? 5_000,
			"snapshotIntervalMs"
		),
	};
};

export const loadEngineConfig = (
	options: EngineConfigLoadOptions = {}
): EngineConfig => {
	const env = options.env ?? process.env;
	const profile =
		options.profile ?? (env.ENGINE_PROFILE?.trim() || "default");
	const configDir = options.configDir ?? getDefaultConfigDir();
	const configPath = path.join(configDir, "engine", `${profile}.json`);
	return parseEngineConfig(readJsonFile(configPath), profile, env);
};
