import { type Instrument, ConfigError, parseInstrumentKey } from "@tickscope/core";

export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.trim() ? value.trim() : undefined;
};

export const getListArg = (
	args: Record<string, ArgValue>,
	key: string
): string[] | undefined => {
	const value = getStringArg(args, key);
	if (!value) {
		return undefined;
	}
	const entries = value
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
	return entries.length ? entries : undefined;
};

export interface CliOptions {
	help: boolean;
	profile?: string;
	configDir?: string;
	intervalMs?: number;
	history: boolean;
	instruments?: Instrument[];
	precision: number;
}

const parsePositiveInteger = (value: string, flag: string): number => {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new ConfigError("InvalidConfig", `--${flag} must be a positive integer`, {
			flag,
			value,
		});
	}
	return parsed;
};

const parseInstrumentArg = (entry: string): Instrument => {
	try {
		return parseInstrumentKey(entry);
	} catch (error) {
		throw new ConfigError(
			"InvalidConfig",
			`--symbols entries must look like EXCHANGE:SYMBOL, got "${entry}"`,
			{ entry, cause: error instanceof Error ? error.message : String(error) }
		);
	}
};

export const resolveCliOptions = (argv: string[]): CliOptions => {
	const args = parseCliArgs(argv);
	const interval = getStringArg(args, "interval");
	const precision = getStringArg(args, "precision");
	return {
		help: args.help === true,
		profile: getStringArg(args, "profile"),
		configDir: getStringArg(args, "configDir"),
		intervalMs: interval ? parsePositiveInteger(interval, "interval") : undefined,
		history: args["no-history"] !== true,
		instruments: getListArg(args, "symbols")?.map(parseInstrumentArg),
		precision: precision ? parsePositiveInteger(precision, "precision") : 4,
	};
};
