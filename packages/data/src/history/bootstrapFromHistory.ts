import {
	type Instrument,
	createLogger,
	describeError,
	instrumentKey,
} from "@tickscope/core";
import type { BootstrapTarget, DataLogger, HistoricalDataClient } from "../types";

export interface BootstrapFromHistoryOptions {
	timeframe: string;
	limit: number;
	logger?: DataLogger;
}

/**
 * Fetch past bars and hand them to the engine before live ticks start.
 * Returns the number of bars applied; fetch failures are logged and rethrown.
 */
export const bootstrapFromHistory = async (
	target: BootstrapTarget,
	client: HistoricalDataClient,
	instrument: Instrument,
	options: BootstrapFromHistoryOptions
): Promise<number> => {
	const logger = options.logger ?? createLogger("data:history");
	const key = instrumentKey(instrument);
	try {
		const bars = await client.fetchHistory(instrument, options.timeframe, options.limit);
		const applied = target.bootstrap(instrument, bars);
		logger.info("history_bootstrap_complete", {
			instrument: key,
			timeframe: options.timeframe,
			bars: applied,
			lastTimestamp: bars.length ? bars[bars.length - 1].timestamp : null,
		});
		return applied;
	} catch (error) {
		logger.error("history_bootstrap_failed", {
			instrument: key,
			timeframe: options.timeframe,
			error: describeError(error),
		});
		throw error;
	}
};
