import {
	type EngineConfig,
	type IndicatorSpec,
	type Instrument,
	type ModuleLogger,
	createLogger,
	describeError,
	instrumentKey,
} from "@tickscope/core";
import {
	CcxtHistoryClient,
	type HistoricalDataClient,
	type TickFeed,
	WebSocketTickFeed,
	bootstrapFromHistory,
} from "@tickscope/data";
import { TickDispatcher, projectSnapshot } from "@tickscope/engine";

export interface EngineRunOptions {
	/** Overrides the configured instrument list. */
	instruments?: Instrument[];
	intervalMs?: number;
	history: boolean;
	precision?: number;
}

export interface EngineRunDeps {
	feed?: TickFeed;
	historyClient?: HistoricalDataClient;
	logger?: ModuleLogger;
}

export interface RunningEngine {
	dispatcher: TickDispatcher;
	instruments: Instrument[];
	logSnapshots(): void;
	stop(): Promise<void>;
}

const resolveInstruments = (
	config: EngineConfig,
	requested: Instrument[] | undefined
): Array<{ instrument: Instrument; indicators: IndicatorSpec[] }> => {
	const configured = new Map(
		config.instruments.map((entry) => [instrumentKey(entry.instrument), entry])
	);
	const instruments =
		requested ?? config.instruments.map((entry) => entry.instrument);
	return instruments.map((instrument) => ({
		instrument,
		indicators:
			configured.get(instrumentKey(instrument))?.indicators ?? config.indicators,
	}));
};

/**
 * Wire config, history, feed and dispatcher together and start streaming.
 * Snapshots are logged every interval until stop() is called.
 */
export const startEngine = async (
	config: EngineConfig,
	options: EngineRunOptions,
	deps: EngineRunDeps = {}
): Promise<RunningEngine> => {
	const logger = deps.logger ?? createLogger("engine-cli");
	const targets = resolveInstruments(config, options.instruments);
	if (targets.length === 0) {
		throw new Error("No instruments configured; pass --symbols or list them in the profile");
	}

	const dispatcher = new TickDispatcher({
		bufferCapacity: config.bufferCapacity,
		queueDepth: config.queueDepth,
		overflowPolicy: config.overflowPolicy,
		staleTickPolicy: config.staleTickPolicy,
		defaultIndicators: config.indicators,
	});
	targets.forEach(({ instrument, indicators }) =>
		dispatcher.subscribe(instrument, indicators)
	);
	const instruments = targets.map(({ instrument }) => instrument);

	logger.info("engine_starting", {
		profile: config.profile,
		instruments: instruments.map(instrumentKey),
		bufferCapacity: config.bufferCapacity,
		queueDepth: config.queueDepth,
		history: options.history,
	});

	if (options.history && config.history.enabled) {
		const historyClient =
			deps.historyClient ??
			new CcxtHistoryClient({ exchangeId: config.history.exchangeId });
		for (const instrument of instruments) {
			try {
				await bootstrapFromHistory(dispatcher, historyClient, instrument, {
					timeframe: config.history.timeframe,
					limit: Math.min(config.history.limit, config.bufferCapacity),
				});
			} catch (error) {
				logger.warn("history_skipped", {
					instrument: instrumentKey(instrument),
					error: describeError(error),
				});
			}
		}
	}

	const feed =
		deps.feed ??
		new WebSocketTickFeed({
			url: config.feed.url,
			instruments,
			mode: config.feed.mode,
			reconnectDelayMs: config.feed.reconnectDelayMs,
		});
	const offEvent = feed.onEvent((event) => {
		dispatcher.ingest(event);
	});
	await feed.start();

	const precision = options.precision ?? 4;
	const logSnapshots = (): void => {
		for (const snapshot of dispatcher.snapshotAll()) {
			logger.info("indicator_snapshot", { ...projectSnapshot(snapshot, { precision }) });
		}
		logger.info("dispatcher_stats", { stats: dispatcher.getStats() });
	};
	const timer = setInterval(logSnapshots, options.intervalMs ?? config.snapshotIntervalMs);

	let stopped = false;
	const stop = async (): Promise<void> => {
		if (stopped) {
			return;
		}
		stopped = true;
		clearInterval(timer);
		offEvent();
		await feed.stop();
		await dispatcher.drain();
		logSnapshots();
		const dropped = dispatcher.shutdown();
		logger.info("engine_stopped", { dropped });
	};

	return { dispatcher, instruments, logSnapshots, stop };
};
