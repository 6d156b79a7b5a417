import {
	type Clock,
	type DepthTick,
	type EngineError,
	type HistoryBar,
	type IndicatorSpec,
	type Instrument,
	type ModuleLogger,
	type OverflowPolicy,
	type Result,
	type SeriesField,
	type StaleTickPolicy,
	type Tick,
	DEFAULT_BUFFER_CAPACITY,
	DEFAULT_QUEUE_DEPTH,
	DispatchError,
	IngestError,
	OverflowPolicyTriggered,
	createLogger,
	describeError,
	err,
	instrumentKey,
	ok,
	systemClock,
} from "@tickscope/core";
import { type DepthMetrics, analyzeDepth } from "./depth";
import { InstrumentLane } from "./InstrumentLane";
import { InstrumentState } from "./InstrumentState";
import { normalizeTick, readInstrument, validateTick } from "./normalize";
import type {
	DispatcherStats,
	IndicatorSnapshot,
	IndicatorUpdateHandler,
	TickDispatcherOptions,
} from "./types";

interface Registration {
	state: InstrumentState;
	lane: InstrumentLane<Tick>;
	/** Last timestamp accepted at ingest time, ahead of what the lane applied. */
	lastTimestamp?: number;
}

type Counter = Exclude<keyof DispatcherStats, "activeInstruments" | "pendingTicks">;

export type DispatchOutcome = Result<
	Tick,
	IngestError | DispatchError | OverflowPolicyTriggered
>;

// bounds the memory spent on remembering which unknown keys were reported
const MAX_REPORTED_UNKNOWN = 1_024;

/**
 * Routes ticks to per-instrument lanes and owns every instrument's state.
 *
 * onTick()/ingest() only validate and enqueue; indicator math runs on the
 * lane's deferred turn. Per-tick failures are returned and counted, never
 * thrown. Registration failures (bad indicator specs) are thrown to the
 * caller that registered.
 */
export class TickDispatcher {
	private readonly registrations = new Map<string, Registration>();
	private readonly handlers: Set<IndicatorUpdateHandler> = new Set();
	private readonly reportedUnknown = new Set<string>();
	private readonly bufferCapacity: number;
	private readonly queueDepth: number;
	private readonly overflowPolicy: OverflowPolicy;
	private readonly staleTickPolicy: StaleTickPolicy;
	private readonly defaultIndicators: IndicatorSpec[];
	private readonly batchSize?: number;
	private readonly recomputeEvery?: number;
	private readonly clock: Clock;
	private readonly logger: ModuleLogger;
	private readonly schedule?: (task: () => void) => void;
	private readonly counters: Record<Counter, number> = {
		ticksReceived: 0,
		ticksQueued: 0,
		ticksApplied: 0,
		invalidTicks: 0,
		staleTicks: 0,
		unknownInstrument: 0,
		overflowDrops: 0,
		droppedOnUnsubscribe: 0,
		laneErrors: 0,
		handlerErrors: 0,
	};

	constructor(options: TickDispatcherOptions = {}) {
		this.bufferCapacity = options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY;
		this.queueDepth = options.queueDepth ?? DEFAULT_QUEUE_DEPTH;
		this.overflowPolicy = options.overflowPolicy ?? "drop-newest";
		this.staleTickPolicy = options.staleTickPolicy ?? "restamp";
		this.defaultIndicators = [...(options.defaultIndicators ?? [])];
		this.batchSize = options.batchSize;
		this.recomputeEvery = options.recomputeEvery;
		this.clock = options.clock ?? systemClock;
		this.logger = options.logger ?? createLogger("engine");
		this.schedule = options.schedule;
	}

	/**
	 * Allocate buffers, indicators and a lane for an instrument. Subscribing
	 * twice is a no-op. Throws ConfigError when a spec does not fit.
	 */
	subscribe(
		instrument: Instrument,
		indicators: IndicatorSpec[] = this.defaultIndicators
	): string {
		const key = instrumentKey(instrument);
		if (this.registrations.has(key)) {
			return key;
		}
		const state = new InstrumentState(instrument, {
			capacity: this.bufferCapacity,
			indicators,
			recomputeEvery: this.recomputeEvery,
		});
		const lane = new InstrumentLane<Tick>({
			depth: this.queueDepth,
			policy: this.overflowPolicy,
			batchSize: this.batchSize,
			schedule: this.schedule,
			apply: (tick) => this.applyTick(state, tick),
			onError: (error, tick) => {
				this.counters.laneErrors += 1;
				this.logger.error("lane_apply_failed", {
					instrument: key,
					kind: tick.kind,
					timestamp: tick.timestamp,
					error: describeError(error),
				});
			},
		});
		this.registrations.set(key, { state, lane });
		this.reportedUnknown.delete(key);
		this.logger.info("instrument_subscribed", {
			instrument: key,
			capacity: this.bufferCapacity,
			indicators: state.indicatorNames(),
		});
		return key;
	}

	/**
	 * Close the instrument's lane and destroy its state. Queued ticks are
	 * discarded; later ticks for it are reported as UnknownInstrument.
	 */
	unsubscribe(instrument: Instrument): { removed: boolean; dropped: number } {
		const key = instrumentKey(instrument);
		const registration = this.registrations.get(key);
		if (!registration) {
			return { removed: false, dropped: 0 };
		}
		this.registrations.delete(key);
		const dropped = registration.lane.close();
		this.counters.droppedOnUnsubscribe += dropped;
		this.logger.info("instrument_unsubscribed", { instrument: key, dropped });
		return { removed: true, dropped };
	}

	isSubscribed(instrument: Instrument): boolean {
		return this.registrations.has(instrumentKey(instrument));
	}

	instruments(): Instrument[] {
		return [...this.registrations.values()].map(({ state }) => state.instrument);
	}

	/**
	 * Register an indicator on a live instrument, warmed from its buffer.
	 * Returns the indicator's snapshot key.
	 */
	addIndicator(instrument: Instrument, spec: IndicatorSpec): string {
		const registration = this.require(instrument);
		return registration.state.addIndicator(spec).name;
	}

	/** Normalize a decoded transport event and dispatch it. */
	ingest(raw: unknown): DispatchOutcome {
		this.counters.ticksReceived += 1;
		const instrument = readInstrument(raw);
		const registration = instrument.ok
			? this.registrations.get(instrumentKey(instrument.value))
			: undefined;
		const normalized = normalizeTick(raw, {
			lastTimestamp: registration?.lastTimestamp,
			now: this.clock(),
			staleTickPolicy: this.staleTickPolicy,
		});
		if (!normalized.ok) {
			this.recordRejected(normalized.error);
			return normalized;
		}
		return this.dispatch(normalized.value, registration);
	}

	/**
	 * Dispatch a tick built by the caller. It is held to the same price and
	 * timestamp rules as ingest().
	 */
	onTick(tick: Tick): DispatchOutcome {
		this.counters.ticksReceived += 1;
		const registration = this.registrations.get(instrumentKey(tick.instrument));
		const checked = validateTick(tick, {
			lastTimestamp: registration?.lastTimestamp,
			now: this.clock(),
			staleTickPolicy: this.staleTickPolicy,
		});
		if (!checked.ok) {
			this.recordRejected(checked.error);
			return checked;
		}
		return this.dispatch(checked.value, registration);
	}

	/**
	 * Pre-warm an instrument from historical bars, oldest first. Runs in one
	 * synchronous step, so no lane turn observes a half-loaded buffer. Only
	 * allowed before the first live tick is queued.
	 */
	bootstrap(instrument: Instrument, bars: readonly HistoryBar[]): number {
		const registration = this.require(instrument);
		if (registration.lane.pending > 0 || registration.lane.applied > 0) {
			const key = registration.state.key;
			throw new DispatchError(
				"AlreadyStreaming",
				`Instrument ${key} already received live ticks; bootstrap must run first`,
				{ instrument: key }
			);
		}
		const count = registration.state.bootstrap(bars);
		const last = bars.length > 0 ? bars[bars.length - 1].timestamp : undefined;
		if (
			last !== undefined &&
			(registration.lastTimestamp === undefined || last > registration.lastTimestamp)
		) {
			registration.lastTimestamp = last;
		}
		this.logger.info("instrument_bootstrapped", {
			instrument: registration.state.key,
			bars: count,
			bufferLength: registration.state.length,
		});
		return count;
	}

	snapshot(instrument: Instrument): IndicatorSnapshot | undefined {
		return this.registrations.get(instrumentKey(instrument))?.state.snapshot();
	}

	snapshotAll(): IndicatorSnapshot[] {
		return [...this.registrations.values()].map(({ state }) => state.snapshot());
	}

	/** Ordered close (or other field) history currently buffered. */
	history(instrument: Instrument, field?: SeriesField): number[] {
		return this.registrations.get(instrumentKey(instrument))?.state.history(field) ?? [];
	}

	analyze(depth: DepthTick): DepthMetrics {
		return analyzeDepth(depth);
	}

	onUpdate(handler: IndicatorUpdateHandler): () => void {
		this.handlers.add(handler);
		return () => {
			this.handlers.delete(handler);
		};
	}

	/** Resolves once every lane has applied everything queued so far. */
	async drain(): Promise<void> {
		while ([...this.registrations.values()].some(({ lane }) => lane.pending > 0)) {
			await Promise.all(
				[...this.registrations.values()].map(({ lane }) => lane.idle())
			);
		}
	}

	getStats(): DispatcherStats {
		let pendingTicks = 0;
		for (const { lane } of this.registrations.values()) {
			pendingTicks += lane.pending;
		}
		return {
			...this.counters,
			activeInstruments: this.registrations.size,
			pendingTicks,
		};
	}

	/** Unsubscribe everything. */
	shutdown(): number {
		let dropped = 0;
		for (const { state } of [...this.registrations.values()]) {
			dropped += this.unsubscribe(state.instrument).dropped;
		}
		this.handlers.clear();
		return dropped;
	}

	private require(instrument: Instrument): Registration {
		const key = instrumentKey(instrument);
		const registration = this.registrations.get(key);
		if (!registration) {
			throw new DispatchError(
				"UnknownInstrument",
				`Instrument ${key} is not subscribed`,
				{ instrument: key }
			);
		}
		return registration;
	}

	private dispatch(
		tick: Tick,
		registration: Registration | undefined
	): DispatchOutcome {
		const key = instrumentKey(tick.instrument);
		if (!registration) {
			this.counters.unknownInstrument += 1;
			this.reportUnknown(key);
			return err(
				new DispatchError("UnknownInstrument", `Instrument ${key} is not subscribed`, {
					instrument: key,
				})
			);
		}

		const outcome = registration.lane.enqueue(tick);
		switch (outcome) {
			case "closed":
				return err(
					new DispatchError("LaneClosed", `Lane for ${key} is closed`, {
						instrument: key,
					})
				);
			case "dropped-newest":
			case "dropped-oldest": {
				this.counters.overflowDrops += 1;
				const error = new OverflowPolicyTriggered(
					`Queue for ${key} is full (${this.queueDepth})`,
					{ instrument: key, policy: this.overflowPolicy, queueDepth: this.queueDepth }
				);
				this.logger.debug("lane_overflow", error.toJSON());
				if (outcome === "dropped-newest") {
					return err(error);
				}
				break;
			}
			case "queued":
				break;
		}
		registration.lastTimestamp = tick.timestamp;
		this.counters.ticksQueued += 1;
		return ok(tick);
	}

	private applyTick(state: InstrumentState, tick: Tick): void {
		if (tick.kind === "depth") {
			state.applyDepth(tick, analyzeDepth(tick));
		} else {
			state.applyPrice(tick);
		}
		this.counters.ticksApplied += 1;
		if (this.handlers.size > 0) {
			this.emit(tick, state.snapshot());
		}
	}

	private emit(tick: Tick, snapshot: IndicatorSnapshot): void {
		for (const handler of this.handlers) {
			try {
				const result = handler({ tick, snapshot });
				if (result instanceof Promise) {
					void result.catch((error: unknown) => this.handlerFailed(snapshot.key, error));
				}
			} catch (error) {
				this.handlerFailed(snapshot.key, error);
			}
		}
	}

	private handlerFailed(key: string, error: unknown): void {
		this.counters.handlerErrors += 1;
		this.logger.error("update_handler_failed", {
			instrument: key,
			error: describeError(error),
		});
	}

	private recordRejected(error: EngineError): void {
		if (error.code === "StaleTimestamp") {
			this.counters.staleTicks += 1;
		} else {
			this.counters.invalidTicks += 1;
		}
		this.logger.warn("tick_rejected", error.toJSON());
	}

	private reportUnknown(key: string): void {
		if (this.reportedUnknown.has(key)) {
			this.logger.debug("tick_unknown_instrument", { instrument: key });
			return;
		}
		if (this.reportedUnknown.size < MAX_REPORTED_UNKNOWN) {
			this.reportedUnknown.add(key);
		}
		this.logger.warn("tick_unknown_instrument", { instrument: key });
	}
}
