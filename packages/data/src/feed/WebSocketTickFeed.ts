import WebSocket from "ws";
import {
	type Instrument,
	type RawTickEvent,
	type TickKind,
	createLogger,
	describeError,
	instrumentKey,
} from "@tickscope/core";
import type { DataLogger, RawEventHandler, TickFeed } from "../types";

export interface WebSocketTickFeedOptions {
	url: string;
	instruments: Instrument[];
	mode: TickKind;
	reconnectDelayMs?: number;
	logger?: DataLogger;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Decode one feed frame: a JSON object is one event, a JSON array a batch.
 * Non-object entries are skipped. Throws on malformed JSON.
 */
export const decodeFeedMessage = (text: string): RawTickEvent[] => {
	const payload: unknown = JSON.parse(text);
	const entries: unknown[] = Array.isArray(payload) ? payload : [payload];
	return entries.filter(isRecord);
};

export const buildSubscribeMessage = (
	instruments: readonly Instrument[],
	mode: TickKind
): string =>
	JSON.stringify({
		action: "subscribe",
		mode,
		instruments: instruments.map(instrumentKey),
	});

/**
 * Streams raw tick events from a JSON WebSocket feed. Subscribes on every
 * (re)connect and reconnects after a fixed delay while running.
 */
export class WebSocketTickFeed implements TickFeed {
	private readonly url: string;
	private readonly instruments: Instrument[];
	private readonly mode: TickKind;
	private readonly reconnectDelayMs: number;
	private readonly logger: DataLogger;
	private readonly handlers: Set<RawEventHandler> = new Set();
	private ws: WebSocket | null = null;
	private running = false;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private connections = 0;

	constructor(options: WebSocketTickFeedOptions) {
		this.url = options.url;
		this.instruments = [...options.instruments];
		this.mode = options.mode;
		this.reconnectDelayMs = options.reconnectDelayMs ?? 1_000;
		this.logger = options.logger ?? createLogger("data:feed");
	}

	/** Number of sockets opened so far, reconnects included. */
	get connectionCount(): number {
		return this.connections;
	}

	async start(): Promise<void> {
		if (this.running) {
			throw new Error("WebSocketTickFeed already running");
		}
		this.running = true;
		this.connect();
	}

	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		this.cleanupWs();
		this.logger.info("feed_stopped", { url: this.url });
	}

	onEvent(handler: RawEventHandler): () => void {
		this.handlers.add(handler);
		return () => {
			this.handlers.delete(handler);
		};
	}

	private connect(): void {
		if (!this.running) {
			return;
		}
		const ws = new WebSocket(this.url);
		this.ws = ws;
		this.connections += 1;

		ws.on("open", () => {
			ws.send(buildSubscribeMessage(this.instruments, this.mode));
			this.logger.info("feed_connected", {
				url: this.url,
				mode: this.mode,
				instruments: this.instruments.map(instrumentKey),
			});
		});

		ws.on("message", (payload) => {
			this.handleMessage(payload.toString());
		});

		ws.on("close", () => {
			this.logger.warn("feed_disconnected", { url: this.url });
			this.scheduleReconnect();
		});

		ws.on("error", (error) => {
			this.logger.error("feed_error", {
				url: this.url,
				error: describeError(error),
			});
		});
	}

	private scheduleReconnect(): void {
		if (!this.running || this.reconnectTimer) {
			return;
		}
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.cleanupWs();
			this.connect();
		}, this.reconnectDelayMs);
	}

	private cleanupWs(): void {
		if (!this.ws) {
			return;
		}
		const ws = this.ws;
		this.ws = null;
		ws.removeAllListeners();
		// a failed handshake may still emit; keep it from surfacing as uncaught
		ws.on("error", () => undefined);
		ws.terminate();
	}

	private handleMessage(text: string): void {
		let events: RawTickEvent[];
		try {
			events = decodeFeedMessage(text);
		} catch (error) {
			this.logger.warn("feed_message_invalid", {
				url: this.url,
				error: describeError(error),
				length: text.length,
			});
			return;
		}
		for (const event of events) {
			for (const handler of this.handlers) {
				try {
					handler(event);
				} catch (error) {
					this.logger.error("feed_handler_failed", {
						error: describeError(error),
					});
				}
			}
		}
	}
}
