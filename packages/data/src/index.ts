export type {
	BootstrapTarget,
	DataLogger,
	HistoricalDataClient,
	OhlcvSource,
	RawEventHandler,
	TickFeed,
} from "./types";
export { mapOhlcvRows, mapOhlcvToBar } from "./utils/ccxtMapper";
export {
	CcxtHistoryClient,
	isHistoryExchangeId,
} from "./history/CcxtHistoryClient";
export type {
	CcxtHistoryClientOptions,
	HistoryExchangeId,
} from "./history/CcxtHistoryClient";
export { bootstrapFromHistory } from "./history/bootstrapFromHistory";
export type { BootstrapFromHistoryOptions } from "./history/bootstrapFromHistory";
export {
	WebSocketTickFeed,
	buildSubscribeMessage,
	decodeFeedMessage,
} from "./feed/WebSocketTickFeed";
export type { WebSocketTickFeedOptions } from "./feed/WebSocketTickFeed";
