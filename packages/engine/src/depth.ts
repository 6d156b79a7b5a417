import type { DepthLevel, DepthTick } from "@tickscope/core";

export interface DepthMetrics {
	bestBid: number;
	bestAsk: number;
	/** bestAsk - bestBid; NaN when either side is empty. */
	spread: number;
	midPrice: number;
	/** totalBuy / (totalBuy + totalSell); NaN when both are zero. */
	buySellImbalanceRatio: number;
	spreadBps: number;
	/** Summed quantity of the visible bid levels. */
	bidQtyTop: number;
	askQtyTop: number;
	/** Buy share of the visible level quantity. */
	levelImbalanceRatio: number;
}

const ratio = (buy: number, sell: number): number => {
	const total = buy + sell;
	return total === 0 ? Number.NaN : buy / total;
};

const bestPrice = (levels: readonly DepthLevel[], side: "bid" | "ask"): number => {
	let best = Number.NaN;
	for (const level of levels) {
		if (
			Number.isNaN(best) ||
			(side === "bid" ? level.price > best : level.price < best)
		) {
			best = level.price;
		}
	}
	return best;
};

const sumQuantity = (levels: readonly DepthLevel[]): number =>
	levels.reduce((acc, level) => acc + level.quantity, 0);

/**
 * Order-book summary of one depth snapshot. Does not assume the levels are
 * sorted, so callers may pass feed data as-is.
 */
export const analyzeDepth = (
	snapshot: Pick<DepthTick, "bids" | "asks" | "totalBuyQty" | "totalSellQty">
): DepthMetrics => {
	const bestBid = bestPrice(snapshot.bids, "bid");
	const bestAsk = bestPrice(snapshot.asks, "ask");
	// NaN on an empty side carries through both
	const spread = bestAsk - bestBid;
	const midPrice = (bestAsk + bestBid) / 2;
	const bidQtyTop = sumQuantity(snapshot.bids);
	const askQtyTop = sumQuantity(snapshot.asks);

	return {
		bestBid,
		bestAsk,
		spread,
		midPrice,
		buySellImbalanceRatio: ratio(snapshot.totalBuyQty, snapshot.totalSellQty),
		spreadBps: (spread / midPrice) * 10_000,
		bidQtyTop,
		askQtyTop,
		levelImbalanceRatio: ratio(bidQtyTop, askQtyTop),
	};
};
