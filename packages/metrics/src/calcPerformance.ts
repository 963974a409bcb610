import type { TradeRecordView } from "@fillreplay/core";
import type {
	FillDetail,
	PerformanceReport,
	TradeDetail,
} from "./metricsSchema";

/**
 * Aggregates executed trades into a JSON-serializable report. Records without
 * fills are left out; the input is never mutated.
 */
export const computePerformance = (
	records: readonly TradeRecordView[]
): PerformanceReport => {
	const tradeDetails = records
		.filter((record) => record.executedQuantity > 0)
		.map(buildTradeDetail);

	const totalTrades = tradeDetails.length;
	const fills = tradeDetails.flatMap((trade) => trade.fills);
	const feesFor = (role: FillDetail["liquidity"]): number =>
		fills
			.filter((fill) => fill.liquidity === role)
			.reduce((sum, fill) => sum + fill.fee, 0);

	return {
		totalTrades,
		averageFillPrice: totalTrades
			? tradeDetails.reduce((sum, trade) => sum + trade.avgPrice, 0) /
				totalTrades
			: 0,
		totalFees: tradeDetails.reduce((sum, trade) => sum + trade.fees, 0),
		totalNotional: tradeDetails.reduce(
			(sum, trade) => sum + trade.notional,
			0
		),
		buyTrades: tradeDetails.filter((trade) => trade.side === "buy").length,
		sellTrades: tradeDetails.filter((trade) => trade.side === "sell").length,
		makerFees: feesFor("maker"),
		takerFees: feesFor("taker"),
		fillCount: fills.length,
		tradeDetails,
	};
};

const buildTradeDetail = (record: TradeRecordView): TradeDetail => ({
	orderId: record.order.orderId,
	instrument: record.order.instrument,
	side: record.order.side,
	kind: record.order.kind,
	requestedQuantity: record.order.quantity,
	quantity: record.executedQuantity,
	avgPrice: record.averagePrice,
	notional: record.notional,
	fees: record.totalFees,
	status: record.status,
	fills: record.fills.map((fill) => ({
		timestamp: fill.timestamp,
		price: fill.price,
		quantity: fill.quantity,
		fee: fill.fee,
		liquidity: fill.liquidity,
	})),
});
