import type {
	LiquidityRole,
	OrderKind,
	OrderSide,
	OrderStatus,
} from "@fillreplay/core";

export interface FillDetail {
	timestamp: number;
	price: number;
	quantity: number;
	fee: number;
	liquidity: LiquidityRole;
}

export interface TradeDetail {
	orderId: string;
	instrument: string;
	side: OrderSide;
	kind: OrderKind;
	requestedQuantity: number;
	/** Executed quantity */
	quantity: number;
	avgPrice: number;
	notional: number;
	fees: number;
	status: OrderStatus;
	fills: FillDetail[];
}

export interface PerformanceSummary {
	/** Orders with at least one fill */
	totalTrades: number;
	/** Unweighted mean of the per-trade average prices, 0 without trades */
	averageFillPrice: number;
	totalFees: number;
	totalNotional: number;
	buyTrades: number;
	sellTrades: number;
	makerFees: number;
	takerFees: number;
	fillCount: number;
}

export interface PerformanceReport extends PerformanceSummary {
	tradeDetails: TradeDetail[];
}
