export interface Bar {
	/** Bar open time, epoch milliseconds */
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type OrderSide = "buy" | "sell";
export type OrderKind = "market" | "limit";
export type LiquidityRole = "maker" | "taker";

export type OrderStatus =
	| "NEW"
	| "SUBMITTED"
	| "PARTIAL"
	| "FILLED"
	| "CANCELLED";

export type TerminalOrderStatus = Extract<OrderStatus, "FILLED" | "CANCELLED">;

export const isOrderSide = (value: unknown): value is OrderSide =>
	value === "buy" || value === "sell";

export const isOrderKind = (value: unknown): value is OrderKind =>
	value === "market" || value === "limit";

export const isTerminalStatus = (
	status: OrderStatus
): status is TerminalOrderStatus => {
	switch (status) {
		case "FILLED":
		case "CANCELLED":
			return true;
		case "NEW":
		case "SUBMITTED":
		case "PARTIAL":
			return false;
		default: {
			const unreachable: never = status;
			throw new Error(`Unknown order status: ${String(unreachable)}`);
		}
	}
};

interface OrderBase {
	orderId: string;
	instrument: string;
	side: OrderSide;
	quantity: number;
	createdBarIndex: number;
	/** Absent means good-till-cancel */
	timeInForceBars?: number;
}

export interface MarketOrder extends OrderBase {
	kind: "market";
}

export interface LimitOrder extends OrderBase {
	kind: "limit";
	limitPrice: number;
}

export type Order = MarketOrder | LimitOrder;

export interface Fill {
	/** Timestamp of the bar the fill executed on */
	timestamp: number;
	price: number;
	quantity: number;
	fee: number;
	liquidity: LiquidityRole;
}

/**
 * Read-only view of an order's execution state. Reporting code depends on
 * this shape rather than on the mutable record owned by the lifecycle.
 */
export interface TradeRecordView {
	readonly order: Readonly<Order>;
	readonly fills: readonly Readonly<Fill>[];
	readonly status: OrderStatus;
	readonly executedQuantity: number;
	readonly averagePrice: number;
	readonly totalFees: number;
	readonly notional: number;
}
