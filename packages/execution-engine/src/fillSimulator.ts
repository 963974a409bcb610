import type { Bar, Fill, Order, OrderSide } from "@fillreplay/core";

/** Flat slippage applied when a bar reports no volume at all */
export const EMERGENCY_SLIPPAGE_PCT = 0.1;

/** Resting orders only see this share of the bar's volume cap */
export const LIMIT_LIQUIDITY_SHARE = 0.5;

export interface FillModelConfig {
	maxShareOfBar: number;
	slippageSpreadPct: number;
	impactSensitivity: number;
	makerFeeRate: number;
	takerFeeRate: number;
}

/**
 * Quantity still available on a bar after earlier orders have filled.
 * `total` bounds every order; `maker` additionally bounds limit orders.
 */
export interface LiquidityAllowance {
	total: number;
	maker: number;
}

export interface FillResult {
	fills: Fill[];
	filledQuantity: number;
}

const emptyResult = (): FillResult => ({ fills: [], filledQuantity: 0 });

export const volumeCap = (
	bar: Readonly<Bar>,
	maxShareOfBar: number
): number => bar.volume * maxShareOfBar;

export interface SlippageBreakdown {
	basePrice: number;
	spread: number;
	impact: number;
	price: number;
}

/**
 * Market orders execute at the bar open plus a fixed spread and a size
 * dependent impact term: base * (qty / volume) ^ sensitivity. Sell prices
 * are floored at zero.
 */
export const priceMarketFill = (
	bar: Readonly<Bar>,
	side: OrderSide,
	quantity: number,
	config: Pick<FillModelConfig, "slippageSpreadPct" | "impactSensitivity">
): SlippageBreakdown => {
	const basePrice = bar.open;
	const spread = basePrice * config.slippageSpreadPct;
	const impact =
		bar.volume > 0
			? basePrice * Math.pow(quantity / bar.volume, config.impactSensitivity)
			: basePrice * EMERGENCY_SLIPPAGE_PCT;
	const price =
		side === "buy"
			? basePrice + spread + impact
			: Math.max(0, basePrice - spread - impact);
	return { basePrice, spread, impact, price };
};

export const isLimitCrossed = (
	bar: Readonly<Bar>,
	side: OrderSide,
	limitPrice: number
): boolean =>
	side === "buy" ? bar.low <= limitPrice : bar.high >= limitPrice;

/**
 * Never worse than the limit, never better than an open that already traded
 * through it.
 */
export const priceLimitFill = (
	bar: Readonly<Bar>,
	side: OrderSide,
	limitPrice: number
): number =>
	side === "buy"
		? Math.min(limitPrice, bar.open)
		: Math.max(limitPrice, bar.open);

/**
 * Decides how much of `remaining` fills on `bar`, and at what price and fee.
 * Pure: callers own the bookkeeping of the returned fills.
 */
export const simulateFill = (
	order: Readonly<Order>,
	bar: Readonly<Bar>,
	remaining: number,
	config: FillModelConfig,
	allowance?: LiquidityAllowance
): FillResult => {
	const cap = volumeCap(bar, config.maxShareOfBar);
	if (cap <= 0 || remaining <= 0) {
		return emptyResult();
	}

	switch (order.kind) {
		case "market": {
			const available = Math.min(cap, allowance?.total ?? cap);
			const quantity = Math.min(remaining, available);
			if (quantity <= 0) {
				return emptyResult();
			}
			const { price } = priceMarketFill(bar, order.side, quantity, config);
			return {
				fills: [
					{
						timestamp: bar.timestamp,
						price,
						quantity,
						fee: price * quantity * config.takerFeeRate,
						liquidity: "taker",
					},
				],
				filledQuantity: quantity,
			};
		}
		case "limit": {
			if (!isLimitCrossed(bar, order.side, order.limitPrice)) {
				return emptyResult();
			}
			const makerCap = cap * LIMIT_LIQUIDITY_SHARE;
			const available = Math.min(
				makerCap,
				allowance?.maker ?? makerCap,
				allowance?.total ?? cap
			);
			const quantity = Math.min(remaining, available);
			if (quantity <= 0) {
				return emptyResult();
			}
			const price = priceLimitFill(bar, order.side, order.limitPrice);
			return {
				fills: [
					{
						timestamp: bar.timestamp,
						price,
						quantity,
						fee: price * quantity * config.makerFeeRate,
						liquidity: "maker",
					},
				],
				filledQuantity: quantity,
			};
		}
		default: {
			const unreachable: never = order;
			throw new Error(
				`Unsupported order kind: ${JSON.stringify(unreachable)}`
			);
		}
	}
};
