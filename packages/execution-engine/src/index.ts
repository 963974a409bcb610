export {
	EMERGENCY_SLIPPAGE_PCT,
	LIMIT_LIQUIDITY_SHARE,
	isLimitCrossed,
	priceLimitFill,
	priceMarketFill,
	simulateFill,
	volumeCap,
} from "./fillSimulator";
export type {
	FillModelConfig,
	FillResult,
	LiquidityAllowance,
	SlippageBreakdown,
} from "./fillSimulator";
export { LiquidityBudget } from "./liquidityBudget";
export { FILL_TOLERANCE, TradeRecord, canTransition } from "./TradeRecord";
export { OrderLifecycleManager } from "./orderLifecycle";
export type {
	LifecycleObserver,
	OrderLifecycleOptions,
} from "./orderLifecycle";
export { PaperAccount } from "./paperAccount";
export type { PaperAccountSnapshot } from "./paperAccount";
