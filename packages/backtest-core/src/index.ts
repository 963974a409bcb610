export { Backtester } from "./Backtester";
export { buildOrder } from "./orderRequest";
export type {
	BacktestResult,
	EquityPoint,
	OrderRequest,
	Signal,
	SignalContext,
	SignalFn,
	SignalStrategy,
	SubmitOrderRequest,
} from "./types";
