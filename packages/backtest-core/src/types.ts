import type {
	Bar,
	OrderKind,
	OrderSide,
	TradeRecordView,
} from "@fillreplay/core";
import type { PaperAccountSnapshot } from "@fillreplay/execution-engine";
import type { PerformanceReport } from "@fillreplay/metrics";

/** What a signal asks for on a bar */
export interface OrderRequest {
	side: OrderSide;
	quantity: number;
	/** Defaults to "market" */
	orderType?: OrderKind;
	limitPrice?: number;
	timeInForceBars?: number;
}

export interface SubmitOrderRequest extends OrderRequest {
	createdBarIndex: number;
	/** Defaults to the configured instrument */
	instrument?: string;
	/** Defaults to a per-run sequence: order-1, order-2, ... */
	orderId?: string;
}

/** Free-form state a signal keeps between calls */
export type SignalContext = Record<string, unknown>;

export type SignalFn = (
	index: number,
	bar: Readonly<Bar>,
	history: readonly Readonly<Bar>[],
	context: SignalContext
) => OrderRequest | null | undefined;

export interface SignalStrategy {
	onBar: SignalFn;
}

export type Signal = SignalFn | SignalStrategy;

/** Cash ledger marked at the close of a processed bar */
export interface EquityPoint {
	barIndex: number;
	timestamp: number;
	equity: number;
	cash: number;
	position: number;
}

export interface BacktestResult {
	records: readonly TradeRecordView[];
	performance: PerformanceReport;
	account: PaperAccountSnapshot;
	equityCurve: EquityPoint[];
	/** Bars on which the signal returned an order request */
	signalsGenerated: number;
	barsProcessed: number;
}
