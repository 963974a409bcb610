import {
	createLogger,
	resolveBacktestConfig,
	type BacktestConfig,
	type BacktestConfigInput,
	type Bar,
	type LogLevel,
	type TradeRecordView,
} from "@fillreplay/core";
import { BarStore } from "@fillreplay/data";
import {
	OrderLifecycleManager,
	PaperAccount,
	type PaperAccountSnapshot,
} from "@fillreplay/execution-engine";
import {
	computePerformance,
	type PerformanceReport,
} from "@fillreplay/metrics";
import { buildOrder } from "./orderRequest";
import type {
	BacktestResult,
	EquityPoint,
	Signal,
	SignalContext,
	SignalFn,
	SubmitOrderRequest,
} from "./types";

const backtestLogger = createLogger("backtest-core");

const toSignalFn = (signal: Signal): SignalFn =>
	typeof signal === "function"
		? signal
		: (index, bar, history, context) =>
				signal.onBar(index, bar, history, context);

/**
 * Single-instrument replay of a bar sequence. One instance owns its bars,
 * its orders and its cash ledger; run two backtests with two instances.
 */
export class Backtester {
	readonly config: BacktestConfig;
	readonly bars: BarStore;
	private readonly lifecycle: OrderLifecycleManager;
	private readonly account: PaperAccount;
	private readonly eventLevel: LogLevel;
	private orderSequence = 0;
	private lastSnapshot: PaperAccountSnapshot | null = null;
	private lastMarkedBar = -1;
	private readonly equityCurve: EquityPoint[] = [];

	constructor(
		bars: BarStore | readonly Bar[],
		config: BacktestConfigInput = {}
	) {
		this.config = resolveBacktestConfig(config);
		this.bars = bars instanceof BarStore ? bars : new BarStore(bars);
		this.eventLevel = this.config.verbose ? "info" : "debug";
		this.account = new PaperAccount(this.config.startingCash);
		this.lifecycle = new OrderLifecycleManager(
			this.bars,
			{
				latencyBars: this.config.latencyBars,
				fillModel: {
					maxShareOfBar: this.config.maxShareOfBar,
					slippageSpreadPct: this.config.slippageSpreadPct,
					impactSensitivity: this.config.impactSensitivity,
					makerFeeRate: this.config.makerFeeRate,
					takerFeeRate: this.config.takerFeeRate,
				},
			},
			{
				onFill: (record, fill, barIndex) => {
					this.account.applyFill(record.order.side, fill);
					backtestLogger.log(this.eventLevel, "order_fill", {
						orderId: record.order.orderId,
						side: record.order.side,
						barIndex,
						fill,
					});
				},
				onStatusChange: (record, from, to, barIndex) => {
					backtestLogger.log(this.eventLevel, "order_status", {
						orderId: record.order.orderId,
						from,
						to,
						barIndex,
						executedQuantity: record.executedQuantity,
					});
				},
			}
		);
	}

	submitOrder(request: SubmitOrderRequest): TradeRecordView {
		this.bars.at(request.createdBarIndex);
		const order = buildOrder(request, {
			instrument: this.config.instrument,
			orderId: request.orderId ?? this.nextOrderId(),
		});
		backtestLogger.log(this.eventLevel, "order_submitted", { order });
		return this.lifecycle.register(order);
	}

	cancelOrder(orderId: string, barIndex: number): boolean {
		return this.lifecycle.cancel(orderId, barIndex);
	}

	/**
	 * Evaluates active orders on bar `index`. The cash ledger is only marked
	 * when the bar is later than any bar marked before.
	 */
	processBar(index: number): void {
		const bar = this.bars.at(index);
		this.lifecycle.processBar(index);
		if (index <= this.lastMarkedBar) {
			return;
		}
		const snapshot = this.account.snapshot(bar.close);
		this.lastSnapshot = snapshot;
		this.lastMarkedBar = index;
		this.equityCurve.push({
			barIndex: index,
			timestamp: bar.timestamp,
			equity: snapshot.equity,
			cash: snapshot.cash,
			position: snapshot.position,
		});
	}

	/** Processes every bar in the inclusive range [from, to]. */
	stepThroughBars(from = 0, to = this.bars.length - 1): void {
		this.bars.at(from);
		this.bars.at(to);
		for (let index = from; index <= to; index += 1) {
			this.processBar(index);
		}
	}

	/**
	 * Calls the signal on every bar from the warm-up offset onwards, submits
	 * what it returns at that bar, then processes the bar for every active
	 * order in submission order.
	 */
	run(signal: Signal, context: SignalContext = {}): BacktestResult {
		const onBar = toSignalFn(signal);
		let barsProcessed = 0;
		let signalsGenerated = 0;

		for (
			let index = this.config.warmupBars;
			index < this.bars.length;
			index += 1
		) {
			const bar = this.bars.at(index);
			const request = onBar(index, bar, this.bars.slice(0, index), context);
			if (request) {
				signalsGenerated += 1;
				this.submitOrder({ ...request, createdBarIndex: index });
			}
			this.processBar(index);
			barsProcessed += 1;
		}

		const records = this.getRecords();
		const performance = computePerformance(records);
		const account = this.getAccountSnapshot();
		backtestLogger.info("backtest_complete", {
			instrument: this.config.instrument,
			barsProcessed,
			signalsGenerated,
			orders: records.length,
			performance: {
				totalTrades: performance.totalTrades,
				averageFillPrice: performance.averageFillPrice,
				totalFees: performance.totalFees,
			},
			account,
		});

		return {
			records,
			performance,
			account,
			equityCurve: this.getEquityCurve(),
			signalsGenerated,
			barsProcessed,
		};
	}

	getRecords(): readonly TradeRecordView[] {
		return this.lifecycle.getRecords();
	}

	getRecord(orderId: string): TradeRecordView | undefined {
		return this.lifecycle.getRecord(orderId);
	}

	computePerformance(): PerformanceReport {
		return computePerformance(this.getRecords());
	}

	/** Cash ledger marked at the close of the last processed bar */
	getAccountSnapshot(): PaperAccountSnapshot {
		return this.lastSnapshot ?? this.account.snapshot(0);
	}

	getEquityCurve(): EquityPoint[] {
		return this.equityCurve.map((point) => ({ ...point }));
	}

	private nextOrderId(): string {
		let candidate: string;
		do {
			this.orderSequence += 1;
			candidate = `order-${this.orderSequence}`;
		} while (this.lifecycle.getRecord(candidate));
		return candidate;
	}
}
