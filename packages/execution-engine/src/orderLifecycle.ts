import {
	InvalidOrderError,
	type Fill,
	type Order,
	type OrderStatus,
} from "@fillreplay/core";
import type { BarStore } from "@fillreplay/data";
import { simulateFill, type FillModelConfig } from "./fillSimulator";
import { LiquidityBudget } from "./liquidityBudget";
import { TradeRecord } from "./TradeRecord";

export interface OrderLifecycleOptions {
	latencyBars: number;
	fillModel: FillModelConfig;
}

export interface LifecycleObserver {
	onFill?: (
		record: TradeRecord,
		fill: Readonly<Fill>,
		barIndex: number
	) => void;
	onStatusChange?: (
		record: TradeRecord,
		from: OrderStatus,
		to: OrderStatus,
		barIndex: number
	) => void;
}

/**
 * Owns every TradeRecord of a run and advances them bar by bar.
 *
 * Records are kept in submission order; on each bar they are evaluated in
 * that order against a shared liquidity budget. An order is inert until its
 * latency has elapsed, then fills are applied before completion and
 * time-in-force expiry are checked, in that order.
 */
export class OrderLifecycleManager {
	private readonly records: TradeRecord[] = [];
	private readonly byId = new Map<string, TradeRecord>();
	private readonly budget: LiquidityBudget;

	constructor(
		private readonly bars: BarStore,
		private readonly options: OrderLifecycleOptions,
		private readonly observer: LifecycleObserver = {}
	) {
		this.budget = new LiquidityBudget(options.fillModel.maxShareOfBar);
	}

	register(order: Order): TradeRecord {
		if (this.byId.has(order.orderId)) {
			throw new InvalidOrderError(`Duplicate order id ${order.orderId}`, {
				orderId: order.orderId,
			});
		}
		const record = new TradeRecord(order);
		this.records.push(record);
		this.byId.set(order.orderId, record);
		this.move(record, "SUBMITTED", order.createdBarIndex);
		return record;
	}

	/** Evaluates every active order against bar `barIndex`. */
	processBar(barIndex: number): void {
		const bar = this.bars.at(barIndex);
		for (const record of this.records) {
			if (record.isTerminal || barIndex <= record.lastProcessedBarIndex) {
				continue;
			}
			const { createdBarIndex } = record.order;
			if (barIndex < createdBarIndex + this.options.latencyBars) {
				continue;
			}
			record.markProcessed(barIndex);

			const result = simulateFill(
				record.order,
				bar,
				record.remainingQuantity,
				this.options.fillModel,
				this.budget.allowance(barIndex, bar)
			);
			for (const fill of result.fills) {
				record.applyFill(fill);
				this.budget.consume(barIndex, fill.quantity, fill.liquidity);
				this.observer.onFill?.(record, fill, barIndex);
			}

			if (record.executedQuantity > 0 && record.isComplete()) {
				this.move(record, "FILLED", barIndex);
				continue;
			}
			if (result.filledQuantity > 0 && record.status === "SUBMITTED") {
				this.move(record, "PARTIAL", barIndex);
			}

			const tif = record.order.timeInForceBars;
			if (tif !== undefined && barIndex - createdBarIndex >= tif) {
				this.move(record, "CANCELLED", barIndex);
			}
		}
	}

	/**
	 * Cancels an active order. Returns false when the order is unknown or
	 * already terminal.
	 */
	cancel(orderId: string, barIndex: number): boolean {
		const record = this.byId.get(orderId);
		if (!record || record.isTerminal) {
			return false;
		}
		this.move(record, "CANCELLED", barIndex);
		return true;
	}

	getRecords(): readonly TradeRecord[] {
		return [...this.records];
	}

	getRecord(orderId: string): TradeRecord | undefined {
		return this.byId.get(orderId);
	}

	activeCount(): number {
		return this.records.filter((record) => !record.isTerminal).length;
	}

	private move(record: TradeRecord, to: OrderStatus, barIndex: number): void {
		const from = record.status;
		record.transition(to);
		this.observer.onStatusChange?.(record, from, to, barIndex);
	}
}
