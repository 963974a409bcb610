import {
	isTerminalStatus,
	type Fill,
	type Order,
	type OrderStatus,
	type TradeRecordView,
} from "@fillreplay/core";

/** Relative tolerance used when deciding an order is completely filled */
export const FILL_TOLERANCE = 1e-9;

const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
	NEW: ["SUBMITTED", "CANCELLED"],
	SUBMITTED: ["PARTIAL", "FILLED", "CANCELLED"],
	PARTIAL: ["PARTIAL", "FILLED", "CANCELLED"],
	FILLED: [],
	CANCELLED: [],
};

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean =>
	TRANSITIONS[from].includes(to);

/**
 * Mutable execution state of one order. Fills are append-only and the
 * status only moves along the allowed transitions.
 */
export class TradeRecord implements TradeRecordView {
	readonly order: Readonly<Order>;
	private readonly fillLog: Readonly<Fill>[] = [];
	private currentStatus: OrderStatus = "NEW";
	private lastEvaluatedBar = -1;

	constructor(order: Order) {
		this.order = Object.freeze({ ...order });
	}

	get status(): OrderStatus {
		return this.currentStatus;
	}

	/** Last bar this record was evaluated on; -1 before any */
	get lastProcessedBarIndex(): number {
		return this.lastEvaluatedBar;
	}

	markProcessed(barIndex: number): void {
		if (barIndex <= this.lastEvaluatedBar) {
			throw new Error(
				`Order ${this.order.orderId} was already evaluated on bar ${this.lastEvaluatedBar}`
			);
		}
		this.lastEvaluatedBar = barIndex;
	}

	get fills(): readonly Readonly<Fill>[] {
		return this.fillLog;
	}

	get executedQuantity(): number {
		return this.fillLog.reduce((sum, fill) => sum + fill.quantity, 0);
	}

	get remainingQuantity(): number {
		return Math.max(0, this.order.quantity - this.executedQuantity);
	}

	get notional(): number {
		return this.fillLog.reduce(
			(sum, fill) => sum + fill.price * fill.quantity,
			0
		);
	}

	/** Volume-weighted average fill price, 0 without fills */
	get averagePrice(): number {
		const executed = this.executedQuantity;
		return executed > 0 ? this.notional / executed : 0;
	}

	get totalFees(): number {
		return this.fillLog.reduce((sum, fill) => sum + fill.fee, 0);
	}

	get isTerminal(): boolean {
		return isTerminalStatus(this.currentStatus);
	}

	isComplete(): boolean {
		return (
			this.order.quantity - this.executedQuantity <=
			FILL_TOLERANCE * this.order.quantity
		);
	}

	transition(next: OrderStatus): void {
		if (!canTransition(this.currentStatus, next)) {
			throw new Error(
				`Order ${this.order.orderId} cannot move from ${this.currentStatus} to ${next}`
			);
		}
		this.currentStatus = next;
	}

	applyFill(fill: Fill): void {
		if (this.isTerminal) {
			throw new Error(
				`Order ${this.order.orderId} is ${this.currentStatus}; fills are closed`
			);
		}
		if (!(fill.quantity > 0)) {
			throw new Error(
				`Fill quantity must be positive, got ${fill.quantity}`
			);
		}
		if (
			this.executedQuantity + fill.quantity >
			this.order.quantity * (1 + FILL_TOLERANCE)
		) {
			throw new Error(
				`Fill of ${fill.quantity} overfills order ${this.order.orderId}`
			);
		}
		this.fillLog.push(Object.freeze({ ...fill }));
	}
}
