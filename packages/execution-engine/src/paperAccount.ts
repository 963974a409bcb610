import type { Fill, OrderSide } from "@fillreplay/core";

export interface PaperAccountSnapshot {
	startingCash: number;
	cash: number;
	/** Signed base-asset position; negative after net selling */
	position: number;
	equity: number;
	totalFees: number;
	maxEquity: number;
	maxDrawdown: number;
	fillCount: number;
}

/**
 * Running cash and position counters fed by every simulated fill.
 * Not margin aware: cash and position may go negative.
 */
export class PaperAccount {
	private readonly startingCash: number;
	private cash: number;
	private position = 0;
	private totalFees = 0;
	private fillCount = 0;
	private maxEquity: number;
	private maxDrawdown = 0;

	constructor(startingCash: number) {
		this.startingCash = startingCash;
		this.cash = startingCash;
		this.maxEquity = startingCash;
	}

	applyFill(side: OrderSide, fill: Readonly<Fill>): void {
		const notional = fill.price * fill.quantity;
		if (side === "buy") {
			this.cash -= notional + fill.fee;
			this.position += fill.quantity;
		} else {
			this.cash += notional - fill.fee;
			this.position -= fill.quantity;
		}
		this.totalFees += fill.fee;
		this.fillCount += 1;
	}

	/** Marks the position at `markPrice` and updates the equity high-water mark */
	snapshot(markPrice: number): PaperAccountSnapshot {
		const equity = this.cash + this.position * markPrice;
		if (equity > this.maxEquity) {
			this.maxEquity = equity;
		}
		const drawdown = this.maxEquity - equity;
		if (drawdown > this.maxDrawdown) {
			this.maxDrawdown = drawdown;
		}

		return {
			startingCash: this.startingCash,
			cash: this.cash,
			position: this.position,
			equity,
			totalFees: this.totalFees,
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxDrawdown,
			fillCount: this.fillCount,
		};
	}
}
