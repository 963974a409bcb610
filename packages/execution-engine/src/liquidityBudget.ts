import type { Bar, LiquidityRole } from "@fillreplay/core";
import {
	LIMIT_LIQUIDITY_SHARE,
	volumeCap,
	type LiquidityAllowance,
} from "./fillSimulator";

interface BarUsage {
	total: number;
	maker: number;
}

/**
 * Tracks how much of each bar's volume cap orders have already consumed.
 * Market and limit orders on the same bar draw from one budget equal to the
 * cap; limit orders together never take more than half of it. Whoever is
 * processed first (submission order) is served first.
 */
export class LiquidityBudget {
	private readonly usage = new Map<number, BarUsage>();

	constructor(private readonly maxShareOfBar: number) {}

	allowance(barIndex: number, bar: Readonly<Bar>): LiquidityAllowance {
		const cap = volumeCap(bar, this.maxShareOfBar);
		const used = this.usage.get(barIndex) ?? { total: 0, maker: 0 };
		return {
			total: Math.max(0, cap - used.total),
			maker: Math.max(0, cap * LIMIT_LIQUIDITY_SHARE - used.maker),
		};
	}

	consume(barIndex: number, quantity: number, role: LiquidityRole): void {
		const used = this.usage.get(barIndex) ?? { total: 0, maker: 0 };
		used.total += quantity;
		if (role === "maker") {
			used.maker += quantity;
		}
		this.usage.set(barIndex, used);
	}
}
