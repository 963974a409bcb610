import type { Bar } from "@fillreplay/core";
import type {
	OrderRequest,
	SignalContext,
	SignalStrategy,
} from "@fillreplay/backtest-core";

export interface PullbackSignalOptions {
	/** Bars scanned for the recent high */
	lookback: number;
	/** Drop from the recent high that triggers an entry, as a fraction */
	pullbackPct: number;
	targetPct: number;
	stopPct: number;
	quantity: number;
}

export const DEFAULT_PULLBACK_OPTIONS: PullbackSignalOptions = {
	lookback: 20,
	pullbackPct: 0.03,
	targetPct: 0.15,
	stopPct: 0.05,
	quantity: 1,
};

const readEntryPrice = (context: SignalContext): number | null =>
	typeof context.entryPrice === "number" ? context.entryPrice : null;

/** Filled base quantity currently held, e.g. from the cash ledger */
export type PositionSource = () => number;

/**
 * Long-only dip buyer: enters after a pullback from the recent high and
 * exits at a profit target or stop, both measured from the entry close.
 * Exits sell what `position` reports as held; without a source they sell the
 * configured quantity, which overshoots when the entry only partly filled.
 */
export const createPullbackSignal = (
	overrides: Partial<PullbackSignalOptions> = {},
	position?: PositionSource
): SignalStrategy => {
	const options: PullbackSignalOptions = {
		lookback: overrides.lookback ?? DEFAULT_PULLBACK_OPTIONS.lookback,
		pullbackPct: overrides.pullbackPct ?? DEFAULT_PULLBACK_OPTIONS.pullbackPct,
		targetPct: overrides.targetPct ?? DEFAULT_PULLBACK_OPTIONS.targetPct,
		stopPct: overrides.stopPct ?? DEFAULT_PULLBACK_OPTIONS.stopPct,
		quantity: overrides.quantity ?? DEFAULT_PULLBACK_OPTIONS.quantity,
	};
	if (!Number.isInteger(options.lookback) || options.lookback < 1) {
		throw new Error(
			`Pullback lookback must be a positive integer, got ${options.lookback}`
		);
	}

	return {
		onBar: (
			_index: number,
			bar: Readonly<Bar>,
			history: readonly Readonly<Bar>[],
			context: SignalContext
		): OrderRequest | null => {
			const entryPrice = readEntryPrice(context);
			if (entryPrice !== null) {
				const hitTarget = bar.close >= entryPrice * (1 + options.targetPct);
				const hitStop = bar.close <= entryPrice * (1 - options.stopPct);
				if (!hitTarget && !hitStop) {
					return null;
				}
				context.entryPrice = null;
				const held = position ? position() : options.quantity;
				return held > 0 ? { side: "sell", quantity: held } : null;
			}

			if (history.length < options.lookback) {
				return null;
			}
			const recentHigh = Math.max(
				...history.slice(-options.lookback).map((prior) => prior.high)
			);
			if (!(recentHigh > 0)) {
				return null;
			}
			const pullback = (recentHigh - bar.close) / recentHigh;
			if (pullback < options.pullbackPct) {
				return null;
			}
			context.entryPrice = bar.close;
			return { side: "buy", quantity: options.quantity };
		},
	};
};
