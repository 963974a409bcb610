import { describe, expect, it } from "vitest";
import type { Bar } from "@fillreplay/core";
import type { SignalContext } from "@fillreplay/backtest-core";
import { createPullbackSignal } from "./pullbackSignal";

const bar = (index: number, close: number): Bar => ({
	timestamp: 1_000 + index * 60_000,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1_000,
});

const replay = (
	closes: number[],
	context: SignalContext = {}
): Array<string | null> => {
	const signal = createPullbackSignal({ lookback: 3, quantity: 2 });
	const bars = closes.map((close, index) => bar(index, close));
	return bars.map((current, index) => {
		const request = signal.onBar(
			index,
			current,
			bars.slice(0, index),
			context
		);
		return request ? `${request.side}:${request.quantity}` : null;
	});
};

describe("createPullbackSignal", () => {
	it("waits for a full lookback window", () => {
		expect(replay([100, 90, 80])).toEqual([null, null, null]);
	});

	it("buys the dip and sells at the profit target", () => {
		const context: SignalContext = {};
		expect(replay([100, 100, 100, 96, 100, 111], context)).toEqual([
			null,
			null,
			null,
			"buy:2",
			null,
			"sell:2",
		]);
		expect(context.entryPrice).toBeNull();
	});

	it("sells at the stop", () => {
		expect(replay([100, 100, 100, 96, 91])).toEqual([
			null,
			null,
			null,
			"buy:2",
			"sell:2",
		]);
	});

	it("ignores shallow pullbacks", () => {
		expect(replay([100, 100, 100, 98])).toEqual([null, null, null, null]);
	});
});

describe("createPullbackSignal options", () => {
	it("falls back to defaults for unset options", () => {
		const signal = createPullbackSignal({ lookback: undefined });
		const bars = Array.from({ length: 21 }, (_, index) =>
			bar(index, index === 20 ? 96 : 100)
		);
		const last = bars[20];
		expect(last).toBeDefined();
		if (last) {
			expect(signal.onBar(20, last, bars.slice(0, 20), {})).toEqual({
				side: "buy",
				quantity: 1,
			});
		}
	});

	it("rejects a non-positive lookback", () => {
		expect(() => createPullbackSignal({ lookback: 0 })).toThrowError(
			"Pullback lookback must be a positive integer, got 0"
		);
	});
});

describe("createPullbackSignal exits", () => {
	const dipThenTarget = [100, 100, 100, 96, 111].map((close, index) =>
		bar(index, close)
	);

	const run = (held: number): Array<string | null> => {
		const signal = createPullbackSignal(
			{ lookback: 3, quantity: 2 },
			() => held
		);
		const context: SignalContext = {};
		return dipThenTarget.map((current, index) => {
			const request = signal.onBar(
				index,
				current,
				dipThenTarget.slice(0, index),
				context
			);
			return request ? `${request.side}:${request.quantity}` : null;
		});
	};

	it("sells only the quantity actually held", () => {
		expect(run(0.5)).toEqual([null, null, null, "buy:2", "sell:0.5"]);
	});

	it("skips the exit when the entry never filled", () => {
		expect(run(0)).toEqual([null, null, null, "buy:2", null]);
	});

	it("does not buy against a zero recent high", () => {
		const flat = [0, 0, 0, 0].map((close, index) => bar(index, close));
		const signal = createPullbackSignal({ lookback: 3 });
		const last = flat[3];
		expect(last).toBeDefined();
		if (last) {
			expect(signal.onBar(3, last, flat.slice(0, 3), {})).toBeNull();
		}
	});
});
