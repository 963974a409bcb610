import { describe, expect, it } from "vitest";
import {
	BarIndexError,
	InvalidOrderError,
	type Bar,
	type MarketOrder,
	type Order,
} from "@fillreplay/core";
import { BarStore } from "@fillreplay/data";
import type { FillModelConfig } from "./fillSimulator";
import { OrderLifecycleManager } from "./orderLifecycle";

const makeBars = (count: number, volume = 1_000): BarStore => {
	const bars: Bar[] = [];
	for (let i = 0; i < count; i += 1) {
		bars.push({
			timestamp: 1_000 + i * 60_000,
			open: 100,
			high: 101,
			low: 99,
			close: 100,
			volume,
		});
	}
	return new BarStore(bars);
};

const fillModel: FillModelConfig = {
	maxShareOfBar: 0.02,
	slippageSpreadPct: 0.0002,
	impactSensitivity: 0.5,
	makerFeeRate: 0.0006,
	takerFeeRate: 0.0006,
};

let sequence = 0;
const marketOrder = (
	overrides: Partial<Omit<MarketOrder, "kind">> = {}
): MarketOrder => {
	sequence += 1;
	return {
		orderId: `order-${sequence}`,
		instrument: "BTC-USDT",
		side: "buy",
		quantity: 30,
		createdBarIndex: 0,
		kind: "market",
		...overrides,
	};
};

const limitOrder = (limitPrice: number, quantity: number): Order => {
	sequence += 1;
	return {
		orderId: `order-${sequence}`,
		instrument: "BTC-USDT",
		side: "buy",
		quantity,
		createdBarIndex: 0,
		kind: "limit",
		limitPrice,
	};
};

describe("OrderLifecycleManager", () => {
	it("submits on register and reports every transition", () => {
		const transitions: string[] = [];
		const manager = new OrderLifecycleManager(
			makeBars(3),
			{ latencyBars: 0, fillModel },
			{
				onStatusChange: (_record, from, to) =>
					transitions.push(`${from}->${to}`),
			}
		);
		const record = manager.register(marketOrder());
		expect(record.status).toBe("SUBMITTED");

		manager.processBar(0);
		expect(record.status).toBe("PARTIAL");
		expect(record.executedQuantity).toBeCloseTo(20, 12);

		manager.processBar(1);
		expect(record.status).toBe("FILLED");
		expect(record.executedQuantity).toBeCloseTo(30, 12);
		expect(transitions).toEqual([
			"NEW->SUBMITTED",
			"SUBMITTED->PARTIAL",
			"PARTIAL->FILLED",
		]);
	});

	it("shares one volume budget between orders on the same bar", () => {
		const manager = new OrderLifecycleManager(makeBars(1), {
			latencyBars: 0,
			fillModel,
		});
		const first = manager.register(marketOrder({ quantity: 15 }));
		const second = manager.register(marketOrder({ quantity: 15 }));
		manager.processBar(0);
		expect(first.executedQuantity).toBe(15);
		expect(second.executedQuantity).toBeCloseTo(5, 12);
		expect(first.status).toBe("FILLED");
		expect(second.status).toBe("PARTIAL");
	});

	it("limits resting orders to half of the budget", () => {
		const manager = new OrderLifecycleManager(makeBars(1), {
			latencyBars: 0,
			fillModel,
		});
		const resting = manager.register(limitOrder(100.5, 30));
		const taker = manager.register(marketOrder());
		manager.processBar(0);
		expect(resting.executedQuantity).toBeCloseTo(10, 12);
		expect(resting.fills[0]?.liquidity).toBe("maker");
		expect(taker.executedQuantity).toBeCloseTo(10, 12);
	});

	it("keeps orders inert until latency has elapsed", () => {
		const manager = new OrderLifecycleManager(makeBars(4), {
			latencyBars: 2,
			fillModel,
		});
		const record = manager.register(marketOrder({ quantity: 5 }));
		manager.processBar(0);
		manager.processBar(1);
		expect(record.fills).toHaveLength(0);
		expect(record.status).toBe("SUBMITTED");
		manager.processBar(2);
		expect(record.status).toBe("FILLED");
		expect(record.fills[0]?.timestamp).toBe(1_000 + 2 * 60_000);
	});

	it("ignores bars before the order was created", () => {
		const manager = new OrderLifecycleManager(makeBars(4), {
			latencyBars: 0,
			fillModel,
		});
		const record = manager.register(
			marketOrder({ quantity: 5, createdBarIndex: 3 })
		);
		manager.processBar(1);
		expect(record.fills).toHaveLength(0);
		manager.processBar(3);
		expect(record.status).toBe("FILLED");
	});

	it("cancels an unfilled order when its time in force runs out", () => {
		const manager = new OrderLifecycleManager(makeBars(4), {
			latencyBars: 0,
			fillModel,
		});
		const record = manager.register({
			...limitOrder(90, 1),
			timeInForceBars: 2,
		});
		manager.processBar(0);
		manager.processBar(1);
		expect(record.status).toBe("SUBMITTED");
		manager.processBar(2);
		expect(record.status).toBe("CANCELLED");
		expect(record.fills).toHaveLength(0);
	});

	it("checks completion before expiry on the same bar", () => {
		const manager = new OrderLifecycleManager(makeBars(3), {
			latencyBars: 0,
			fillModel,
		});
		const record = manager.register(marketOrder({ timeInForceBars: 1 }));
		manager.processBar(0);
		manager.processBar(1);
		expect(record.status).toBe("FILLED");
	});

	it("cancels a partial order at expiry with its fills kept", () => {
		const manager = new OrderLifecycleManager(makeBars(3), {
			latencyBars: 0,
			fillModel,
		});
		const record = manager.register(
			marketOrder({ quantity: 50, timeInForceBars: 1 })
		);
		manager.processBar(0);
		manager.processBar(1);
		expect(record.status).toBe("CANCELLED");
		expect(record.executedQuantity).toBeCloseTo(40, 12);
		manager.processBar(2);
		expect(record.fills).toHaveLength(2);
	});

	it("processes a bar at most once per order", () => {
		const manager = new OrderLifecycleManager(makeBars(2), {
			latencyBars: 0,
			fillModel,
		});
		const record = manager.register(marketOrder());
		manager.processBar(0);
		manager.processBar(0);
		expect(record.fills).toHaveLength(1);
	});

	it("leaves orders pending on bars without volume", () => {
		const manager = new OrderLifecycleManager(makeBars(2, 0), {
			latencyBars: 0,
			fillModel,
		});
		const record = manager.register(marketOrder());
		manager.processBar(0);
		manager.processBar(1);
		expect(record.status).toBe("SUBMITTED");
		expect(manager.activeCount()).toBe(1);
	});

	it("cancels active orders on request only", () => {
		const manager = new OrderLifecycleManager(makeBars(1), {
			latencyBars: 0,
			fillModel,
		});
		const record = manager.register(marketOrder());
		expect(manager.cancel(record.order.orderId, 0)).toBe(true);
		expect(record.status).toBe("CANCELLED");
		expect(manager.cancel(record.order.orderId, 0)).toBe(false);
		expect(manager.cancel("missing", 0)).toBe(false);
	});

	it("rejects duplicate order ids", () => {
		const manager = new OrderLifecycleManager(makeBars(1), {
			latencyBars: 0,
			fillModel,
		});
		const order = marketOrder();
		manager.register(order);
		expect(() => manager.register(order)).toThrowError(InvalidOrderError);
		expect(manager.getRecords()).toHaveLength(1);
	});

	it("fails on bar indexes outside the store", () => {
		const manager = new OrderLifecycleManager(makeBars(2), {
			latencyBars: 0,
			fillModel,
		});
		expect(() => manager.processBar(2)).toThrowError(BarIndexError);
	});

	it("notifies fills in submission order", () => {
		const seen: string[] = [];
		const manager = new OrderLifecycleManager(
			makeBars(1),
			{ latencyBars: 0, fillModel },
			{ onFill: (record) => seen.push(record.order.orderId) }
		);
		const a = manager.register(marketOrder({ quantity: 1 }));
		const b = manager.register(marketOrder({ quantity: 1 }));
		manager.processBar(0);
		expect(seen).toEqual([a.order.orderId, b.order.orderId]);
	});
});
