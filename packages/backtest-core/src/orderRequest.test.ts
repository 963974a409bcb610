import { describe, expect, it } from "vitest";
import { InvalidOrderError } from "@fillreplay/core";
import { buildOrder } from "./orderRequest";
import type { SubmitOrderRequest } from "./types";

const defaults = { instrument: "BTC-USDT", orderId: "order-1" };

const request = (
	overrides: Partial<SubmitOrderRequest> = {}
): SubmitOrderRequest => ({
	side: "buy",
	quantity: 2,
	createdBarIndex: 3,
	...overrides,
});

describe("buildOrder", () => {
	it("defaults to a market order on the configured instrument", () => {
		expect(buildOrder(request(), defaults)).toEqual({
			orderId: "order-1",
			instrument: "BTC-USDT",
			side: "buy",
			quantity: 2,
			createdBarIndex: 3,
			kind: "market",
		});
	});

	it("builds limit orders with time in force and caller identity", () => {
		expect(
			buildOrder(
				request({
					side: "sell",
					orderType: "limit",
					limitPrice: 101.5,
					timeInForceBars: 4,
					orderId: "exit-1",
					instrument: "ETH-USDT",
				}),
				defaults
			)
		).toEqual({
			orderId: "exit-1",
			instrument: "ETH-USDT",
			side: "sell",
			quantity: 2,
			createdBarIndex: 3,
			timeInForceBars: 4,
			kind: "limit",
			limitPrice: 101.5,
		});
	});

	it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
		"rejects quantity %s",
		(quantity) => {
			expect(() => buildOrder(request({ quantity }), defaults)).toThrowError(
				InvalidOrderError
			);
		}
	);

	it("rejects sides other than buy and sell", () => {
		const invalid = request();
		Reflect.set(invalid, "side", "hold");
		expect(() => buildOrder(invalid, defaults)).toThrowError(
			"Order side must be buy or sell, got hold"
		);
	});

	it("rejects unknown order types", () => {
		const invalid = request();
		Reflect.set(invalid, "orderType", "stop");
		expect(() => buildOrder(invalid, defaults)).toThrowError(
			"Order type must be market or limit, got stop"
		);
	});

	it("requires a positive limit price on limit orders", () => {
		expect(() =>
			buildOrder(request({ orderType: "limit" }), defaults)
		).toThrowError("Limit orders need a positive limit price, got undefined");
		expect(() =>
			buildOrder(request({ orderType: "limit", limitPrice: 0 }), defaults)
		).toThrowError(InvalidOrderError);
	});

	it("rejects a limit price on market orders", () => {
		expect(() =>
			buildOrder(request({ limitPrice: 100 }), defaults)
		).toThrowError("Market orders do not take a limit price");
	});

	it.each([0, 1.5, -2])("rejects time in force %s", (timeInForceBars) => {
		expect(() =>
			buildOrder(request({ timeInForceBars }), defaults)
		).toThrowError(/timeInForceBars must be a positive integer/);
	});

	it("attaches the offending request to the error", () => {
		try {
			buildOrder(request({ quantity: -5 }), defaults);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidOrderError);
			if (error instanceof InvalidOrderError) {
				expect(error.code).toBe("INVALID_ORDER");
				expect(error.details).toEqual({
					request: { side: "buy", quantity: -5, createdBarIndex: 3 },
				});
			}
		}
	});
});
