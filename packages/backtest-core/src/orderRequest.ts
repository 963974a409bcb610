import {
	InvalidOrderError,
	isOrderKind,
	isOrderSide,
	type Order,
} from "@fillreplay/core";
import type { SubmitOrderRequest } from "./types";

const isPositiveFinite = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value) && value > 0;

/**
 * Turns a submission request into an Order, rejecting anything the
 * simulator could not execute faithfully.
 */
export const buildOrder = (
	request: SubmitOrderRequest,
	defaults: { instrument: string; orderId: string }
): Order => {
	const details = { request: { ...request } };
	const { side, quantity, limitPrice, timeInForceBars } = request;
	const kind = request.orderType ?? "market";

	if (!isOrderSide(side)) {
		throw new InvalidOrderError(
			`Order side must be buy or sell, got ${String(side)}`,
			details
		);
	}
	if (!isPositiveFinite(quantity)) {
		throw new InvalidOrderError(
			`Order quantity must be a positive number, got ${String(quantity)}`,
			details
		);
	}
	if (!isOrderKind(kind)) {
		throw new InvalidOrderError(
			`Order type must be market or limit, got ${String(kind)}`,
			details
		);
	}
	if (
		timeInForceBars !== undefined &&
		(!Number.isInteger(timeInForceBars) || timeInForceBars <= 0)
	) {
		throw new InvalidOrderError(
			`timeInForceBars must be a positive integer, got ${timeInForceBars}`,
			details
		);
	}
	const instrument = request.instrument ?? defaults.instrument;
	if (!instrument.trim()) {
		throw new InvalidOrderError("Order instrument must not be empty", details);
	}
	const orderId = request.orderId ?? defaults.orderId;
	if (!orderId.trim()) {
		throw new InvalidOrderError("Order id must not be empty", details);
	}

	const base = {
		orderId,
		instrument,
		side,
		quantity,
		createdBarIndex: request.createdBarIndex,
		...(timeInForceBars !== undefined ? { timeInForceBars } : {}),
	};

	if (kind === "market") {
		if (limitPrice !== undefined) {
			throw new InvalidOrderError(
				"Market orders do not take a limit price",
				details
			);
		}
		return { ...base, kind };
	}
	if (!isPositiveFinite(limitPrice)) {
		throw new InvalidOrderError(
			`Limit orders need a positive limit price, got ${String(limitPrice)}`,
			details
		);
	}
	return { ...base, kind, limitPrice };
};
