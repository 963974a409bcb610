export type FillReplayErrorCode =
	| "INVALID_ORDER"
	| "BAR_INDEX"
	| "BAR_SEQUENCE"
	| "CONFIG";

export class FillReplayError extends Error {
	constructor(
		readonly code: FillReplayErrorCode,
		message: string,
		readonly details: Record<string, unknown> = {}
	) {
		super(message);
		this.name = new.target.name;
	}
}

/** Rejected order request. Raised synchronously at submission. */
export class InvalidOrderError extends FillReplayError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("INVALID_ORDER", message, details);
	}
}

export class BarIndexError extends FillReplayError {
	constructor(readonly index: number, readonly length: number) {
		super(
			"BAR_INDEX",
			`Bar index ${index} out of range (bars available: ${length})`,
			{ index, length }
		);
	}
}

export class BarSequenceError extends FillReplayError {
	constructor(message: string, readonly position: number) {
		super("BAR_SEQUENCE", message, { position });
	}
}

export class ConfigError extends FillReplayError {
	constructor(readonly field: string, message: string) {
		super("CONFIG", `Invalid config field ${field}: ${message}`, { field });
	}
}
