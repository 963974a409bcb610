import { BarIndexError, BarSequenceError, type Bar } from "@fillreplay/core";

/**
 * Read-only, index-addressed bar sequence for a single simulation run.
 *
 * Responsibilities:
 * - Validate the supplied sequence once (finite prices, non-negative volume,
 *   low <= high, strictly increasing timestamps)
 * - Freeze every bar so nothing downstream can mutate history
 * - Fail fast on out-of-range access
 *
 * NOT responsible for:
 * - Parsing external data (see loadBarsFromCsv / mapCcxtOhlcvToBar)
 * - Gap filling or resampling
 */
export class BarStore implements Iterable<Readonly<Bar>> {
	private readonly bars: readonly Readonly<Bar>[];

	constructor(bars: readonly Bar[]) {
		assertBarSequence(bars);
		this.bars = Object.freeze(bars.map((bar) => Object.freeze({ ...bar })));
	}

	get length(): number {
		return this.bars.length;
	}

	at(index: number): Readonly<Bar> {
		if (!Number.isInteger(index) || index < 0 || index >= this.bars.length) {
			throw new BarIndexError(index, this.bars.length);
		}
		const bar = this.bars[index];
		if (!bar) {
			throw new BarIndexError(index, this.bars.length);
		}
		return bar;
	}

	/** Copy of bars in [start, end), same semantics as Array.prototype.slice */
	slice(start?: number, end?: number): Readonly<Bar>[] {
		return this.bars.slice(start, end);
	}

	first(): Readonly<Bar> {
		return this.at(0);
	}

	last(): Readonly<Bar> {
		return this.at(this.bars.length - 1);
	}

	[Symbol.iterator](): Iterator<Readonly<Bar>> {
		return this.bars[Symbol.iterator]();
	}
}

const BAR_FIELDS = [
	"timestamp",
	"open",
	"high",
	"low",
	"close",
	"volume",
] as const;

export const assertBarSequence = (bars: readonly Bar[]): void => {
	let previous: number | undefined;
	bars.forEach((bar, position) => {
		for (const field of BAR_FIELDS) {
			if (!Number.isFinite(bar[field])) {
				throw new BarSequenceError(
					`Bar ${position} has a non-finite ${field}`,
					position
				);
			}
		}
		if (bar.volume < 0) {
			throw new BarSequenceError(
				`Bar ${position} has negative volume ${bar.volume}`,
				position
			);
		}
		if (bar.low > bar.high) {
			throw new BarSequenceError(
				`Bar ${position} has low ${bar.low} above high ${bar.high}`,
				position
			);
		}
		if (previous !== undefined && bar.timestamp <= previous) {
			throw new BarSequenceError(
				`Bar ${position} timestamp ${bar.timestamp} is not after ${previous}`,
				position
			);
		}
		previous = bar.timestamp;
	});
};
