import { promises as fs } from "node:fs";
import type { OHLCV } from "ccxt";
import { BarSequenceError, type Bar } from "@fillreplay/core";

const COLUMNS = ["timestamp", "open", "high", "low", "close", "volume"];

const readCell = (value: unknown, row: number, column: number): number => {
	const parsed =
		typeof value === "number"
			? value
			: typeof value === "string" && value.trim()
				? Number(value)
				: Number.NaN;
	if (!Number.isFinite(parsed)) {
		throw new BarSequenceError(
			`OHLCV row ${row} ${COLUMNS[column]} is not a finite number: ${JSON.stringify(value) ?? "undefined"}`,
			row
		);
	}
	return parsed;
};

const toBar = (cells: readonly unknown[], position: number): Bar => ({
	timestamp: readCell(cells[0], position, 0),
	open: readCell(cells[1], position, 1),
	high: readCell(cells[2], position, 2),
	low: readCell(cells[3], position, 3),
	close: readCell(cells[4], position, 4),
	volume: readCell(cells[5], position, 5),
});

/**
 * Maps a CCXT OHLCV row (as returned by `exchange.fetchOHLCV`) to a Bar.
 * Missing cells throw; `position` only labels the error.
 */
export const mapCcxtOhlcvToBar = (row: OHLCV, position = 0): Bar =>
	toBar(row, position);

/**
 * Narrows a parsed JSON dump of `fetchOHLCV` rows and maps each row to a Bar.
 * Numeric strings are accepted; any other non-finite cell is rejected.
 */
export const mapOhlcvRows = (raw: unknown): Bar[] => {
	if (!Array.isArray(raw)) {
		throw new BarSequenceError("OHLCV payload must be an array of rows", 0);
	}
	return raw.map((entry: unknown, position) => {
		if (!Array.isArray(entry) || entry.length < 6) {
			throw new BarSequenceError(
				`OHLCV row ${position} must have six columns`,
				position
			);
		}
		return toBar(entry, position);
	});
};

export const loadBarsFromOhlcvJson = async (
	filePath: string
): Promise<Bar[]> => {
	const text = await fs.readFile(filePath, "utf-8");
	const parsed: unknown = JSON.parse(text);
	return mapOhlcvRows(parsed);
};
