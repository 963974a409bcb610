import { promises as fs } from "node:fs";
import { BarSequenceError, type Bar } from "@fillreplay/core";

export type BarField = keyof Bar;

export interface CsvBarOptions {
	/** Header name per bar field; defaults to the field name itself */
	columns?: Partial<Record<BarField, string>>;
	delimiter?: string;
	/**
	 * Unit of numeric timestamps. Other cells must be ISO 8601 dates; a time
	 * without a zone is read as UTC.
	 */
	timestampUnit?: "ms" | "s";
}

const FIELDS: readonly BarField[] = [
	"timestamp",
	"open",
	"high",
	"low",
	"close",
	"volume",
];

const unquote = (cell: string): string => {
	const trimmed = cell.trim();
	if (
		trimmed.length >= 2 &&
		trimmed.startsWith('"') &&
		trimmed.endsWith('"')
	) {
		return trimmed.slice(1, -1).replace(/""/g, '"');
	}
	return trimmed;
};

/**
 * Splits one line on the delimiter, leaving delimiters inside double-quoted
 * cells in place. A doubled quote inside a quoted cell is a literal quote.
 */
const splitLine = (line: string, delimiter: string): string[] => {
	const cells: string[] = [];
	let start = 0;
	let inQuotes = false;
	let i = 0;
	while (i < line.length) {
		if (line[i] === '"') {
			inQuotes = !inQuotes;
			i += 1;
		} else if (!inQuotes && line.startsWith(delimiter, i)) {
			cells.push(line.slice(start, i));
			i += delimiter.length;
			start = i;
		} else {
			i += 1;
		}
	}
	cells.push(line.slice(start));
	return cells.map(unquote);
};

// ISO 8601 date, optionally with a time and a zone. A time without a zone is UTC.
const ISO_TIMESTAMP =
	/^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:\d{2})?)?$/;

const parseTimestamp = (
	raw: string,
	unit: "ms" | "s",
	line: number
): number => {
	if (/^-?\d+(\.\d+)?$/.test(raw)) {
		const value = Number(raw);
		return unit === "s" ? Math.round(value * 1000) : value;
	}
	const match = ISO_TIMESTAMP.exec(raw);
	const [, date, time, zone] = match ?? [];
	const normalized =
		date === undefined
			? null
			: time === undefined
				? date
				: `${date}T${time}${zone ?? "Z"}`;
	const parsed = normalized === null ? Number.NaN : Date.parse(normalized);
	if (Number.isNaN(parsed)) {
		throw new BarSequenceError(
			`Line ${line}: unparseable timestamp "${raw}"`,
			line
		);
	}
	return parsed;
};

const resolveColumnIndexes = (
	header: string[],
	columns: Partial<Record<BarField, string>>
): Record<BarField, number> => {
	const normalized = header.map((name) => name.toLowerCase());
	const indexes: Partial<Record<BarField, number>> = {};
	for (const field of FIELDS) {
		const wanted = (columns[field] ?? field).toLowerCase();
		const idx = normalized.indexOf(wanted);
		if (idx === -1) {
			throw new BarSequenceError(
				`CSV header is missing column "${wanted}" for ${field}`,
				1
			);
		}
		indexes[field] = idx;
	}
	const { timestamp, open, high, low, close, volume } = indexes;
	if (
		timestamp === undefined ||
		open === undefined ||
		high === undefined ||
		low === undefined ||
		close === undefined ||
		volume === undefined
	) {
		throw new BarSequenceError("CSV header could not be resolved", 1);
	}
	return { timestamp, open, high, low, close, volume };
};

const readRow = (
	cells: string[],
	indexes: Record<BarField, number>,
	unit: "ms" | "s",
	lineNumber: number
): Bar => {
	const cellFor = (field: BarField): string => {
		const cell = cells[indexes[field]];
		if (cell === undefined || cell === "") {
			throw new BarSequenceError(
				`Line ${lineNumber}: missing ${field}`,
				lineNumber
			);
		}
		return cell;
	};
	const numberFor = (field: BarField): number => {
		const value = Number(cellFor(field));
		if (!Number.isFinite(value)) {
			throw new BarSequenceError(
				`Line ${lineNumber}: ${field} is not numeric`,
				lineNumber
			);
		}
		return value;
	};
	return {
		timestamp: parseTimestamp(cellFor("timestamp"), unit, lineNumber),
		open: numberFor("open"),
		high: numberFor("high"),
		low: numberFor("low"),
		close: numberFor("close"),
		volume: numberFor("volume"),
	};
};

/**
 * Parses tabular OHLCV text into bars ordered by timestamp. Rows sharing a
 * timestamp collapse to the last one seen.
 */
export const parseBarsCsv = (
	text: string,
	options: CsvBarOptions = {}
): Bar[] => {
	const delimiter = options.delimiter ?? ",";
	const unit = options.timestampUnit ?? "ms";
	const lines = text.split(/\r?\n/);

	let indexes: Record<BarField, number> | null = null;
	const rows: Bar[] = [];

	for (const [lineIdx, rawLine] of lines.entries()) {
		if (!rawLine.trim()) {
			continue;
		}
		const cells = splitLine(rawLine, delimiter);
		if (!indexes) {
			indexes = resolveColumnIndexes(cells, options.columns ?? {});
			continue;
		}
		rows.push(readRow(cells, indexes, unit, lineIdx + 1));
	}

	if (!indexes) {
		throw new BarSequenceError("CSV input has no header row", 0);
	}

	return dedupeByTimestamp(rows.sort((a, b) => a.timestamp - b.timestamp));
};

const dedupeByTimestamp = (sorted: Bar[]): Bar[] => {
	const result: Bar[] = [];
	for (const bar of sorted) {
		const last = result[result.length - 1];
		if (last && last.timestamp === bar.timestamp) {
			result[result.length - 1] = bar;
		} else {
			result.push(bar);
		}
	}
	return result;
};

export const loadBarsFromCsv = async (
	filePath: string,
	options: CsvBarOptions = {}
): Promise<Bar[]> => {
	const text = await fs.readFile(filePath, "utf-8");
	return parseBarsCsv(text, options);
};
