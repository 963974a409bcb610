import type { PerformanceReport } from "./metricsSchema";

export type CsvMode = "summary" | "trades" | "fills";

export interface FormatCsvOptions {
	mode?: CsvMode;
	includeHeader?: boolean;
}

type CsvRow = Record<string, string | number | null | undefined>;

export const formatPerformanceCsv = (
	report: PerformanceReport,
	options: FormatCsvOptions = {}
): string => {
	const mode = options.mode ?? "trades";
	const includeHeader = options.includeHeader ?? true;
	switch (mode) {
		case "summary":
			return toCsv([buildSummaryRow(report)], includeHeader);
		case "fills":
			return toCsv(buildFillRows(report), includeHeader);
		case "trades":
		default:
			return toCsv(buildTradeRows(report), includeHeader);
	}
};

const buildSummaryRow = (report: PerformanceReport): CsvRow => ({
	totalTrades: report.totalTrades,
	buyTrades: report.buyTrades,
	sellTrades: report.sellTrades,
	fillCount: report.fillCount,
	averageFillPrice: report.averageFillPrice,
	totalNotional: report.totalNotional,
	totalFees: report.totalFees,
	makerFees: report.makerFees,
	takerFees: report.takerFees,
});

const buildTradeRows = (report: PerformanceReport): CsvRow[] =>
	report.tradeDetails.map((trade) => ({
		orderId: trade.orderId,
		instrument: trade.instrument,
		side: trade.side,
		kind: trade.kind,
		status: trade.status,
		requestedQuantity: trade.requestedQuantity,
		quantity: trade.quantity,
		avgPrice: trade.avgPrice,
		notional: trade.notional,
		fees: trade.fees,
		fills: trade.fills.length,
	}));

const buildFillRows = (report: PerformanceReport): CsvRow[] =>
	report.tradeDetails.flatMap((trade) =>
		trade.fills.map((fill) => ({
			orderId: trade.orderId,
			side: trade.side,
			time: new Date(fill.timestamp).toISOString(),
			price: fill.price,
			quantity: fill.quantity,
			fee: fill.fee,
			liquidity: fill.liquidity,
		}))
	);

const toCsv = (rows: CsvRow[], includeHeader: boolean): string => {
	const [first] = rows;
	if (!first) {
		return "";
	}
	const headers = Object.keys(first);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: CsvRow[string]): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
	}
	return Number.isFinite(value) ? value.toString() : "";
};
