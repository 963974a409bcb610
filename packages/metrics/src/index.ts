export { computePerformance } from "./calcPerformance";
export { formatPerformanceCsv } from "./formatCSV";
export type { CsvMode, FormatCsvOptions } from "./formatCSV";
export type {
	FillDetail,
	PerformanceReport,
	PerformanceSummary,
	TradeDetail,
} from "./metricsSchema";
