import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import {
	getConfigMetadata,
	type BacktestConfig,
	type ConfigSourceType,
} from "@fillreplay/core";
import type { BacktestResult, EquityPoint } from "@fillreplay/backtest-core";
import {
	formatPerformanceCsv,
	type PerformanceReport,
} from "@fillreplay/metrics";

export interface BacktestReport {
	metadata: {
		source: string;
		bars: number;
		config: BacktestConfig;
		configSources: ConfigSourceType[];
	};
	signalsGenerated: number;
	performance: PerformanceReport;
	account: BacktestResult["account"];
	equityCurve: EquityPoint[];
}

export const buildBacktestReport = (
	result: BacktestResult,
	source: string,
	bars: number,
	config: BacktestConfig
): BacktestReport => ({
	metadata: {
		source,
		bars,
		config,
		configSources: getConfigMetadata(config)?.sources ?? [],
	},
	signalsGenerated: result.signalsGenerated,
	performance: result.performance,
	account: result.account,
	equityCurve: result.equityCurve,
});

/**
 * Writes `<base>.json` and `<base>.trades.csv` into `outputDir` (resolved
 * against the working directory) and returns the JSON path.
 */
export const persistBacktestReport = (
	outputDir: string,
	report: BacktestReport,
	now: Date = new Date()
): string => {
	const timestamp = now.toISOString().replace(/[:.]/g, "-");
	const safeInstrument = report.metadata.config.instrument.replace(
		/[\\/]/g,
		""
	);
	const baseName = `backtest-${safeInstrument}-${timestamp}`;
	const resolvedDir = path.resolve(process.cwd(), outputDir);
	fs.mkdirSync(resolvedDir, { recursive: true });
	const reportPath = path.join(resolvedDir, `${baseName}.json`);
	fs.writeFileSync(reportPath, JSON.stringify(report, null, 2));
	fs.writeFileSync(
		path.join(resolvedDir, `${baseName}.trades.csv`),
		formatPerformanceCsv(report.performance, { mode: "trades" })
	);
	return reportPath;
};
