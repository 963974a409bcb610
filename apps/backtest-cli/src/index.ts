#!/usr/bin/env node

import path from "node:path";
import process from "node:process";
import {
	loadBacktestConfig,
	type Bar,
	type BacktestConfigInput,
} from "@fillreplay/core";
import { Backtester } from "@fillreplay/backtest-core";
import { loadBarsFromCsv, loadBarsFromOhlcvJson } from "@fillreplay/data";
import {
	parseCliArgs,
	readFlag,
	readNumber,
	readString,
	type ArgValue,
} from "./cliArgs";
import { createPullbackSignal } from "./pullbackSignal";
import { buildBacktestReport, persistBacktestReport } from "./report";

const USAGE = `Usage:
  npm run backtest -- --csv <file> [options]
  npm run backtest -- --ohlcv-json <file> [options]

Options:
  --csv <file>             OHLCV bars with a timestamp,open,high,low,close,volume header
  --ohlcv-json <file>      JSON array of ccxt fetchOHLCV rows
  --timestampUnit <ms|s>   Unit of numeric CSV timestamps (default ms)
  --config <path>          Backtest config JSON (default config/backtest.json)
  --envPath <path>         Extra .env file
  --instrument <id>        Instrument label for orders
  --startingCash <n>       Starting cash for the ledger
  --feeRate <rate>         Flat fee rate
  --maxShareOfBar <frac>   Share of bar volume an order may take
  --latencyBars <n>        Bars before a submitted order can fill
  --warmupBars <n>         Bars skipped before the signal runs
  --lookback <n>           Pullback lookback window (default 20)
  --pullback <frac>        Pullback from the recent high that triggers a buy (default 0.03)
  --target <frac>          Profit target (default 0.15)
  --stop <frac>            Stop loss (default 0.05)
  --quantity <n>           Order quantity (default 1)
  --out <dir>              Output directory (default output/backtests)
  --verbose                Log every order event
  --json                   Print the full performance report
  --help                   Show this message
`;

const loadBars = async (
	flags: Record<string, ArgValue>,
	positionals: string[]
): Promise<{ source: string; bars: Bar[] }> => {
	const jsonPath = readString(flags, "ohlcv-json");
	if (jsonPath) {
		return { source: jsonPath, bars: await loadBarsFromOhlcvJson(jsonPath) };
	}
	const csvPath = readString(flags, "csv") ?? positionals[0];
	if (!csvPath) {
		throw new Error("Missing bar input: pass --csv <file> or --ohlcv-json <file>");
	}
	const unit = readString(flags, "timestampUnit") ?? "ms";
	if (unit !== "ms" && unit !== "s") {
		throw new Error(`--timestampUnit must be ms or s, got ${unit}`);
	}
	return {
		source: csvPath,
		bars: await loadBarsFromCsv(csvPath, { timestampUnit: unit }),
	};
};

const readOverrides = (
	flags: Record<string, ArgValue>
): BacktestConfigInput => ({
	instrument: readString(flags, "instrument"),
	startingCash: readNumber(flags, "startingCash"),
	feeRate: readNumber(flags, "feeRate"),
	maxShareOfBar: readNumber(flags, "maxShareOfBar"),
	latencyBars: readNumber(flags, "latencyBars"),
	warmupBars: readNumber(flags, "warmupBars"),
	verbose: readFlag(flags, "verbose") ? true : undefined,
});

const formatUsd = (value: number): string => `$${value.toFixed(2)}`;

const main = async (): Promise<void> => {
	const { flags, positionals } = parseCliArgs(process.argv.slice(2));
	if (readFlag(flags, "help")) {
		console.log(USAGE);
		return;
	}

	const config = loadBacktestConfig({
		configPath: readString(flags, "config"),
		envPath: readString(flags, "envPath"),
		overrides: readOverrides(flags),
	});
	const { source, bars } = await loadBars(flags, positionals);
	const backtester = new Backtester(bars, config);
	const signal = createPullbackSignal(
		{
			lookback: readNumber(flags, "lookback"),
			pullbackPct: readNumber(flags, "pullback"),
			targetPct: readNumber(flags, "target"),
			stopPct: readNumber(flags, "stop"),
			quantity: readNumber(flags, "quantity"),
		},
		() => backtester.getAccountSnapshot().position
	);

	console.log(
		`Running backtest for ${config.instrument} on ${bars.length} bars from ${source}...`
	);
	const result = backtester.run(signal);
	const { performance, account } = result;

	if (readFlag(flags, "json")) {
		console.log(JSON.stringify(performance, null, 2));
	} else {
		console.log("---- Summary ----");
		console.log(`Bars processed: ${result.barsProcessed}`);
		console.log(`Signals generated: ${result.signalsGenerated}`);
		console.log(`Orders submitted: ${result.records.length}`);
		console.log(`Trades executed: ${performance.totalTrades}`);
		console.log(`Average fill price: ${performance.averageFillPrice.toFixed(4)}`);
		console.log(`Total fees: ${formatUsd(performance.totalFees)}`);
		console.log(`Starting cash: ${formatUsd(account.startingCash)}`);
		console.log(`Final equity: ${formatUsd(account.equity)}`);
		console.log(`Max drawdown: ${formatUsd(account.maxDrawdown)}`);
	}

	const reportPath = persistBacktestReport(
		readString(flags, "out") ?? path.join("output", "backtests"),
		buildBacktestReport(result, source, bars.length, config)
	);
	const relative = path.relative(process.cwd(), reportPath) || reportPath;
	console.log(`Backtest saved to ${relative}`);
};

main().catch((error: unknown) => {
	console.error(
		"Backtest failed:",
		error instanceof Error ? error.message : String(error)
	);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
