import { fileURLToPath } from "node:url";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	DEFAULT_BACKTEST_CONFIG,
	getConfigMetadata,
	loadBacktestConfig,
	parseConfigFile,
	readEnvConfig,
	resolveBacktestConfig,
} from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = fileURLToPath(
	new URL("./__tests__/fixtures", import.meta.url)
);

describe("resolveBacktestConfig", () => {
	it("applies defaults and derives maker/taker rates from the flat fee", () => {
		const config = resolveBacktestConfig();
		expect(config).toEqual({
			...DEFAULT_BACKTEST_CONFIG,
			makerFeeRate: 0.0006,
			takerFeeRate: 0.0006,
		});
	});

	it("keeps explicit maker and taker rates", () => {
		const config = resolveBacktestConfig({
			feeRate: 0.001,
			makerFeeRate: 0.0002,
		});
		expect(config.makerFeeRate).toBe(0.0002);
		expect(config.takerFeeRate).toBe(0.001);
	});

	it("ignores undefined entries instead of wiping defaults", () => {
		const config = resolveBacktestConfig({ maxShareOfBar: undefined });
		expect(config.maxShareOfBar).toBe(0.05);
	});

	it("rejects an impact sensitivity outside (0, 1]", () => {
		expect(() => resolveBacktestConfig({ impactSensitivity: 0 })).toThrowError(
			ConfigError
		);
		expect(() =>
			resolveBacktestConfig({ impactSensitivity: 1.5 })
		).toThrowError(/impactSensitivity/);
	});

	it("rejects fractional latency", () => {
		expect(() => resolveBacktestConfig({ latencyBars: 1.5 })).toThrowError(
			/latencyBars: expected a non-negative integer, got 1.5/
		);
	});

	it("rejects fee rates at or above 100%", () => {
		expect(() => resolveBacktestConfig({ takerFeeRate: 1 })).toThrowError(
			/takerFeeRate/
		);
	});
});

describe("readEnvConfig", () => {
	it("parses numeric and boolean variables", () => {
		expect(
			readEnvConfig({
				FILLREPLAY_MAX_SHARE_OF_BAR: "0.02",
				FILLREPLAY_VERBOSE: "yes",
				FILLREPLAY_INSTRUMENT: " SOL-USDT ",
				UNRELATED: "1",
			})
		).toEqual({ maxShareOfBar: 0.02, verbose: true, instrument: "SOL-USDT" });
	});

	it("treats blank variables as unset", () => {
		expect(readEnvConfig({ FILLREPLAY_FEE_RATE: "  " })).toEqual({});
	});

	it("rejects non-numeric values", () => {
		expect(() =>
			readEnvConfig({ FILLREPLAY_LATENCY_BARS: "two" })
		).toThrowError(/FILLREPLAY_LATENCY_BARS is not numeric/);
	});
});

describe("parseConfigFile", () => {
	it("rejects non-object payloads", () => {
		expect(() => parseConfigFile([1, 2], "inline.json")).toThrowError(
			ConfigError
		);
	});
});

describe("loadBacktestConfig", () => {
	it("layers file, env and overrides on top of the defaults", () => {
		const configPath = path.join(FIXTURE_DIR, "backtest.json");
		const config = loadBacktestConfig({
			configPath,
			env: { FILLREPLAY_LATENCY_BARS: "2" },
			overrides: { warmupBars: 3, verbose: undefined },
			skipEnvFiles: true,
		});

		expect(config.instrument).toBe("ETH-USDT");
		expect(config.feeRate).toBe(0.001);
		expect(config.makerFeeRate).toBe(0.001);
		expect(config.maxShareOfBar).toBe(0.03);
		expect(config.latencyBars).toBe(2);
		expect(config.warmupBars).toBe(3);
		expect(config.verbose).toBe(false);
		expect(getConfigMetadata(config)).toEqual({
			path: configPath,
			sources: ["defaults", "file", "env", "overrides"],
		});
	});

	it("rejects wrongly typed file entries", () => {
		expect(() =>
			loadBacktestConfig({
				configPath: path.join(FIXTURE_DIR, "bad-type.json"),
				env: {},
				skipEnvFiles: true,
			})
		).toThrowError(/maxShareOfBar: expected a number/);
	});

	it("fails when an explicit config path does not exist", () => {
		expect(() =>
			loadBacktestConfig({
				configPath: path.join(FIXTURE_DIR, "missing.json"),
				env: {},
				skipEnvFiles: true,
			})
		).toThrowError(/file not found/);
	});
});
