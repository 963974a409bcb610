import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { ConfigError } from "./errors";

export interface BacktestConfig {
	instrument: string;
	startingCash: number;
	/** Flat fee rate; maker and taker rates fall back to it */
	feeRate: number;
	makerFeeRate: number;
	takerFeeRate: number;
	/** Fraction of a bar's volume that can be consumed on that bar */
	maxShareOfBar: number;
	/** Fixed spread slippage, as a fraction of the base price */
	slippageSpreadPct: number;
	/** Exponent in (0, 1] applied to the filled share of bar volume */
	impactSensitivity: number;
	latencyBars: number;
	warmupBars: number;
	verbose: boolean;
}

export type BacktestConfigInput = Partial<BacktestConfig>;

export const DEFAULT_BACKTEST_CONFIG: Readonly<
	Omit<BacktestConfig, "makerFeeRate" | "takerFeeRate">
> = {
	instrument: "BTC-USDT",
	startingCash: 10_000,
	feeRate: 0.0006,
	maxShareOfBar: 0.05,
	slippageSpreadPct: 0.0002,
	impactSensitivity: 0.5,
	latencyBars: 0,
	warmupBars: 0,
	verbose: false,
};

export type ConfigSourceType = "defaults" | "file" | "env" | "overrides";

export interface ConfigMetadata {
	path?: string;
	sources: ConfigSourceType[];
}

const metadataStore = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	metadataStore.set(config, metadata);
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	metadataStore.get(config) ?? null;

const NUMERIC_FIELDS = [
	"startingCash",
	"feeRate",
	"makerFeeRate",
	"takerFeeRate",
	"maxShareOfBar",
	"slippageSpreadPct",
	"impactSensitivity",
	"latencyBars",
	"warmupBars",
] as const;

type NumericField = (typeof NUMERIC_FIELDS)[number];

const ENV_KEYS: Record<NumericField | "instrument" | "verbose", string> = {
	instrument: "FILLREPLAY_INSTRUMENT",
	startingCash: "FILLREPLAY_STARTING_CASH",
	feeRate: "FILLREPLAY_FEE_RATE",
	makerFeeRate: "FILLREPLAY_MAKER_FEE_RATE",
	takerFeeRate: "FILLREPLAY_TAKER_FEE_RATE",
	maxShareOfBar: "FILLREPLAY_MAX_SHARE_OF_BAR",
	slippageSpreadPct: "FILLREPLAY_SLIPPAGE_SPREAD_PCT",
	impactSensitivity: "FILLREPLAY_IMPACT_SENSITIVITY",
	latencyBars: "FILLREPLAY_LATENCY_BARS",
	warmupBars: "FILLREPLAY_WARMUP_BARS",
	verbose: "FILLREPLAY_VERBOSE",
};

const ensureNumber = (value: number | undefined, field: string): number => {
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(field, "expected a finite number");
	}
	return value;
};

const ensureRate = (value: number, field: string): number => {
	if (value < 0 || value >= 1) {
		throw new ConfigError(field, `expected a rate in [0, 1), got ${value}`);
	}
	return value;
};

const ensureBarCount = (value: number, field: string): number => {
	if (!Number.isInteger(value) || value < 0) {
		throw new ConfigError(
			field,
			`expected a non-negative integer, got ${value}`
		);
	}
	return value;
};

/**
 * Applies defaults to a partial config and validates every field.
 */
export const resolveBacktestConfig = (
	input: BacktestConfigInput = {}
): BacktestConfig => {
	const merged = { ...DEFAULT_BACKTEST_CONFIG, ...stripUndefined(input) };
	const feeRate = ensureRate(
		ensureNumber(merged.feeRate, "feeRate"),
		"feeRate"
	);
	const makerFeeRate = ensureRate(
		ensureNumber(input.makerFeeRate ?? feeRate, "makerFeeRate"),
		"makerFeeRate"
	);
	const takerFeeRate = ensureRate(
		ensureNumber(input.takerFeeRate ?? feeRate, "takerFeeRate"),
		"takerFeeRate"
	);

	const startingCash = ensureNumber(merged.startingCash, "startingCash");
	if (startingCash < 0) {
		throw new ConfigError("startingCash", "must not be negative");
	}

	const maxShareOfBar = ensureNumber(merged.maxShareOfBar, "maxShareOfBar");
	if (maxShareOfBar < 0 || maxShareOfBar > 1) {
		throw new ConfigError(
			"maxShareOfBar",
			`expected a fraction in [0, 1], got ${maxShareOfBar}`
		);
	}

	const impactSensitivity = ensureNumber(
		merged.impactSensitivity,
		"impactSensitivity"
	);
	if (impactSensitivity <= 0 || impactSensitivity > 1) {
		throw new ConfigError(
			"impactSensitivity",
			`expected a value in (0, 1], got ${impactSensitivity}`
		);
	}

	if (typeof merged.instrument !== "string" || !merged.instrument.trim()) {
		throw new ConfigError("instrument", "expected a non-empty string");
	}
	if (typeof merged.verbose !== "boolean") {
		throw new ConfigError("verbose", "expected a boolean");
	}

	return {
		instrument: merged.instrument.trim(),
		startingCash,
		feeRate,
		makerFeeRate,
		takerFeeRate,
		maxShareOfBar,
		slippageSpreadPct: ensureRate(
			ensureNumber(merged.slippageSpreadPct, "slippageSpreadPct"),
			"slippageSpreadPct"
		),
		impactSensitivity,
		latencyBars: ensureBarCount(
			ensureNumber(merged.latencyBars, "latencyBars"),
			"latencyBars"
		),
		warmupBars: ensureBarCount(
			ensureNumber(merged.warmupBars, "warmupBars"),
			"warmupBars"
		),
		verbose: merged.verbose,
	};
};

const stripUndefined = (input: BacktestConfigInput): BacktestConfigInput => {
	const result: BacktestConfigInput = {};
	for (const [key, value] of Object.entries(input)) {
		if (value !== undefined) {
			Reflect.set(result, key, value);
		}
	}
	return result;
};

const parseBoolean = (raw: string, field: string): boolean => {
	const normalized = raw.trim().toLowerCase();
	if (["1", "true", "yes", "on"].includes(normalized)) {
		return true;
	}
	if (["0", "false", "no", "off"].includes(normalized)) {
		return false;
	}
	throw new ConfigError(field, `expected a boolean, got "${raw}"`);
};

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const readEnvConfig = (
	env: NodeJS.ProcessEnv = process.env
): BacktestConfigInput => {
	const input: BacktestConfigInput = {};
	for (const field of NUMERIC_FIELDS) {
		const raw = readOptionalEnvVar(env, ENV_KEYS[field]);
		if (raw === undefined) {
			continue;
		}
		const value = Number(raw);
		if (!Number.isFinite(value)) {
			throw new ConfigError(
				field,
				`${ENV_KEYS[field]} is not numeric ("${raw}")`
			);
		}
		input[field] = value;
	}
	const instrument = readOptionalEnvVar(env, ENV_KEYS.instrument);
	if (instrument !== undefined) {
		input.instrument = instrument;
	}
	const verbose = readOptionalEnvVar(env, ENV_KEYS.verbose);
	if (verbose !== undefined) {
		input.verbose = parseBoolean(verbose, "verbose");
	}
	return input;
};

/**
 * Narrows parsed JSON into a config input. Unknown keys are ignored; known
 * keys with the wrong type are rejected.
 */
export const parseConfigFile = (
	raw: unknown,
	filePath: string
): BacktestConfigInput => {
	if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
		throw new ConfigError(filePath, "config file must contain a JSON object");
	}
	const input: BacktestConfigInput = {};
	for (const field of NUMERIC_FIELDS) {
		const value: unknown = Reflect.get(raw, field);
		if (value === undefined) {
			continue;
		}
		if (typeof value !== "number") {
			throw new ConfigError(field, `expected a number in ${filePath}`);
		}
		input[field] = value;
	}
	const instrument: unknown = Reflect.get(raw, "instrument");
	if (instrument !== undefined) {
		if (typeof instrument !== "string") {
			throw new ConfigError("instrument", `expected a string in ${filePath}`);
		}
		input.instrument = instrument;
	}
	const verbose: unknown = Reflect.get(raw, "verbose");
	if (verbose !== undefined) {
		if (typeof verbose !== "boolean") {
			throw new ConfigError("verbose", `expected a boolean in ${filePath}`);
		}
		input.verbose = verbose;
	}
	return input;
};

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceManifest = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return (
		typeof parsed === "object" && parsed !== null && "workspaces" in parsed
	);
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!isWorkspaceManifest(current) &&
		!fs.existsSync(path.join(current, ".git"))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigPath = (): string =>
	path.join(findWorkspaceRoot(), "config", "backtest.json");

export interface ConfigLoadOptions {
	/** JSON config file; defaults to config/backtest.json when it exists */
	configPath?: string;
	/** Extra .env file, resolved against the workspace root */
	envPath?: string;
	env?: NodeJS.ProcessEnv;
	overrides?: BacktestConfigInput;
	/** Skip reading .env files (the env map is still consulted) */
	skipEnvFiles?: boolean;
}

/**
 * Layers defaults < JSON file < environment < overrides, then validates.
 */
export const loadBacktestConfig = (
	options: ConfigLoadOptions = {}
): BacktestConfig => {
	const sources: ConfigSourceType[] = ["defaults"];

	if (!options.skipEnvFiles) {
		loadEnvFiles(findWorkspaceRoot(), options.envPath);
	}

	const explicitPath = options.configPath
		? path.resolve(options.configPath)
		: undefined;
	const configPath = explicitPath ?? getDefaultConfigPath();
	let fileInput: BacktestConfigInput = {};
	if (explicitPath && !fs.existsSync(explicitPath)) {
		throw new ConfigError("configPath", `file not found: ${explicitPath}`);
	}
	if (fs.existsSync(configPath)) {
		fileInput = parseConfigFile(
			JSON.parse(fs.readFileSync(configPath, "utf-8")),
			configPath
		);
		sources.push("file");
	}

	const envInput = readEnvConfig(options.env ?? process.env);
	if (Object.keys(envInput).length) {
		sources.push("env");
	}
	const overrides = stripUndefined(options.overrides ?? {});
	if (Object.keys(overrides).length) {
		sources.push("overrides");
	}

	const config = resolveBacktestConfig({
		...fileInput,
		...envInput,
		...overrides,
	});
	return withConfigMetadata(config, {
		path: sources.includes("file") ? configPath : undefined,
		sources,
	});
};
