export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

export type LogSink = (line: string) => void;

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

let minLevel = normalizeLevel(process.env.LOG_LEVEL);
let sink: LogSink = (line) => console.log(line);

export const setLogLevel = (level: LogLevel): void => {
	minLevel = level;
};

/** Redirects JSON lines, e.g. to capture them in tests. Returns the previous sink. */
export const setLogSink = (next: LogSink): LogSink => {
	const previous = sink;
	sink = next;
	return previous;
};

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			sink(JSON.stringify(sanitizeRecord(base)));
		} catch (err) {
			sink(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

export const sanitizeRecord = (
	payload: Record<string, unknown>
): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clone: Record<string, unknown> = {};
	seen.add(payload);
	for (const [key, nested] of Object.entries(payload)) {
		clone[key] = sanitizeValue(nested, seen);
	}
	return clone;
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "order_fill": {
				printFill(rest);
				break;
			}
			case "backtest_complete": {
				printBacktestSummary(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const pickNumber = (source: unknown, key: string): number | undefined => {
	if (!source || typeof source !== "object") {
		return undefined;
	}
	const value: unknown = Reflect.get(source, key);
	return typeof value === "number" ? value : undefined;
};

const pickString = (source: unknown, key: string): string | undefined => {
	if (!source || typeof source !== "object") {
		return undefined;
	}
	const value: unknown = Reflect.get(source, key);
	return typeof value === "string" ? value : undefined;
};

const printFill = (rest: Record<string, unknown>): void => {
	console.table([
		{
			orderId: pickString(rest, "orderId"),
			side: pickString(rest, "side"),
			barIndex: pickNumber(rest, "barIndex"),
			price: pickNumber(rest.fill, "price"),
			quantity: pickNumber(rest.fill, "quantity"),
			fee: pickNumber(rest.fill, "fee"),
			liquidity: pickString(rest.fill, "liquidity"),
		},
	]);
};

const printBacktestSummary = (rest: Record<string, unknown>): void => {
	const { performance, account } = rest;
	console.table([
		{
			bars: pickNumber(rest, "barsProcessed"),
			trades: pickNumber(performance, "totalTrades"),
			avgFillPrice: pickNumber(performance, "averageFillPrice"),
			totalFees: pickNumber(performance, "totalFees"),
			cash: pickNumber(account, "cash"),
			position: pickNumber(account, "position"),
			equity: pickNumber(account, "equity"),
		},
	]);
};
