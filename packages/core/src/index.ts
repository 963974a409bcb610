/**
 * Core package centralizes the shared domain contracts, errors, logging and
 * configuration helpers. Everything else in the workspace depends on these
 * primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export { loadEnvFiles } from "./env";
export {
	createLogger,
	log,
	normalizeLevel,
	sanitizeRecord,
	setLogLevel,
	setLogSink,
} from "./utils/logger";
export type {
	BaseLogPayload,
	LogLevel,
	LogSink,
	ModuleLogger,
} from "./utils/logger";
