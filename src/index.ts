/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                            Public Entry Point                             ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * In-memory cache with expiry, designed for values that are slow or
 * unreliable to fetch and cheaper to fetch several at a time.
 *
 * @packageDocumentation
 */

export { Cache } from './utils/cache.js'
export { EntriesRequest } from './utils/entries.js'
export { EntryRequest } from './utils/entry.js'
export { monotonicNow } from './utils/clock.js'
export {
	CacheError,
	CacheConfigurationError,
	EnvValidationError,
	FetchContractError,
	MissingEntryError,
	RequestConsumedError,
} from './utils/errors.js'
export {
	logger,
	diagnostic,
	createLogger,
	LogLevel,
	applyLogSettings,
	isDiagnosticEnabled,
} from './utils/logger.js'
export type { LogSettings } from './utils/logger.js'
export {
	clearEnvConfigCache,
	getEnvConfig,
	loadEnvironment,
	printEnvValidationReport,
	setEnvConfigCache,
	validateEnv,
} from './utils/env.js'
export type {
	AsyncBatchFetcher,
	AsyncEntryFetcher,
	BatchFetcher,
	CacheOptions,
	CacheStats,
	Clock,
	EntryFetcher,
	KeyHasher,
} from './types/cache.js'
export type {
	EnvironmentConfig,
	EnvValidationResult,
	EnvVariable,
} from './types/setup.js'
