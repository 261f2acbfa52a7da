/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                            Logger Utility                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Centralized logging utility providing structured output with tslog.
 *
 * - Main logger: Branded console output controlled by LOG_LEVEL
 * - Diagnostic logger: JSON output with source locations via DIAGNOSTIC_LOGGER
 * - Child loggers: Module-specific loggers with name prefixes
 * - applyLogSettings: pushes validated configuration into all of the above
 *
 * @packageDocumentation
 */

import { Logger, type ILogObj } from 'tslog'

/**
 * Base log template used by all loggers
 * @internal
 */
const BASE_LOG_TEMPLATE =
	'\x1b[36m[\x1b[1mBATCH CACHE ⚙️ \x1b[22m]\x1b[0m [{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}] [{{logLevelName}}] '

/**
 * Main library logger instance
 *
 * Log level controlled by LOG_LEVEL environment variable.
 *
 * @example
 * ```typescript
 * logger.info('Cache configured', { expiryMs: 100 })
 * // Output: [BATCH CACHE ⚙️] [2024-09-24 15:30:45] [INFO] Cache configured { expiryMs: 100 }
 * ```
 *
 * @public
 */
export const logger = new Logger<ILogObj>({
	type: 'pretty',
	prettyLogTemplate: BASE_LOG_TEMPLATE,
	minLevel: parseInt(process.env.LOG_LEVEL || '3'), // 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
	hideLogPositionForProduction: true,
	stylePrettyLogs: true,
	prettyLogTimeZone: 'UTC',
	prettyErrorTemplate: '\n{{errorName}} {{errorMessage}}\n{{errorStack}}',
	prettyErrorStackTemplate:
		'  • {{fileName}}\t{{method}}\n\t{{filePathWithLine}}',
	prettyErrorParentNamesSeparator: ' → ',
	prettyLogStyles: {
		logLevelName: {
			'*': ['bold', 'dim'],
			ERROR: ['bold', 'red'],
			WARN: ['bold', 'yellow'],
			INFO: ['bold', 'green'],
			DEBUG: ['bold', 'blue'],
			TRACE: ['bold', 'magenta'],
			FATAL: ['bold', 'bgRed', 'white'],
		},
	},
})

/**
 * Level above FATAL; a logger at this level prints nothing
 * @internal
 */
const SILENT_LEVEL = 7

/**
 * Diagnostic logger for detailed output
 *
 * Outputs JSON logs with source locations when DIAGNOSTIC_LOGGER is 'true'
 * or after {@link applyLogSettings} enables it. Silent otherwise.
 *
 * @example
 * ```typescript
 * // Enable with: DIAGNOSTIC_LOGGER=true
 * diagnostic.debug('Batch fetch completed', { missing: 2, fetchTime: 4 })
 * ```
 *
 * @public
 */
export const diagnostic = new Logger<ILogObj>({
	name: 'DIAGNOSTIC',
	type: 'json',
	minLevel: process.env.DIAGNOSTIC_LOGGER === 'true' ? 0 : SILENT_LEVEL,
	hideLogPositionForProduction: false,
	prettyInspectOptions: {
		depth: null,
		colors: false,
	},
})

/** Child loggers follow level changes made through applyLogSettings */
const childLoggers: Logger<ILogObj>[] = []

/**
 * Create a child logger with additional context
 *
 * @param name - Name for the child logger (e.g., 'Env', 'MotorPositions')
 * @param metadata - Optional metadata to include with every log
 *
 * @example
 * ```typescript
 * const envLogger = createLogger('Env')
 * envLogger.info('Loaded .env')
 * // Output: [BATCH CACHE ⚙️] [2024-09-24 15:30:45] [INFO] [Env] Loaded .env
 * ```
 *
 * @public
 */
export function createLogger(
	name: string,
	metadata?: Record<string, unknown>
): Logger<ILogObj> {
	const childLogger = logger.getSubLogger({ name }, metadata)

	// Override the template to include the child name
	childLogger.settings.prettyLogTemplate = BASE_LOG_TEMPLATE + '[' + name + '] '
	childLoggers.push(childLogger)

	return childLogger
}

/**
 * Settings applied to the shared loggers once configuration is known
 */
export interface LogSettings {
	/** Minimum level for the main logger and its children */
	logLevel: number
	/** Whether the diagnostic logger prints */
	diagnosticEnabled: boolean
}

/**
 * Apply log settings after the environment has been validated.
 *
 * The loggers are built at import time, before a .env file can be loaded,
 * so validated configuration has to be pushed into them afterwards.
 */
export function applyLogSettings(settings: LogSettings): void {
	logger.settings.minLevel = settings.logLevel
	for (const child of childLoggers) {
		child.settings.minLevel = settings.logLevel
	}
	diagnostic.settings.minLevel = settings.diagnosticEnabled ? 0 : SILENT_LEVEL
}

/**
 * Whether diagnostic output is currently printed
 */
export function isDiagnosticEnabled(): boolean {
	return diagnostic.settings.minLevel <= LogLevel.FATAL
}

/**
 * Log level enum for reference
 *
 * @public
 */
export enum LogLevel {
	SILLY = 0,
	TRACE = 1,
	DEBUG = 2,
	INFO = 3,
	WARN = 4,
	ERROR = 5,
	FATAL = 6,
}
