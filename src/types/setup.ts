/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                       Configuration Type Definitions                      ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * TypeScript type definitions for environment-driven configuration.
 *
 * @packageDocumentation
 */

/**
 * Defines the schema for an environment variable.
 * Used to validate and transform environment configuration.
 */
export interface EnvVariable {
	/** The environment variable name (e.g., 'LOG_LEVEL') */
	name: keyof EnvironmentConfig
	/** Whether this variable must be set */
	required: boolean
	/** Human-readable description of what this variable configures */
	description: string
	/** Optional validation function that returns true or an error message */
	validator?: (value: string) => boolean | string
	/** Optional transformer to convert the string value to the appropriate type */
	transformer?: (value: string) => string | number | boolean
	/** Default value if the environment variable is not set (only for optional vars) */
	defaultValue?: string | number | boolean
}

/**
 * Result of environment validation process.
 * Contains validation status, errors, and the processed configuration.
 */
export interface EnvValidationResult {
	/** Whether all environment variables passed validation */
	valid: boolean
	/** List of validation errors */
	errors: Array<{
		/** The environment variable that failed validation */
		variable: string
		/** The specific error that occurred */
		error: string
		/** Description of what this variable is used for */
		description: string
	}>
	/** The validated and transformed configuration object */
	config: Partial<Record<keyof EnvironmentConfig, string | number | boolean>>
}

/**
 * Strongly-typed environment configuration after validation.
 */
export interface EnvironmentConfig {
	/** Logging verbosity level 0-6 (default: 3/info) */
	LOG_LEVEL: number
	/** Whether to enable detailed diagnostic logging (default: false) */
	DIAGNOSTIC_LOGGER: boolean
	/** Expiry for caches built from the environment; unset keeps the last value */
	CACHE_EXPIRY_MS?: number
}
