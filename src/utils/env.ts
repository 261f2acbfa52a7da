/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                  Environment Configuration Utilities                      ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Provides utilities for validating, caching, and accessing environment
 * configuration. Validation is lazy: nothing is read until a caller asks
 * for the config or builds a cache from the environment.
 *
 * @packageDocumentation
 */

import dotenv from 'dotenv'
import { applyLogSettings, createLogger, LogLevel } from './logger.js'
import { EnvValidationError } from './errors.js'
import { envSchema } from '../config/envSchema.js'
import type { EnvValidationResult, EnvironmentConfig } from '../types/setup.js'

const logger = createLogger('Env')

/**
 * Validates all environment variables against the schema.
 * @returns Validation result containing errors and processed config
 */
export function validateEnv(): EnvValidationResult {
	const errors: EnvValidationResult['errors'] = []
	const config: EnvValidationResult['config'] = {}

	logger.debug('🔍 Validating environment configuration...')

	for (const envVar of envSchema) {
		const value = process.env[envVar.name]

		if (!value && envVar.required) {
			errors.push({
				variable: envVar.name,
				error: 'Missing required environment variable',
				description: envVar.description,
			})
			logger.error(`✗ ${envVar.name}: Missing`)
			continue
		}

		if (!value) {
			if (envVar.defaultValue !== undefined) {
				config[envVar.name] = envVar.defaultValue
			}
			logger.debug(`○ ${envVar.name}: Using default (${envVar.defaultValue})`)
			continue
		}

		if (envVar.validator) {
			const validationResult = envVar.validator(value)
			if (validationResult !== true) {
				errors.push({
					variable: envVar.name,
					error:
						typeof validationResult === 'string'
							? validationResult
							: 'Invalid value',
					description: envVar.description,
				})
				logger.error(`✗ ${envVar.name}: ${validationResult}`)
				continue
			}
		}

		const transformed = envVar.transformer ? envVar.transformer(value) : value
		config[envVar.name] = transformed

		logger.debug(`✓ ${envVar.name}: ${transformed}`)
	}

	return {
		valid: errors.length === 0,
		errors,
		config,
	}
}

/**
 * Logs a formatted validation report.
 * @param result - The validation result to display
 */
export function printEnvValidationReport(result: EnvValidationResult): void {
	const separator = '═'.repeat(60)

	if (result.errors.length > 0) {
		const errorDetails = result.errors
			.map(
				(error) =>
					`  • ${error.variable}:\n    Error: ${error.error}\n    Description: ${error.description}`
			)
			.join('\n\n')

		logger.error(
			`❌ Environment Validation Failed\n${separator}\nFound ${result.errors.length} error(s):\n\n${errorDetails}\n${separator}`
		)
	} else {
		logger.debug('✅ Environment configuration is valid')
	}
}

/**
 * Narrows a validated config record to {@link EnvironmentConfig}.
 * @internal
 */
function toEnvironmentConfig(
	config: EnvValidationResult['config']
): EnvironmentConfig {
	const expiry = config.CACHE_EXPIRY_MS
	return {
		LOG_LEVEL:
			typeof config.LOG_LEVEL === 'number' ? config.LOG_LEVEL : LogLevel.INFO,
		DIAGNOSTIC_LOGGER: config.DIAGNOSTIC_LOGGER === true,
		...(typeof expiry === 'number' && { CACHE_EXPIRY_MS: expiry }),
	}
}

// Cache for validated configuration
let cachedConfig: EnvironmentConfig | null = null

/**
 * Sets the validated configuration cache and applies its log settings.
 * @param config - The validated environment configuration
 */
export function setEnvConfigCache(config: EnvironmentConfig): void {
	cachedConfig = config
	applyLogSettings({
		logLevel: config.LOG_LEVEL,
		diagnosticEnabled: config.DIAGNOSTIC_LOGGER,
	})
}

/**
 * Drops the cached configuration so the next read validates again.
 */
export function clearEnvConfigCache(): void {
	cachedConfig = null
}

/**
 * Returns the cached environment configuration, validating on first use.
 * @throws EnvValidationError if the environment is invalid
 */
export function getEnvConfig(): EnvironmentConfig {
	if (cachedConfig) {
		return cachedConfig
	}

	const result = validateEnv()
	if (!result.valid) {
		printEnvValidationReport(result)
		throw new EnvValidationError(result.errors)
	}

	const config = toEnvironmentConfig(result.config)
	setEnvConfigCache(config)
	return config
}

/**
 * Loads a .env file, validates it, caches the result and applies its
 * log settings.
 * @param path - Optional .env path; dotenv's default lookup otherwise
 * @throws EnvValidationError if the environment is invalid
 */
export function loadEnvironment(path?: string): EnvironmentConfig {
	dotenv.config(path ? { path } : undefined)

	const result = validateEnv()
	printEnvValidationReport(result)

	if (!result.valid) {
		throw new EnvValidationError(result.errors)
	}

	const config = toEnvironmentConfig(result.config)
	setEnvConfigCache(config)
	return config
}
