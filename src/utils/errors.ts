/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                             Error Classes                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Errors raised by the cache itself. Errors thrown by caller-supplied fetch
 * callbacks are never wrapped in these; they propagate as thrown.
 *
 * @packageDocumentation
 */

import type { EnvValidationResult } from '../types/setup.js'

/**
 * Base class for every error the cache raises
 */
export class CacheError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CacheError'
	}
}

/**
 * A batched fetch returned a result that cannot be paired with the
 * missing keys. Nothing was inserted.
 */
export class FetchContractError extends CacheError {
	constructor(
		public expected: number,
		public received: number | null
	) {
		super(
			received === null
				? `Fetch must return an array of ${expected} value(s)`
				: `Fetch returned ${received} value(s) for ${expected} missing key(s)`
		)
		this.name = 'FetchContractError'
	}
}

/**
 * Thrown by {@link Cache.getOrThrow} when the key has no live entry
 */
export class MissingEntryError extends CacheError {
	constructor(public key: unknown) {
		super('no entry found for key')
		this.name = 'MissingEntryError'
	}
}

/**
 * A batched or single-key request was resolved more than once
 */
export class RequestConsumedError extends CacheError {
	constructor() {
		super('Request has already been resolved; build a new one from the cache')
		this.name = 'RequestConsumedError'
	}
}

/**
 * Invalid cache construction options
 */
export class CacheConfigurationError extends CacheError {
	constructor(
		message: string,
		public field: string,
		public value: unknown
	) {
		super(message)
		this.name = 'CacheConfigurationError'
	}
}

/**
 * Environment configuration failed validation
 */
export class EnvValidationError extends CacheError {
	constructor(public errors: EnvValidationResult['errors']) {
		super(
			`Environment validation failed: ${errors.map((e) => e.variable).join(', ')}`
		)
		this.name = 'EnvValidationError'
	}
}
