/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                      Environment Variable Schema                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Defines the environment variables the cache reads. None are required.
 *
 * @packageDocumentation
 */

import type { EnvVariable } from '../types/setup.js'

/**
 * Environment variable schema.
 * Each entry describes a variable's validation rules, transformations, and metadata.
 */
export const envSchema: EnvVariable[] = [
	{
		name: 'LOG_LEVEL',
		required: false,
		description:
			'Logging level (0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal)',
		defaultValue: 3,
		validator: (value) => {
			const level = parseInt(value)
			if (isNaN(level) || level < 0 || level > 6) {
				return 'Log level must be between 0 and 6'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
	{
		name: 'DIAGNOSTIC_LOGGER',
		required: false,
		description: 'Enable diagnostic logging',
		defaultValue: false,
		transformer: (value) => value === 'true',
	},
	{
		name: 'CACHE_EXPIRY_MS',
		required: false,
		description:
			'Expiry in milliseconds for caches created from the environment (unset = never expire)',
		validator: (value) => {
			if (!/^\d+$/.test(value.trim())) {
				return 'Expiry must be a non-negative integer number of milliseconds'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
]
