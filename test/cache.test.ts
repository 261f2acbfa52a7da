/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                         Cache Utility Tests                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Unit tests for the cache store: expiry, single-key operations, and
 * statistics.
 */

import { describe, test, expect, vi, afterEach } from 'vitest'
import { Cache } from '../src/utils/cache.js'
import {
	CacheConfigurationError,
	MissingEntryError,
} from '../src/utils/errors.js'
import { clearEnvConfigCache, setEnvConfigCache } from '../src/utils/env.js'
import { ManualClock } from './helpers/clock.js'

describe('Cache Utility', () => {
	describe('Basic Operations', () => {
		test('should store and retrieve values', () => {
			const cache = new Cache<string, string>()

			cache.insert('key1', 'value1')
			cache.insert('key2', 'value2')

			expect(cache.get('key1')).toBe('value1')
			expect(cache.get('key2')).toBe('value2')
		})

		test('should return undefined for non-existent keys', () => {
			const cache = new Cache<string, string>()

			expect(cache.get('nonexistent')).toBeUndefined()
		})

		test('should handle different key and value types', () => {
			const numberKeys = new Cache<number, number>()
			const objectValues = new Cache<string, { foo: string }>()

			numberKeys.insert(11, 42.5)
			objectValues.insert('obj', { foo: 'bar' })

			expect(numberKeys.get(11)).toBe(42.5)
			expect(objectValues.get('obj')).toEqual({ foo: 'bar' })
		})

		test('should overwrite existing keys and return the previous value', () => {
			const cache = Cache.keepLast<number, string>()

			expect(cache.insert(10, 'a')).toBeUndefined()
			expect(cache.insert(10, 'b')).toBe('a')
			expect(cache.get(10)).toBe('b')
		})

		test('should return the previous value even when it had expired', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(10, {
				clock: clock.now,
			})

			cache.insert('speed', 1)
			clock.advance(20)

			expect(cache.get('speed')).toBeUndefined()
			expect(cache.insert('speed', 2)).toBe(1)
			expect(cache.get('speed')).toBe(2)
		})
	})

	describe('Expiry', () => {
		test('should serve values strictly before the expiry duration', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(10, {
				clock: clock.now,
			})

			cache.insert('temperature', 27)
			clock.advance(9)
			expect(cache.get('temperature')).toBe(27)

			clock.advance(1) // age is now exactly the expiry duration
			expect(cache.get('temperature')).toBeUndefined()
		})

		test('should refresh the insertion time on re-insert', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(10, {
				clock: clock.now,
			})

			cache.insert('temperature', 27)
			clock.advance(8)
			cache.insert('temperature', 28)
			clock.advance(8)

			expect(cache.get('temperature')).toBe(28)
		})

		test('should never expire entries without an expiry duration', () => {
			const clock = new ManualClock()
			const cache = Cache.keepLast<string, number>({ clock: clock.now })

			cache.insert('position', 0.23)
			clock.advance(1_000_000_000)

			expect(cache.get('position')).toBe(0.23)
			expect(cache.expiryDuration).toBeNull()
		})

		test('should treat a zero expiry as always stale', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(0, {
				clock: clock.now,
			})

			cache.insert('key', 1)

			expect(cache.get('key')).toBeUndefined()
		})

		test('should not purge expired entries on read', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(10, {
				clock: clock.now,
			})

			cache.insert('key', 1)
			clock.advance(15)

			expect(cache.get('key')).toBeUndefined()
			expect(cache.size).toBe(1)
		})

		test('should expire entries in real time', async () => {
			const cache = Cache.withExpiryDuration<number, number>(10)

			cache.insert(10, 0.0)
			expect(cache.get(10)).toBe(0.0)

			// Wait well past expiration
			await new Promise((resolve) => setTimeout(resolve, 30))

			expect(cache.get(10)).toBeUndefined()
		})

		test('should not expire entries before the duration in real time', async () => {
			const cache = Cache.withExpiryDuration<string, string>(1000)

			cache.insert('key', 'value')
			await new Promise((resolve) => setTimeout(resolve, 20))

			expect(cache.get('key')).toBe('value')
		})
	})

	describe('Construction', () => {
		test('should reject a negative expiry', () => {
			expect(() => new Cache<string, number>({ expiryMs: -1 })).toThrow(
				CacheConfigurationError
			)
		})

		test('should reject a NaN expiry', () => {
			expect(() => Cache.withExpiryDuration<string, number>(NaN)).toThrow(
				'Expiry duration must be a non-negative number of milliseconds'
			)
		})

		test('should treat a null expiry as keep-last', () => {
			const cache = new Cache<string, number>({ expiryMs: null })

			expect(cache.expiryDuration).toBeNull()
		})

		describe('fromEnvironment()', () => {
			afterEach(() => {
				clearEnvConfigCache()
			})

			test('should use CACHE_EXPIRY_MS from the environment config', () => {
				setEnvConfigCache({
					LOG_LEVEL: 5,
					DIAGNOSTIC_LOGGER: false,
					CACHE_EXPIRY_MS: 10,
				})

				const cache = Cache.fromEnvironment<number, number>()

				expect(cache.expiryDuration).toBe(10)
			})

			test('should keep the last value when CACHE_EXPIRY_MS is unset', () => {
				setEnvConfigCache({ LOG_LEVEL: 5, DIAGNOSTIC_LOGGER: false })

				const cache = Cache.fromEnvironment<number, number>()

				expect(cache.expiryDuration).toBeNull()
			})
		})
	})

	describe('has() method', () => {
		test('should return true for live entries', () => {
			const cache = new Cache<string, string>()

			cache.insert('key', 'value')
			expect(cache.has('key')).toBe(true)
		})

		test('should return false for expired entries', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, string>(50, {
				clock: clock.now,
			})

			cache.insert('key', 'value')
			clock.advance(60)

			expect(cache.has('key')).toBe(false)
		})

		test('should report a cached undefined as present', () => {
			const cache = new Cache<string, string | undefined>()

			cache.insert('undefined', undefined)

			expect(cache.get('undefined')).toBeUndefined()
			expect(cache.has('undefined')).toBe(true)
		})
	})

	describe('peek() method', () => {
		test('should box a live value', () => {
			const cache = new Cache<string, string | undefined>()

			cache.insert('undefined', undefined)

			expect(cache.peek('undefined')).toEqual({ value: undefined })
			expect(cache.peek('missing')).toBeUndefined()
		})

		test('should not expose the stored entry', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(10, {
				clock: clock.now,
			})

			cache.insert('speed', 1)
			const boxed = cache.peek('speed')
			if (boxed) {
				boxed.value = 99
			}

			expect(boxed).toEqual({ value: 99 })
			expect(cache.get('speed')).toBe(1)
			expect(Object.keys(boxed ?? {})).toEqual(['value'])

			clock.advance(10)
			expect(cache.peek('speed')).toBeUndefined()
		})
	})

	describe('getOrThrow() method', () => {
		test('should return live values', () => {
			const cache = Cache.keepLast<number, number>()

			cache.insert(10, 90)

			expect(cache.getOrThrow(10)).toBe(90)
		})

		test('should throw MissingEntryError for absent keys', () => {
			const cache = Cache.keepLast<number, number>()

			expect(() => cache.getOrThrow(10)).toThrow(MissingEntryError)
			expect(() => cache.getOrThrow(10)).toThrow('no entry found for key')
		})
	})

	describe('update() method', () => {
		test('should modify a live value in place', () => {
			const cache = Cache.keepLast<string, number>()

			cache.insert('target_position', 90.0)

			expect(cache.update('target_position', (pos) => pos + 10)).toBe(100)
			expect(cache.get('target_position')).toBe(100)
		})

		test('should keep the original insertion time', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(10, {
				clock: clock.now,
			})

			cache.insert('target_position', 90)
			clock.advance(6)
			cache.update('target_position', (pos) => pos + 10)
			clock.advance(5)

			expect(cache.get('target_position')).toBeUndefined()
		})

		test('should not call the updater for missing keys', () => {
			const cache = Cache.keepLast<string, number>()
			const updater = vi.fn((pos: number) => pos + 1)

			expect(cache.update('missing', updater)).toBeUndefined()
			expect(updater).not.toHaveBeenCalled()
			expect(cache.size).toBe(0)
		})
	})

	describe('remove() method', () => {
		test('should remove and return live values', () => {
			const cache = Cache.keepLast<number, string>()

			cache.insert(1, 'one')

			expect(cache.remove(1)).toBe('one')
			expect(cache.get(1)).toBeUndefined()
			expect(cache.size).toBe(0)
		})

		test('should remove expired values too', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<number, string>(10, {
				clock: clock.now,
			})

			cache.insert(1, 'one')
			clock.advance(20)

			expect(cache.remove(1)).toBe('one')
			expect(cache.size).toBe(0)
		})

		test('should return undefined for absent keys', () => {
			const cache = Cache.keepLast<number, string>()

			expect(cache.remove(1)).toBeUndefined()
		})
	})

	describe('clear() method', () => {
		test('should clear live and expired entries', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, string>(50, {
				clock: clock.now,
			})

			cache.insert('key1', 'value1')
			clock.advance(60)
			cache.insert('key2', 'value2')

			expect(cache.clear()).toBe(2)
			expect(cache.get('key2')).toBeUndefined()
		})

		test('should return 0 when clearing empty cache', () => {
			const cache = new Cache<string, string>()

			expect(cache.clear()).toBe(0)
		})
	})

	describe('getStats() method', () => {
		test('should return correct statistics for empty cache', () => {
			const cache = Cache.withExpiryDuration<string, string>(1000)

			expect(cache.getStats()).toEqual({
				total: 0,
				valid: 0,
				expired: 0,
				expiryMs: 1000,
			})
		})

		test('should count expired entries correctly', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, string>(50, {
				clock: clock.now,
			})

			cache.insert('key1', 'value1')
			cache.insert('key2', 'value2')
			clock.advance(60)
			cache.insert('key3', 'value3')

			expect(cache.getStats()).toEqual({
				total: 3,
				valid: 1,
				expired: 2,
				expiryMs: 50,
			})
		})

		test('should report a null expiry for keep-last caches', () => {
			const cache = Cache.keepLast<string, string>()

			cache.insert('key', 'value')

			expect(cache.getStats()).toEqual({
				total: 1,
				valid: 1,
				expired: 0,
				expiryMs: null,
			})
		})
	})

	describe('prune() method', () => {
		test('should remove only expired entries', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, string>(50, {
				clock: clock.now,
			})

			cache.insert('expired1', 'value1')
			cache.insert('expired2', 'value2')
			clock.advance(60)
			cache.insert('fresh', 'value3')

			expect(cache.prune()).toBe(2)
			expect(cache.size).toBe(1)
			expect(cache.get('fresh')).toBe('value3')
		})

		test('should never remove anything from a keep-last cache', () => {
			const clock = new ManualClock()
			const cache = Cache.keepLast<string, string>({ clock: clock.now })

			cache.insert('key', 'value')
			clock.advance(1_000_000)

			expect(cache.prune()).toBe(0)
			expect(cache.size).toBe(1)
		})
	})

	describe('Key hashing', () => {
		type Register = [motorId: number, register: string]

		test('should match composite keys by hash', () => {
			const cache = Cache.keepLast<Register, number>({
				hashKey: ([motorId, register]) => `${motorId}:${register}`,
			})

			cache.insert([1, 'position'], 12.5)

			expect(cache.get([1, 'position'])).toBe(12.5)
			expect(cache.get([2, 'position'])).toBeUndefined()
			expect(cache.remove([1, 'position'])).toBe(12.5)
		})

		test('should compare array keys by identity without a hasher', () => {
			const cache = Cache.keepLast<Register, number>()
			const key: Register = [1, 'position']

			cache.insert(key, 12.5)

			expect(cache.get(key)).toBe(12.5)
			expect(cache.get([1, 'position'])).toBeUndefined()
		})
	})

	describe('keys() method', () => {
		test('should list live keys in insertion order', () => {
			const clock = new ManualClock()
			const cache = Cache.withExpiryDuration<string, number>(10, {
				clock: clock.now,
			})

			cache.insert('old', 1)
			clock.advance(10)
			cache.insert('b', 2)
			cache.insert('a', 3)

			expect([...cache.keys()]).toEqual(['b', 'a'])
		})
	})
})
