/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                         Generic Cache Utility                             ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Generic in-memory cache with optional expiry, built for values that are
 * slow or unreliable to read (e.g. registers behind a shared serial bus)
 * and cheaper to read in batches.
 *
 * Expired entries are never returned but stay in the store until they are
 * overwritten, removed, or pruned.
 *
 * @packageDocumentation
 */

import { EntriesRequest } from './entries.js'
import { EntryRequest } from './entry.js'
import { monotonicNow } from './clock.js'
import { getEnvConfig } from './env.js'
import { CacheConfigurationError, MissingEntryError } from './errors.js'
import { DEFAULT_CACHE_NAME, KEEP_LAST_EXPIRY } from '../config/cacheSettings.js'
import type {
	CacheEntry,
	CacheOptions,
	CacheStats,
	Clock,
	KeyHasher,
} from '../types/cache.js'

/**
 * Generic in-memory cache with expiry and batched get-or-fetch.
 * Type parameter K: key type (compared with SameValueZero unless `hashKey` is set)
 * Type parameter V: value type
 *
 * @example
 * ```typescript
 * const positions = Cache.withExpiryDuration<number, number>(10)
 * positions.insert(10, 0.0)
 *
 * const values = positions
 * 	.entries([10, 11, 12])
 * 	.orInsertWith((ids) => ids.map((id) => id * 10.0))
 * // values: [0, 110, 120]
 * ```
 */
export class Cache<K, V> {
	private store: Map<unknown, CacheEntry<K, V>>
	private readonly expiryMs: number | null
	private readonly clock: Clock
	private readonly hashKey: KeyHasher<K>

	/** Label used in diagnostic output */
	readonly name: string

	/**
	 * Creates a new cache. Without `expiryMs`, the last inserted value is kept.
	 * @throws CacheConfigurationError if `expiryMs` is negative or NaN
	 */
	constructor(options: CacheOptions<K> = {}) {
		const expiryMs = options.expiryMs ?? KEEP_LAST_EXPIRY
		if (expiryMs !== null && (Number.isNaN(expiryMs) || expiryMs < 0)) {
			throw new CacheConfigurationError(
				'Expiry duration must be a non-negative number of milliseconds',
				'expiryMs',
				expiryMs
			)
		}

		this.store = new Map()
		this.expiryMs = expiryMs
		this.clock = options.clock ?? monotonicNow
		this.hashKey = options.hashKey ?? ((key: K) => key)
		this.name = options.name ?? DEFAULT_CACHE_NAME
	}

	/**
	 * Creates a cache where the last inserted value is always kept.
	 */
	static keepLast<K, V>(
		options: Omit<CacheOptions<K>, 'expiryMs'> = {}
	): Cache<K, V> {
		return new Cache<K, V>({ ...options, expiryMs: null })
	}

	/**
	 * Creates a cache whose entries go stale once they are `expiryMs` old.
	 */
	static withExpiryDuration<K, V>(
		expiryMs: number,
		options: Omit<CacheOptions<K>, 'expiryMs'> = {}
	): Cache<K, V> {
		return new Cache<K, V>({ ...options, expiryMs })
	}

	/**
	 * Creates a cache using `CACHE_EXPIRY_MS` from the validated environment.
	 * @throws EnvValidationError if the environment is invalid
	 */
	static fromEnvironment<K, V>(
		options: Omit<CacheOptions<K>, 'expiryMs'> = {}
	): Cache<K, V> {
		const { CACHE_EXPIRY_MS } = getEnvConfig()
		return new Cache<K, V>({ ...options, expiryMs: CACHE_EXPIRY_MS ?? null })
	}

	/** Configured expiry in milliseconds, or null when values never expire */
	get expiryDuration(): number | null {
		return this.expiryMs
	}

	/** Number of stored entries, live or expired */
	get size(): number {
		return this.store.size
	}

	/**
	 * Identity used for map lookups of `key`.
	 * @internal
	 */
	identify(key: K): unknown {
		return this.hashKey(key)
	}

	/**
	 * The live value for `key`, boxed so a cached `undefined` is still found.
	 * The box is a copy; changing it does not touch the stored entry.
	 */
	peek(key: K): { value: V } | undefined {
		const entry = this.liveEntry(key)
		return entry && { value: entry.value }
	}

	/**
	 * Get a value from the cache.
	 * Returns undefined if not found or expired; the store is not modified.
	 */
	get(key: K): V | undefined {
		return this.peek(key)?.value
	}

	/**
	 * Get a live value, throwing when there is none.
	 * @throws MissingEntryError if the key is absent or expired
	 */
	getOrThrow(key: K): V {
		const entry = this.peek(key)
		if (!entry) {
			throw new MissingEntryError(key)
		}
		return entry.value
	}

	/**
	 * Check if a key exists and is not expired.
	 */
	has(key: K): boolean {
		return this.peek(key) !== undefined
	}

	/**
	 * Store a value, refreshing its insertion time.
	 * @returns The previous value for the key, expired or not
	 */
	insert(key: K, value: V): V | undefined {
		const id = this.hashKey(key)
		const previous = this.store.get(id)
		this.store.set(id, { key, value, insertedAt: this.clock() })
		return previous?.value
	}

	/**
	 * Replace the value of a live entry without refreshing its insertion time.
	 * @returns The new value, or undefined if the key is not live
	 */
	update(key: K, updater: (value: V) => V): V | undefined {
		const entry = this.liveEntry(key)
		if (!entry) {
			return undefined
		}
		entry.value = updater(entry.value)
		return entry.value
	}

	/**
	 * Remove an entry whether or not it has expired.
	 * @returns The removed value, or undefined if there was no entry
	 */
	remove(key: K): V | undefined {
		const id = this.hashKey(key)
		const entry = this.store.get(id)
		if (!entry) {
			return undefined
		}
		this.store.delete(id)
		return entry.value
	}

	/**
	 * Begin a single-key get-or-insert.
	 */
	entry(key: K): EntryRequest<K, V> {
		return new EntryRequest(this, key)
	}

	/**
	 * Begin a batched get-or-fetch over `keys`.
	 * Order and duplicates are preserved; nothing is fetched until the
	 * request is resolved.
	 */
	entries(keys: readonly K[]): EntriesRequest<K, V> {
		return new EntriesRequest(this, keys)
	}

	/**
	 * Clear all entries from the cache.
	 * @returns Number of entries cleared
	 */
	clear(): number {
		const size = this.store.size
		this.store.clear()
		return size
	}

	/**
	 * Get cache statistics.
	 */
	getStats(): CacheStats {
		const now = this.clock()
		let valid = 0
		let expired = 0

		for (const entry of this.store.values()) {
			if (this.isExpired(entry, now)) {
				expired++
			} else {
				valid++
			}
		}

		return {
			total: this.store.size,
			valid,
			expired,
			expiryMs: this.expiryMs,
		}
	}

	/**
	 * Remove expired entries from the cache.
	 * @returns Number of entries removed
	 */
	prune(): number {
		if (this.expiryMs === null) {
			return 0
		}

		const now = this.clock()
		let removed = 0

		for (const [id, entry] of this.store.entries()) {
			if (this.isExpired(entry, now)) {
				this.store.delete(id)
				removed++
			}
		}

		return removed
	}

	/** Live keys in insertion order */
	*keys(): IterableIterator<K> {
		const now = this.clock()
		for (const entry of this.store.values()) {
			if (!this.isExpired(entry, now)) {
				yield entry.key
			}
		}
	}

	private liveEntry(key: K): CacheEntry<K, V> | undefined {
		const entry = this.store.get(this.hashKey(key))
		if (!entry || this.isExpired(entry, this.clock())) {
			return undefined
		}
		return entry
	}

	private isExpired(entry: CacheEntry<K, V>, now: number): boolean {
		return this.expiryMs !== null && now - entry.insertedAt >= this.expiryMs
	}
}
