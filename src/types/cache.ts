/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                          Cache Type Definitions                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Type definitions for the cache store and its batched fetch protocol.
 *
 * @packageDocumentation
 */

/**
 * A stored value together with the monotonic time it was inserted.
 */
export interface CacheEntry<K, V> {
	/** The original key, kept for iteration when keys are hashed */
	key: K
	/** The cached value */
	value: V
	/** Monotonic clock reading (ms) at insertion or last refresh */
	insertedAt: number
}

/**
 * Statistics about the cache state.
 */
export interface CacheStats {
	/** Total number of entries in the store, live or not */
	total: number
	/** Number of live (non-expired) entries */
	valid: number
	/** Number of expired entries still in the store */
	expired: number
	/** Expiry duration in milliseconds, or null when values never expire */
	expiryMs: number | null
}

/** Source of monotonic milliseconds. */
export type Clock = () => number

/** Maps a key to the identity used for map lookups. */
export type KeyHasher<K> = (key: K) => unknown

/**
 * Options accepted by every cache constructor.
 */
export interface CacheOptions<K> {
	/** Age (ms) at which entries go stale; null or omitted keeps the last value */
	expiryMs?: number | null
	/** Clock override, mostly for tests */
	clock?: Clock
	/**
	 * Key identity for composite keys. Two keys with the same hash are the
	 * same cache key. Defaults to the key itself.
	 */
	hashKey?: KeyHasher<K>
	/** Label attached to diagnostic output */
	name?: string
}

/**
 * Batched fetch callback. Receives the missing keys in first-occurrence
 * order and must return exactly one value per key, in the same order.
 */
export type BatchFetcher<K, V> = (missing: readonly K[]) => V[]

/** Asynchronous form of {@link BatchFetcher}. */
export type AsyncBatchFetcher<K, V> = (
	missing: readonly K[]
) => Promise<V[]> | V[]

/** Single-key fetch callback. */
export type EntryFetcher<K, V> = (key: K) => V

/** Asynchronous form of {@link EntryFetcher}. */
export type AsyncEntryFetcher<K, V> = (key: K) => Promise<V> | V
