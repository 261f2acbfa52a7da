/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                        Batched Entries Request                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Reconciles a requested key sequence against the cache with at most one
 * call to a caller-supplied batch fetch.
 *
 * - Missing set: keys that are absent or expired, de-duplicated, in
 *   first-occurrence order
 * - Results: one value per requested key, in request order
 * - Atomicity: nothing is inserted unless the fetch succeeds and returns one
 *   value per missing key
 *
 * @packageDocumentation
 */

import { diagnostic } from './logger.js'
import { monotonicNow } from './clock.js'
import { FetchContractError, RequestConsumedError } from './errors.js'
import type { Cache } from './cache.js'
import type { AsyncBatchFetcher, BatchFetcher } from '../types/cache.js'

/**
 * A view over several cache entries, built by {@link Cache.entries}.
 *
 * The request is single-use: the first terminal call consumes it.
 */
export class EntriesRequest<K, V> {
	private readonly requested: readonly K[]
	private readonly missingKeys: readonly K[]
	private readonly snapshot: Map<unknown, { value: V }>
	private consumed = false

	constructor(
		private readonly cache: Cache<K, V>,
		keys: readonly K[]
	) {
		const snapshot = new Map<unknown, { value: V }>()
		const missing: K[] = []
		const seenMissing = new Set<unknown>()

		for (const key of keys) {
			const id = cache.identify(key)
			if (snapshot.has(id) || seenMissing.has(id)) {
				continue
			}

			const entry = cache.peek(key)
			if (entry) {
				snapshot.set(id, { value: entry.value })
			} else {
				seenMissing.add(id)
				missing.push(key)
			}
		}

		this.requested = [...keys]
		this.missingKeys = missing
		this.snapshot = snapshot
	}

	/** The requested keys, in request order */
	get keys(): readonly K[] {
		return this.requested
	}

	/** Keys that will be passed to the fetch, in first-occurrence order */
	get missing(): readonly K[] {
		return [...this.missingKeys]
	}

	/**
	 * Insert `defaultValue` for every missing key.
	 * @returns One value per requested key
	 */
	orInsert(defaultValue: V): V[] {
		return this.orTryInsertWith((missing) => missing.map(() => defaultValue))
	}

	/**
	 * Fill missing keys from an infallible batch fetch.
	 *
	 * @example
	 * ```typescript
	 * const temps = cache
	 * 	.entries([1, 2, 3])
	 * 	.orInsertWith((ids) => ids.map(readTemperature))
	 * ```
	 *
	 * @param fetch - Called once with the missing keys, never when none are missing
	 * @returns One value per requested key
	 * @throws FetchContractError if `fetch` does not return one value per missing key
	 */
	orInsertWith(fetch: BatchFetcher<K, V>): V[] {
		return this.orTryInsertWith(fetch)
	}

	/**
	 * Fill missing keys from a batch fetch that may throw.
	 *
	 * Whatever `fetch` throws is rethrown as is, and the cache is left
	 * untouched.
	 *
	 * @param fetch - Called once with the missing keys, never when none are missing
	 * @returns One value per requested key
	 * @throws FetchContractError if `fetch` does not return one value per missing key
	 */
	orTryInsertWith(fetch: BatchFetcher<K, V>): V[] {
		this.consume()

		if (this.missingKeys.length === 0) {
			return this.assemble()
		}

		const startTime = monotonicNow()
		const values = fetch(this.missing)
		return this.commit(values, monotonicNow() - startTime)
	}

	/**
	 * Same protocol as {@link EntriesRequest.orTryInsertWith} for an
	 * asynchronous fetch. A rejection propagates unchanged and nothing is
	 * inserted.
	 */
	async orTryInsertWithAsync(fetch: AsyncBatchFetcher<K, V>): Promise<V[]> {
		this.consume()

		if (this.missingKeys.length === 0) {
			return this.assemble()
		}

		const startTime = monotonicNow()
		const values = await fetch(this.missing)
		return this.commit(values, monotonicNow() - startTime)
	}

	private consume(): void {
		if (this.consumed) {
			throw new RequestConsumedError()
		}
		this.consumed = true
	}

	private commit(values: V[], fetchTime: number): V[] {
		const expected = this.missingKeys.length

		if (!Array.isArray(values) || values.length !== expected) {
			const received = Array.isArray(values) ? values.length : null
			diagnostic.error('Batch fetch broke its contract', {
				cache: this.cache.name,
				expected,
				received,
			})
			throw new FetchContractError(expected, received)
		}

		this.missingKeys.forEach((key, i) => {
			this.cache.insert(key, values[i])
			this.snapshot.set(this.cache.identify(key), { value: values[i] })
		})

		diagnostic.debug('Batch fetch completed', {
			cache: this.cache.name,
			requested: this.requested.length,
			missing: expected,
			fetchTime,
		})

		return this.assemble()
	}

	private assemble(): V[] {
		return this.requested.map((key) => {
			const resolved = this.snapshot.get(this.cache.identify(key))
			if (!resolved) {
				// Every requested identity is either snapshotted or fetched
				throw new Error('Unresolved key in batched request')
			}
			return resolved.value
		})
	}
}
