/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                         Single Entry Request                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Get-or-insert for one key. The fetch receives the key, so a single
 * register read can be passed directly.
 *
 * @packageDocumentation
 */

import { RequestConsumedError } from './errors.js'
import type { Cache } from './cache.js'
import type { AsyncEntryFetcher, EntryFetcher } from '../types/cache.js'

/**
 * A view into a single cache entry, built by {@link Cache.entry}.
 */
export class EntryRequest<K, V> {
	private consumed = false

	constructor(
		private readonly cache: Cache<K, V>,
		readonly key: K
	) {}

	/** Whether the key currently has a live value */
	get occupied(): boolean {
		return this.cache.has(this.key)
	}

	orInsert(defaultValue: V): V {
		return this.orTryInsertWith(() => defaultValue)
	}

	/**
	 * @example
	 * ```typescript
	 * const torqueEnabled = Cache.keepLast<number, boolean>()
	 * torqueEnabled.entry(20).orInsertWith(() => false)
	 * ```
	 */
	orInsertWith(fetch: EntryFetcher<K, V>): V {
		return this.orTryInsertWith(fetch)
	}

	/**
	 * Insert the result of `fetch` if the key is not live. A throw from
	 * `fetch` propagates unchanged and leaves the cache untouched.
	 */
	orTryInsertWith(fetch: EntryFetcher<K, V>): V {
		this.consume()

		const entry = this.cache.peek(this.key)
		if (entry) {
			return entry.value
		}

		const value = fetch(this.key)
		this.cache.insert(this.key, value)
		return value
	}

	async orTryInsertWithAsync(fetch: AsyncEntryFetcher<K, V>): Promise<V> {
		this.consume()

		const entry = this.cache.peek(this.key)
		if (entry) {
			return entry.value
		}

		const value = await fetch(this.key)
		this.cache.insert(this.key, value)
		return value
	}

	private consume(): void {
		if (this.consumed) {
			throw new RequestConsumedError()
		}
		this.consumed = true
	}
}
