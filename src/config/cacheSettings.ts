/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                          Cache Configuration                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Centralized cache constants.
 *
 * @packageDocumentation
 */

/**
 * Expiry used when none is given: entries keep their last value forever.
 */
export const KEEP_LAST_EXPIRY = null

/**
 * Label used in diagnostic output for caches constructed without a name.
 */
export const DEFAULT_CACHE_NAME = 'cache'
