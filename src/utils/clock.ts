/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                          ⚙️  BATCH CACHE  ⚙️                               ║
 * ║                            Monotonic Clock                                ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Expiry is measured against a monotonic clock so that wall-clock
 * adjustments never revive or kill entries.
 *
 * @packageDocumentation
 */

import { performance } from 'node:perf_hooks'
import type { Clock } from '../types/cache.js'

/**
 * Milliseconds since process start, monotonic.
 */
export const monotonicNow: Clock = () => performance.now()
