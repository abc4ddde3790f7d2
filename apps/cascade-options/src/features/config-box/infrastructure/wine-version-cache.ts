/**
 * infrastructure/wine-version-cache.ts
 *
 * Memoized list of installed Wine/Proton builds. The scan itself is injected:
 * the browser build has no file system of its own.
 */

import type { WineVersionCachePort } from '../application/ports'

export type WineVersionCache = WineVersionCachePort & {
  list(): readonly string[]
}

export function createWineVersionCache(scan: () => readonly string[]): WineVersionCache {
  let cached: readonly string[] | null = null

  return {
    list() {
      if (cached === null) cached = scan()
      return cached
    },
    clear() {
      cached = null
    },
  }
}
