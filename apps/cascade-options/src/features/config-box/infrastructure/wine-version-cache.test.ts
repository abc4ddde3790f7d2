import { describe, expect, it, vi } from 'vitest'

import { createWineVersionCache } from './wine-version-cache'

describe('wine version cache', () => {
  it('scans once until cleared', () => {
    const scan = vi.fn(() => ['wine-ge-8-26', 'wine-staging-9.4'])
    const cache = createWineVersionCache(scan)

    expect(cache.list()).toEqual(['wine-ge-8-26', 'wine-staging-9.4'])
    cache.list()
    expect(scan).toHaveBeenCalledTimes(1)

    cache.clear()
    cache.list()
    expect(scan).toHaveBeenCalledTimes(2)
  })
})
