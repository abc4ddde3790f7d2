import { describe, expect, it, vi } from 'vitest'

import { createConsoleLogger } from './console-logger'

describe('console logger', () => {
  it('prefixes every message and passes errors along', () => {
    const sink = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }
    const logger = createConsoleLogger('[test]', sink)
    const failure = new Error('boom')

    logger.warn('careful')
    logger.error('failed', failure)
    logger.error('failed quietly')

    expect(sink.warn).toHaveBeenCalledWith('[test] careful')
    expect(sink.error).toHaveBeenNthCalledWith(1, '[test] failed', failure)
    expect(sink.error).toHaveBeenNthCalledWith(2, '[test] failed quietly')
  })
})
