import { describe, expect, it } from 'vitest'

import { describeConfigBoxError, InvalidRunnerError, normalizeConfigBoxError } from './errors'

describe('config box errors', () => {
  it('keeps the message of Error values and stringifies the rest', () => {
    expect(normalizeConfigBoxError(new Error('boom'), 'row_render', 'dpi')).toMatchObject({
      kind: 'row_render',
      message: 'boom',
      optionKey: 'dpi',
    })
    expect(normalizeConfigBoxError('plain text').message).toBe('plain text')
    expect(normalizeConfigBoxError('').message).toBe('Unknown error')
    expect(normalizeConfigBoxError(null).kind).toBe('unknown')
  })

  it('describes an error on one line', () => {
    expect(describeConfigBoxError(normalizeConfigBoxError(new Error('boom'), 'validation', 'fsync'))).toBe(
      'validation [fsync]: boom'
    )
    expect(describeConfigBoxError(normalizeConfigBoxError(new Error('gone'), 'schema_resolution'))).toBe(
      'schema_resolution: gone'
    )
  })

  it('names the runner that could not be found', () => {
    expect(new InvalidRunnerError('dosbox').message).toBe('Invalid runner provided: dosbox')
    expect(new InvalidRunnerError(null).message).toBe('No runner provided')
    expect(new InvalidRunnerError('dosbox').name).toBe('InvalidRunnerError')
  })
})
