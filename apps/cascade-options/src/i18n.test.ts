import { describe, expect, it } from 'vitest'

import { detectLocale } from './i18n'

describe('locale detection', () => {
  it('matches on the language part of the preferred languages', () => {
    expect(detectLocale(['pt-PT'])).toBe('pt-BR')
    expect(detectLocale(['de-DE', 'pt'])).toBe('pt-BR')
    expect(detectLocale(['en-GB', 'pt-BR'])).toBe('en-US')
  })

  it('falls back to English', () => {
    expect(detectLocale([])).toBe('en-US')
    expect(detectLocale(['fr-FR'])).toBe('en-US')
  })
})
