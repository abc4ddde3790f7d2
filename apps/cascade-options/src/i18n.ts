export type Locale = 'pt-BR' | 'en-US'

export const SUPPORTED_LOCALES: readonly Locale[] = ['en-US', 'pt-BR']

/**
 * First supported locale sharing a language with the user's preferences,
 * e.g. `pt-PT` picks `pt-BR`. Falls back to `en-US`.
 */
export function detectLocale(
  languages: readonly string[] = typeof navigator === 'undefined' ? [] : navigator.languages
): Locale {
  for (const language of languages) {
    const prefix = language.toLowerCase().split('-')[0] ?? ''
    const match = SUPPORTED_LOCALES.find((locale) => locale.toLowerCase().startsWith(`${prefix}-`))
    if (match) return match
  }
  return 'en-US'
}
