import type { Locale } from '../../i18n'
import { configBoxMessagesEnUS } from './copy.en-US'
import { configBoxMessagesPtBR } from './copy.pt-BR'

export const configBoxMessages = {
  'pt-BR': configBoxMessagesPtBR,
  'en-US': configBoxMessagesEnUS,
} as const

export type ConfigBoxCopyKey = keyof (typeof configBoxMessages)['en-US']

export function configBoxTranslate(locale: Locale, key: ConfigBoxCopyKey): string {
  return configBoxMessages[locale][key] ?? configBoxMessages['en-US'][key] ?? key
}

export function configBoxFormat(
  locale: Locale,
  key: ConfigBoxCopyKey,
  params: Record<string, string | number>
): string {
  const template = configBoxTranslate(locale, key)
  return template.replace(/\{(\w+)\}/g, (_, name: string) => String(params[name] ?? `{${name}}`))
}
