/**
 * domain/override-state.ts
 *
 * Which configuration layer supplies an option's value, expressed as the
 * visual weight of its row, and the tooltip text derived from it.
 *
 * Rules:
 *   - Pure TypeScript, no `solid-js` imports.
 *   - Localized strings are passed in; this module does not own i18n.
 */

import { valuesEqual, type ConfigLayerView, type OptionValue } from './config-layers'

/**
 * `bold`:   set at the level being edited.
 * `italic`: inherited from a lower level that differs from the default.
 * `plain`:  unset anywhere, the default applies.
 */
export type OptionWeight = 'plain' | 'bold' | 'italic'

export type OverrideInput = {
  key: string
  layer: ConfigLayerView
  defaultValue: OptionValue | null
}

export function classifyWeight({ key, layer, defaultValue }: OverrideInput): OptionWeight {
  if (layer.raw.has(key)) return 'bold'
  if (!valuesEqual(layer.effective.get(key), defaultValue)) return 'italic'
  return 'plain'
}

export type TooltipCopy = {
  defaultLine: (defaultText: string) => string
  inheritedNote: string
}

export type TooltipInput = {
  help: string | undefined
  defaultTooltipText: string | null
  inherited: boolean
}

/**
 * Help text, then the default value line, then the inherited-value note,
 * separated by blank lines. Empty when there is nothing to say.
 */
export function composeTooltip(input: TooltipInput, copy: TooltipCopy): string {
  const parts: string[] = []
  if (input.help) parts.push(input.help)
  if (typeof input.defaultTooltipText === 'string') {
    parts.push(copy.defaultLine(input.defaultTooltipText))
  }
  if (input.inherited) parts.push(copy.inheritedNote)
  return parts.join('\n\n')
}
