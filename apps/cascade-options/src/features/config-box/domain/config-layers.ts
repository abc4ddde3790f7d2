/**
 * domain/config-layers.ts
 *
 * Value types shared by every layer of the config box: option values, the
 * three configuration tiers and the contract of the layered config store.
 *
 * Rules:
 *   - Pure TypeScript, no `solid-js` imports.
 *   - No JSX / UI component imports.
 */

export type OptionValue =
  | string
  | number
  | boolean
  | null
  | readonly OptionValue[]
  | { readonly [key: string]: OptionValue }

/**
 * Tier of the configuration cascade. A `game` config overrides its runner
 * config, which overrides the global `system` config.
 */
export type ConfigLevel = 'game' | 'runner' | 'system'

/**
 * Section of a config file edited by one box. Same names as the levels, but a
 * different axis: a game-level config carries `game`, `runner` and `system`
 * sections.
 */
export type ConfigSection = ConfigLevel

export const CONFIG_LEVEL_DEPTH: Record<ConfigLevel, number> = {
  system: 0,
  runner: 1,
  game: 2,
}

export type ConfigValues = Map<string, OptionValue>

/**
 * One section of the cascade as seen from the level being edited.
 *
 * `raw` holds only the keys set at that level; `effective` is the merge of
 * every level up to it. Both maps are live: the store mutates them in place.
 */
export type ConfigLayerView = {
  readonly effective: ConfigValues
  readonly raw: ConfigValues
  /** Rebuilds `effective` after `key` was dropped from `raw`. */
  recomputeAfterRemoval(key: string): void
}

export type LayeredConfigStore = {
  readonly level: ConfigLevel
  readonly runnerSlug: string | null
  readonly gameConfigId: string | null
  layer(section: ConfigSection): ConfigLayerView
}

/**
 * Structural equality between option values. Missing values compare as
 * `null`.
 */
export function valuesEqual(
  left: OptionValue | undefined,
  right: OptionValue | undefined
): boolean {
  const a = left ?? null
  const b = right ?? null
  if (a === b) return true
  if (a === null || b === null) return false
  if (typeof a !== 'object' || typeof b !== 'object') return false

  if (isValueList(a) || isValueList(b)) {
    if (!isValueList(a) || !isValueList(b) || a.length !== b.length) return false
    return a.every((item, index) => valuesEqual(item, b[index]))
  }

  const leftKeys = Object.keys(a)
  const rightKeys = Object.keys(b)
  if (leftKeys.length !== rightKeys.length) return false
  return leftKeys.every((key) => key in b && valuesEqual(a[key], b[key]))
}

export function isValueList(value: OptionValue): value is readonly OptionValue[] {
  return Array.isArray(value)
}

export function formatOptionValue(value: OptionValue | undefined): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}
