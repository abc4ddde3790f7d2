/**
 * domain/option-descriptor.ts
 *
 * Declarative schema entries describing one configurable option, and the
 * per-render resolution of their lazily computed fields.
 *
 * Rules:
 *   - Pure TypeScript, no `solid-js` imports.
 *   - No JSX / UI component imports.
 */

import type { ConfigLevel, LayeredConfigStore, OptionValue } from './config-layers'

/** A literal value, or a zero-argument producer evaluated at render time. */
export type Resolvable<T> = T | (() => T)

/** A bare value, or a `[label, value]` pair. */
export type OptionChoice = string | readonly [label: string, value: string]

/**
 * Message attached under an option. A function receives the whole store so a
 * warning can depend on other options; a falsy result hides the message.
 */
export type OptionMessage =
  | string
  | ((config: LayeredConfigStore, key: string) => string | null | undefined | false)

export type OptionDescriptor = {
  key: string
  label: string
  type: string
  /** Levels where the option applies. Absent means every level. */
  scope?: readonly ConfigLevel[]
  /** Consecutive descriptors with the same section are grouped together. */
  section?: string | null
  advanced?: boolean
  help?: string
  default?: OptionValue
  warning?: OptionMessage
  error?: OptionMessage
  visible?: Resolvable<boolean>
  choices?: Resolvable<readonly OptionChoice[]>
  condition?: Resolvable<boolean>
  min?: number
  max?: number
  step?: number
}

/**
 * Descriptor after one render pass resolved its producers. `choices` may
 * still be a producer for widget types that query them lazily.
 */
export type ResolvedOptionDescriptor = Omit<OptionDescriptor, 'visible' | 'condition'> & {
  visible: boolean
  condition?: boolean
}

/** Widget types whose choices are fetched by the widget itself, on demand. */
export const LAZY_CHOICE_TYPES: ReadonlySet<string> = new Set(['choice_with_search'])

export function resolveValue<T>(value: Resolvable<T>): T {
  return isProducer(value) ? value() : value
}

function isProducer<T>(value: Resolvable<T>): value is () => T {
  return typeof value === 'function'
}

export function appliesToLevel(descriptor: OptionDescriptor, level: ConfigLevel): boolean {
  return !descriptor.scope || descriptor.scope.includes(level)
}

/** Literal defaults keyed by option, for seeding a store's section. */
export function descriptorDefaults(descriptors: readonly OptionDescriptor[]): Record<string, OptionValue> {
  const defaults: Record<string, OptionValue> = {}
  for (const descriptor of descriptors) {
    if (descriptor.default !== undefined) defaults[descriptor.key] = descriptor.default
  }
  return defaults
}

/**
 * Resolves `visible`, `choices` and `condition` once, on a copy. When the
 * option turns out to be hidden the remaining producers are not evaluated.
 */
export function resolveDescriptor(descriptor: OptionDescriptor): ResolvedOptionDescriptor {
  const { visible, condition, choices, ...rest } = descriptor
  const resolvedVisible = visible === undefined ? true : resolveValue(visible)
  if (!resolvedVisible) {
    return { ...rest, choices, visible: false }
  }

  const resolved: ResolvedOptionDescriptor = { ...rest, visible: true }
  if (choices !== undefined) {
    resolved.choices = LAZY_CHOICE_TYPES.has(descriptor.type) ? choices : resolveValue(choices)
  }
  if (condition !== undefined) {
    resolved.condition = resolveValue(condition)
  }
  return resolved
}

export function choiceLabel(choice: OptionChoice): string {
  return typeof choice === 'string' ? choice : choice[0]
}

export function choiceValue(choice: OptionChoice): string {
  return typeof choice === 'string' ? choice : choice[1]
}
