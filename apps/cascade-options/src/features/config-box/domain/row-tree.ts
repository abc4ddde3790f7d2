/**
 * domain/row-tree.ts
 *
 * Model of a rendered config box: option rows, optionally grouped in
 * sections. The rendering boundary reads this model and translates `weight`,
 * `enabled` and `visible` into toolkit styling.
 */

import type { LayeredConfigStore, OptionValue } from './config-layers'
import type { ResolvedOptionDescriptor } from './option-descriptor'
import type { OptionWeight } from './override-state'

/** Opaque handle on the toolkit control that edits one option. */
export type Control = {
  setVisible(visible: boolean): void
  setEnabled(enabled: boolean): void
  bind(value: OptionValue | null, onChange: (value: OptionValue) => void): void
}

export type PresenterKind = 'warning' | 'error'

/**
 * A message shown under an option. It may only show or hide itself and
 * change its text; it never adds or removes rows.
 */
export type ValidationPresenter = {
  readonly kind: PresenterKind
  readonly key: string
  readonly visible: boolean
  readonly message: string
  reevaluate(config: LayeredConfigStore): void
}

export type FilterableRow = {
  readonly label: string
  readonly helptext: string
  readonly advanced: boolean
}

export type OptionRow<TControl extends Control = Control> = FilterableRow & {
  readonly kind: 'row'
  readonly key: string
  readonly descriptor: ResolvedOptionDescriptor
  readonly control: TControl
  readonly defaultValue: OptionValue | null
  readonly defaultTooltipText: string | null
  readonly presenters: ValidationPresenter[]
  weight: OptionWeight
  tooltip: string
  enabled: boolean
  resetVisible: boolean
  visible: boolean
}

export type SectionGroup<TControl extends Control = Control> = {
  readonly kind: 'section'
  readonly title: string
  readonly rows: OptionRow<TControl>[]
  visible: boolean
}

export type RowNode<TControl extends Control = Control> = OptionRow<TControl> | SectionGroup<TControl>

export type RowTree<TControl extends Control = Control> = {
  /** Explanation shown above the options, if the box has one. */
  readonly banner: string | null
  /** Replaces the rows when the schema is empty. */
  readonly placeholder: string | null
  readonly nodes: RowNode<TControl>[]
}

export function* iterateRows<TControl extends Control>(
  nodes: readonly RowNode<TControl>[]
): Generator<OptionRow<TControl>> {
  for (const node of nodes) {
    if (node.kind === 'section') {
      yield* node.rows
    } else {
      yield node
    }
  }
}

export function findRow<TControl extends Control>(
  tree: RowTree<TControl> | null,
  key: string
): OptionRow<TControl> | undefined {
  if (!tree) return undefined
  for (const row of iterateRows(tree.nodes)) {
    if (row.key === key) return row
  }
  return undefined
}
