/**
 * domain/visibility.ts
 *
 * Decides which rows and sections of a rendered box are shown, from the
 * "advanced options" toggle and the free-text filter. Only the `visible`
 * flags change; controls are never rebuilt here.
 */

import type { Control, FilterableRow, RowNode } from './row-tree'

export type VisibilityState = {
  advancedVisible: boolean
  filterText: string
}

/**
 * A row is shown when advanced rows are shown (or it is not one), and the
 * filter is empty or found, case-insensitively, in its label or help text.
 */
export function isRowVisible(row: FilterableRow, state: VisibilityState): boolean {
  if (row.advanced && !state.advancedVisible) return false

  const filter = state.filterText.toLowerCase()
  if (!filter) return true
  return row.label.toLowerCase().includes(filter) || row.helptext.toLowerCase().includes(filter)
}

/**
 * Walks the nodes depth-first, updates every `visible` flag and returns the
 * number of visible rows. A section is visible only if one of its rows is;
 * its own title is not matched against the filter.
 */
export function applyVisibility<TControl extends Control>(
  nodes: readonly RowNode<TControl>[],
  state: VisibilityState
): number {
  let visibleCount = 0
  for (const node of nodes) {
    if (node.kind === 'section') {
      const sectionCount = applyVisibility(node.rows, state)
      node.visible = sectionCount > 0
      visibleCount += sectionCount
      continue
    }

    node.visible = isRowVisible(node, state)
    node.control.setVisible(node.visible)
    if (node.visible) visibleCount += 1
  }
  return visibleCount
}

/** Marks every node visible, as right after a render pass. */
export function showAll<TControl extends Control>(nodes: readonly RowNode<TControl>[]): void {
  for (const node of nodes) {
    node.visible = true
    if (node.kind === 'section') {
      showAll(node.rows)
    } else {
      node.control.setVisible(true)
    }
  }
}
