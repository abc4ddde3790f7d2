import { describe, expect, it } from 'vitest'

import type { Control, OptionRow, RowNode, SectionGroup } from './row-tree'
import { applyVisibility, isRowVisible, showAll } from './visibility'

function stubControl(): Control & { shown: boolean } {
  return {
    shown: true,
    setVisible(visible) {
      this.shown = visible
    },
    setEnabled() {},
    bind() {},
  }
}

function row(key: string, label: string, options: { helptext?: string; advanced?: boolean } = {}) {
  const control = stubControl()
  const built: OptionRow<typeof control> = {
    kind: 'row',
    key,
    label,
    helptext: options.helptext ?? '',
    advanced: options.advanced ?? false,
    descriptor: { key, label, type: 'string', visible: true },
    control,
    defaultValue: null,
    defaultTooltipText: null,
    presenters: [],
    weight: 'plain',
    tooltip: '',
    enabled: true,
    resetVisible: false,
    visible: true,
  }
  return built
}

function section<TControl extends Control>(title: string, rows: OptionRow<TControl>[]): SectionGroup<TControl> {
  return { kind: 'section', title, rows, visible: true }
}

describe('row visibility', () => {
  it('hides advanced rows unless advanced options are shown, whatever the filter', () => {
    const advancedRow = row('dpi', 'Screen DPI', { advanced: true })

    expect(isRowVisible(advancedRow, { advancedVisible: false, filterText: '' })).toBe(false)
    expect(isRowVisible(advancedRow, { advancedVisible: false, filterText: 'dpi' })).toBe(false)
    expect(isRowVisible(advancedRow, { advancedVisible: true, filterText: '' })).toBe(true)
  })

  it('matches the filter case-insensitively against the label', () => {
    const wineRow = row('version', 'Wine version')

    expect(isRowVisible(wineRow, { advancedVisible: true, filterText: 'wine' })).toBe(true)
    expect(isRowVisible(wineRow, { advancedVisible: true, filterText: 'VERSION' })).toBe(true)
    expect(isRowVisible(wineRow, { advancedVisible: true, filterText: 'zz-nomatch' })).toBe(false)
  })

  it('matches the filter against the help text but not the key', () => {
    const esync = row('esync', 'Enable Esync', { helptext: 'Eventfd-based synchronization.' })

    expect(isRowVisible(esync, { advancedVisible: true, filterText: 'eventfd' })).toBe(true)
    expect(isRowVisible(row('fsync', 'Futex sync'), { advancedVisible: true, filterText: 'fsync' })).toBe(false)
  })
})

describe('tree visibility', () => {
  it('hides a section whose rows are all hidden even if its title matches the filter', () => {
    const graphics = section('Graphics', [row('dxvk', 'Enable DXVK'), row('vkd3d', 'Enable VKD3D')])
    const nodes: RowNode<ReturnType<typeof stubControl>>[] = [graphics, row('version', 'Wine version')]

    const count = applyVisibility(nodes, { advancedVisible: true, filterText: 'graphics' })

    expect(count).toBe(0)
    expect(graphics.visible).toBe(false)
    expect(graphics.rows.map((item) => item.visible)).toEqual([false, false])
  })

  it('keeps a section visible while one of its rows is and counts rows across sections', () => {
    const dxvk = row('dxvk', 'Enable DXVK')
    const dxvkVersion = row('dxvk_version', 'DXVK version', { advanced: true })
    const graphics = section('Graphics', [dxvk, dxvkVersion])
    const version = row('version', 'Wine version')

    const count = applyVisibility([graphics, version], { advancedVisible: false, filterText: '' })

    expect(count).toBe(2)
    expect(graphics.visible).toBe(true)
    expect(dxvkVersion.visible).toBe(false)
    expect(dxvkVersion.control.shown).toBe(false)
    expect(dxvk.control.shown).toBe(true)
  })

  it('shows every node again after showAll', () => {
    const hidden = row('dpi', 'Screen DPI', { advanced: true })
    const display = section('Display', [hidden])
    applyVisibility([display], { advancedVisible: false, filterText: '' })

    showAll([display])

    expect(display.visible).toBe(true)
    expect(hidden.visible).toBe(true)
    expect(hidden.control.shown).toBe(true)
  })
})
