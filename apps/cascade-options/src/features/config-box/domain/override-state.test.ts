import { describe, expect, it } from 'vitest'

import { formatOptionValue, valuesEqual, type ConfigLayerView, type OptionValue } from './config-layers'
import { classifyWeight, composeTooltip, type TooltipCopy } from './override-state'

function layerOf(raw: Record<string, OptionValue>, effective: Record<string, OptionValue>): ConfigLayerView {
  return {
    raw: new Map(Object.entries(raw)),
    effective: new Map(Object.entries(effective)),
    recomputeAfterRemoval() {},
  }
}

const copy: TooltipCopy = {
  defaultLine: (value) => `Default: ${value}`,
  inheritedNote: '(inherited)',
}

describe('override weight', () => {
  it('is bold when the edited level sets the key, even to the default', () => {
    const layer = layerOf({ esync: true }, { esync: true })

    expect(classifyWeight({ key: 'esync', layer, defaultValue: true })).toBe('bold')
  })

  it('is italic when a lower level supplies a value other than the default', () => {
    const layer = layerOf({}, { esync: false })

    expect(classifyWeight({ key: 'esync', layer, defaultValue: true })).toBe('italic')
  })

  it('is italic for a key missing from an unseeded store when the default is not null', () => {
    expect(classifyWeight({ key: 'dpi', layer: layerOf({}, {}), defaultValue: 96 })).toBe('italic')
  })

  it('is plain when the effective value equals the default or nothing sets it', () => {
    expect(classifyWeight({ key: 'esync', layer: layerOf({}, { esync: true }), defaultValue: true })).toBe('plain')
    expect(classifyWeight({ key: 'prefix', layer: layerOf({}, {}), defaultValue: null })).toBe('plain')
  })

  it('compares structured values by content', () => {
    const layer = layerOf({}, { env: { DXVK_HUD: '1' } })

    expect(classifyWeight({ key: 'env', layer, defaultValue: { DXVK_HUD: '1' } })).toBe('plain')
    expect(classifyWeight({ key: 'env', layer, defaultValue: { DXVK_HUD: '0' } })).toBe('italic')
  })
})

describe('option tooltip', () => {
  it('joins help, default line and inherited note with blank lines', () => {
    expect(
      composeTooltip({ help: 'Use DXVK.', defaultTooltipText: 'Enabled', inherited: true }, copy)
    ).toBe('Use DXVK.\n\nDefault: Enabled\n\n(inherited)')
  })

  it('omits the parts that are missing', () => {
    expect(composeTooltip({ help: undefined, defaultTooltipText: 'auto', inherited: false }, copy)).toBe(
      'Default: auto'
    )
    expect(composeTooltip({ help: 'Only help.', defaultTooltipText: null, inherited: false }, copy)).toBe(
      'Only help.'
    )
    expect(composeTooltip({ help: '', defaultTooltipText: null, inherited: false }, copy)).toBe('')
  })

  it('keeps an empty default text as its own line', () => {
    expect(composeTooltip({ help: undefined, defaultTooltipText: '', inherited: false }, copy)).toBe('Default: ')
  })
})

describe('option values', () => {
  it('treats a missing value as null', () => {
    expect(valuesEqual(undefined, null)).toBe(true)
    expect(valuesEqual(undefined, false)).toBe(false)
    expect(valuesEqual(0, false)).toBe(false)
  })

  it('compares lists in order and mappings regardless of key order', () => {
    expect(valuesEqual(['a', 'b'], ['a', 'b'])).toBe(true)
    expect(valuesEqual(['a', 'b'], ['b', 'a'])).toBe(false)
    expect(valuesEqual({ a: '1', b: '2' }, { b: '2', a: '1' })).toBe(true)
    expect(valuesEqual({ a: '1' }, { a: '1', b: '2' })).toBe(false)
    expect(valuesEqual(['a'], { 0: 'a' })).toBe(false)
  })

  it('formats values as display text', () => {
    expect(formatOptionValue(undefined)).toBe('')
    expect(formatOptionValue(null)).toBe('')
    expect(formatOptionValue(96)).toBe('96')
    expect(formatOptionValue(false)).toBe('false')
    expect(formatOptionValue(['a', 1])).toBe('["a",1]')
  })
})
