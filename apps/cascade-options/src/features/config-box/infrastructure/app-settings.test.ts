import { describe, expect, it } from 'vitest'

import type { LocalStoragePort } from '../application/ports'
import { browserLocalStorage, createAppSettings, SHOW_ADVANCED_OPTIONS_KEY } from './app-settings'

function memoryStorage(initial: Record<string, string> = {}): LocalStoragePort & { data: Map<string, string> } {
  const data = new Map(Object.entries(initial))
  return {
    data,
    getItem: (key) => data.get(key) ?? null,
    setItem: (key, value) => {
      data.set(key, value)
    },
  }
}

describe('application settings', () => {
  it('shows advanced options only when the setting is "True"', () => {
    expect(createAppSettings(memoryStorage({ [SHOW_ADVANCED_OPTIONS_KEY]: 'True' })).showAdvancedOptions()).toBe(true)
    expect(createAppSettings(memoryStorage({ [SHOW_ADVANCED_OPTIONS_KEY]: 'true' })).showAdvancedOptions()).toBe(false)
    expect(createAppSettings(memoryStorage()).showAdvancedOptions()).toBe(false)
  })

  it('writes the setting back with the same spelling', () => {
    const storage = memoryStorage()
    const settings = createAppSettings(storage)

    settings.setShowAdvancedOptions(true)
    expect(storage.data.get(SHOW_ADVANCED_OPTIONS_KEY)).toBe('True')
    expect(settings.showAdvancedOptions()).toBe(true)

    settings.setShowAdvancedOptions(false)
    expect(storage.data.get(SHOW_ADVANCED_OPTIONS_KEY)).toBe('False')
  })

  it('uses window.localStorage by default', () => {
    window.localStorage.setItem(SHOW_ADVANCED_OPTIONS_KEY, 'True')

    const settings = createAppSettings()
    expect(settings.showAdvancedOptions()).toBe(true)

    settings.setShowAdvancedOptions(false)
    expect(window.localStorage.getItem(SHOW_ADVANCED_OPTIONS_KEY)).toBe('False')
    expect(browserLocalStorage.getItem(SHOW_ADVANCED_OPTIONS_KEY)).toBe('False')
  })
})
