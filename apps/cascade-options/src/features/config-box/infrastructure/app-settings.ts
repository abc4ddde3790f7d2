/**
 * infrastructure/app-settings.ts
 *
 * Adapters implementing `LocalStoragePort` over `window.localStorage`, and
 * `AppSettingsPort` on top of any `LocalStoragePort`.
 *
 * Settings are stored as strings; booleans use the `"True"` / `"False"`
 * spelling of the settings file they mirror.
 */

import type { AppSettingsPort, LocalStoragePort } from '../application/ports'

export const SHOW_ADVANCED_OPTIONS_KEY = 'show_advanced_options'

export const browserLocalStorage: LocalStoragePort = {
  getItem(key) {
    if (typeof window === 'undefined') return null
    return window.localStorage.getItem(key)
  },
  setItem(key, value) {
    if (typeof window === 'undefined') return
    window.localStorage.setItem(key, value)
  },
}

export function createAppSettings(storage: LocalStoragePort = browserLocalStorage): AppSettingsPort & {
  setShowAdvancedOptions(visible: boolean): void
} {
  return {
    showAdvancedOptions: () => storage.getItem(SHOW_ADVANCED_OPTIONS_KEY) === 'True',
    setShowAdvancedOptions: (visible) =>
      storage.setItem(SHOW_ADVANCED_OPTIONS_KEY, visible ? 'True' : 'False'),
  }
}
