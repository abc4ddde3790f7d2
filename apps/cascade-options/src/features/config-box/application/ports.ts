/**
 * application/ports.ts
 *
 * Port/contract definitions for the `config-box` application layer.
 *
 * A "port" is an interface the application layer depends on but does not
 * implement. Adapters in `infrastructure/` implement them; the page wires
 * them up, and tests hand in stubs.
 *
 * Rules:
 *   - No `solid-js` imports.
 *   - No JSX.
 *   - No UI component imports.
 */

import type { LayeredConfigStore, OptionValue } from '../domain/config-layers'
import type { OptionDescriptor, OptionMessage, ResolvedOptionDescriptor } from '../domain/option-descriptor'
import type { Control, ValidationPresenter } from '../domain/row-tree'

export type { LayeredConfigStore }

// ---------------------------------------------------------------------------
// Widget generator port
// ---------------------------------------------------------------------------

/**
 * State shared by every control built during one render pass.
 */
export type WidgetSession = {
  /** Directory file and folder pickers open in first. */
  defaultDirectory: string
  /** Invoked whenever the user changes the value of a control. */
  onChange(key: string, value: OptionValue): void
}

export type GeneratedWidget<TControl extends Control> = {
  control: TControl
  /** Value the option takes when no level sets it. */
  defaultValue: OptionValue | null
  /** Human-readable default for the tooltip, or `null` to omit the line. */
  defaultTooltipText: string | null
  /** Error messages the control itself wants shown under the row. */
  errorPresenters: ValidationPresenter[]
}

/**
 * Port: builds the control for one option type. The engine never looks
 * inside a control; it only uses the `Control` capability.
 */
export type WidgetGenerator<TControl extends Control> = {
  generateWidget(descriptor: ResolvedOptionDescriptor, value: OptionValue | null): GeneratedWidget<TControl>

  /** Shows `value` in an existing control, used when a reset changes it. */
  rebind(control: TControl, descriptor: ResolvedOptionDescriptor, value: OptionValue | null): void
}

export type WidgetGeneratorFactory<TControl extends Control> = (
  session: WidgetSession
) => WidgetGenerator<TControl>

/**
 * Port: builds the presenters for the `warning` and `error` fields of a
 * descriptor.
 */
export type ValidationPresenterFactory = {
  createWarning(message: OptionMessage, key: string): ValidationPresenter
  createError(message: OptionMessage, key: string): ValidationPresenter
}

// ---------------------------------------------------------------------------
// Schema source ports
// ---------------------------------------------------------------------------

export type RunnerDefinition = {
  slug: string
  /** Options stored in the `game` section of a game config. */
  gameOptions: readonly OptionDescriptor[]
  /** Options stored in the `runner` section. Recomputed on each call. */
  runnerOptions(): readonly OptionDescriptor[]
  /** Directory a game of this runner runs from, if known. */
  workingDirectory: string | null
}

/**
 * Port: looks runners up by slug.
 *
 * `resolve` throws `InvalidRunnerError` for an unknown or missing slug.
 */
export type RunnerRegistryPort = {
  resolve(slug: string | null): RunnerDefinition
}

/**
 * Port: the global system option list.
 */
export type SystemOptionsPort = {
  list(): readonly OptionDescriptor[]
  /** System options with a runner's own overrides applied. */
  withRunnerOverrides(runnerSlug: string): readonly OptionDescriptor[]
}

/**
 * Port: cache of detected Wine/Proton builds. The versions live in
 * directories outside the application's control, so the runner box clears
 * it before each render.
 */
export type WineVersionCachePort = {
  clear(): void
}

/**
 * The game being configured, when the box belongs to a game config.
 */
export type GameContext = {
  directory: string | null
  runner: RunnerDefinition | null
}

// ---------------------------------------------------------------------------
// Ambient ports
// ---------------------------------------------------------------------------

/**
 * Port: logger. The default adapter writes to the console; tests record the
 * entries.
 */
export type LoggerPort = {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string, error?: unknown): void
}

/**
 * Port: local key-value storage adapter.
 *
 * The default infrastructure adapter wraps `localStorage`; tests can use an
 * in-memory map.
 */
export type LocalStoragePort = {
  getItem(key: string): string | null
  setItem(key: string, value: string): void
}

/**
 * Port: application-wide preferences read by the config box.
 */
export type AppSettingsPort = {
  showAdvancedOptions(): boolean
}
