/**
 * application/schema-selectors.ts
 *
 * The three kinds of config box. They differ only in which descriptor list
 * they render, which section of the store they edit, and the banner shown
 * above the options.
 */

import { configBoxTranslate } from '../copy'
import type { OptionDescriptor } from '../domain/option-descriptor'
import type { Control } from '../domain/row-tree'
import {
  err,
  InvalidRunnerError,
  normalizeConfigBoxError,
  ok,
  type ConfigBoxResult,
} from '../errors'
import { ConfigBox, type ConfigBoxOptions } from './config-box'
import type {
  GameContext,
  RunnerDefinition,
  RunnerRegistryPort,
  SystemOptionsPort,
  WineVersionCachePort,
} from './ports'

/** What every selector needs; the selector fills in the rest. */
export type ConfigBoxDependencies<TControl extends Control> = Omit<
  ConfigBoxOptions<TControl>,
  'configSection' | 'descriptors' | 'banner' | 'beforeRender' | 'game'
>

export function createGameConfigBox<TControl extends Control>(
  deps: ConfigBoxDependencies<TControl> & { game: GameContext }
): ConfigBox<TControl> {
  const runner = deps.game.runner
  if (!runner) {
    deps.logger.warn('No runner in game supplied to the game options box')
  }

  return new ConfigBox({
    ...deps,
    configSection: 'game',
    descriptors: runner ? runner.gameOptions : [],
  })
}

/**
 * Runner options of the configured runner. Before each render the Wine
 * version cache is cleared: the versions are scanned from directories that
 * may have changed since the box was last built.
 */
export function createRunnerConfigBox<TControl extends Control>(
  deps: ConfigBoxDependencies<TControl> & {
    runners: RunnerRegistryPort
    wineVersions: WineVersionCachePort
    game?: GameContext | null
  }
): ConfigBox<TControl> {
  const runner = resolveRunner(deps.runners, deps.store.runnerSlug)
  let descriptors: readonly OptionDescriptor[] = []
  if (runner.ok) {
    descriptors = runner.value.runnerOptions()
  } else {
    deps.logger.warn(`No runner options available: ${runner.error.message}`)
  }

  const banner =
    deps.store.level === 'game'
      ? configBoxTranslate(deps.locale, 'config_box_runner_banner_game')
      : null

  return new ConfigBox({
    ...deps,
    configSection: 'runner',
    descriptors,
    banner,
    beforeRender: () => deps.wineVersions.clear(),
  })
}

export function createSystemConfigBox<TControl extends Control>(
  deps: ConfigBoxDependencies<TControl> & { systemOptions: SystemOptionsPort }
): ConfigBox<TControl> {
  const { runnerSlug, gameConfigId } = deps.store
  const descriptors = runnerSlug
    ? deps.systemOptions.withRunnerOverrides(runnerSlug)
    : deps.systemOptions.list()

  let banner: string
  if (gameConfigId && runnerSlug) {
    banner = configBoxTranslate(deps.locale, 'config_box_system_banner_game')
  } else if (runnerSlug) {
    banner = configBoxTranslate(deps.locale, 'config_box_system_banner_runner')
  } else {
    banner = configBoxTranslate(deps.locale, 'config_box_system_banner_global')
  }

  return new ConfigBox({
    ...deps,
    configSection: 'system',
    descriptors,
    banner,
  })
}

/**
 * Only `InvalidRunnerError` is turned into a failed result; anything else a
 * registry throws is a bug and propagates.
 */
export function resolveRunner(
  registry: RunnerRegistryPort,
  slug: string | null
): ConfigBoxResult<RunnerDefinition> {
  try {
    return ok(registry.resolve(slug))
  } catch (error) {
    if (error instanceof InvalidRunnerError) {
      return err(normalizeConfigBoxError(error, 'schema_resolution'))
    }
    throw error
  }
}
