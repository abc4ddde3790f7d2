import { describe, expect, it, vi } from 'vitest'

import {
  createFakeWidgets,
  createRecordingLogger,
  fixedSettings,
  type FakeControl,
} from '../../../test/config-box-doubles'
import { createRunnerRegistry } from '../catalog/runner-registry'
import { createLinuxRunner, createWineRunner, runnerSystemOverrides } from '../catalog/runners'
import { createSystemOptionsSource, systemOptions } from '../catalog/system-options'
import { configBoxMessagesEnUS } from '../copy.en-US'
import type { ConfigLevel } from '../domain/config-layers'
import { InvalidRunnerError } from '../errors'
import { InMemoryLayeredConfig } from '../infrastructure/layered-config'
import { createWineVersionCache } from '../infrastructure/wine-version-cache'
import type { RunnerRegistryPort } from './ports'
import {
  createGameConfigBox,
  createRunnerConfigBox,
  createSystemConfigBox,
  resolveRunner,
  type ConfigBoxDependencies,
} from './schema-selectors'

function dependencies(level: ConfigLevel, runnerSlug: string | null = null, gameConfigId: string | null = null) {
  const { logger, entries } = createRecordingLogger()
  const deps: ConfigBoxDependencies<FakeControl> = {
    configLevel: level,
    store: new InMemoryLayeredConfig({ level, runnerSlug, gameConfigId }),
    widgets: createFakeWidgets().factory,
    settings: fixedSettings(true),
    logger,
    locale: 'en-US',
    homeDirectory: '/home/tester',
  }
  return { deps, entries }
}

function wineSetup() {
  const scan = vi.fn(() => ['wine-ge-8-26', 'wine-staging-9.4'])
  const versions = createWineVersionCache(scan)
  const wine = createWineRunner(versions)
  return { scan, versions, wine, runners: createRunnerRegistry([wine, createLinuxRunner()]) }
}

describe('game options box', () => {
  it('renders the game options of the game runner', () => {
    const { deps } = dependencies('game', 'wine', 'test-game-1')
    const { wine } = wineSetup()
    const box = createGameConfigBox({ ...deps, game: { directory: '/games/test', runner: wine } })

    expect(box.configSection).toBe('game')
    expect(box.descriptors.map((option) => option.key)).toEqual(['exe', 'args', 'working_dir', 'prefix', 'arch'])
    expect(box.render().banner).toBeNull()
  })

  it('falls back to no options when the game has no runner', () => {
    const { deps, entries } = dependencies('game')
    const box = createGameConfigBox({ ...deps, game: { directory: null, runner: null } })

    expect(box.render().placeholder).toBe('No options available')
    expect(entries).toEqual([{ level: 'warn', message: 'No runner in game supplied to the game options box' }])
  })
})

describe('runner options box', () => {
  it('renders the runner options with the game-level banner', () => {
    const { deps } = dependencies('game', 'wine', 'test-game-1')
    const { runners, versions } = wineSetup()
    const box = createRunnerConfigBox({ ...deps, runners, wineVersions: versions })

    const tree = box.render()

    expect(box.configSection).toBe('runner')
    expect(tree.banner).toBe(configBoxMessagesEnUS.config_box_runner_banner_game)
    expect(box.rowFor('version')?.descriptor.choices).toEqual([
      ['wine-ge-8-26', 'wine-ge-8-26'],
      ['wine-staging-9.4', 'wine-staging-9.4'],
    ])
  })

  it('has no banner when editing the runner itself', () => {
    const { deps } = dependencies('runner', 'wine')
    const { runners, versions } = wineSetup()

    expect(createRunnerConfigBox({ ...deps, runners, wineVersions: versions }).render().banner).toBeNull()
  })

  it('rescans the Wine versions on every render', () => {
    const { deps } = dependencies('runner', 'wine')
    const { runners, versions, scan } = wineSetup()
    const clear = vi.spyOn(versions, 'clear')
    const box = createRunnerConfigBox({ ...deps, runners, wineVersions: versions })
    expect(scan).toHaveBeenCalledTimes(1)

    box.render()
    box.render()

    expect(clear).toHaveBeenCalledTimes(2)
    expect(scan).toHaveBeenCalledTimes(3)
  })

  it('falls back to no options for an unknown runner', () => {
    const { deps, entries } = dependencies('runner', 'dosbox')
    const { runners, versions } = wineSetup()
    const box = createRunnerConfigBox({ ...deps, runners, wineVersions: versions })

    expect(box.descriptors).toEqual([])
    expect(box.render().placeholder).toBe('No options available')
    expect(entries).toEqual([{ level: 'warn', message: 'No runner options available: Invalid runner provided: dosbox' }])
  })

  it('falls back to no options without a runner', () => {
    const { deps, entries } = dependencies('runner')
    const { runners, versions } = wineSetup()
    createRunnerConfigBox({ ...deps, runners, wineVersions: versions })

    expect(entries.map((entry) => entry.message)).toEqual(['No runner options available: No runner provided'])
  })
})

describe('system options box', () => {
  const source = createSystemOptionsSource(systemOptions, runnerSystemOverrides)

  it('applies the runner overrides and the game banner in a game config', () => {
    const { deps } = dependencies('game', 'linux', 'test-game-1')
    const box = createSystemConfigBox({ ...deps, systemOptions: source })

    expect(box.descriptors.find((option) => option.key === 'disable_runtime')?.default).toBe(true)
    expect(box.render().banner).toBe(configBoxMessagesEnUS.config_box_system_banner_game)
    expect(box.rowFor('game_path')).toBeUndefined()
  })

  it('uses the runner banner in a runner config', () => {
    const { deps } = dependencies('runner', 'wine')
    const box = createSystemConfigBox({ ...deps, systemOptions: source })

    expect(box.descriptors.find((option) => option.key === 'disable_runtime')?.default).toBe(false)
    expect(box.render().banner).toBe(configBoxMessagesEnUS.config_box_system_banner_runner)
  })

  it('shows the global options with the global banner', () => {
    const { deps } = dependencies('system')
    const box = createSystemConfigBox({ ...deps, systemOptions: source })

    expect(box.descriptors).toBe(systemOptions)
    expect(box.render().banner).toBe(configBoxMessagesEnUS.config_box_system_banner_global)
    expect(box.rowFor('game_path')?.label).toBe('Default installation folder')
  })
})

describe('runner resolution', () => {
  it('turns an invalid runner into a failed result', () => {
    const { runners } = wineSetup()
    const result = resolveRunner(runners, 'dosbox')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('schema_resolution')
      expect(result.error.raw).toBeInstanceOf(InvalidRunnerError)
    }
  })

  it('lets other registry failures propagate', () => {
    const registry: RunnerRegistryPort = {
      resolve: () => {
        throw new TypeError('registry offline')
      },
    }

    expect(() => resolveRunner(registry, 'wine')).toThrow('registry offline')
  })
})
