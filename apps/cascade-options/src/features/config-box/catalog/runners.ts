/**
 * catalog/runners.ts
 *
 * Option schemas of the runners the demo page knows about.
 */

import type { RunnerDefinition } from '../application/ports'
import type { LayeredConfigStore } from '../domain/config-layers'
import type { OptionChoice, OptionDescriptor } from '../domain/option-descriptor'
import type { WineVersionCache } from '../infrastructure/wine-version-cache'
import type { SystemOptionOverrides } from './system-options'

const commonGameOptions: readonly OptionDescriptor[] = [
  {
    key: 'exe',
    type: 'file',
    label: 'Executable',
    help: 'The game executable.',
  },
  {
    key: 'args',
    type: 'string',
    label: 'Arguments',
    help: 'Command line arguments used when launching the game.',
  },
  {
    key: 'working_dir',
    type: 'directory_chooser',
    label: 'Working directory',
    advanced: true,
    help: 'The location where the game is run from. By default, it is the directory of the executable.',
  },
]

function fsyncWarning(config: LayeredConfigStore): string | null {
  const runner = config.layer('runner').effective
  if (runner.get('fsync') === true && runner.get('esync') === false) {
    return 'Fsync without Esync falls back to plain wineserver synchronization on older kernels.'
  }
  return null
}

export function createWineRunner(versions: WineVersionCache): RunnerDefinition {
  const versionChoices = (): readonly OptionChoice[] =>
    versions.list().map((version): OptionChoice => [version, version])

  return {
    slug: 'wine',
    workingDirectory: null,
    gameOptions: [
      ...commonGameOptions,
      {
        key: 'prefix',
        type: 'directory_chooser',
        label: 'Wine prefix',
        help: 'The prefix used by Wine. It is a directory containing a set of files and folders making up a confined Windows environment.',
      },
      {
        key: 'arch',
        type: 'choice',
        label: 'Prefix architecture',
        advanced: true,
        default: 'auto',
        choices: [['Auto', 'auto'], ['32-bit', 'win32'], ['64-bit', 'win64']],
        help: 'The architecture of the Windows environment.',
      },
    ],
    runnerOptions: () => [
      {
        key: 'version',
        type: 'choice',
        label: 'Wine version',
        section: 'Runner',
        choices: versionChoices,
        default: versions.list()[0] ?? null,
        help: 'The version of Wine used to launch the game.',
      },
      {
        key: 'dxvk',
        type: 'bool',
        label: 'Enable DXVK',
        section: 'Graphics',
        default: true,
        help: 'Use DXVK to increase compatibility and performance in Direct3D 11, 10 and 9 applications by translating their calls to Vulkan.',
      },
      {
        key: 'dxvk_version',
        type: 'choice_with_search',
        label: 'DXVK version',
        section: 'Graphics',
        advanced: true,
        choices: () => [['v2.3', 'v2.3'], ['v2.4', 'v2.4']],
        help: 'Version of DXVK installed in the prefix.',
      },
      {
        key: 'esync',
        type: 'bool',
        label: 'Enable Esync',
        section: 'Synchronization',
        default: true,
        help: 'Enable eventfd-based synchronization (esync).',
      },
      {
        key: 'fsync',
        type: 'bool',
        label: 'Enable Fsync',
        section: 'Synchronization',
        default: true,
        warning: fsyncWarning,
        help: 'Enable futex-based synchronization (fsync).',
      },
      {
        key: 'dpi',
        type: 'range',
        label: 'Screen DPI',
        section: 'Display',
        advanced: true,
        min: 96,
        max: 480,
        step: 1,
        default: 96,
        help: 'DPI reported to Windows applications.',
      },
      {
        key: 'overrides',
        type: 'mapping',
        label: 'DLL overrides',
        section: 'Overrides',
        advanced: true,
        help: 'Sets WINEDLLOVERRIDES when launching the game.',
      },
    ],
  }
}

export function createLinuxRunner(): RunnerDefinition {
  return {
    slug: 'linux',
    workingDirectory: null,
    gameOptions: commonGameOptions,
    runnerOptions: () => [],
  }
}

export const runnerSystemOverrides: SystemOptionOverrides = {
  linux: {
    disable_runtime: { default: true },
  },
}
