/**
 * catalog/system-options.ts
 *
 * Options of the `system` section, shared by every runner, and the source
 * that applies a runner's overrides on top of them.
 */

import type { SystemOptionsPort } from '../application/ports'
import type { OptionDescriptor } from '../domain/option-descriptor'

export const systemOptions: readonly OptionDescriptor[] = [
  {
    key: 'game_path',
    type: 'directory_chooser',
    label: 'Default installation folder',
    section: 'Paths',
    scope: ['system'],
    help: 'The default folder where you install your games.',
  },
  {
    key: 'disable_runtime',
    type: 'bool',
    label: 'Disable Steam runtime',
    section: 'Runtime',
    default: false,
    advanced: true,
    help: 'Run the game without the bundled runtime libraries.',
  },
  {
    key: 'prefer_system_libs',
    type: 'bool',
    label: 'Prefer system libraries',
    section: 'Runtime',
    default: true,
    advanced: true,
    help: 'When the runtime is enabled, prioritize the system libraries over the provided ones.',
  },
  {
    key: 'gamemode',
    type: 'bool',
    label: 'Enable Feral GameMode',
    section: 'Performance',
    default: true,
    help: 'Request a set of optimisations be temporarily applied to the host OS.',
  },
  {
    key: 'mangohud',
    type: 'bool',
    label: 'FPS counter (MangoHud)',
    section: 'Performance',
    default: false,
    help: 'Display the game frame rate and hardware usage in an overlay.',
  },
  {
    key: 'gamescope',
    type: 'bool',
    label: 'Enable Gamescope',
    section: 'Gamescope',
    default: false,
    help: 'Run the game inside the Gamescope micro-compositor.',
  },
  {
    key: 'gamescope_output_res',
    type: 'choice_with_entry',
    label: 'Output resolution',
    section: 'Gamescope',
    advanced: true,
    choices: [['Custom', ''], ['1280x720', '1280x720'], ['1920x1080', '1920x1080'], ['2560x1440', '2560x1440']],
    help: 'Set the resolution used by Gamescope. Leave empty to use the native resolution.',
  },
  {
    key: 'env',
    type: 'mapping',
    label: 'Environment variables',
    section: 'Launch',
    help: 'Environment variables loaded at run time.',
  },
  {
    key: 'prefix_command',
    type: 'string',
    label: 'Command prefix',
    section: 'Launch',
    advanced: true,
    help: 'Command line instructions to add in front of the game execution command.',
  },
  {
    key: 'manual_command',
    type: 'file',
    label: 'Manual script',
    section: 'Launch',
    advanced: true,
    help: 'Script to execute from the game context menu.',
  },
  {
    key: 'log_level',
    type: 'choice',
    label: 'Output debugging info',
    section: 'Debugging',
    advanced: true,
    default: 'auto',
    choices: [['Enabled', 'on'], ['Disabled', 'off'], ['Automatic', 'auto']],
    help: 'Output debugging information in the game log.',
  },
]

/**
 * Per-runner tweaks of system options, keyed by runner slug then option key.
 * An override can change any field but the key.
 */
export type SystemOptionOverrides = Readonly<
  Record<string, Readonly<Record<string, Partial<Omit<OptionDescriptor, 'key'>>>>>
>

export function createSystemOptionsSource(
  options: readonly OptionDescriptor[],
  overrides: SystemOptionOverrides = {}
): SystemOptionsPort {
  return {
    list: () => options,
    withRunnerOverrides(runnerSlug) {
      const runnerOverrides = overrides[runnerSlug]
      if (!runnerOverrides) return options
      return options.map((option) => {
        const override = runnerOverrides[option.key]
        return override ? { ...option, ...override, key: option.key } : option
      })
    },
  }
}
