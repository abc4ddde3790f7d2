export const configBoxMessagesEnUS = {
  config_box_no_options: 'No options available',
  config_box_default_value: 'Default: {value}',
  config_box_inherited_note:
    '(Italic indicates that this option is modified in a lower configuration level.)',
  config_box_reset_tooltip: 'Reset option to global or default config',
  config_box_enabled: 'Enabled',
  config_box_disabled: 'Disabled',
  config_box_path_missing: 'The path "{path}" does not exist.',
  config_box_runner_banner_game:
    'If modified, these options supersede the same options from the base runner configuration.',
  config_box_system_banner_game:
    'If modified, these options supersede the same options from the base runner configuration, which themselves supersede the global preferences.',
  config_box_system_banner_runner:
    'If modified, these options supersede the same options from the global preferences.',
  config_box_system_banner_global:
    'These options apply to every game unless a runner or game configuration overrides them.',
  config_box_filter_placeholder: 'Filter options',
  config_box_show_advanced: 'Show advanced options',
  config_box_tab_game: 'Game options',
  config_box_tab_runner: 'Runner options',
  config_box_tab_system: 'System options',
  config_box_search_choices: 'Search…',
} as const
