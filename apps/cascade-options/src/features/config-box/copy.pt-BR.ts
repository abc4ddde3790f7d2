import type { configBoxMessagesEnUS } from './copy.en-US'

export const configBoxMessagesPtBR: Record<keyof typeof configBoxMessagesEnUS, string> = {
  config_box_no_options: 'Nenhuma opção disponível',
  config_box_default_value: 'Padrão: {value}',
  config_box_inherited_note:
    '(Itálico indica que esta opção foi modificada em um nível de configuração inferior.)',
  config_box_reset_tooltip: 'Restaurar a opção para a configuração global ou padrão',
  config_box_enabled: 'Ativado',
  config_box_disabled: 'Desativado',
  config_box_path_missing: 'O caminho "{path}" não existe.',
  config_box_runner_banner_game:
    'Se modificadas, estas opções substituem as mesmas opções da configuração base do runner.',
  config_box_system_banner_game:
    'Se modificadas, estas opções substituem as mesmas opções da configuração base do runner, que por sua vez substituem as preferências globais.',
  config_box_system_banner_runner:
    'Se modificadas, estas opções substituem as mesmas opções das preferências globais.',
  config_box_system_banner_global:
    'Estas opções valem para todos os jogos, a menos que uma configuração de runner ou de jogo as substitua.',
  config_box_filter_placeholder: 'Filtrar opções',
  config_box_show_advanced: 'Mostrar opções avançadas',
  config_box_tab_game: 'Opções do jogo',
  config_box_tab_runner: 'Opções do runner',
  config_box_tab_system: 'Opções do sistema',
  config_box_search_choices: 'Buscar…',
}
