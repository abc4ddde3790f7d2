import { createSignal } from 'solid-js'

import { FilterInput } from '../../components/ui/filter-input'
import { SectionTabs, type SectionTab } from '../../components/ui/section-tabs'
import { ToggleSwitch } from '../../components/ui/toggle-switch'
import type { Locale } from '../../i18n'
import type { ConfigBox } from './application/config-box'
import type {
  AppSettingsPort,
  GameContext,
  LayeredConfigStore,
  LoggerPort,
  RunnerRegistryPort,
  SystemOptionsPort,
  WineVersionCachePort,
} from './application/ports'
import {
  createGameConfigBox,
  createRunnerConfigBox,
  createSystemConfigBox,
} from './application/schema-selectors'
import { ConfigBoxView } from './ConfigBoxView'
import { configBoxTranslate, type ConfigBoxCopyKey } from './copy'
import type { ConfigSection } from './domain/config-layers'
import { createDomWidgetGenerator, type DomControl } from './infrastructure/dom-widget-generator'

export type ConfigBoxPageProps = {
  locale: Locale
  store: LayeredConfigStore
  game: GameContext | null
  runners: RunnerRegistryPort
  systemOptions: SystemOptionsPort
  wineVersions: WineVersionCachePort
  settings: AppSettingsPort & { setShowAdvancedOptions(visible: boolean): void }
  logger: LoggerPort
  homeDirectory: string
  pathExists?: (path: string) => boolean
}

type BoxTab = {
  section: ConfigSection
  title: ConfigBoxCopyKey
  box: ConfigBox<DomControl>
}

/**
 * One tab per config section, plus the filter field and the advanced
 * switch, which apply to every tab at once.
 */
export default function ConfigBoxPage(props: ConfigBoxPageProps) {
  const shared = {
    configLevel: props.store.level,
    store: props.store,
    widgets: createDomWidgetGenerator({ locale: props.locale, pathExists: props.pathExists }),
    settings: props.settings,
    logger: props.logger,
    locale: props.locale,
    homeDirectory: props.homeDirectory,
  }

  const tabs: BoxTab[] = []
  if (props.game) {
    tabs.push({
      section: 'game',
      title: 'config_box_tab_game',
      box: createGameConfigBox({ ...shared, game: props.game }),
    })
  }
  if (props.store.level !== 'system') {
    tabs.push({
      section: 'runner',
      title: 'config_box_tab_runner',
      box: createRunnerConfigBox({
        ...shared,
        game: props.game,
        runners: props.runners,
        wineVersions: props.wineVersions,
      }),
    })
  }
  tabs.push({
    section: 'system',
    title: 'config_box_tab_system',
    box: createSystemConfigBox({ ...shared, systemOptions: props.systemOptions }),
  })

  const [advanced, setAdvanced] = createSignal(props.settings.showAdvancedOptions())
  const [filter, setFilter] = createSignal('')

  const onAdvancedChange = (visible: boolean) => {
    setAdvanced(visible)
    props.settings.setShowAdvancedOptions(visible)
    tabs.forEach((tab) => tab.box.setAdvancedVisible(visible))
  }

  const onFilterInput = (text: string) => {
    setFilter(text)
    tabs.forEach((tab) => tab.box.setFilterText(text))
  }

  const t = (key: ConfigBoxCopyKey) => configBoxTranslate(props.locale, key)

  const sectionTabs: SectionTab[] = tabs.map((tab) => ({
    value: tab.section,
    label: t(tab.title),
    content: () => <ConfigBoxView box={tab.box} locale={props.locale} />,
  }))

  return (
    <div class="flex flex-col gap-4 p-4">
      <div class="flex items-center gap-4">
        <FilterInput value={filter()} placeholder={t('config_box_filter_placeholder')} onFilter={onFilterInput} />
        <ToggleSwitch checked={advanced()} onChange={onAdvancedChange} label={t('config_box_show_advanced')} />
      </div>

      <SectionTabs tabs={sectionTabs} />
    </div>
  )
}
