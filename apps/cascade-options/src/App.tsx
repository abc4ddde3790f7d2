import { detectLocale } from './i18n'
import ConfigBoxPage from './features/config-box/ConfigBoxPage'
import { createRunnerRegistry } from './features/config-box/catalog/runner-registry'
import { createLinuxRunner, createWineRunner, runnerSystemOverrides } from './features/config-box/catalog/runners'
import { createSystemOptionsSource, systemOptions } from './features/config-box/catalog/system-options'
import { descriptorDefaults } from './features/config-box/domain/option-descriptor'
import { createAppSettings } from './features/config-box/infrastructure/app-settings'
import { consoleLogger } from './features/config-box/infrastructure/console-logger'
import { InMemoryLayeredConfig } from './features/config-box/infrastructure/layered-config'
import { createWineVersionCache } from './features/config-box/infrastructure/wine-version-cache'

const wineVersions = createWineVersionCache(() => ['wine-ge-8-26', 'wine-staging-9.4', 'system'])
const wine = createWineRunner(wineVersions)
const systemOptionsSource = createSystemOptionsSource(systemOptions, runnerSystemOverrides)

const store = new InMemoryLayeredConfig({
  level: 'game',
  runnerSlug: 'wine',
  gameConfigId: 'demo-game-1700000000',
  levels: {
    system: { system: { game_path: '/home/player/Games', gamemode: true } },
    runner: { runner: { dxvk: false }, system: { mangohud: true } },
    game: { game: { exe: 'drive_c/Game/game.exe' }, runner: { version: 'wine-staging-9.4' } },
  },
  defaults: {
    system: descriptorDefaults(systemOptionsSource.withRunnerOverrides(wine.slug)),
    runner: descriptorDefaults(wine.runnerOptions()),
    game: descriptorDefaults(wine.gameOptions),
  },
})

export default function App() {
  return (
    <ConfigBoxPage
      locale={detectLocale()}
      store={store}
      game={{ directory: '/home/player/Games/demo-game', runner: wine }}
      runners={createRunnerRegistry([wine, createLinuxRunner()])}
      systemOptions={systemOptionsSource}
      wineVersions={wineVersions}
      settings={createAppSettings()}
      logger={consoleLogger}
      homeDirectory="/home/player"
    />
  )
}
