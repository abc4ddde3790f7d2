/**
 * infrastructure/layered-config.ts
 *
 * In-memory adapter implementing `LayeredConfigStore`.
 *
 * Each level (system, runner, game) stores the values it sets, split by
 * section. The effective value of a section is the merge of every level from
 * `system` up to the level being edited; levels above it are ignored.
 * Descriptor defaults of each section sit beneath every level.
 *
 *   system section: system ← runner ← game
 *   runner section:          runner ← game
 *   game section:                     game
 */

import {
  CONFIG_LEVEL_DEPTH,
  type ConfigLayerView,
  type ConfigLevel,
  type ConfigSection,
  type ConfigValues,
  type LayeredConfigStore,
  type OptionValue,
} from '../domain/config-layers'

export type LevelData = Partial<Record<ConfigSection, Record<string, OptionValue>>>

export type LayeredConfigInit = {
  level: ConfigLevel
  runnerSlug?: string | null
  gameConfigId?: string | null
  levels?: Partial<Record<ConfigLevel, LevelData>>
  /** Descriptor defaults per section, see `descriptorDefaults()`. */
  defaults?: LevelData
}

const LEVELS: readonly ConfigLevel[] = ['system', 'runner', 'game']
const SECTIONS: readonly ConfigSection[] = ['system', 'runner', 'game']

export class InMemoryLayeredConfig implements LayeredConfigStore {
  readonly level: ConfigLevel
  readonly runnerSlug: string | null
  readonly gameConfigId: string | null

  private readonly stored = new Map<ConfigLevel, Map<ConfigSection, ConfigValues>>()
  private readonly merged = new Map<ConfigSection, ConfigValues>()
  private readonly defaults = new Map<ConfigSection, ConfigValues>()

  constructor(init: LayeredConfigInit) {
    this.level = init.level
    this.runnerSlug = init.runnerSlug ?? null
    this.gameConfigId = init.gameConfigId ?? null

    for (const level of LEVELS) {
      const sections = new Map<ConfigSection, ConfigValues>()
      for (const section of SECTIONS) {
        sections.set(section, new Map(Object.entries(init.levels?.[level]?.[section] ?? {})))
      }
      this.stored.set(level, sections)
    }
    for (const section of SECTIONS) {
      this.merged.set(section, new Map())
      this.defaults.set(section, new Map(Object.entries(init.defaults?.[section] ?? {})))
    }
    this.updateCascadedConfig()
  }

  layer(section: ConfigSection): ConfigLayerView {
    return {
      effective: this.effective(section),
      raw: this.raw(section),
      recomputeAfterRemoval: () => this.updateCascadedConfig(),
    }
  }

  /** Values of `section` set at the level being edited. */
  raw(section: ConfigSection, level: ConfigLevel = this.level): ConfigValues {
    const sections = this.stored.get(level)
    const values = sections?.get(section)
    if (!values) {
      throw new Error(`Unknown config section ${level}/${section}`)
    }
    return values
  }

  effective(section: ConfigSection): ConfigValues {
    const values = this.merged.get(section)
    if (!values) {
      throw new Error(`Unknown config section ${section}`)
    }
    return values
  }

  /**
   * Recomputes every effective section in place, so views handed out by
   * `layer()` stay valid.
   */
  updateCascadedConfig(): void {
    const depth = CONFIG_LEVEL_DEPTH[this.level]
    for (const section of SECTIONS) {
      const target = this.effective(section)
      target.clear()
      for (const [key, value] of this.defaults.get(section) ?? []) {
        target.set(key, value)
      }
      for (const level of LEVELS) {
        if (CONFIG_LEVEL_DEPTH[level] > depth) break
        if (CONFIG_LEVEL_DEPTH[level] < CONFIG_LEVEL_DEPTH[section]) continue
        for (const [key, value] of this.raw(section, level)) {
          target.set(key, value)
        }
      }
    }
  }
}
