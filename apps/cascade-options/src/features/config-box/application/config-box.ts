/**
 * application/config-box.ts
 *
 * Renders a list of option descriptors against one section of a layered
 * config into a row tree, and keeps the tree's override styling, reset
 * affordances, visibility and validation messages in step with the store
 * while the user edits and resets options.
 *
 * Rules:
 *   - No `solid-js` imports. The view subscribes to changes instead.
 *   - Every handler runs synchronously and runs to completion.
 */

import type { Locale } from '../../../i18n'
import { configBoxFormat, configBoxTranslate } from '../copy'
import {
  valuesEqual,
  type ConfigLayerView,
  type ConfigLevel,
  type ConfigSection,
  type OptionValue,
} from '../domain/config-layers'
import {
  appliesToLevel,
  resolveDescriptor,
  type OptionDescriptor,
  type ResolvedOptionDescriptor,
} from '../domain/option-descriptor'
import { classifyWeight, composeTooltip, type TooltipCopy } from '../domain/override-state'
import {
  findRow,
  type Control,
  type OptionRow,
  type RowNode,
  type RowTree,
  type SectionGroup,
  type ValidationPresenter,
} from '../domain/row-tree'
import { applyVisibility, showAll, type VisibilityState } from '../domain/visibility'
import { describeConfigBoxError, normalizeConfigBoxError } from '../errors'
import { resolveDefaultDirectory } from './default-directory'
import type {
  AppSettingsPort,
  GameContext,
  LayeredConfigStore,
  LoggerPort,
  ValidationPresenterFactory,
  WidgetGenerator,
  WidgetGeneratorFactory,
} from './ports'
import {
  messagePresenterFactory,
  reevaluatePresenter,
  ValidationRegistry,
  type PresenterFailureHandler,
} from './validation-hook'

export type ConfigBoxOptions<TControl extends Control> = {
  /** Section of the store this box edits. */
  configSection: ConfigSection
  /** Level of the config being edited, matched against descriptor scopes. */
  configLevel: ConfigLevel
  store: LayeredConfigStore
  descriptors: readonly OptionDescriptor[]
  widgets: WidgetGeneratorFactory<TControl>
  presenters?: ValidationPresenterFactory
  settings: AppSettingsPort
  logger: LoggerPort
  locale: Locale
  homeDirectory: string
  game?: GameContext | null
  /** Explanation shown above the options. */
  banner?: string | null
  /** Runs at the start of every render pass. */
  beforeRender?: () => void
}

export type ConfigBoxListener = () => void

export class ConfigBox<TControl extends Control = Control> {
  private currentTree: RowTree<TControl> | null = null
  private readonly validation = new ValidationRegistry()
  private readonly listeners = new Set<ConfigBoxListener>()
  /** `null` until the first render reads the application setting. */
  private advanced: boolean | null = null
  private filter = ''

  constructor(private readonly options: ConfigBoxOptions<TControl>) {}

  get tree(): RowTree<TControl> | null {
    return this.currentTree
  }

  get configSection(): ConfigSection {
    return this.options.configSection
  }

  get descriptors(): readonly OptionDescriptor[] {
    return this.options.descriptors
  }

  get advancedVisible(): boolean {
    return this.advanced ?? false
  }

  get filterText(): string {
    return this.filter
  }

  subscribe(listener: ConfigBoxListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  rowFor(key: string): OptionRow<TControl> | undefined {
    return findRow(this.currentTree, key)
  }

  /**
   * Builds a new row tree from scratch. A descriptor whose row fails to build
   * is logged and left out; the pass carries on with the next one.
   */
  render(): RowTree<TControl> {
    this.options.beforeRender?.()
    this.validation.clear()
    const banner = this.options.banner ?? null

    if (this.options.descriptors.length === 0) {
      this.currentTree = {
        banner,
        placeholder: configBoxTranslate(this.options.locale, 'config_box_no_options'),
        nodes: [],
      }
      this.notify()
      return this.currentTree
    }

    const layer = this.layer()
    const generator = this.createWidgetGenerator()
    const nodes: RowNode<TControl>[] = []
    let currentSection: string | null = null
    let currentGroup: SectionGroup<TControl> | null = null

    for (const descriptor of this.options.descriptors) {
      try {
        if (!appliesToLevel(descriptor, this.options.configLevel)) continue

        const option = resolveDescriptor(descriptor)
        if (!option.visible) continue

        const section = option.section || null
        if (section !== currentSection) {
          currentSection = section
          if (section) {
            currentGroup = { kind: 'section', title: section, rows: [], visible: true }
            nodes.push(currentGroup)
          } else {
            currentGroup = null
          }
        }

        const row = this.buildRow(option, layer, generator)
        row.presenters.forEach((presenter) => this.validation.register(presenter))
        if (currentGroup) {
          currentGroup.rows.push(row)
        } else {
          nodes.push(row)
        }
      } catch (error) {
        const failure = normalizeConfigBoxError(error, 'row_render', descriptor.key)
        this.options.logger.error(describeConfigBoxError(failure), error)
      }
    }

    this.currentTree = { banner, placeholder: null, nodes }
    showAll(nodes)
    if (this.advanced === null) {
      this.advanced = this.options.settings.showAdvancedOptions()
    }
    applyVisibility(nodes, this.visibilityState())
    this.notify()
    return this.currentTree
  }

  setAdvancedVisible(visible: boolean): void {
    this.advanced = visible
    this.updateVisibility()
  }

  setFilterText(text: string): void {
    this.filter = text
    this.updateVisibility()
  }

  refreshValidation(): void {
    this.validation.reevaluateAll(this.options.store, this.onPresenterFailure)
    this.notify()
  }

  /**
   * The user changed `key`: it is now set at this level.
   */
  onEdit(key: string, value: OptionValue): void {
    const layer = this.layer()
    layer.raw.set(key, value)
    layer.effective.set(key, value)

    const row = this.rowFor(key)
    if (row) {
      row.resetVisible = true
      this.restyleRow(row, layer)
    }

    this.validation.reevaluateAll(this.options.store, this.onPresenterFailure)
    this.notify()
  }

  /**
   * Drops `key` from this level and lets the lower levels supply it again.
   * Only this row's control is updated, and only if the value changed.
   */
  onReset(key: string): void {
    const layer = this.layer()
    const currentValue = layer.effective.get(key)
    const row = this.rowFor(key)
    if (row) row.resetVisible = false

    layer.raw.delete(key)
    layer.recomputeAfterRemoval(key)
    if (row) this.restyleRow(row, layer)

    const resetValue = layer.effective.get(key)
    if (valuesEqual(currentValue, resetValue)) {
      this.notify()
      return
    }

    if (row) {
      this.createWidgetGenerator().rebind(row.control, row.descriptor, resetValue ?? null)
    }
    this.validation.reevaluateAll(this.options.store, this.onPresenterFailure)
    this.notify()
  }

  private buildRow(
    option: ResolvedOptionDescriptor,
    layer: ConfigLayerView,
    generator: WidgetGenerator<TControl>
  ): OptionRow<TControl> {
    const key = option.key
    const value = layer.effective.get(key) ?? null
    const widget = generator.generateWidget(option, value)

    const weight = classifyWeight({ key, layer, defaultValue: widget.defaultValue })
    const tooltip = composeTooltip(
      {
        help: option.help,
        defaultTooltipText: widget.defaultTooltipText,
        inherited: weight === 'italic',
      },
      this.tooltipCopy()
    )

    const enabled = option.condition === undefined || option.condition
    if (!enabled) widget.control.setEnabled(false)

    const factory = this.options.presenters ?? messagePresenterFactory
    const presenters: ValidationPresenter[] = []
    if (option.warning !== undefined) presenters.push(factory.createWarning(option.warning, key))
    if (option.error !== undefined) presenters.push(factory.createError(option.error, key))
    presenters.push(...widget.errorPresenters)
    for (const presenter of presenters) {
      reevaluatePresenter(presenter, this.options.store, this.onPresenterFailure)
    }

    return {
      kind: 'row',
      key,
      label: option.label,
      helptext: option.help ?? '',
      advanced: Boolean(option.advanced),
      descriptor: option,
      control: widget.control,
      defaultValue: widget.defaultValue,
      defaultTooltipText: widget.defaultTooltipText,
      presenters,
      weight,
      tooltip,
      enabled,
      resetVisible: layer.raw.has(key),
      visible: true,
    }
  }

  /** A message that fails to evaluate is logged; its row stays. */
  private readonly onPresenterFailure: PresenterFailureHandler = (presenter, error) => {
    const failure = normalizeConfigBoxError(error, 'validation', presenter.key)
    this.options.logger.error(describeConfigBoxError(failure), error)
  }

  private restyleRow(row: OptionRow<TControl>, layer: ConfigLayerView): void {
    row.weight = classifyWeight({ key: row.key, layer, defaultValue: row.defaultValue })
    row.tooltip = composeTooltip(
      {
        help: row.descriptor.help,
        defaultTooltipText: row.defaultTooltipText,
        inherited: row.weight === 'italic',
      },
      this.tooltipCopy()
    )
  }

  private createWidgetGenerator(): WidgetGenerator<TControl> {
    return this.options.widgets({
      defaultDirectory: resolveDefaultDirectory({
        game: this.options.game ?? null,
        store: this.options.store,
        homeDirectory: this.options.homeDirectory,
      }),
      onChange: (key, value) => this.onEdit(key, value),
    })
  }

  private layer(): ConfigLayerView {
    return this.options.store.layer(this.options.configSection)
  }

  private tooltipCopy(): TooltipCopy {
    const locale = this.options.locale
    return {
      defaultLine: (value) => configBoxFormat(locale, 'config_box_default_value', { value }),
      inheritedNote: configBoxTranslate(locale, 'config_box_inherited_note'),
    }
  }

  private visibilityState(): VisibilityState {
    return { advancedVisible: this.advancedVisible, filterText: this.filter }
  }

  private updateVisibility(): void {
    if (this.currentTree) {
      applyVisibility(this.currentTree.nodes, this.visibilityState())
    }
    this.notify()
  }

  private notify(): void {
    this.listeners.forEach((listener) => listener())
  }
}
