/**
 * infrastructure/dom-widget-generator.ts
 *
 * Adapter implementing `WidgetGenerator` with plain DOM form controls. The
 * Solid view mounts `DomControl.element` as-is.
 *
 * Supported option types: label, string, bool, range, choice,
 * choice_with_entry, choice_with_search, file, directory_chooser, multiple
 * (one value per line) and mapping (`key=value` per line).
 */

import type { Locale } from '../../../i18n'
import type { GeneratedWidget, WidgetGenerator, WidgetGeneratorFactory, WidgetSession } from '../application/ports'
import { MessagePresenter } from '../application/validation-hook'
import { configBoxFormat, configBoxTranslate } from '../copy'
import {
  formatOptionValue,
  isValueList,
  type OptionValue,
} from '../domain/config-layers'
import {
  choiceLabel,
  choiceValue,
  resolveValue,
  type OptionChoice,
  type ResolvedOptionDescriptor,
} from '../domain/option-descriptor'
import type { Control, ValidationPresenter } from '../domain/row-tree'

type FormField = HTMLInputElement | HTMLSelectElement | HTMLTextAreaElement

export class DomControl implements Control {
  private onChange: ((value: OptionValue) => void) | null = null
  private currentValue: OptionValue | null = null

  constructor(
    readonly element: HTMLElement,
    private readonly fields: readonly FormField[],
    private readonly write: (value: OptionValue | null) => void
  ) {}

  get value(): OptionValue | null {
    return this.currentValue
  }

  get enabled(): boolean {
    return this.element.getAttribute('aria-disabled') !== 'true'
  }

  setVisible(visible: boolean): void {
    this.element.hidden = !visible
  }

  setEnabled(enabled: boolean): void {
    this.fields.forEach((field) => {
      field.disabled = !enabled
    })
    this.element.setAttribute('aria-disabled', String(!enabled))
  }

  bind(value: OptionValue | null, onChange: (value: OptionValue) => void): void {
    this.currentValue = value
    this.write(value)
    this.onChange = onChange
  }

  /** Called by the DOM listeners with the value the user entered. */
  emit(value: OptionValue): void {
    this.currentValue = value
    this.onChange?.(value)
  }
}

export type DomWidgetGeneratorOptions = {
  locale: Locale
  /** Checks file and directory options; without it paths are not checked. */
  pathExists?: (path: string) => boolean
  document?: Document
}

export function createDomWidgetGenerator(
  options: DomWidgetGeneratorOptions
): WidgetGeneratorFactory<DomControl> {
  return (session) => new DomWidgetGenerator(session, options)
}

class DomWidgetGenerator implements WidgetGenerator<DomControl> {
  private readonly doc: Document

  constructor(
    private readonly session: WidgetSession,
    private readonly options: DomWidgetGeneratorOptions
  ) {
    this.doc = options.document ?? document
  }

  generateWidget(
    descriptor: ResolvedOptionDescriptor,
    value: OptionValue | null
  ): GeneratedWidget<DomControl> {
    const defaultValue = descriptor.default ?? null
    const errorPresenters: ValidationPresenter[] = []
    const control = this.build(descriptor, errorPresenters)
    this.rebind(control, descriptor, value)

    return {
      control,
      defaultValue,
      defaultTooltipText: this.defaultTooltip(descriptor, defaultValue),
      errorPresenters,
    }
  }

  rebind(control: DomControl, descriptor: ResolvedOptionDescriptor, value: OptionValue | null): void {
    control.bind(value ?? descriptor.default ?? null, (next) =>
      this.session.onChange(descriptor.key, next)
    )
  }

  private build(descriptor: ResolvedOptionDescriptor, errors: ValidationPresenter[]): DomControl {
    switch (descriptor.type) {
      case 'label':
        return this.buildLabel(descriptor)
      case 'string':
        return this.buildText(descriptor)
      case 'bool':
        return this.buildCheckbox(descriptor)
      case 'range':
        return this.buildRange(descriptor)
      case 'choice':
        return this.buildSelect(descriptor)
      case 'choice_with_entry':
      case 'choice_with_search':
        return this.buildChoiceEntry(descriptor)
      case 'file':
      case 'directory_chooser':
        return this.buildPath(descriptor, errors)
      case 'multiple':
        return this.buildLines(descriptor)
      case 'mapping':
        return this.buildMapping(descriptor)
      default:
        throw new Error(`Unknown option type '${descriptor.type}'`)
    }
  }

  private shell(descriptor: ResolvedOptionDescriptor): { wrapper: HTMLDivElement; fieldId: string } {
    const wrapper = this.doc.createElement('div')
    wrapper.className = 'config-option'
    wrapper.dataset.optionKey = descriptor.key
    const fieldId = `config-option-${descriptor.key}`

    const label = this.doc.createElement('label')
    label.className = 'config-option-label'
    label.htmlFor = fieldId
    label.textContent = descriptor.label
    wrapper.appendChild(label)
    return { wrapper, fieldId }
  }

  private buildLabel(descriptor: ResolvedOptionDescriptor): DomControl {
    const wrapper = this.doc.createElement('div')
    wrapper.className = 'config-option config-option-text'
    wrapper.dataset.optionKey = descriptor.key
    const text = this.doc.createElement('p')
    wrapper.appendChild(text)
    return new DomControl(wrapper, [], () => {
      text.textContent = descriptor.label
    })
  }

  private buildText(descriptor: ResolvedOptionDescriptor): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const input = this.doc.createElement('input')
    input.type = 'text'
    input.id = fieldId
    wrapper.appendChild(input)

    const control = new DomControl(wrapper, [input], (value) => {
      input.value = formatOptionValue(value)
    })
    input.addEventListener('input', () => control.emit(input.value))
    return control
  }

  private buildCheckbox(descriptor: ResolvedOptionDescriptor): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const input = this.doc.createElement('input')
    input.type = 'checkbox'
    input.id = fieldId
    wrapper.appendChild(input)

    const control = new DomControl(wrapper, [input], (value) => {
      input.checked = value === true
    })
    input.addEventListener('change', () => control.emit(input.checked))
    return control
  }

  private buildRange(descriptor: ResolvedOptionDescriptor): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const input = this.doc.createElement('input')
    input.type = 'number'
    input.id = fieldId
    if (descriptor.min !== undefined) input.min = String(descriptor.min)
    if (descriptor.max !== undefined) input.max = String(descriptor.max)
    if (descriptor.step !== undefined) input.step = String(descriptor.step)
    wrapper.appendChild(input)

    const control = new DomControl(wrapper, [input], (value) => {
      input.value = formatOptionValue(value)
    })
    input.addEventListener('input', () => {
      const parsed = Number(input.value)
      if (input.value.trim() && Number.isFinite(parsed)) control.emit(parsed)
    })
    return control
  }

  private buildSelect(descriptor: ResolvedOptionDescriptor): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const select = this.doc.createElement('select')
    select.id = fieldId
    for (const choice of this.choicesOf(descriptor)) {
      const option = this.doc.createElement('option')
      option.value = choiceValue(choice)
      option.textContent = choiceLabel(choice)
      select.appendChild(option)
    }
    wrapper.appendChild(select)

    const control = new DomControl(wrapper, [select], (value) => {
      select.value = formatOptionValue(value)
    })
    select.addEventListener('change', () => control.emit(select.value))
    return control
  }

  /**
   * Free text with suggestions. For `choice_with_search` the suggestions are
   * only fetched when the field gets focus.
   */
  private buildChoiceEntry(descriptor: ResolvedOptionDescriptor): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const input = this.doc.createElement('input')
    input.type = 'text'
    input.id = fieldId
    const list = this.doc.createElement('datalist')
    list.id = `${fieldId}-choices`
    input.setAttribute('list', list.id)
    wrapper.append(input, list)

    const fillChoices = () => {
      list.replaceChildren(
        ...this.choicesOf(descriptor).map((choice) => {
          const option = this.doc.createElement('option')
          option.value = choiceValue(choice)
          option.label = choiceLabel(choice)
          return option
        })
      )
    }

    if (descriptor.type === 'choice_with_search') {
      input.placeholder = configBoxTranslate(this.options.locale, 'config_box_search_choices')
      input.addEventListener('focus', fillChoices, { once: true })
    } else {
      fillChoices()
    }

    const control = new DomControl(wrapper, [input], (value) => {
      input.value = formatOptionValue(value)
    })
    input.addEventListener('change', () => control.emit(input.value))
    return control
  }

  private buildPath(descriptor: ResolvedOptionDescriptor, errors: ValidationPresenter[]): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const input = this.doc.createElement('input')
    input.type = 'text'
    input.id = fieldId
    input.placeholder = this.session.defaultDirectory
    input.dataset.defaultDirectory = this.session.defaultDirectory
    wrapper.appendChild(input)

    const control = new DomControl(wrapper, [input], (value) => {
      input.value = formatOptionValue(value)
    })
    input.addEventListener('change', () => control.emit(input.value.trim()))

    const pathExists = this.options.pathExists
    if (pathExists) {
      errors.push(
        new MessagePresenter('error', descriptor.key, () => {
          const path = formatOptionValue(control.value ?? null)
          if (!path || pathExists(path)) return null
          return configBoxFormat(this.options.locale, 'config_box_path_missing', { path })
        })
      )
    }
    return control
  }

  private buildLines(descriptor: ResolvedOptionDescriptor): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const area = this.doc.createElement('textarea')
    area.id = fieldId
    wrapper.appendChild(area)

    const control = new DomControl(wrapper, [area], (value) => {
      area.value = value !== null && isValueList(value) ? value.map(formatOptionValue).join('\n') : formatOptionValue(value)
    })
    area.addEventListener('change', () => control.emit(splitLines(area.value)))
    return control
  }

  private buildMapping(descriptor: ResolvedOptionDescriptor): DomControl {
    const { wrapper, fieldId } = this.shell(descriptor)
    const area = this.doc.createElement('textarea')
    area.id = fieldId
    wrapper.appendChild(area)

    const control = new DomControl(wrapper, [area], (value) => {
      if (value === null || typeof value !== 'object' || isValueList(value)) {
        area.value = ''
        return
      }
      area.value = Object.entries(value)
        .map(([key, entry]) => `${key}=${formatOptionValue(entry)}`)
        .join('\n')
    })
    area.addEventListener('change', () => {
      const mapping: Record<string, string> = {}
      for (const line of splitLines(area.value)) {
        const separator = line.indexOf('=')
        if (separator <= 0) continue
        mapping[line.slice(0, separator).trim()] = line.slice(separator + 1).trim()
      }
      control.emit(mapping)
    })
    return control
  }

  private choicesOf(descriptor: ResolvedOptionDescriptor): readonly OptionChoice[] {
    return descriptor.choices === undefined ? [] : resolveValue(descriptor.choices)
  }

  private defaultTooltip(descriptor: ResolvedOptionDescriptor, defaultValue: OptionValue | null): string | null {
    const locale = this.options.locale
    if (descriptor.type === 'label') return null
    if (descriptor.type === 'bool') {
      return configBoxTranslate(locale, defaultValue === true ? 'config_box_enabled' : 'config_box_disabled')
    }
    if (defaultValue === null) return null

    if (descriptor.type === 'choice' && descriptor.choices !== undefined) {
      const text = formatOptionValue(defaultValue)
      const match = resolveValue(descriptor.choices).find((choice) => choiceValue(choice) === text)
      return match ? choiceLabel(match) : text
    }

    const text = formatOptionValue(defaultValue)
    return text || null
  }
}

function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
}
