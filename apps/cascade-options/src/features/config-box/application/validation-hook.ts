/**
 * application/validation-hook.ts
 *
 * Warning and error presenters attached under option rows, and the registry
 * that re-evaluates all of them after each edit or reset. Any option may
 * depend on any other, so re-evaluation is global rather than key-scoped.
 */

import type { LayeredConfigStore } from '../domain/config-layers'
import type { OptionMessage } from '../domain/option-descriptor'
import type { PresenterKind, ValidationPresenter } from '../domain/row-tree'
import type { ValidationPresenterFactory } from './ports'

export class MessagePresenter implements ValidationPresenter {
  private currentMessage = ''

  constructor(
    readonly kind: PresenterKind,
    readonly key: string,
    private readonly source: OptionMessage
  ) {}

  get visible(): boolean {
    return this.currentMessage.length > 0
  }

  get message(): string {
    return this.currentMessage
  }

  reevaluate(config: LayeredConfigStore): void {
    const result = typeof this.source === 'function' ? this.source(config, this.key) : this.source
    this.currentMessage = result ? String(result) : ''
  }
}

export const messagePresenterFactory: ValidationPresenterFactory = {
  createWarning: (message, key) => new MessagePresenter('warning', key, message),
  createError: (message, key) => new MessagePresenter('error', key, message),
}

export type PresenterFailureHandler = (presenter: ValidationPresenter, error: unknown) => void

export function reevaluatePresenter(
  presenter: ValidationPresenter,
  config: LayeredConfigStore,
  onFailure?: PresenterFailureHandler
): void {
  if (!onFailure) {
    presenter.reevaluate(config)
    return
  }
  try {
    presenter.reevaluate(config)
  } catch (error) {
    onFailure(presenter, error)
  }
}

export class ValidationRegistry {
  private readonly byKind: Record<PresenterKind, Map<string, ValidationPresenter[]>> = {
    warning: new Map(),
    error: new Map(),
  }

  register(presenter: ValidationPresenter): void {
    const boxes = this.byKind[presenter.kind]
    const list = boxes.get(presenter.key)
    if (list) {
      list.push(presenter)
    } else {
      boxes.set(presenter.key, [presenter])
    }
  }

  /**
   * Warnings first, then errors, each in registration order. Without
   * `onFailure` the first presenter that throws stops the pass.
   */
  reevaluateAll(config: LayeredConfigStore, onFailure?: PresenterFailureHandler): void {
    for (const kind of ['warning', 'error'] as const) {
      for (const presenters of this.byKind[kind].values()) {
        for (const presenter of presenters) {
          reevaluatePresenter(presenter, config, onFailure)
        }
      }
    }
  }

  clear(): void {
    this.byKind.warning.clear()
    this.byKind.error.clear()
  }
}
