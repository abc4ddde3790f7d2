import { createSignal, For, onCleanup, onMount, Show, type Accessor } from 'solid-js'
import {
  IconAlertCircle,
  IconAlertTriangle,
  IconArrowBackUp,
  IconInfoCircle,
} from '@tabler/icons-solidjs'

import { Alert, AlertDescription } from '../../components/ui/alert'
import type { Locale } from '../../i18n'
import { cn } from '../../lib/cva'
import type { ConfigBox } from './application/config-box'
import { configBoxTranslate } from './copy'
import type { OptionWeight } from './domain/override-state'
import type { OptionRow, RowNode, ValidationPresenter } from './domain/row-tree'
import type { DomControl } from './infrastructure/dom-widget-generator'

const weightClass: Record<OptionWeight, string> = {
  plain: '',
  bold: 'font-semibold',
  italic: 'italic',
}

type ConfigBoxViewProps = {
  box: ConfigBox<DomControl>
  locale: Locale
}

/**
 * Renders the box's row tree. The box mutates its rows in place and notifies
 * subscribers, so every read below goes through `revision()`.
 */
export function ConfigBoxView(props: ConfigBoxViewProps) {
  const [revision, setRevision] = createSignal(0)
  const unsubscribe = props.box.subscribe(() => setRevision((value) => value + 1))
  onCleanup(unsubscribe)

  onMount(() => {
    if (!props.box.tree) props.box.render()
  })

  const tree = () => {
    revision()
    return props.box.tree
  }

  return (
    <div class="flex flex-col gap-3">
      <Show when={tree()?.banner}>
        {(banner) => (
          <Alert variant="info">
            <IconInfoCircle />
            <AlertDescription class="italic">{banner()}</AlertDescription>
          </Alert>
        )}
      </Show>

      <Show when={tree()?.placeholder}>
        {(placeholder) => (
          <p class="py-10 text-center text-sm text-muted-foreground">{placeholder()}</p>
        )}
      </Show>

      <For each={tree()?.nodes ?? []}>
        {(node) => <RowNodeView node={node} box={props.box} locale={props.locale} revision={revision} />}
      </For>
    </div>
  )
}

type NodeViewProps = {
  node: RowNode<DomControl>
  box: ConfigBox<DomControl>
  locale: Locale
  revision: Accessor<number>
}

function RowNodeView(props: NodeViewProps) {
  const node = props.node
  if (node.kind === 'row') {
    return <OptionRowView row={node} box={props.box} locale={props.locale} revision={props.revision} />
  }

  const visible = () => {
    props.revision()
    return node.visible
  }

  return (
    <fieldset class={cn('section-frame rounded-lg border border-border px-3 pb-3', !visible() && 'hidden')}>
      <legend class="px-1 text-sm font-medium">{node.title}</legend>
      <For each={node.rows}>
        {(row) => <OptionRowView row={row} box={props.box} locale={props.locale} revision={props.revision} />}
      </For>
    </fieldset>
  )
}

type OptionRowViewProps = {
  row: OptionRow<DomControl>
  box: ConfigBox<DomControl>
  locale: Locale
  revision: Accessor<number>
}

function OptionRowView(props: OptionRowViewProps) {
  const row = props.row
  const read = <T,>(pick: () => T) => () => {
    props.revision()
    return pick()
  }
  const visible = read(() => row.visible)
  const weight = read(() => row.weight)
  const tooltip = read(() => row.tooltip)
  const resetVisible = read(() => row.resetVisible)
  const presenters = read(() => row.presenters.filter((presenter) => presenter.visible))
  const messageOf = (presenter: ValidationPresenter) => {
    props.revision()
    return presenter.message
  }

  return (
    <div
      class={cn('flex flex-col gap-1 pl-4', !visible() && 'hidden', row.advanced && 'advanced')}
      data-option-key={row.key}
    >
      <div class="flex items-center gap-2">
        <div
          class={cn('flex-1', weightClass[weight()], !row.enabled && 'opacity-50')}
          title={tooltip() || undefined}
        >
          {row.control.element}
        </div>
        <div class="flex size-8 items-center justify-center">
          <Show when={resetVisible()}>
            <button
              type="button"
              class="rounded-md p-1 text-muted-foreground hover:bg-muted"
              title={configBoxTranslate(props.locale, 'config_box_reset_tooltip')}
              onClick={() => props.box.onReset(row.key)}
            >
              <IconArrowBackUp size={16} />
            </button>
          </Show>
        </div>
      </div>

      <For each={presenters()}>
        {(presenter) => (
          <Alert variant={presenter.kind === 'error' ? 'destructive' : 'warning'} size="compact">
            {presenter.kind === 'error' ? <IconAlertCircle /> : <IconAlertTriangle />}
            <AlertDescription>{messageOf(presenter)}</AlertDescription>
          </Alert>
        )}
      </For>
    </div>
  )
}
