import { For, type JSX } from 'solid-js'
import { Tabs as TabsPrimitive } from '@kobalte/core/tabs'

import { cn } from '../../lib/cva'

export type SectionTab = {
  value: string
  label: string
  content: () => JSX.Element
}

type SectionTabsProps = {
  tabs: readonly SectionTab[]
  class?: string
}

/** Kobalte tabs over a fixed list; the first tab starts selected. */
export function SectionTabs(props: SectionTabsProps) {
  return (
    <TabsPrimitive defaultValue={props.tabs[0]?.value} class={cn('flex flex-col gap-3', props.class)}>
      <TabsPrimitive.List class="bg-muted text-muted-foreground inline-flex h-10 w-fit items-center rounded-lg p-1">
        <For each={props.tabs}>
          {(tab) => (
            <TabsPrimitive.Trigger
              value={tab.value}
              class="inline-flex items-center justify-center rounded-md px-3 py-1.5 text-sm font-medium data-[selected]:bg-background data-[selected]:text-foreground"
            >
              {tab.label}
            </TabsPrimitive.Trigger>
          )}
        </For>
      </TabsPrimitive.List>
      <For each={props.tabs}>
        {(tab) => (
          <TabsPrimitive.Content value={tab.value} class="outline-none">
            {tab.content()}
          </TabsPrimitive.Content>
        )}
      </For>
    </TabsPrimitive>
  )
}
