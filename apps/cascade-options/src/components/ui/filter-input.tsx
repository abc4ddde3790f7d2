import { IconSearch } from '@tabler/icons-solidjs'

import { cn } from '../../lib/cva'

type FilterInputProps = {
  value: string
  placeholder: string
  onFilter: (text: string) => void
  class?: string
}

/** Search field that reports every keystroke. */
export function FilterInput(props: FilterInputProps) {
  return (
    <label class={cn('relative flex w-full items-center', props.class)}>
      <IconSearch class="text-muted-foreground pointer-events-none absolute left-2.5 size-4" />
      <input
        type="search"
        value={props.value}
        placeholder={props.placeholder}
        aria-label={props.placeholder}
        class={cn(
          'flex h-9 w-full rounded-md border border-input bg-background py-1 pl-8 pr-3 text-sm text-foreground transition-colors',
          'placeholder:text-muted-foreground focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring'
        )}
        onInput={(event) => props.onFilter(event.currentTarget.value)}
      />
    </label>
  )
}
