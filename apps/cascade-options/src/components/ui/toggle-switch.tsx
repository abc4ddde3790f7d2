import { Switch as SwitchPrimitive } from '@kobalte/core/switch'

import { cn } from '../../lib/cva'

type ToggleSwitchProps = {
  checked: boolean
  onChange: (checked: boolean) => void
  label: string
  class?: string
}

export function ToggleSwitch(props: ToggleSwitchProps) {
  return (
    <SwitchPrimitive
      checked={props.checked}
      onChange={props.onChange}
      class={cn('inline-flex items-center gap-2 text-sm', props.class)}
    >
      <SwitchPrimitive.Input />
      <SwitchPrimitive.Control
        class={cn(
          'bg-input inline-flex h-5 w-10 items-center rounded-full border border-transparent transition-all',
          'data-[checked]:bg-primary data-[disabled]:cursor-not-allowed data-[disabled]:opacity-50'
        )}
      >
        <SwitchPrimitive.Thumb class="bg-background pointer-events-none size-4 rounded-full transition-transform data-[checked]:translate-x-5" />
      </SwitchPrimitive.Control>
      <SwitchPrimitive.Label>{props.label}</SwitchPrimitive.Label>
    </SwitchPrimitive>
  )
}
