import type { ComponentProps } from 'solid-js'
import { splitProps } from 'solid-js'

import { cn, cva, type VariantProps } from '../../lib/cva'

const alertVariants = cva(
  'relative w-full rounded-lg border px-4 py-3 text-sm [&>svg]:absolute [&>svg]:left-4 [&>svg]:top-3.5 [&>svg]:size-4 [&>svg~*]:pl-7',
  {
    variants: {
      variant: {
        default: 'bg-card text-card-foreground border-border',
        info: 'border-sky-500/30 bg-sky-500/10 text-sky-900 dark:text-sky-100',
        warning:
          'border-amber-500/30 bg-amber-500/10 text-amber-900 dark:border-amber-400/25 dark:bg-amber-500/10 dark:text-amber-100',
        destructive: 'border-destructive/40 bg-destructive/10 text-destructive'
      },
      size: {
        default: 'px-4 py-3',
        compact: 'px-3 py-1.5 text-xs'
      }
    },
    defaultVariants: {
      variant: 'default',
      size: 'default'
    }
  }
)

export type AlertProps = ComponentProps<'div'> & VariantProps<typeof alertVariants>

export const Alert = (props: AlertProps) => {
  const [, rest] = splitProps(props, ['class', 'variant', 'size'])
  return (
    <div
      role="alert"
      class={cn(alertVariants({ variant: props.variant, size: props.size }), props.class)}
      {...rest}
    />
  )
}

export type AlertDescriptionProps = ComponentProps<'div'>

export const AlertDescription = (props: AlertDescriptionProps) => {
  const [, rest] = splitProps(props, ['class'])
  return <div class={cn('text-xs leading-relaxed opacity-95', props.class)} {...rest} />
}
