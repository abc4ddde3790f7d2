/**
 * infrastructure/console-logger.ts
 *
 * Adapter implementing `LoggerPort` on top of the browser console.
 */

import type { LoggerPort } from '../application/ports'

const PREFIX = '[config-box]'

export type ConsoleSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

export function createConsoleLogger(prefix: string = PREFIX, sink: ConsoleSink = console): LoggerPort {
  return {
    debug: (message) => sink.debug(`${prefix} ${message}`),
    info: (message) => sink.info(`${prefix} ${message}`),
    warn: (message) => sink.warn(`${prefix} ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        sink.error(`${prefix} ${message}`)
      } else {
        sink.error(`${prefix} ${message}`, error)
      }
    },
  }
}

export const consoleLogger: LoggerPort = createConsoleLogger()
