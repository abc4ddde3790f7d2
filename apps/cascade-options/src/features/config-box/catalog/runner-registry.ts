/**
 * catalog/runner-registry.ts
 *
 * In-memory `RunnerRegistryPort` over a fixed set of runner definitions.
 */

import type { RunnerDefinition, RunnerRegistryPort } from '../application/ports'
import { InvalidRunnerError } from '../errors'

export function createRunnerRegistry(definitions: readonly RunnerDefinition[]): RunnerRegistryPort {
  const bySlug = new Map(definitions.map((definition) => [definition.slug, definition]))

  return {
    resolve(slug) {
      const runner = slug ? bySlug.get(slug) : undefined
      if (!runner) throw new InvalidRunnerError(slug)
      return runner
    },
  }
}
