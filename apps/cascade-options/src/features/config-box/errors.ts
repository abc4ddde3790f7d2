/**
 * errors.ts
 *
 * Centralized error types and normalization helpers for the `config-box`
 * feature.
 *
 * Rules:
 *   - No `solid-js` imports.
 *   - No UI component imports.
 *   - Pure TypeScript only, safe to use in domain or application layers.
 */

// ---------------------------------------------------------------------------
// Error kind taxonomy
// ---------------------------------------------------------------------------

/**
 * Discriminated union of the failures the config box knows about.
 *
 * `"schema_resolution"`: the runner or options source could not be resolved;
 *                         the box falls back to an empty schema.
 * `"row_render"`:        building a single option row threw; the row is
 *                         left out of the form.
 * `"validation"`:        a warning or error message threw while being
 *                         evaluated; its row stays in the form.
 * `"unknown"`:           any other caught value.
 */
export type ConfigBoxErrorKind =
    | 'schema_resolution'
    | 'row_render'
    | 'validation'
    | 'unknown'

// ---------------------------------------------------------------------------
// Structured error envelope
// ---------------------------------------------------------------------------

export type ConfigBoxError = {
    readonly kind: ConfigBoxErrorKind

    /** Short human-readable message. Always non-empty after normalization. */
    readonly message: string

    /** Option key the failure relates to, when there is one. */
    readonly optionKey: string | null

    /** The raw caught value, preserved for logging. */
    readonly raw: unknown
}

/**
 * Error thrown by a runner registry when a slug names no installed runner.
 */
export class InvalidRunnerError extends Error {
    constructor(readonly runnerSlug: string | null) {
        super(runnerSlug ? `Invalid runner provided: ${runnerSlug}` : 'No runner provided')
        this.name = 'InvalidRunnerError'
    }
}

// ---------------------------------------------------------------------------
// Operation result type
// ---------------------------------------------------------------------------

/**
 * Result of a fallible lookup in the config box application layer.
 *
 * ```ts
 * const runner = resolveRunner(registry, slug)
 * if (!runner.ok) {
 *   logger.warn(runner.error.message)
 *   return []
 * }
 * return runner.value.runnerOptions()
 * ```
 */
export type ConfigBoxResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: ConfigBoxError }

export function ok<T>(value: T): ConfigBoxResult<T> {
    return { ok: true, value }
}

export function err<T>(error: ConfigBoxError): ConfigBoxResult<T> {
    return { ok: false, error }
}

// ---------------------------------------------------------------------------
// Normalization helpers
// ---------------------------------------------------------------------------

/**
 * Wraps a caught value into a `ConfigBoxError` of the given kind.
 *
 * @param optionKey - Key of the option being processed, if any.
 */
export function normalizeConfigBoxError(
    error: unknown,
    kind: ConfigBoxErrorKind = 'unknown',
    optionKey: string | null = null
): ConfigBoxError {
    return {
        kind,
        message: extractMessage(error),
        optionKey,
        raw: error
    }
}

/**
 * One-line description used in log entries, e.g.
 * `row_render [wine_version]: boom`.
 */
export function describeConfigBoxError(error: ConfigBoxError): string {
    const scope = error.optionKey ? ` [${error.optionKey}]` : ''
    return `${error.kind}${scope}: ${error.message}`
}

// ---------------------------------------------------------------------------
// Internal utility
// ---------------------------------------------------------------------------

/**
 * Prefers `error.message` for Error-like values, since `String(error)` would
 * add the `"Error: "` prefix.
 */
function extractMessage(error: unknown): string {
    if (error instanceof Error && error.message) {
        return error.message
    }
    const text = String(error)
    return text || 'Unknown error'
}
