export interface ConfigErrorContext {
  phase?: string
  key?: string
}

/**
 * Fatal configuration problem. Raised before any timestamp is produced.
 */
export class ConfigError extends Error {
  readonly phase?: string
  readonly key?: string

  constructor(message: string, context: ConfigErrorContext = {}) {
    super(message)
    this.name = 'ConfigError'
    this.phase = context.phase
    this.key = context.key
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}
