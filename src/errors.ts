import type { ZodError } from 'zod'

// Fatal input problems: the run stops and the message is shown as-is
export class TableError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TableError'
  }
}

export class MissingColumnError extends TableError {
  readonly column: string
  readonly available: readonly string[]

  constructor(column: string, source: string, available: readonly string[]) {
    super(
      `Column '${column}' not found in ${source}. Available: ${available.join(', ')}`,
    )
    this.name = 'MissingColumnError'
    this.column = column
    this.available = available
  }
}

export class SchemaValidationError extends TableError {
  readonly issues: readonly string[]

  constructor(source: string, issues: readonly string[]) {
    super(`Invalid ${source}: ${issues.join('; ')}`)
    this.name = 'SchemaValidationError'
    this.issues = issues
  }

  static fromZod(source: string, error: ZodError) {
    return new SchemaValidationError(
      source,
      error.issues.map(issue =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      ),
    )
  }
}

export function toError(value: unknown) {
  return value instanceof Error ? value : new Error(String(value))
}
