/**
 * pgvector literal helpers
 *
 * pgvector accepts and returns vectors as text in the form `[0.1,0.2,0.3]`.
 * node-postgres has no parser registered for the type, so rows come back as
 * that string.
 */

export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(',')}]`
}

/**
 * Parse a vector column value. NULL and malformed values become an empty
 * array, which callers treat as "no stored embedding".
 */
export function parseVectorLiteral(value: unknown): number[] {
  if (value === null || value === undefined) return []

  if (Array.isArray(value)) {
    return value.every(v => typeof v === 'number') ? value : []
  }

  if (typeof value !== 'string') return []

  try {
    const parsed: unknown = JSON.parse(value)
    if (Array.isArray(parsed) && parsed.every(v => typeof v === 'number' && Number.isFinite(v))) {
      return parsed
    }
  } catch {
    // not a vector literal
  }
  return []
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

export function isSafeIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name)
}

/**
 * Quote a table or column name taken from configuration.
 * Only plain identifiers are accepted.
 */
export function quoteIdentifier(name: string): string {
  if (!isSafeIdentifier(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`)
  }
  return `"${name}"`
}
