function quotePart(part: string): string {
  const trimmed = part.trim()
  const raw = trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"') ? trimmed.slice(1, -1) : trimmed

  if (raw.length === 0) {
    throw new Error(`empty SQL identifier in "${part}"`)
  }

  return `"${raw.replace(/"/g, '""')}"`
}

/**
 * Quotes a column or table name for interpolation into SQL. A dotted name
 * such as `public.membership` is quoted part by part; already-quoted parts
 * are not quoted twice.
 */
export function quoteIdentifier(identifier: string): string {
  return identifier.split('.').map(quotePart).join('.')
}
