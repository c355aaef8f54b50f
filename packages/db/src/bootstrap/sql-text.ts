/** Quotes a string as a SQL literal. */
export function literal(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

/** `column IN ('a', 'b')` check body for a closed vocabulary. */
export function oneOf(column: string, values: readonly string[]): string {
  return `CHECK (${column} IN (${values.map(literal).join(', ')}))`
}
