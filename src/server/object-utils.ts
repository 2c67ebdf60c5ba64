export const asString = (value: unknown) => (typeof value === 'string' && value.trim().length > 0 ? value.trim() : null)

export const asRecord = (value: unknown) =>
  value && typeof value === 'object' && !Array.isArray(value) ? (value as Record<string, unknown>) : null

export const readNested = (value: unknown, path: string[]) => {
  let cursor: unknown = value
  for (const key of path) {
    const record = asRecord(cursor)
    if (!record) return null
    cursor = record[key]
  }
  return cursor ?? null
}

export const formatError = (error: unknown) => (error instanceof Error ? error.message : String(error))
