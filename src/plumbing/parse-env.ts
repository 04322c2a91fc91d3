/**
 * Safely parse a string to a number. Returns fallback for empty, invalid, or non-finite values.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value) {
    return fallback
  }

  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    return fallback
  }

  return parsed
}

/**
 * Split a comma separated env var into trimmed, non-empty entries.
 */
export const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)

/**
 * PEM values in env files are usually single-line with literal "\n" escapes.
 */
export const parsePem = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  if (!trimmed) {
    return undefined
  }
  return trimmed.replace(/\\n/g, '\n')
}
