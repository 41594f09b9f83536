/**
 * Numeric env value with a fallback. Ports, timeouts, limits and counts are
 * never negative, so blank, non-numeric and negative values all fall back.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  const trimmed = value?.trim()
  if (!trimmed) {
    return fallback
  }

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}
