/**
 * Horizontal bar for terminal charts, scaled against `max`.
 * Any non-zero value gets at least one block so small amounts stay visible.
 *
 * @example
 * bar(50, 100, 10) // => '█████'
 */
export const bar = (value: number, max: number, width = 20): string => {
  if (value <= 0 || max <= 0) return ''
  const filled = Math.min(width, Math.max(1, Math.round((value / max) * width)))
  return '█'.repeat(filled)
}
