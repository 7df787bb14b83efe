const KIB = 1024
const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const

/**
 * Format a byte count for humans: `512B`, `1.5KB`, `3.0MB`.
 */
export function humanSize(bytes: number): string {
  let value = bytes
  let unit = 0
  while (value >= KIB && unit < UNITS.length - 1) {
    value /= KIB
    unit++
  }
  if (unit === 0)
    return `${Math.trunc(value)}B`
  return `${value.toFixed(1)}${UNITS[unit]}`
}
