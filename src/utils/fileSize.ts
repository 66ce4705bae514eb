/**
 * Format a file size in bytes to human-readable string.
 * @param decimals Number of decimal places
 */
export function formatFileSize(bytes: number, decimals: number = 1): string {
  if (bytes === 0) return '0 B'
  if (bytes < 0) return '—'

  const k = 1024
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), units.length - 1)

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(decimals))} ${units[i]}`
}

/** Whole-number percentage of a transfer, clamped to 0..100 */
export function formatPercent(transferred: number, total: number): string {
  if (total <= 0) return transferred > 0 ? '100%' : '0%'
  const pct = Math.floor((transferred / total) * 100)
  return `${Math.max(0, Math.min(100, pct))}%`
}
