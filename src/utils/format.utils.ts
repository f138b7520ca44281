export function formatDuration(durationMs: number): string {
  const totalSeconds = Number.isFinite(durationMs) ? Math.max(0, Math.floor(durationMs / 1000)) : 0

  if (totalSeconds < 60) {
    return `${totalSeconds}s`
  }
  if (totalSeconds < 3600) {
    return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`
  }
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  return `${hours}h ${minutes}m`
}

export function formatPercent(value: number | null): string {
  if (value === null) return 'n/a'
  const sign = value >= 0 ? '+' : ''
  return `${sign}${value.toFixed(2)}%`
}

export function formatPrice(value: number | null): string {
  return value === null ? 'n/a' : `$${value.toFixed(4)}`
}

export function formatLeverage(leverage: number): string {
  return Number.isInteger(leverage) ? `${leverage}x` : `${leverage.toFixed(1)}x`
}

/** `HH:MM:SS UTC` */
export function formatClockTime(timestamp: number): string {
  return `${new Date(timestamp).toISOString().slice(11, 19)} UTC`
}

export function formatAddress(address: string): string {
  return `${address.slice(0, 6)}...${address.slice(-4)}`
}
