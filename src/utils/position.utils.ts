import type { Position, RawAssetPosition } from '@/models'

export function parseNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null
  const parsed = typeof value === 'number' ? value : parseFloat(value)
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Maps a venue position entry onto `Position`. Returns null for flat or
 * unreadable entries. Defaults: leverage 1, entry price 0, mark price equal to
 * the entry price when the position value is missing.
 */
export function normalizePosition(raw: RawAssetPosition): Position | null {
  const { coin, szi, entryPx, positionValue, unrealizedPnl, leverage } = raw.position
  const signedSize = parseNumber(szi)

  if (!coin || signedSize === null || signedSize === 0) return null

  const size = Math.abs(signedSize)
  const entryPrice = parseNumber(entryPx) ?? 0
  const value = parseNumber(positionValue)
  const leverageValue = parseNumber(leverage?.value)

  return {
    coin,
    side: signedSize > 0 ? 'long' : 'short',
    size,
    entryPrice,
    markPrice: value !== null && value > 0 ? value / size : entryPrice,
    leverage: leverageValue !== null && leverageValue >= 1 ? leverageValue : 1,
    unrealizedPnl: parseNumber(unrealizedPnl) ?? 0
  }
}
