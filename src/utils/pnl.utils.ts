import type { Position } from '@/models'

function isUsablePrice(price: number | null | undefined): price is number {
  return typeof price === 'number' && Number.isFinite(price) && price > 0
}

/**
 * Leveraged percentage return of a position against a reference price.
 * Returns null when either price is unusable, so an unknown PnL is never
 * mistaken for a flat one.
 */
export function calculatePnlPercent(
  position: Pick<Position, 'side' | 'entryPrice' | 'leverage'>,
  referencePrice: number | null | undefined
): number | null {
  const { side, entryPrice, leverage } = position
  if (!isUsablePrice(entryPrice) || !isUsablePrice(referencePrice)) return null

  const priceChange = side === 'long'
    ? (referencePrice - entryPrice) / entryPrice
    : (entryPrice - referencePrice) / entryPrice

  return priceChange * 100 * leverage
}

/** First usable price of the fresh quote and the fallback, or null. */
export function resolveReferencePrice(fresh: number | null | undefined, fallback: number | null | undefined): number | null {
  if (isUsablePrice(fresh)) return fresh
  if (isUsablePrice(fallback)) return fallback
  return null
}
