export type PositionSide = 'long' | 'short'

export interface Position {
  coin: string
  side: PositionSide
  /** Absolute size in coins; the direction lives in `side`. */
  size: number
  entryPrice: number
  markPrice: number
  leverage: number
  unrealizedPnl: number
}

/** Open positions at one poll instant, keyed by coin. */
export type Snapshot = ReadonlyMap<string, Position>

/**
 * Position entry as the venue reports it. Only the fields the monitor reads
 * are listed, and every one of them is treated as untrusted.
 */
export interface RawAssetPosition {
  position: {
    coin: string
    szi: string
    entryPx?: string | null
    positionValue?: string | null
    unrealizedPnl?: string | null
    leverage?: { value: number | string } | null
  }
}

export interface PositionSource {
  fetchPositions(): Promise<Position[]>
  fetchReferencePrice(coin: string): Promise<number>
}
