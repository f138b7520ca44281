export interface PositionExtremes {
  maxProfitPercent: number
  maxDrawdownPercent: number
}

/**
 * Best and worst PnL seen per coin over a position's continuous lifetime.
 * Entries are removed on close, so a reopened position starts fresh.
 */
export class ExtremesTracker {
  private extremes: Map<string, PositionExtremes> = new Map()

  update(coin: string, pnlPercent: number): PositionExtremes {
    const current = this.extremes.get(coin)
    const next: PositionExtremes = current
      ? {
          maxProfitPercent: Math.max(current.maxProfitPercent, pnlPercent),
          maxDrawdownPercent: Math.min(current.maxDrawdownPercent, pnlPercent)
        }
      : { maxProfitPercent: pnlPercent, maxDrawdownPercent: pnlPercent }

    this.extremes.set(coin, next)
    return { ...next }
  }

  get(coin: string): PositionExtremes | undefined {
    const current = this.extremes.get(coin)
    return current ? { ...current } : undefined
  }

  /** Returns false when nothing was tracked for the coin. */
  remove(coin: string): boolean {
    return this.extremes.delete(coin)
  }

  coins(): string[] {
    return Array.from(this.extremes.keys())
  }

  get size(): number {
    return this.extremes.size
  }
}
