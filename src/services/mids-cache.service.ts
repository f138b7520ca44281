import { FetchError } from '@/utils/errors'
import { parseNumber } from '@/utils/position.utils'

export interface MidsSource {
  allMids(): Promise<Record<string, string>>
}

const DEFAULT_TTL_MS = 1000

/**
 * Short-lived cache over the venue's all-mids endpoint. Concurrent lookups
 * within one poll cycle share a single request.
 */
export class MidsCacheService {
  private midsCache: Map<string, number> = new Map()
  private fetchedAt: number | null = null
  private inFlight: Promise<Map<string, number>> | null = null

  constructor(
    private source: MidsSource,
    private ttlMs: number = DEFAULT_TTL_MS,
    private now: () => number = Date.now
  ) {}

  async getMid(coin: string): Promise<number | null> {
    const mids = await this.getAllMids()
    return mids.get(coin) ?? null
  }

  async getAllMids(): Promise<Map<string, number>> {
    if (this.fetchedAt !== null && this.now() - this.fetchedAt < this.ttlMs) {
      return this.midsCache
    }
    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  private async refresh(): Promise<Map<string, number>> {
    let raw: Record<string, string>
    try {
      raw = await this.source.allMids()
    } catch (error) {
      throw new FetchError('allMids', error)
    }

    const mids: Map<string, number> = new Map()
    for (const [coin, mid] of Object.entries(raw)) {
      const price = parseNumber(mid)
      if (price !== null && price > 0) {
        mids.set(coin, price)
      }
    }

    this.midsCache = mids
    this.fetchedAt = this.now()
    return mids
  }

  clear(): void {
    this.midsCache = new Map()
    this.fetchedAt = null
  }
}
