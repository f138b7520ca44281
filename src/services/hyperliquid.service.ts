import { HttpTransport, InfoClient } from '@nktkas/hyperliquid'
import type { Address } from 'viem'
import type { Position, PositionSource, RawAssetPosition } from '@/models'
import { FetchError } from '@/utils/errors'
import { normalizePosition, parseNumber } from '@/utils/position.utils'
import { MidsCacheService, type MidsSource } from './mids-cache.service'
import type { Logger } from './logger.service'

/** The read-only slice of the info API this service calls. */
export interface HyperliquidInfo extends MidsSource {
  clearinghouseState(params: { user: Address }): Promise<{ assetPositions: RawAssetPosition[] }>
}

export interface HyperliquidOptions {
  isTestnet: boolean
  requestTimeoutMs: number
}

export class HyperliquidService implements PositionSource {
  private mids: MidsCacheService
  private logger: Logger

  constructor(
    private trackedWallet: Address,
    private info: HyperliquidInfo,
    logger: Logger,
    mids?: MidsCacheService
  ) {
    this.logger = logger.child({ component: 'hyperliquid' })
    this.mids = mids ?? new MidsCacheService(info)
  }

  static create(trackedWallet: Address, options: HyperliquidOptions, logger: Logger): HyperliquidService {
    const transport = new HttpTransport({
      isTestnet: options.isTestnet,
      timeout: options.requestTimeoutMs
    })
    return new HyperliquidService(trackedWallet, new InfoClient({ transport }), logger)
  }

  async fetchPositions(): Promise<Position[]> {
    let state: { assetPositions: RawAssetPosition[] }
    try {
      state = await this.info.clearinghouseState({ user: this.trackedWallet })
    } catch (error) {
      throw new FetchError('clearinghouseState', error)
    }

    const positions: Position[] = []
    for (const raw of state.assetPositions) {
      const position = normalizePosition(raw)
      if (position) {
        positions.push(position)
      } else if (parseNumber(raw.position.szi) !== 0) {
        this.logger.warn({ coin: raw.position.coin, szi: raw.position.szi }, 'Skipping unreadable position entry')
      }
    }

    this.logger.debug({ count: positions.length }, 'Fetched open positions')
    return positions
  }

  async fetchReferencePrice(coin: string): Promise<number> {
    const mid = await this.mids.getMid(coin)
    if (mid === null) {
      throw new FetchError(`allMids[${coin}]`, 'no mid price quoted')
    }
    return mid
  }
}
