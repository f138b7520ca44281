import type {
  ControlIntent,
  MonitorControls,
  MonitorPhase,
  MonitorStatus,
  Position,
  PositionEvent,
  PositionSource
} from '@/models'
import { describeError } from '@/utils/errors'
import { formatPercent } from '@/utils/format.utils'
import type { ControlSignal } from './control-signal.service'
import type { DispatcherService } from './dispatcher.service'
import type { Logger } from './logger.service'
import { createMonitorState, type MonitorState, type SnapshotDifferService } from './snapshot-differ.service'

export interface MonitorOptions {
  intervalMs: number
  /** Sleep after a failed cycle, as a multiple of the interval. */
  errorBackoffMultiplier: number
}

/**
 * Drives the poll → diff → dispatch cycle. The interval is measured from the
 * end of one cycle to the start of the next, so slow cycles slip rather than
 * overlap. Stop and restart are cooperative and observed between phases.
 */
export class PositionMonitorService implements MonitorControls {
  private state: MonitorState = createMonitorState()
  private phase: MonitorPhase = 'running'
  private cycles = 0
  private lastPollAt: number | null = null
  private logger: Logger

  constructor(
    private source: PositionSource,
    private differ: SnapshotDifferService,
    private dispatcher: DispatcherService,
    private control: ControlSignal,
    logger: Logger,
    private options: MonitorOptions,
    private now: () => number = Date.now
  ) {
    this.logger = logger.child({ component: 'monitor' })
  }

  async run(): Promise<ControlIntent> {
    this.logger.info({ intervalMs: this.options.intervalMs }, 'Starting position monitoring')

    while (!this.control.isSet) {
      let delayMs = this.options.intervalMs
      try {
        await this.runCycle()
      } catch (error) {
        delayMs = this.options.intervalMs * this.options.errorBackoffMultiplier
        this.logger.error({ err: describeError(error), backoffMs: delayMs }, 'Monitoring cycle failed')
      }

      if (this.control.isSet) break
      await this.control.sleep(delayMs)
    }

    const intent = this.control.current ?? 'stop'
    this.logger.info({ intent }, 'Monitoring loop stopping')
    this.phase = 'stopped'
    return intent
  }

  /** One poll. A failed position fetch is a no-op that leaves the stored snapshot untouched. */
  async runCycle(): Promise<PositionEvent[]> {
    let positions: Position[]
    try {
      positions = await this.source.fetchPositions()
    } catch (error) {
      this.logger.warn({ err: describeError(error) }, 'Position fetch failed, skipping cycle')
      return []
    }
    if (this.control.isSet) return []

    const prices = await this.fetchReferencePrices(positions)
    if (this.control.isSet) return []

    const { events, next } = this.differ.diff(this.state, positions, prices)
    this.state.previous = next
    this.cycles++
    this.lastPollAt = this.now()

    for (const event of events) {
      this.logger.info({
        coin: event.position.coin,
        type: event.type,
        direction: event.type === 'resized' ? event.direction : undefined,
        pnl: formatPercent(event.pnlPercent)
      }, 'Position event')
      await this.dispatcher.dispatch(event)
    }

    return events
  }

  private async fetchReferencePrices(positions: Position[]): Promise<Map<string, number>> {
    const coins = new Set(positions.map(position => position.coin))
    for (const coin of this.state.previous?.keys() ?? []) {
      coins.add(coin)
    }

    const lookups = Array.from(coins)
    const settled = await Promise.allSettled(lookups.map(coin => this.source.fetchReferencePrice(coin)))
    const prices: Map<string, number> = new Map()

    settled.forEach((outcome, index) => {
      const coin = lookups[index]
      if (outcome.status === 'fulfilled') {
        prices.set(coin, outcome.value)
      } else {
        this.logger.warn({ coin, err: describeError(outcome.reason) }, 'Reference price unavailable, using mark price')
      }
    })

    return prices
  }

  requestStop(): void {
    if (this.control.send('stop')) {
      this.logger.info('Stop requested')
    }
  }

  requestRestart(): void {
    if (this.control.send('restart')) {
      this.logger.info('Restart requested')
    }
  }

  status(): MonitorStatus {
    return {
      phase: this.control.isSet && this.phase === 'running' ? 'stopping' : this.phase,
      activeCoins: Array.from(this.state.previous?.keys() ?? []),
      intervalMs: this.options.intervalMs,
      configuredRecipients: this.dispatcher.recipientCount,
      cycles: this.cycles,
      lastPollAt: this.lastPollAt
    }
  }
}
