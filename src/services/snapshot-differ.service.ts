import type {
  Position,
  PositionClosedEvent,
  PositionEvent,
  PositionOpenedEvent,
  PositionResizedEvent,
  ResizeDirection,
  Snapshot
} from '@/models'
import { calculatePnlPercent, resolveReferencePrice } from '@/utils/pnl.utils'
import { ExtremesTracker } from './extremes-tracker.service'
import type { Logger } from './logger.service'

/**
 * Everything the differ carries between cycles. Owned by the monitor and
 * handed to `diff` by reference; nothing else mutates it.
 */
export interface MonitorState {
  /** Null until the first successful poll after a start or restart. */
  previous: Snapshot | null
  readonly extremes: ExtremesTracker
  readonly startTimes: Map<string, number>
}

export function createMonitorState(): MonitorState {
  return {
    previous: null,
    extremes: new ExtremesTracker(),
    startTimes: new Map()
  }
}

export interface DiffResult {
  events: PositionEvent[]
  /** Becomes `state.previous` for the next cycle, replacing it entirely. */
  next: Snapshot
  /** True when this pass only adopted the open positions as a starting point. */
  baseline: boolean
}

export function hasExposureChanged(previous: Position, current: Position): boolean {
  return previous.side !== current.side ||
    previous.size !== current.size ||
    previous.entryPrice !== current.entryPrice ||
    previous.leverage !== current.leverage
}

export function classifyResize(previous: Position, current: Position): ResizeDirection {
  const previousSize = Math.abs(previous.size)
  const currentSize = Math.abs(current.size)
  if (currentSize > previousSize) return 'increased'
  if (currentSize < previousSize) return 'reduced'
  return 'updated'
}

export class SnapshotDifferService {
  private logger: Logger

  constructor(
    logger: Logger,
    private now: () => number = Date.now
  ) {
    this.logger = logger.child({ component: 'differ' })
  }

  buildSnapshot(positions: Position[]): Map<string, Position> {
    const snapshot: Map<string, Position> = new Map()
    for (const position of positions) {
      if (!Number.isFinite(position.size) || position.size === 0) continue
      if (snapshot.has(position.coin)) {
        this.logger.warn({ coin: position.coin }, 'Duplicate coin in position list, keeping the last entry')
      }
      snapshot.set(position.coin, position)
    }
    return snapshot
  }

  /**
   * Compares the stored snapshot against freshly fetched positions. Updates
   * extremes and start times in `state`; the caller must assign `next` to
   * `state.previous`.
   */
  diff(state: MonitorState, positions: Position[], referencePrices: ReadonlyMap<string, number>): DiffResult {
    const timestamp = this.now()
    const current = this.buildSnapshot(positions)
    const previous = state.previous

    if (previous === null) {
      for (const [coin, position] of current) {
        const pnlPercent = calculatePnlPercent(position, resolveReferencePrice(referencePrices.get(coin), position.markPrice))
        if (pnlPercent !== null) state.extremes.update(coin, pnlPercent)
      }
      this.logger.info({ coins: Array.from(current.keys()) }, 'Adopted open positions as baseline')
      return { events: [], next: current, baseline: true }
    }

    const opened: PositionOpenedEvent[] = []
    const resized: PositionResizedEvent[] = []
    const closed: PositionClosedEvent[] = []

    for (const [coin, position] of current) {
      const referencePrice = resolveReferencePrice(referencePrices.get(coin), position.markPrice)
      const pnlPercent = calculatePnlPercent(position, referencePrice)
      const last = previous.get(coin)

      if (!last) {
        state.extremes.remove(coin)
        state.startTimes.set(coin, timestamp)
        if (pnlPercent !== null) state.extremes.update(coin, pnlPercent)
        opened.push({ type: 'opened', position, referencePrice, pnlPercent, timestamp })
        continue
      }

      if (pnlPercent !== null) state.extremes.update(coin, pnlPercent)

      if (hasExposureChanged(last, position)) {
        resized.push({
          type: 'resized',
          direction: classifyResize(last, position),
          position,
          previousPosition: last,
          referencePrice,
          pnlPercent,
          timestamp
        })
      }
    }

    for (const [coin, last] of previous) {
      if (!current.has(coin)) {
        closed.push(this.close(state, last, referencePrices.get(coin), timestamp))
      }
    }

    return { events: [...opened, ...resized, ...closed], next: current, baseline: false }
  }

  private close(state: MonitorState, last: Position, freshPrice: number | undefined, timestamp: number): PositionClosedEvent {
    const { coin } = last
    const referencePrice = resolveReferencePrice(freshPrice, last.markPrice)
    const pnlPercent = calculatePnlPercent(last, referencePrice)
    const extremes = state.extremes.get(coin)
    const startTime = state.startTimes.get(coin)
    const startedUnknown = startTime === undefined

    state.extremes.remove(coin)
    state.startTimes.delete(coin)

    return {
      type: 'closed',
      position: last,
      referencePrice,
      pnlPercent,
      durationMs: startTime === undefined ? 0 : Math.max(0, timestamp - startTime),
      maxProfitPercent: extremes?.maxProfitPercent ?? pnlPercent,
      maxDrawdownPercent: extremes?.maxDrawdownPercent ?? pnlPercent,
      startedUnknown,
      timestamp
    }
  }
}
