import { describe, it, expect, beforeEach } from 'vitest'
import type { Position, PositionEvent } from '@/models'
import {
  SnapshotDifferService,
  classifyResize,
  createMonitorState,
  hasExposureChanged,
  type MonitorState
} from '@/services/snapshot-differ.service'
import { createSilentLogger } from '../helpers/logger'
import { makePosition } from '../fixtures/positions'

const T0 = Date.UTC(2024, 4, 1, 12, 0, 0)

function prices(entries: Record<string, number> = {}): Map<string, number> {
  return new Map(Object.entries(entries))
}

function count(events: PositionEvent[], type: PositionEvent['type']): number {
  return events.filter(event => event.type === type).length
}

describe('SnapshotDifferService', () => {
  let clock: number
  let differ: SnapshotDifferService
  let state: MonitorState

  function step(positions: Position[], quotes: Record<string, number> = {}): PositionEvent[] {
    const result = differ.diff(state, positions, prices(quotes))
    state.previous = result.next
    return result.events
  }

  beforeEach(() => {
    clock = T0
    differ = new SnapshotDifferService(createSilentLogger(), () => clock)
    state = createMonitorState()
    state.previous = new Map()
  })

  describe('new then close', () => {
    it('reports the open with its PnL and the close with the tracked extremes', () => {
      const btc = makePosition({ coin: 'BTC', side: 'long', entryPrice: 100, size: 1, leverage: 5 })

      const openEvents = step([btc], { BTC: 110 })
      expect(openEvents).toHaveLength(1)
      expect(openEvents[0]).toMatchObject({ type: 'opened', position: btc, referencePrice: 110, timestamp: T0 })
      expect(openEvents[0].pnlPercent).toBeCloseTo(50, 10)

      clock = T0 + 90_000
      const closeEvents = step([], { BTC: 110 })
      expect(closeEvents).toHaveLength(1)
      const [closed] = closeEvents
      if (closed.type !== 'closed') throw new Error(`expected a close, got ${closed.type}`)
      expect(closed.position).toBe(btc)
      expect(closed.maxProfitPercent).toBeCloseTo(50, 10)
      expect(closed.maxDrawdownPercent).toBeCloseTo(50, 10)
      expect(closed.startedUnknown).toBe(false)
      expect(closed.durationMs).toBe(90_000)
    })

    it('clears extremes and start time on close', () => {
      step([makePosition()], { BTC: 110 })
      step([])
      expect(state.extremes.get('BTC')).toBeUndefined()
      expect(state.startTimes.has('BTC')).toBe(false)
    })

    it('starts a reopened position with fresh extremes', () => {
      step([makePosition()], { BTC: 120 })
      step([makePosition()], { BTC: 80 })
      step([])
      step([makePosition()], { BTC: 101 })
      const extremes = state.extremes.get('BTC')
      expect(extremes?.maxProfitPercent).toBeCloseTo(5, 10)
      expect(extremes?.maxDrawdownPercent).toBeCloseTo(5, 10)
    })
  })

  describe('resize classification', () => {
    it('reports growth as increased', () => {
      step([makePosition({ size: 1 })], { BTC: 100 })
      const events = step([makePosition({ size: 2 })], { BTC: 100 })
      expect(events).toHaveLength(1)
      expect(events[0]).toMatchObject({ type: 'resized', direction: 'increased' })
    })

    it('reports shrinkage as reduced', () => {
      step([makePosition({ size: 2 })], { BTC: 100 })
      const events = step([makePosition({ size: 1 })], { BTC: 100 })
      expect(events[0]).toMatchObject({ type: 'resized', direction: 'reduced' })
    })

    it('reports an entry change at the same size as updated', () => {
      step([makePosition({ entryPrice: 100 })], { BTC: 100 })
      const events = step([makePosition({ entryPrice: 98 })], { BTC: 100 })
      expect(events[0]).toMatchObject({ type: 'resized', direction: 'updated' })
    })

    it('carries the previous position on resize events', () => {
      const before = makePosition({ size: 1 })
      step([before], { BTC: 100 })
      const [event] = step([makePosition({ size: 3 })], { BTC: 100 })
      expect(event.type === 'resized' && event.previousPosition).toBe(before)
    })

    it('ignores mark price and unrealized PnL movement', () => {
      step([makePosition({ markPrice: 100, unrealizedPnl: 0 })], { BTC: 100 })
      const events = step([makePosition({ markPrice: 104, unrealizedPnl: 4 })], { BTC: 104 })
      expect(events).toEqual([])
    })

    it('updates extremes for unchanged positions', () => {
      step([makePosition()], { BTC: 100 })
      step([makePosition()], { BTC: 104 })
      step([makePosition()], { BTC: 97 })
      const extremes = state.extremes.get('BTC')
      expect(extremes?.maxProfitPercent).toBeCloseTo(20, 10)
      expect(extremes?.maxDrawdownPercent).toBeCloseTo(-15, 10)
    })
  })

  describe('restart mid-trade', () => {
    it('adopts the first snapshot as a baseline without events', () => {
      state = createMonitorState()
      const result = differ.diff(state, [makePosition({ coin: 'BTC' })], prices({ BTC: 110 }))
      expect(result.baseline).toBe(true)
      expect(result.events).toEqual([])
      expect(state.startTimes.size).toBe(0)
      expect(state.extremes.get('BTC')?.maxProfitPercent).toBeCloseTo(50, 10)
    })

    it('flags a position open before the restart as started unknown at close', () => {
      state = createMonitorState()
      step([makePosition({ coin: 'BTC' })], { BTC: 110 })
      clock = T0 + 3_600_000
      const [closed] = step([], { BTC: 120 })

      if (closed.type !== 'closed') throw new Error(`expected a close, got ${closed.type}`)
      expect(closed.startedUnknown).toBe(true)
      expect(closed.durationMs).toBe(0)
      expect(closed.maxProfitPercent).toBeCloseTo(50, 10)
      expect(closed.maxDrawdownPercent).toBeCloseTo(50, 10)
      expect(closed.pnlPercent).toBeCloseTo(100, 10)
    })
  })

  describe('close pricing', () => {
    it('uses a fresh quote for the final PnL when one is available', () => {
      step([makePosition({ markPrice: 105 })], { BTC: 105 })
      const [closed] = step([], { BTC: 90 })
      expect(closed.referencePrice).toBe(90)
      expect(closed.pnlPercent).toBeCloseTo(-50, 10)
    })

    it('falls back to the last known mark price', () => {
      step([makePosition({ markPrice: 102 })], {})
      const [closed] = step([], {})
      expect(closed.referencePrice).toBe(102)
      expect(closed.pnlPercent).toBeCloseTo(10, 10)
    })

    it('falls back to the final PnL for extremes when none were tracked', () => {
      step([makePosition({ markPrice: 0 })], {})
      expect(state.extremes.get('BTC')).toBeUndefined()
      const [closed] = step([], { BTC: 110 })
      if (closed.type !== 'closed') throw new Error(`expected a close, got ${closed.type}`)
      expect(closed.maxProfitPercent).toBeCloseTo(50, 10)
      expect(closed.maxDrawdownPercent).toBeCloseTo(50, 10)
    })

    it('leaves every PnL field null when no price is known', () => {
      step([makePosition({ markPrice: 0 })], {})
      const [closed] = step([], {})
      expect(closed).toMatchObject({
        referencePrice: null,
        pnlPercent: null,
        maxProfitPercent: null,
        maxDrawdownPercent: null
      })
    })
  })

  describe('partition', () => {
    it('emits one opened per new coin, one closed per gone coin and one resized per changed coin', () => {
      step([
        makePosition({ coin: 'BTC', size: 1 }),
        makePosition({ coin: 'ETH', size: 4 }),
        makePosition({ coin: 'SOL', size: 10 }),
        makePosition({ coin: 'DOGE', size: 500 })
      ])

      const events = step([
        makePosition({ coin: 'BTC', size: 1 }),
        makePosition({ coin: 'ETH', size: 5 }),
        makePosition({ coin: 'ARB', size: 50 }),
        makePosition({ coin: 'OP', size: 30 })
      ])

      expect(count(events, 'opened')).toBe(2)
      expect(count(events, 'closed')).toBe(2)
      expect(count(events, 'resized')).toBe(1)
      expect(events.map(event => `${event.type}:${event.position.coin}`)).toEqual([
        'opened:ARB',
        'opened:OP',
        'resized:ETH',
        'closed:SOL',
        'closed:DOGE'
      ])
    })

    it('returns the new snapshot as the next authoritative state', () => {
      step([makePosition({ coin: 'BTC' }), makePosition({ coin: 'ETH' })])
      const result = differ.diff(state, [makePosition({ coin: 'ETH' })], prices())
      expect(Array.from(result.next.keys())).toEqual(['ETH'])
    })

    it('drops zero-size entries before comparing', () => {
      const events = step([makePosition({ coin: 'BTC', size: 0 })])
      expect(events).toEqual([])
      expect(state.previous?.size).toBe(0)
    })
  })
})

describe('exposure comparison', () => {
  it('detects side, size, entry and leverage changes', () => {
    const base = makePosition()
    expect(hasExposureChanged(base, makePosition({ side: 'short' }))).toBe(true)
    expect(hasExposureChanged(base, makePosition({ size: 2 }))).toBe(true)
    expect(hasExposureChanged(base, makePosition({ entryPrice: 101 }))).toBe(true)
    expect(hasExposureChanged(base, makePosition({ leverage: 10 }))).toBe(true)
    expect(hasExposureChanged(base, makePosition({ markPrice: 150 }))).toBe(false)
  })

  it('classifies by absolute size', () => {
    expect(classifyResize(makePosition({ size: 1 }), makePosition({ size: 1.5 }))).toBe('increased')
    expect(classifyResize(makePosition({ size: 1.5 }), makePosition({ size: 1 }))).toBe('reduced')
    expect(classifyResize(makePosition({ size: 1, side: 'long' }), makePosition({ size: 1, side: 'short' }))).toBe('updated')
  })
})
