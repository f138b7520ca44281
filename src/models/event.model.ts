import type { Position } from './position.model'

export type ResizeDirection = 'increased' | 'reduced' | 'updated'

interface PositionEventBase {
  position: Position
  /** Price the PnL was computed against; null when no usable price existed. */
  referencePrice: number | null
  pnlPercent: number | null
  timestamp: number
}

export interface PositionOpenedEvent extends PositionEventBase {
  type: 'opened'
}

export interface PositionResizedEvent extends PositionEventBase {
  type: 'resized'
  direction: ResizeDirection
  previousPosition: Position
}

export interface PositionClosedEvent extends PositionEventBase {
  type: 'closed'
  durationMs: number
  maxProfitPercent: number | null
  maxDrawdownPercent: number | null
  /** The open was never observed by this process (started before a restart). */
  startedUnknown: boolean
}

export type PositionEvent = PositionOpenedEvent | PositionResizedEvent | PositionClosedEvent
