import type { Recipient } from '@/models'

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class PositionMonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PositionMonitorError'
  }
}

/** Position or price retrieval failed. Never fatal: the cycle skips or falls back. */
export class FetchError extends PositionMonitorError {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`${operation} failed: ${describeError(cause)}`, { cause })
    this.name = 'FetchError'
  }
}

export class DeliveryError extends PositionMonitorError {
  constructor(
    public readonly recipient: Recipient,
    cause: unknown
  ) {
    super(`Delivery to ${recipient.platform}:${recipient.displayName} failed: ${describeError(cause)}`, { cause })
    this.name = 'DeliveryError'
  }
}

export class FormatError extends PositionMonitorError {
  constructor(message: string) {
    super(message)
    this.name = 'FormatError'
  }
}

/** Missing or invalid configuration at startup; the only error that halts the process. */
export class FatalConfigError extends PositionMonitorError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`)
    this.name = 'FatalConfigError'
  }
}
