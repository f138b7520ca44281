import type { MonitorControls, MonitorStatus } from '@/models'

/**
 * Stable control surface for operator inputs while the monitor underneath is
 * rebuilt on every restart.
 */
export class MonitorHandle implements MonitorControls {
  private monitor: MonitorControls | null = null
  private stopped = false

  constructor(
    private intervalMs: number,
    private recipientCount: number
  ) {}

  attach(monitor: MonitorControls): void {
    this.monitor = monitor
    if (this.stopped) {
      monitor.requestStop()
    }
  }

  detach(): void {
    this.monitor = null
  }

  /** Set once stop has been asked for; a pending restart must not run after it. */
  get stopRequested(): boolean {
    return this.stopped
  }

  requestStop(): void {
    this.stopped = true
    this.monitor?.requestStop()
  }

  requestRestart(): void {
    this.monitor?.requestRestart()
  }

  status(): MonitorStatus {
    if (this.monitor) {
      return this.monitor.status()
    }
    return {
      phase: 'stopped',
      activeCoins: [],
      intervalMs: this.intervalMs,
      configuredRecipients: this.recipientCount,
      cycles: 0,
      lastPollAt: null
    }
  }
}
