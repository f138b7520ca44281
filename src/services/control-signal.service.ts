import type { ControlIntent } from '@/models'

/**
 * Single-slot handoff from operator inputs to the monitoring loop. The first
 * intent sent wins and wakes any pending sleep.
 */
export class ControlSignal {
  private intent: ControlIntent | null = null
  private waiters: Array<() => void> = []

  send(intent: ControlIntent): boolean {
    if (this.intent !== null) return false
    this.intent = intent
    for (const wake of this.waiters.splice(0)) {
      wake()
    }
    return true
  }

  get current(): ControlIntent | null {
    return this.intent
  }

  get isSet(): boolean {
    return this.intent !== null
  }

  /** Resolves after `ms`, or as soon as an intent arrives. */
  sleep(ms: number): Promise<void> {
    if (this.intent !== null) return Promise.resolve()

    return new Promise(resolve => {
      const wake = (): void => {
        clearTimeout(timer)
        this.waiters = this.waiters.filter(waiter => waiter !== wake)
        resolve()
      }
      const timer = setTimeout(wake, ms)
      this.waiters.push(wake)
    })
  }
}
