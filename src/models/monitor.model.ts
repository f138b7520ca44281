export type ControlIntent = 'stop' | 'restart'

export type MonitorPhase = 'running' | 'stopping' | 'stopped'

export interface MonitorStatus {
  phase: MonitorPhase
  activeCoins: string[]
  intervalMs: number
  configuredRecipients: number
  cycles: number
  lastPollAt: number | null
}

export interface MonitorControls {
  requestStop(): void
  requestRestart(): void
  status(): MonitorStatus
}
