import type { Address } from 'viem'
import type { Recipient } from '@/models'

export interface PlatformConfig {
  enabled: boolean
  botToken: string | null
}

export interface AppConfig {
  trackedWallet: Address
  isTestnet: boolean
  monitoringIntervalMs: number
  errorBackoffMultiplier: number
  restartDelayMs: number
  requestTimeoutMs: number
  maxConcurrentDeliveries: number
  statusPort: number | null
  statusHost: string
  logLevel: string
  logPretty: boolean
  discord: PlatformConfig
  telegram: PlatformConfig
  recipients: Recipient[]
}
