import { setTimeout as sleep } from 'timers/promises'
import { createStatusApp, startServer, stopServer } from '@/api/server'
import { loadConfig, type AppConfig } from '@/config'
import type { ControlIntent, NotificationChannel } from '@/models'
import { CommandListenerService } from '@/services/command-listener.service'
import { ControlSignal } from '@/services/control-signal.service'
import { DiscordService } from '@/services/discord.service'
import { DispatcherService } from '@/services/dispatcher.service'
import { HyperliquidService } from '@/services/hyperliquid.service'
import { createLogger, type Logger } from '@/services/logger.service'
import { MonitorHandle } from '@/services/monitor-handle.service'
import { NotificationFormatterService } from '@/services/notification-formatter.service'
import { PositionMonitorService } from '@/services/position-monitor.service'
import { SnapshotDifferService } from '@/services/snapshot-differ.service'
import { TelegramService } from '@/services/telegram.service'
import { FatalConfigError, describeError } from '@/utils/errors'
import { formatAddress } from '@/utils/format.utils'

function createChannels(config: AppConfig): NotificationChannel[] {
  const channels: NotificationChannel[] = []
  if (config.discord.enabled && config.discord.botToken) {
    channels.push(new DiscordService(config.discord.botToken, { timeoutMs: config.requestTimeoutMs }))
  }
  if (config.telegram.enabled && config.telegram.botToken) {
    channels.push(TelegramService.fromToken(config.telegram.botToken, config.requestTimeoutMs))
  }
  return channels
}

/** Builds every service from scratch and runs until a stop or restart intent arrives. */
async function runMonitor(config: AppConfig, logger: Logger, handle: MonitorHandle): Promise<ControlIntent> {
  const formatter = new NotificationFormatterService(logger)
  const dispatcher = new DispatcherService(
    config.recipients,
    createChannels(config),
    formatter,
    logger,
    config.maxConcurrentDeliveries
  )
  const monitor = new PositionMonitorService(
    HyperliquidService.create(config.trackedWallet, {
      isTestnet: config.isTestnet,
      requestTimeoutMs: config.requestTimeoutMs
    }, logger),
    new SnapshotDifferService(logger),
    dispatcher,
    new ControlSignal(),
    logger,
    {
      intervalMs: config.monitoringIntervalMs,
      errorBackoffMultiplier: config.errorBackoffMultiplier
    }
  )

  handle.attach(monitor)
  try {
    const startedAt = Date.now()
    await dispatcher.broadcast(recipient => formatter.formatStartupMessage({
      trackedWallet: config.trackedWallet,
      isTestnet: config.isTestnet,
      intervalMs: config.monitoringIntervalMs,
      startedAt
    }, recipient))
    return await monitor.run()
  } finally {
    handle.detach()
  }
}

async function main(): Promise<void> {
  let config: AppConfig
  try {
    config = loadConfig()
  } catch (error) {
    if (error instanceof FatalConfigError) {
      createLogger().fatal({ issues: error.issues }, 'Invalid configuration, see .env.example and recipients.example.json')
      process.exit(1)
    }
    throw error
  }

  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty })
  logger.info({
    wallet: formatAddress(config.trackedWallet),
    network: config.isTestnet ? 'testnet' : 'mainnet',
    intervalMs: config.monitoringIntervalMs,
    recipients: config.recipients.length
  }, 'Position monitor starting')

  const handle = new MonitorHandle(config.monitoringIntervalMs, config.recipients.length)
  const commands = new CommandListenerService(handle, logger)
  commands.start()

  const server = config.statusPort !== null
    ? await startServer(createStatusApp(handle), config.statusPort, config.statusHost, logger)
    : null

  const shutdown = (): void => handle.requestStop()
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)

  for (;;) {
    const intent = await runMonitor(config, logger, handle)
    if (intent !== 'restart' || handle.stopRequested) break
    logger.info({ delayMs: config.restartDelayMs }, 'Restarting monitor')
    await sleep(config.restartDelayMs)
    if (handle.stopRequested) break
  }

  commands.stop()
  if (server) await stopServer(server)
  logger.info('Position monitor stopped')
  process.exit(0)
}

main().catch(error => {
  console.error('❌ Fatal error:', describeError(error))
  process.exit(1)
})
