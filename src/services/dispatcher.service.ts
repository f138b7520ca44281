import type { DeliveryResult, NotificationChannel, Platform, PositionEvent, Recipient } from '@/models'
import { DeliveryError, describeError } from '@/utils/errors'
import type { NotificationFormatterService } from './notification-formatter.service'
import type { Logger } from './logger.service'

const DEFAULT_MAX_CONCURRENT_DELIVERIES = 5

/**
 * Fans one message out to every configured recipient. Each delivery stands
 * alone: a failure is logged once and reported in the results, never retried
 * within the cycle and never thrown.
 */
export class DispatcherService {
  private channels: Map<Platform, NotificationChannel> = new Map()
  private logger: Logger

  constructor(
    private recipients: readonly Recipient[],
    channels: NotificationChannel[],
    private formatter: NotificationFormatterService,
    logger: Logger,
    private maxConcurrentDeliveries: number = DEFAULT_MAX_CONCURRENT_DELIVERIES
  ) {
    for (const channel of channels) {
      this.channels.set(channel.platform, channel)
    }
    this.logger = logger.child({ component: 'dispatcher' })
  }

  get recipientCount(): number {
    return this.recipients.length
  }

  async dispatch(event: PositionEvent): Promise<DeliveryResult[]> {
    return this.broadcast(recipient => this.formatter.formatEvent(event, recipient))
  }

  async broadcast(render: (recipient: Recipient) => string): Promise<DeliveryResult[]> {
    const results: DeliveryResult[] = []
    const batchSize = Math.max(1, this.maxConcurrentDeliveries)

    for (let i = 0; i < this.recipients.length; i += batchSize) {
      const batch = this.recipients.slice(i, i + batchSize)
      const settled = await Promise.allSettled(batch.map(recipient => this.deliverTo(recipient, render)))

      settled.forEach((outcome, index) => {
        const recipient = batch[index]
        if (outcome.status === 'fulfilled') {
          results.push({ recipient, ok: true })
          return
        }
        const error = describeError(outcome.reason)
        this.logger.error({ platform: recipient.platform, recipient: recipient.displayName, err: error }, 'Notification delivery failed')
        results.push({ recipient, ok: false, error })
      })
    }

    return results
  }

  private async deliverTo(recipient: Recipient, render: (recipient: Recipient) => string): Promise<void> {
    const channel = this.channels.get(recipient.platform)
    if (!channel) {
      throw new DeliveryError(recipient, `no ${recipient.platform} channel is enabled`)
    }

    try {
      await channel.deliver(recipient, render(recipient))
    } catch (error) {
      throw new DeliveryError(recipient, error)
    }
    this.logger.info({ platform: recipient.platform, recipient: recipient.displayName }, 'Notification delivered')
  }
}
