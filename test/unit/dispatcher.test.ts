import { describe, it, expect } from 'vitest'
import type { NotificationChannel, PositionOpenedEvent, Recipient } from '@/models'
import { DispatcherService } from '@/services/dispatcher.service'
import { NotificationFormatterService } from '@/services/notification-formatter.service'
import { LEVEL, createCapturingLogger, createSilentLogger } from '../helpers/logger'
import { makePosition } from '../fixtures/positions'

interface Delivery {
  destinationId: string
  text: string
}

class FakeChannel implements NotificationChannel {
  deliveries: Delivery[] = []
  active = 0
  peakActive = 0

  constructor(
    readonly platform: NotificationChannel['platform'],
    private failFor: ReadonlySet<string> = new Set()
  ) {}

  async deliver(recipient: Recipient, text: string): Promise<void> {
    this.active++
    this.peakActive = Math.max(this.peakActive, this.active)
    await new Promise(resolve => setTimeout(resolve, 1))
    this.active--
    if (this.failFor.has(recipient.destinationId)) {
      throw new Error('channel unavailable')
    }
    this.deliveries.push({ destinationId: recipient.destinationId, text })
  }
}

function discord(id: string, name: string): Recipient {
  return { platform: 'discord', destinationId: id, displayName: name }
}

const EVENT: PositionOpenedEvent = {
  type: 'opened',
  position: makePosition(),
  referencePrice: 110,
  pnlPercent: 50,
  timestamp: Date.UTC(2024, 0, 2, 3, 4, 5)
}

describe('DispatcherService', () => {
  it('delivers to the remaining recipients when one fails', async () => {
    const { logger, records } = createCapturingLogger()
    const channel = new FakeChannel('discord', new Set(['2']))
    const recipients = [discord('1', 'First'), discord('2', 'Second'), discord('3', 'Third')]
    const dispatcher = new DispatcherService(recipients, [channel], new NotificationFormatterService(logger), logger)

    const results = await dispatcher.dispatch(EVENT)

    expect(channel.deliveries.map(delivery => delivery.destinationId)).toEqual(['1', '3'])
    expect(results.map(result => result.ok)).toEqual([true, false, true])
    expect(results[1]).toEqual({
      recipient: recipients[1],
      ok: false,
      error: 'Delivery to discord:Second failed: channel unavailable'
    })

    const failures = records.filter(record => record.level === LEVEL.error)
    expect(failures).toHaveLength(1)
    expect(failures[0]).toMatchObject({
      msg: 'Notification delivery failed',
      component: 'dispatcher',
      platform: 'discord',
      recipient: 'Second'
    })
    expect(records.filter(record => record.msg === 'Notification delivered')).toHaveLength(2)
  })

  it('renders the message for each recipient', async () => {
    const channel = new FakeChannel('discord')
    const recipients: Recipient[] = [
      { ...discord('1', 'First'), mention: '42' },
      discord('2', 'Second')
    ]
    const dispatcher = new DispatcherService(recipients, [channel], new NotificationFormatterService(createSilentLogger()), createSilentLogger())

    await dispatcher.dispatch(EVENT)

    expect(channel.deliveries[0].text.startsWith('<@&42>\n\n## 🚀 **NEW POSITION**')).toBe(true)
    expect(channel.deliveries[1].text.startsWith('## 🚀 **NEW POSITION**')).toBe(true)
  })

  it('routes recipients to the channel of their platform', async () => {
    const discordChannel = new FakeChannel('discord')
    const telegramChannel = new FakeChannel('telegram')
    const recipients: Recipient[] = [
      discord('1', 'Server'),
      { platform: 'telegram', destinationId: '-100', displayName: 'Chat' }
    ]
    const dispatcher = new DispatcherService(
      recipients,
      [discordChannel, telegramChannel],
      new NotificationFormatterService(createSilentLogger()),
      createSilentLogger()
    )

    await dispatcher.broadcast(recipient => `hello ${recipient.displayName}`)

    expect(discordChannel.deliveries).toEqual([{ destinationId: '1', text: 'hello Server' }])
    expect(telegramChannel.deliveries).toEqual([{ destinationId: '-100', text: 'hello Chat' }])
  })

  it('reports recipients whose platform has no channel', async () => {
    const recipients: Recipient[] = [{ platform: 'telegram', destinationId: '-100', displayName: 'Chat' }]
    const dispatcher = new DispatcherService(recipients, [], new NotificationFormatterService(createSilentLogger()), createSilentLogger())

    const [result] = await dispatcher.broadcast(() => 'text')

    expect(result).toEqual({
      recipient: recipients[0],
      ok: false,
      error: 'Delivery to telegram:Chat failed: no telegram channel is enabled'
    })
  })

  it('bounds concurrent deliveries', async () => {
    const channel = new FakeChannel('discord')
    const recipients = Array.from({ length: 7 }, (_, index) => discord(String(index), `Server ${index}`))
    const dispatcher = new DispatcherService(recipients, [channel], new NotificationFormatterService(createSilentLogger()), createSilentLogger(), 3)

    const results = await dispatcher.broadcast(() => 'text')

    expect(results).toHaveLength(7)
    expect(results.every(result => result.ok)).toBe(true)
    expect(channel.peakActive).toBe(3)
    expect(channel.deliveries.map(delivery => delivery.destinationId)).toHaveLength(7)
  })

  it('returns no results without recipients', async () => {
    const dispatcher = new DispatcherService([], [], new NotificationFormatterService(createSilentLogger()), createSilentLogger())
    expect(await dispatcher.dispatch(EVENT)).toEqual([])
    expect(dispatcher.recipientCount).toBe(0)
  })
})
