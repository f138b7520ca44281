import TelegramBot from 'node-telegram-bot-api'
import type { NotificationChannel, Recipient } from '@/models'
import { withTimeout } from '@/utils/timeout.utils'

export type TelegramSender = Pick<TelegramBot, 'sendMessage'>

export class TelegramService implements NotificationChannel {
  readonly platform = 'telegram' as const

  constructor(
    private bot: TelegramSender,
    private timeoutMs: number
  ) {}

  static fromToken(botToken: string, timeoutMs: number): TelegramService {
    return new TelegramService(new TelegramBot(botToken, { polling: false }), timeoutMs)
  }

  async deliver(recipient: Recipient, text: string): Promise<void> {
    await withTimeout(
      this.bot.sendMessage(recipient.destinationId, text, {
        parse_mode: 'HTML',
        disable_web_page_preview: true
      }),
      this.timeoutMs,
      `Telegram sendMessage to ${recipient.displayName}`
    )
  }
}
