export type Platform = 'discord' | 'telegram'

export interface Recipient {
  platform: Platform
  /** Discord channel id or Telegram chat id. */
  destinationId: string
  displayName: string
  /** Discord role id, or a Telegram tag such as `@traders`. */
  mention?: string
}

export interface NotificationChannel {
  readonly platform: Platform
  deliver(recipient: Recipient, text: string): Promise<void>
}

export type DeliveryResult =
  | { recipient: Recipient; ok: true }
  | { recipient: Recipient; ok: false; error: string }
