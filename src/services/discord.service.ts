import axios, { type AxiosAdapter, type AxiosInstance } from 'axios'
import type { NotificationChannel, Recipient } from '@/models'

const DISCORD_API_URL = 'https://discord.com/api/v10'

export interface DiscordOptions {
  timeoutMs: number
  adapter?: AxiosAdapter
}

/** Posts to guild channels through the bot REST API; no gateway connection is held. */
export class DiscordService implements NotificationChannel {
  readonly platform = 'discord' as const
  private client: AxiosInstance

  constructor(botToken: string, options: DiscordOptions) {
    this.client = axios.create({
      baseURL: DISCORD_API_URL,
      timeout: options.timeoutMs,
      adapter: options.adapter,
      headers: {
        Authorization: `Bot ${botToken}`,
        'Content-Type': 'application/json'
      }
    })
  }

  async deliver(recipient: Recipient, text: string): Promise<void> {
    const body = {
      content: text,
      allowed_mentions: recipient.mention
        ? { parse: [], roles: [recipient.mention] }
        : { parse: [] }
    }

    try {
      await this.client.post(`/channels/${recipient.destinationId}/messages`, body)
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const detail = typeof error.response.data === 'object' && error.response.data !== null
          ? JSON.stringify(error.response.data)
          : String(error.response.data)
        throw new Error(`Discord API responded ${error.response.status}: ${detail}`)
      }
      throw error
    }
  }
}
