import dotenv from 'dotenv'
import fs from 'fs'
import path from 'path'
import { isAddress, type Address } from 'viem'
import { z } from 'zod'
import type { Recipient } from '@/models'
import { FatalConfigError, describeError } from '@/utils/errors'
import type { AppConfig } from './config.model'

export type { AppConfig, PlatformConfig } from './config.model'

const RESTART_DELAY_MS = 2000
const REQUEST_TIMEOUT_MS = 10000
const MAX_CONCURRENT_DELIVERIES = 5

const optionalString = z.preprocess(
  value => (value === '' ? undefined : value),
  z.string().optional()
)

function envNumber(defaultValue: number, schema: z.ZodNumber) {
  return z.preprocess(
    value => (value === undefined || value === '' ? defaultValue : Number(value)),
    schema
  )
}

function envBoolean(defaultValue: boolean) {
  return z.preprocess(
    value => (value === undefined || value === '' ? defaultValue : String(value).toLowerCase() === 'true'),
    z.boolean()
  )
}

const envSchema = z.object({
  TRACKED_WALLET: z.custom<Address>(
    value => typeof value === 'string' && isAddress(value),
    { message: 'must be a 0x-prefixed 20-byte address' }
  ),
  IS_TESTNET: envBoolean(false),
  MONITORING_INTERVAL_SECONDS: envNumber(10, z.number().positive()),
  ERROR_BACKOFF_MULTIPLIER: envNumber(3, z.number().min(3)),
  DISCORD_BOT_TOKEN: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  STATUS_PORT: z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().min(1).max(65535).optional()
  ),
  STATUS_HOST: z.string().min(1).default('127.0.0.1'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: envBoolean(false)
})

const discordSchema = z.object({
  enabled: z.boolean().default(true),
  servers: z.array(z.object({
    name: z.string().min(1),
    channelId: z.string().regex(/^\d+$/, 'must be a numeric Discord id'),
    roleId: z.string().regex(/^\d+$/, 'must be a numeric Discord id').optional()
  })).default([])
})

const telegramSchema = z.object({
  enabled: z.boolean().default(true),
  chats: z.array(z.object({
    name: z.string().min(1),
    chatId: z.union([z.string().min(1), z.number().int()]).transform(String),
    tag: z.string().min(1).optional()
  })).default([])
})

const recipientsSchema = z.object({
  discord: discordSchema.optional(),
  telegram: telegramSchema.optional()
})

function formatIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map(issue => {
    const location = [prefix, ...issue.path.map(String)].filter(Boolean).join('.')
    return `${location}: ${issue.message}`
  })
}

/**
 * Validates environment variables and the recipients document. Collects every
 * problem before failing so the operator can fix them in one pass.
 */
export function parseConfig(env: Record<string, string | undefined>, recipientsDocument: unknown): AppConfig {
  const envResult = envSchema.safeParse(env)
  const recipientsResult = recipientsSchema.safeParse(recipientsDocument)

  const issues: string[] = []
  if (!envResult.success) issues.push(...formatIssues(envResult.error, ''))
  if (!recipientsResult.success) issues.push(...formatIssues(recipientsResult.error, 'recipients'))
  if (!envResult.success || !recipientsResult.success) {
    throw new FatalConfigError(issues)
  }

  const vars = envResult.data
  const discord = recipientsResult.data.discord
  const telegram = recipientsResult.data.telegram
  const recipients: Recipient[] = []

  const discordEnabled = discord !== undefined && discord.enabled && discord.servers.length > 0
  if (discordEnabled) {
    if (!vars.DISCORD_BOT_TOKEN) issues.push('DISCORD_BOT_TOKEN: required when Discord servers are enabled')
    for (const server of discord.servers) {
      recipients.push({
        platform: 'discord',
        destinationId: server.channelId,
        displayName: server.name,
        mention: server.roleId
      })
    }
  }

  const telegramEnabled = telegram !== undefined && telegram.enabled && telegram.chats.length > 0
  if (telegramEnabled) {
    if (!vars.TELEGRAM_BOT_TOKEN) issues.push('TELEGRAM_BOT_TOKEN: required when Telegram chats are enabled')
    for (const chat of telegram.chats) {
      recipients.push({
        platform: 'telegram',
        destinationId: chat.chatId,
        displayName: chat.name,
        mention: chat.tag
      })
    }
  }

  if (recipients.length === 0) {
    issues.push('recipients: at least one enabled Discord server or Telegram chat is required')
  }
  if (issues.length > 0) {
    throw new FatalConfigError(issues)
  }

  return {
    trackedWallet: vars.TRACKED_WALLET,
    isTestnet: vars.IS_TESTNET,
    monitoringIntervalMs: vars.MONITORING_INTERVAL_SECONDS * 1000,
    errorBackoffMultiplier: vars.ERROR_BACKOFF_MULTIPLIER,
    restartDelayMs: RESTART_DELAY_MS,
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
    maxConcurrentDeliveries: MAX_CONCURRENT_DELIVERIES,
    statusPort: vars.STATUS_PORT ?? null,
    statusHost: vars.STATUS_HOST,
    logLevel: vars.LOG_LEVEL,
    logPretty: vars.LOG_PRETTY,
    discord: { enabled: discordEnabled, botToken: vars.DISCORD_BOT_TOKEN ?? null },
    telegram: { enabled: telegramEnabled, botToken: vars.TELEGRAM_BOT_TOKEN ?? null },
    recipients
  }
}

function readRecipientsDocument(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new FatalConfigError([`${configPath}: not found. Create it from recipients.example.json`])
  }
  try {
    return JSON.parse(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    throw new FatalConfigError([`${configPath}: ${describeError(error)}`])
  }
}

export function loadConfig(): AppConfig {
  dotenv.config({ path: path.resolve(process.cwd(), '.env') })
  const configPath = path.resolve(process.cwd(), process.env.CONFIG_PATH || 'recipients.json')
  return parseConfig(process.env, readRecipientsDocument(configPath))
}
