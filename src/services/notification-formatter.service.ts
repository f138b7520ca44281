import type {
  MonitorStatus,
  Platform,
  PositionClosedEvent,
  PositionEvent,
  Recipient,
  ResizeDirection
} from '@/models'
import { FormatError, describeError } from '@/utils/errors'
import {
  formatAddress,
  formatClockTime,
  formatDuration,
  formatLeverage,
  formatPercent,
  formatPrice
} from '@/utils/format.utils'
import type { Logger } from './logger.service'

interface Markup {
  mention(value: string): string
  heading(emoji: string, title: string): string
  bold(text: string): string
  italic(text: string): string
  field(emoji: string, label: string, value: string): string
  bullet(label: string, value: string): string
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

const discordMarkup: Markup = {
  mention: roleId => `<@&${roleId}>`,
  heading: (emoji, title) => `## ${emoji} **${title}**`,
  bold: text => `**${text}**`,
  italic: text => `*${text}*`,
  field: (emoji, label, value) => `**${emoji} ${label}:** \`${value}\``,
  bullet: (label, value) => `• **${label}:** \`${value}\``
}

const telegramMarkup: Markup = {
  mention: tag => escapeHtml(tag),
  heading: (emoji, title) => `${emoji} <b>${escapeHtml(title)}</b>`,
  bold: text => `<b>${escapeHtml(text)}</b>`,
  italic: text => `<i>${escapeHtml(text)}</i>`,
  field: (emoji, label, value) => `${emoji} ${escapeHtml(label)}: <code>${escapeHtml(value)}</code>`,
  bullet: (label, value) => `• ${escapeHtml(label)}: <code>${escapeHtml(value)}</code>`
}

const MARKUP: Record<Platform, Markup> = {
  discord: discordMarkup,
  telegram: telegramMarkup
}

const RESIZE_HEADERS: Record<ResizeDirection, { title: string; emoji: string; accent: string }> = {
  increased: { title: 'POSITION INCREASED (DCA)', emoji: '📈', accent: '🔵' },
  reduced: { title: 'POSITION REDUCED', emoji: '📉', accent: '🟡' },
  updated: { title: 'POSITION UPDATED', emoji: '📋', accent: '⚪' }
}

function pnlEmoji(pnlPercent: number | null): string {
  if (pnlPercent === null || pnlPercent === 0) return '🟡'
  return pnlPercent > 0 ? '🟢' : '🔴'
}

function closeEmoji(pnlPercent: number | null): string {
  if (pnlPercent === null || pnlPercent === 0) return '😐'
  return pnlPercent > 0 ? '🎉' : '💔'
}

function assertFormattable(event: PositionEvent): void {
  const { coin, entryPrice, leverage } = event.position
  if (!coin) throw new FormatError('position has no coin')
  if (!Number.isFinite(entryPrice)) throw new FormatError(`entry price for ${coin} is not a number`)
  if (!Number.isFinite(leverage)) throw new FormatError(`leverage for ${coin} is not a number`)
}

export interface StartupInfo {
  trackedWallet: string
  isTestnet: boolean
  intervalMs: number
  startedAt: number
}

/**
 * Renders position events per recipient. Content is identical across
 * recipients; only the markup and the mention line differ.
 */
export class NotificationFormatterService {
  private logger: Logger

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'formatter' })
  }

  formatEvent(event: PositionEvent, recipient: Recipient): string {
    try {
      assertFormattable(event)
      const markup = MARKUP[recipient.platform]
      const body = event.type === 'closed'
        ? this.renderClosed(event, markup)
        : this.renderOpenOrResize(event, markup)
      return recipient.mention ? `${markup.mention(recipient.mention)}\n\n${body}` : body
    } catch (error) {
      const coin = event.position.coin || 'UNKNOWN'
      this.logger.error({ coin, recipient: recipient.displayName, err: describeError(error) }, 'Failed to format notification')
      return `❌ Error formatting trade data for ${coin}`
    }
  }

  formatStartupMessage(info: StartupInfo, recipient: Recipient): string {
    const markup = MARKUP[recipient.platform]
    return [
      markup.heading('🤖', 'POSITION MONITOR ONLINE'),
      '',
      `✅ ${markup.bold('Connected & Ready')}`,
      '',
      markup.bullet('Wallet', formatAddress(info.trackedWallet)),
      markup.bullet('Network', info.isTestnet ? 'TESTNET' : 'MAINNET'),
      markup.bullet('Interval', formatDuration(info.intervalMs)),
      markup.bullet('Started', formatClockTime(info.startedAt)),
      '',
      `🚀 ${markup.bold('Ready to track trades!')}`
    ].join('\n')
  }

  private renderOpenOrResize(event: Exclude<PositionEvent, PositionClosedEvent>, markup: Markup): string {
    const { position } = event
    const side = position.side.toUpperCase()
    const header = event.type === 'opened'
      ? { title: 'NEW POSITION', emoji: '🚀', accent: position.side === 'long' ? '🟢' : '🔴' }
      : RESIZE_HEADERS[event.direction]

    return [
      markup.heading(header.emoji, header.title),
      '',
      `${header.accent} ${markup.bold(position.coin)} • ${markup.bold(side)} (${formatLeverage(position.leverage)})`,
      '',
      markup.field('💰', 'Entry Price', formatPrice(position.entryPrice)),
      markup.field('📈', 'Current Price', formatPrice(event.referencePrice)),
      markup.field(pnlEmoji(event.pnlPercent), 'PnL', formatPercent(event.pnlPercent)),
      '',
      `⏰ ${formatClockTime(event.timestamp)}`
    ].join('\n')
  }

  private renderClosed(event: PositionClosedEvent, markup: Markup): string {
    const { position } = event
    const side = position.side.toUpperCase()
    const lines = [
      `${markup.heading('🔒', 'POSITION CLOSED')} ${closeEmoji(event.pnlPercent)}`,
      '',
      `${pnlEmoji(event.pnlPercent)} ${markup.bold(position.coin)} • ${markup.bold(side)} (${formatLeverage(position.leverage)}) • Final Result: ${markup.bold(formatPercent(event.pnlPercent))}`,
      '',
      markup.field('💰', 'Entry Price', formatPrice(position.entryPrice)),
      markup.field('🏁', 'Exit Price', formatPrice(event.referencePrice)),
      '',
      `📊 ${markup.bold('Performance Summary:')}`,
      markup.bullet('Max Profit', formatPercent(event.maxProfitPercent)),
      markup.bullet('Max Drawdown', formatPercent(event.maxDrawdownPercent)),
      markup.bullet('Duration', formatDuration(event.durationMs)),
      '',
      `⏰ Closed at ${formatClockTime(event.timestamp)}`
    ]

    if (event.startedUnknown) {
      lines.push(`⚠️ ${markup.italic('Opened while the monitor was offline')}`)
    }
    return lines.join('\n')
  }
}

export function formatStatus(status: MonitorStatus): string {
  const coins = status.activeCoins.length > 0 ? ` (${status.activeCoins.join(', ')})` : ''
  return [
    `Monitor state: ${status.phase}`,
    `Active positions: ${status.activeCoins.length}${coins}`,
    `Monitoring interval: ${formatDuration(status.intervalMs)}`,
    `Configured recipients: ${status.configuredRecipients}`,
    `Cycles completed: ${status.cycles}`,
    `Last poll: ${status.lastPollAt === null ? 'never' : formatClockTime(status.lastPollAt)}`
  ].join('\n')
}
