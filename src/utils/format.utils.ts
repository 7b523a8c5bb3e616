import type {
  Balance,
  Notification,
  OperationalAlert,
  Position,
  PositionChangeEvent,
  PositionSide,
  StoredState
} from '@/models'
import { shortWallet } from './async.utils'

const LINE = '━━━━━━━━━━━━━━━━━━'

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

export function formatUsd(value: number): string {
  const abs = Math.abs(value).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2
  })
  return value < 0 ? `-$${abs}` : `$${abs}`
}

export function formatPnl(value: number): string {
  if (value > 0) return `🟢 <b>+${formatUsd(value)}</b>`
  if (value < 0) return `🔴 <b>${formatUsd(value)}</b>`
  return '⚪ <b>$0.00</b>'
}

export function formatPercent(ratio: number): string {
  const sign = ratio > 0 ? '+' : ''
  return `${sign}${(ratio * 100).toFixed(2)}%`
}

export function formatSize(size: number): string {
  return String(parseFloat(size.toFixed(6)))
}

export function formatSide(side: PositionSide): string {
  return side === 'long' ? '🟢 LONG' : '🔴 SHORT'
}

function formatLeverage(leverage: number): string {
  return `${parseFloat(leverage.toFixed(1))}x`
}

function header(icon: string, title: string): string {
  return `${icon} <b>${title}</b> ${icon}\n${LINE}`
}

function coinLine(position: Position): string {
  return `🪙 <b>${escapeHtml(position.coin)}</b> — ${formatSide(position.side)}`
}

function formatChange(event: PositionChangeEvent): string {
  const wallet = `👛 ${shortWallet(event.wallet)}`
  const coin = escapeHtml(event.coin)

  switch (event.type) {
    case 'opened': {
      const p = event.position
      return [
        header('🟢🟢🟢', 'POSITION OPENED'),
        wallet,
        coinLine(p),
        `📏 Size: <b>${formatSize(p.size)} ${coin}</b>`,
        `💵 Entry: <b>${formatUsd(p.entryPrice)}</b>`,
        `⚡ Leverage: <b>${formatLeverage(p.leverage)}</b>`,
        `💎 Value: ${formatUsd(p.notionalValue)}`
      ].join('\n')
    }

    case 'closed': {
      const p = event.previous
      const lines = [
        header('🔴🔴🔴', 'POSITION CLOSED'),
        wallet,
        `🪙 <b>${coin}</b>`,
        `📊 Side: ${formatSide(p.side)} → Closed`,
        `💵 Entry: ${formatUsd(p.entryPrice)}`,
        `📏 Size: ${formatSize(p.size)} ${coin}`
      ]
      if (event.realizedPnl !== null) {
        lines.push(`💰 Realized PnL: ${formatPnl(event.realizedPnl)}`)
      }
      return lines.join('\n')
    }

    case 'increased':
    case 'decreased': {
      const increased = event.type === 'increased'
      const icon = increased ? '📈📈📈' : '📉📉📉'
      const before = event.previous
      const after = event.position
      return [
        header(icon, increased ? 'POSITION INCREASED' : 'POSITION DECREASED'),
        wallet,
        coinLine(after),
        `📏 Size: ${formatSize(before.size)} → <b>${formatSize(after.size)} ${coin}</b>`,
        `💵 Entry: ${formatUsd(before.entryPrice)} → <b>${formatUsd(after.entryPrice)}</b>`,
        `⚡ Leverage: <b>${formatLeverage(after.leverage)}</b>`,
        `💎 Value: ${formatUsd(after.notionalValue)}`,
        `💰 Unrealized PnL: ${formatPnl(after.unrealizedPnl)}`
      ].join('\n')
    }

    case 'leverage_changed':
      return [
        header('⚡⚡⚡', 'LEVERAGE CHANGED'),
        wallet,
        coinLine(event.position),
        `⚡ Leverage: ${formatLeverage(event.previous.leverage)} → <b>${formatLeverage(event.position.leverage)}</b>`,
        `📏 Size: ${formatSize(event.position.size)} ${coin}`
      ].join('\n')
  }
}

function formatAlert(alert: OperationalAlert): string {
  const wallet = shortWallet(alert.wallet)
  const detail = escapeHtml(alert.detail)

  switch (alert.kind) {
    case 'reconnecting':
      return [
        '⚠️ <b>Bot Alert</b>',
        `Stream disconnected for ${wallet}: ${detail}`,
        `Reconnecting (attempt ${alert.retryAttempt ?? '?'}, next retry in ${alert.nextRetryInSeconds ?? '?'}s)`
      ].join('\n')
    case 'reconnected':
      return `✅ <b>Stream restored</b>\n${wallet}: ${detail}`
    case 'store_write_failed':
      return `🛑 <b>State write failed</b>\n${wallet}: ${detail}`
    case 'pipeline_restarted':
      return `♻️ <b>Monitor restarted</b>\n${wallet}: ${detail}`
  }
}

export function formatNotification(notification: Notification): string {
  return notification.type === 'alert' ? formatAlert(notification) : formatChange(notification)
}

export function formatPositionSummary(wallet: string, state: StoredState | null): string {
  if (!state || state.positions.size === 0) {
    return `📊 <b>${shortWallet(wallet)}</b>\n😴 No open positions.`
  }

  const lines = [`📊 <b>Positions — ${shortWallet(wallet)}</b>`, LINE]
  let totalPnl = 0
  const coins = Array.from(state.positions.keys()).sort()

  for (const coin of coins) {
    const p = state.positions.get(coin)
    if (!p) continue
    totalPnl += p.unrealizedPnl
    lines.push(
      coinLine(p),
      `  📏 Size: ${formatSize(p.size)} ${escapeHtml(p.coin)}`,
      `  💵 Entry: ${formatUsd(p.entryPrice)}`,
      `  ⚡ Leverage: ${formatLeverage(p.leverage)}`,
      `  💎 Value: ${formatUsd(p.notionalValue)}`,
      `  💰 PnL: ${formatPnl(p.unrealizedPnl)} (${formatPercent(p.returnOnEquity)})`
    )
  }

  lines.push(LINE, `💰 Total PnL: ${formatPnl(totalPnl)}`)
  lines.push(`🕒 As of ${new Date(state.lastReconciledAt).toISOString()}`)
  return lines.join('\n')
}

export function formatBalance(wallet: string, balance: Balance): string {
  return [
    `💰 <b>Balance — ${shortWallet(wallet)}</b>`,
    LINE,
    `🏦 Account Value: <b>${formatUsd(balance.accountValue)}</b>`,
    `📊 Position Value: ${formatUsd(balance.totalNotional)}`,
    `🔒 Margin Used: ${formatUsd(balance.totalMarginUsed)}`,
    `💸 Withdrawable: <b>${formatUsd(balance.withdrawable)}</b>`
  ].join('\n')
}

export function formatHelp(wallets: string[]): string {
  return [
    '🤖 <b>Position Monitor</b>',
    '',
    `Monitoring: ${wallets.map(shortWallet).join(', ')}`,
    '',
    'Commands:',
    '/position - Positions &amp; unrealized PnL',
    '/balance - Wallet balance',
    '/help - Show this message'
  ].join('\n')
}

export function formatStartup(wallets: string[]): string {
  return `🤖 Bot started\nMonitoring: ${wallets.map(shortWallet).join(', ')}\nWallets: ${wallets.length}`
}
