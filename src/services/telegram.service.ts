import TelegramBot from 'node-telegram-bot-api'
import { BalanceProvider, errorMessage, Notification } from '@/models'
import { TelegramConfig } from '@/config/config.model'
import {
  escapeHtml,
  formatBalance,
  formatHelp,
  formatNotification,
  formatPositionSummary,
  formatStartup
} from '@/utils/format.utils'
import { NotificationSink } from './notification-dispatcher.service'
import { ReadonlyStateStore } from './state-store.service'

export type TelegramCommand = 'start' | 'help' | 'position' | 'balance'

const SHORTCUT_KEYBOARD: TelegramBot.InlineKeyboardMarkup = {
  inline_keyboard: [
    [
      { text: '📊 Position', callback_data: 'position' },
      { text: '💰 Balance', callback_data: 'balance' }
    ]
  ]
}

interface TelegramDeps {
  store: ReadonlyStateStore
  balances: BalanceProvider
  wallets: string[]
}

/**
 * Outbound sink for change events and alerts, plus the inbound command surface.
 * Commands only read: positions come from the state store, balances from the exchange.
 */
export class TelegramService implements NotificationSink {
  private readonly chatId: string

  constructor(
    private bot: TelegramBot,
    telegramConfig: TelegramConfig,
    private deps: TelegramDeps
  ) {
    this.chatId = telegramConfig.chatId
    if (telegramConfig.polling) {
      this.setupCommands()
      this.setupCallbackHandlers()
      this.setupErrorHandlers()
    }
  }

  private isAuthorized(chatId: number | string): boolean {
    return chatId.toString() === this.chatId
  }

  private setupErrorHandlers(): void {
    this.bot.on('polling_error', (error) => {
      console.error('Telegram polling error:', error.message)
    })

    this.bot.on('error', (error) => {
      console.error('Telegram bot error:', error.message)
    })
  }

  private setupCommands(): void {
    const commands: TelegramCommand[] = ['start', 'help', 'position', 'balance']
    for (const command of commands) {
      this.bot.onText(new RegExp(`^/${command}(?:@\\w+)?$`), (msg) => {
        this.runCommand(msg.chat.id, command)
      })
    }
  }

  private setupCallbackHandlers(): void {
    this.bot.on('callback_query', (query) => {
      if (!query.message) return
      const chatId = query.message.chat.id
      this.bot.answerCallbackQuery(query.id).catch(error => {
        console.error('Failed to answer callback:', errorMessage(error))
      })
      if (query.data === 'position' || query.data === 'balance') {
        this.runCommand(chatId, query.data)
      }
    })
  }

  private runCommand(chatId: number | string, command: TelegramCommand): void {
    this.handleCommand(chatId, command).catch(error => {
      console.error(`Telegram /${command} failed:`, errorMessage(error))
    })
  }

  async handleCommand(chatId: number | string, command: TelegramCommand): Promise<void> {
    if (!this.isAuthorized(chatId)) return

    switch (command) {
      case 'start':
      case 'help':
        await this.send(chatId, formatHelp(this.deps.wallets))
        break

      case 'position':
        for (const wallet of this.deps.wallets) {
          try {
            const state = await this.deps.store.get(wallet)
            await this.send(chatId, formatPositionSummary(wallet, state))
          } catch (error) {
            await this.send(chatId, `Error: ${escapeHtml(errorMessage(error))}`)
          }
        }
        break

      case 'balance':
        for (const wallet of this.deps.wallets) {
          try {
            const balance = await this.deps.balances.fetchBalance(wallet)
            await this.send(chatId, formatBalance(wallet, balance))
          } catch (error) {
            await this.send(chatId, `Error: ${escapeHtml(errorMessage(error))}`)
          }
        }
        break
    }
  }

  async deliver(notification: Notification): Promise<void> {
    await this.send(this.chatId, formatNotification(notification))
  }

  async sendStartup(): Promise<void> {
    await this.send(this.chatId, formatStartup(this.deps.wallets))
  }

  async stop(): Promise<void> {
    if (this.bot.isPolling()) {
      await this.bot.stopPolling()
    }
  }

  private async send(chatId: number | string, text: string): Promise<void> {
    await this.bot.sendMessage(chatId, text, {
      parse_mode: 'HTML',
      reply_markup: SHORTCUT_KEYBOARD
    })
  }
}
