import TelegramBot from 'node-telegram-bot-api'
import { Balance, BalanceProvider } from '@/models'
import { MemoryStore, OTHER_WALLET, position, silenceConsole, WALLET } from '@/testing/fakes'
import { formatBalance, formatHelp, formatNotification, formatPositionSummary } from '@/utils/format.utils'
import { TelegramService } from './telegram.service'

const CHAT_ID = '12345'

const SENT: TelegramBot.Message = {
  message_id: 1,
  date: 0,
  chat: { id: 12345, type: 'private' }
}

const KEYBOARD_OPTIONS = {
  parse_mode: 'HTML',
  reply_markup: {
    inline_keyboard: [
      [
        { text: '📊 Position', callback_data: 'position' },
        { text: '💰 Balance', callback_data: 'balance' }
      ]
    ]
  }
}

class FakeBalances implements BalanceProvider {
  failFor = new Set<string>()

  async fetchBalance(wallet: string): Promise<Balance> {
    if (this.failFor.has(wallet)) throw new Error('request timed out after <10s>')
    return { accountValue: 1000, totalNotional: 500, totalMarginUsed: 50, withdrawable: 950 }
  }
}

describe('TelegramService', () => {
  let bot: TelegramBot
  let sendMessage: jest.SpyInstance
  let store: MemoryStore
  let balances: FakeBalances
  let telegram: TelegramService

  beforeEach(() => {
    silenceConsole()
    bot = new TelegramBot('test-token', { polling: false })
    sendMessage = jest.spyOn(bot, 'sendMessage').mockResolvedValue(SENT)
    store = new MemoryStore()
    balances = new FakeBalances()
    telegram = new TelegramService(
      bot,
      { botToken: 'test-token', chatId: CHAT_ID, polling: false },
      { store, balances, wallets: [WALLET, OTHER_WALLET] }
    )
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('delivers notifications to the configured chat as HTML', async () => {
    const event = {
      type: 'opened' as const,
      wallet: WALLET,
      coin: 'ETH',
      detectedAt: 0,
      position: position('ETH', 'long', 1)
    }

    await telegram.deliver(event)

    expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, formatNotification(event), KEYBOARD_OPTIONS)
  })

  it('propagates delivery failures', async () => {
    sendMessage.mockRejectedValueOnce(new Error('ETELEGRAM: 429 Too Many Requests'))

    await expect(telegram.sendStartup()).rejects.toThrow('ETELEGRAM: 429 Too Many Requests')
  })

  it('answers /help with the monitored wallets', async () => {
    await telegram.handleCommand(12345, 'help')

    expect(sendMessage).toHaveBeenCalledTimes(1)
    expect(sendMessage).toHaveBeenCalledWith(12345, formatHelp([WALLET, OTHER_WALLET]), KEYBOARD_OPTIONS)
  })

  it('ignores commands from other chats', async () => {
    await telegram.handleCommand(999, 'position')

    expect(sendMessage).not.toHaveBeenCalled()
  })

  it('reports positions from the state store, one message per wallet', async () => {
    await store.put(WALLET, {
      wallet: WALLET,
      positions: new Map([['ETH', position('ETH', 'long', 1)]]),
      sequence: 1,
      fetchedAt: 1000
    })

    await telegram.handleCommand(CHAT_ID, 'position')

    expect(sendMessage.mock.calls.map(call => call[1])).toEqual([
      formatPositionSummary(WALLET, await store.get(WALLET)),
      formatPositionSummary(OTHER_WALLET, null)
    ])
  })

  it('reports a failed balance lookup without skipping the other wallets', async () => {
    balances.failFor.add(WALLET)

    await telegram.handleCommand(CHAT_ID, 'balance')

    expect(sendMessage.mock.calls.map(call => call[1])).toEqual([
      'Error: request timed out after &lt;10s&gt;',
      formatBalance(OTHER_WALLET, {
        accountValue: 1000,
        totalNotional: 500,
        totalMarginUsed: 50,
        withdrawable: 950
      })
    ])
  })
})
