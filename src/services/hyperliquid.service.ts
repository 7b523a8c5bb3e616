import { HttpTransport, PublicClient } from '@nktkas/hyperliquid'
import {
  Balance,
  BalanceProvider,
  errorMessage,
  FetchError,
  Position,
  PositionSnapshotProvider
} from '@/models'
import { parsePositions, sumClosedPnl } from '@/utils/position-parse.utils'

export interface HyperliquidServiceOptions {
  isTestnet: boolean
  timeoutMs?: number
}

export function hyperliquidWsUrl(isTestnet: boolean): string {
  return isTestnet ? 'wss://api.hyperliquid-testnet.xyz/ws' : 'wss://api.hyperliquid.xyz/ws'
}

export class HyperliquidService implements PositionSnapshotProvider, BalanceProvider {
  private publicClient: PublicClient

  constructor(options: HyperliquidServiceOptions) {
    const httpUrl = options.isTestnet
      ? 'https://api.hyperliquid-testnet.xyz'
      : 'https://api.hyperliquid.xyz'

    const httpTransport = new HttpTransport({
      url: httpUrl,
      timeout: options.timeoutMs ?? 30000,
      fetchOptions: { keepalive: false }
    })

    this.publicClient = new PublicClient({ transport: httpTransport })
  }

  async fetchPositions(wallet: string): Promise<Position[]> {
    try {
      const state = await this.publicClient.clearinghouseState({
        user: wallet as `0x${string}`
      })
      return parsePositions(wallet, state.assetPositions.map(asset => asset.position))
    } catch (error) {
      throw new FetchError(`clearinghouseState failed: ${errorMessage(error)}`, wallet, error)
    }
  }

  async fetchClosedPnl(wallet: string, coin: string, sinceMs: number): Promise<number | null> {
    try {
      const fills = await this.publicClient.userFillsByTime({
        user: wallet as `0x${string}`,
        startTime: sinceMs
      })
      return sumClosedPnl(fills, coin)
    } catch (error) {
      console.warn(`⚠ Could not load fills for ${coin} (${wallet}): ${errorMessage(error)}`)
      return null
    }
  }

  async fetchBalance(wallet: string): Promise<Balance> {
    try {
      const state = await this.publicClient.clearinghouseState({
        user: wallet as `0x${string}`
      })
      return {
        accountValue: parseFloat(state.marginSummary.accountValue),
        totalNotional: parseFloat(state.marginSummary.totalNtlPos),
        totalMarginUsed: parseFloat(state.marginSummary.totalMarginUsed),
        withdrawable: parseFloat(state.withdrawable)
      }
    } catch (error) {
      throw new FetchError(`clearinghouseState failed: ${errorMessage(error)}`, wallet, error)
    }
  }
}
