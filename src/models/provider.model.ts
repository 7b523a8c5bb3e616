import type { Balance, Position } from './position.model'

export interface PositionSnapshotProvider {
  /** Full list of open positions for the wallet. Rejects with FetchError. */
  fetchPositions(wallet: string): Promise<Position[]>
  /** Closed PnL booked on `coin` since `sinceMs`, or null when it cannot be determined. */
  fetchClosedPnl(wallet: string, coin: string, sinceMs: number): Promise<number | null>
}

export interface BalanceProvider {
  fetchBalance(wallet: string): Promise<Balance>
}
