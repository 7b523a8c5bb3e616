export type PositionSide = 'long' | 'short'

export interface Position {
  wallet: string
  coin: string
  side: PositionSide
  size: number
  entryPrice: number
  markPrice: number
  leverage: number
  notionalValue: number
  unrealizedPnl: number
  returnOnEquity: number
  liquidationPrice: number | null
  marginUsed: number
}

// Keyed by coin. Only open positions (size > 0) are present.
export type PositionMap = Map<string, Position>

export interface PositionSnapshot {
  wallet: string
  positions: PositionMap
  /** Diagnostics only, never used for ordering. */
  sequence: number
  fetchedAt: number
}

export interface StoredState {
  wallet: string
  positions: PositionMap
  sequence: number
  lastReconciledAt: number
}

export interface Balance {
  accountValue: number
  totalNotional: number
  totalMarginUsed: number
  withdrawable: number
}
