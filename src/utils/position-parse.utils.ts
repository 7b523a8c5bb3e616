import type { Position } from '@/models'

// The fields of a clearinghouseState asset position this monitor reads.
export interface RawPerpPosition {
  coin: string
  szi: string
  entryPx?: string | null
  positionValue: string
  unrealizedPnl: string
  returnOnEquity?: string
  leverage: { value: number | string }
  liquidationPx?: string | null
  marginUsed?: string
}

function toNumber(value: string | number | null | undefined): number {
  if (value === null || value === undefined) return 0
  const parsed = typeof value === 'number' ? value : parseFloat(value)
  return isNaN(parsed) ? 0 : parsed
}

export function parsePosition(wallet: string, raw: RawPerpPosition): Position | null {
  const signedSize = toNumber(raw.szi)
  if (signedSize === 0) return null

  const size = Math.abs(signedSize)
  const positionValue = toNumber(raw.positionValue)
  const entryPrice = toNumber(raw.entryPx)
  const markPrice = positionValue > 0 ? positionValue / size : entryPrice
  const liquidationPrice = raw.liquidationPx ? toNumber(raw.liquidationPx) : null

  return {
    wallet,
    coin: raw.coin,
    side: signedSize > 0 ? 'long' : 'short',
    size,
    entryPrice,
    markPrice,
    leverage: toNumber(raw.leverage.value),
    notionalValue: size * markPrice,
    unrealizedPnl: toNumber(raw.unrealizedPnl),
    returnOnEquity: toNumber(raw.returnOnEquity),
    liquidationPrice,
    marginUsed: toNumber(raw.marginUsed)
  }
}

export function parsePositions(wallet: string, raws: RawPerpPosition[]): Position[] {
  const positions: Position[] = []
  for (const raw of raws) {
    const position = parsePosition(wallet, raw)
    if (position) positions.push(position)
  }
  return positions
}

export function sumClosedPnl(fills: Array<{ coin: string; closedPnl: string }>, coin: string): number {
  return fills
    .filter(fill => fill.coin === coin)
    .reduce((sum, fill) => sum + toNumber(fill.closedPnl), 0)
}
