import type { Position, PositionMap, PositionChangeEvent } from '@/models'

export function toPositionMap(positions: Position[]): PositionMap {
  const map: PositionMap = new Map()
  for (const position of positions) {
    if (position.size > 0) map.set(position.coin, position)
  }
  return map
}

/**
 * Diffs two snapshots of one wallet into change events, ordered by coin.
 *
 * Only side, size and leverage take part in the comparison; prices and PnL ride along
 * in the attached positions. A side flip is reported as the old side closing followed
 * by the new side opening, since positions are keyed by coin rather than coin and side.
 */
export function diffPositions(
  wallet: string,
  previous: PositionMap,
  next: PositionMap,
  detectedAt: number = Date.now()
): PositionChangeEvent[] {
  const coins = Array.from(new Set([...previous.keys(), ...next.keys()])).sort()
  const changes: PositionChangeEvent[] = []

  for (const coin of coins) {
    const before = previous.get(coin)
    const after = next.get(coin)
    const base = { wallet, coin, detectedAt }

    if (!before && after) {
      changes.push({ ...base, type: 'opened', position: after })
    } else if (before && !after) {
      changes.push({ ...base, type: 'closed', previous: before, realizedPnl: null })
    } else if (before && after) {
      if (before.side !== after.side) {
        changes.push({ ...base, type: 'closed', previous: before, realizedPnl: null })
        changes.push({ ...base, type: 'opened', position: after })
      } else if (after.size > before.size) {
        changes.push({ ...base, type: 'increased', previous: before, position: after })
      } else if (after.size < before.size) {
        changes.push({ ...base, type: 'decreased', previous: before, position: after })
      } else if (after.leverage !== before.leverage) {
        changes.push({ ...base, type: 'leverage_changed', previous: before, position: after })
      }
    }
  }

  return changes
}
