import * as fs from 'fs'
import * as path from 'path'
import { errorMessage, Position, PositionMap, PositionSide, PositionSnapshot, StoredState, WriteError } from '@/models'

export interface ReadonlyStateStore {
  get(wallet: string): Promise<StoredState | null>
}

export interface StateStore extends ReadonlyStateStore {
  put(wallet: string, snapshot: PositionSnapshot): Promise<void>
  /** Operator action; nothing in the monitoring path calls this. */
  clear(wallet: string): Promise<boolean>
}

interface StoredPositionRecord {
  coin: string
  side: PositionSide
  size: number
  entryPrice: number
  markPrice: number
  leverage: number
  unrealizedPnl: number
  returnOnEquity: number
  liquidationPrice: number | null
  marginUsed: number
}

interface StateFile {
  version: 1
  wallet: string
  sequence: number
  lastReconciledAt: number
  positions: Record<string, StoredPositionRecord>
}

const NUMBER_FIELDS = [
  'size',
  'entryPrice',
  'markPrice',
  'leverage',
  'unrealizedPnl',
  'returnOnEquity',
  'marginUsed'
] as const

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isNotFound(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT'
}

function decodePosition(wallet: string, coin: string, value: unknown): Position | null {
  if (!isRecord(value)) return null
  const side = value.side
  if (side !== 'long' && side !== 'short') return null
  for (const field of NUMBER_FIELDS) {
    if (typeof value[field] !== 'number') return null
  }
  const liquidationPrice = value.liquidationPrice
  if (liquidationPrice !== null && typeof liquidationPrice !== 'number') return null

  const size = Number(value.size)
  const markPrice = Number(value.markPrice)
  return {
    wallet,
    coin,
    side,
    size,
    entryPrice: Number(value.entryPrice),
    markPrice,
    leverage: Number(value.leverage),
    notionalValue: size * markPrice,
    unrealizedPnl: Number(value.unrealizedPnl),
    returnOnEquity: Number(value.returnOnEquity),
    liquidationPrice,
    marginUsed: Number(value.marginUsed)
  }
}

/**
 * One JSON document per wallet holding a record per coin. Each put writes a temp file,
 * fsyncs it and renames it over the previous document, so readers see either the old
 * or the new snapshot and never a mix.
 */
export class JsonStateStoreService implements StateStore {
  private writeCounter = 0

  constructor(private readonly dir: string) {}

  private filePath(wallet: string): string {
    return path.join(this.dir, `${wallet.toLowerCase()}.json`)
  }

  async get(wallet: string): Promise<StoredState | null> {
    let raw: string
    try {
      raw = await fs.promises.readFile(this.filePath(wallet), 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }
    return this.decode(wallet, raw)
  }

  private decode(wallet: string, raw: string): StoredState | null {
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      console.error(`✗ Stored state for ${wallet} is not valid JSON, treating as empty: ${errorMessage(error)}`)
      return null
    }

    if (
      !isRecord(parsed) ||
      parsed.version !== 1 ||
      typeof parsed.lastReconciledAt !== 'number' ||
      !isRecord(parsed.positions)
    ) {
      console.error(`✗ Stored state for ${wallet} has an unknown layout, treating as empty`)
      return null
    }

    const positions: PositionMap = new Map()
    for (const [coin, value] of Object.entries(parsed.positions)) {
      const position = decodePosition(wallet, coin, value)
      if (!position) {
        console.error(`✗ Stored position ${coin} for ${wallet} is malformed, treating state as empty`)
        return null
      }
      positions.set(coin, position)
    }

    return {
      wallet,
      positions,
      sequence: typeof parsed.sequence === 'number' ? parsed.sequence : 0,
      lastReconciledAt: parsed.lastReconciledAt
    }
  }

  async put(wallet: string, snapshot: PositionSnapshot): Promise<void> {
    const positions: Record<string, StoredPositionRecord> = {}
    for (const [coin, p] of snapshot.positions) {
      positions[coin] = {
        coin,
        side: p.side,
        size: p.size,
        entryPrice: p.entryPrice,
        markPrice: p.markPrice,
        leverage: p.leverage,
        unrealizedPnl: p.unrealizedPnl,
        returnOnEquity: p.returnOnEquity,
        liquidationPrice: p.liquidationPrice,
        marginUsed: p.marginUsed
      }
    }

    const document: StateFile = {
      version: 1,
      wallet,
      sequence: snapshot.sequence,
      lastReconciledAt: snapshot.fetchedAt,
      positions
    }

    const target = this.filePath(wallet)
    const temp = `${target}.${process.pid}.${++this.writeCounter}.tmp`

    try {
      await fs.promises.mkdir(this.dir, { recursive: true })
      const handle = await fs.promises.open(temp, 'w')
      try {
        await handle.writeFile(JSON.stringify(document, null, 2), 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await fs.promises.rename(temp, target)
    } catch (error) {
      await fs.promises.rm(temp, { force: true }).catch(cleanupError => {
        console.warn(`⚠ Could not remove ${temp}: ${errorMessage(cleanupError)}`)
      })
      throw new WriteError(`Failed to persist state: ${errorMessage(error)}`, wallet, error)
    }
  }

  async clear(wallet: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.filePath(wallet))
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw error
    }
  }
}
