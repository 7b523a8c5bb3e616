import { Server } from 'http'
import { PipelineStatus, Position } from '@/models'
import { MemoryStore, OTHER_WALLET, position, WALLET } from '@/testing/fakes'
import { createStatusApp, StatusSource } from './server'

class FixedStatus implements StatusSource {
  constructor(public statuses: PipelineStatus[]) {}

  getStatuses(): PipelineStatus[] {
    return this.statuses
  }

  isMonitored(wallet: string): boolean {
    return this.statuses.some(s => s.wallet === wallet.toLowerCase())
  }
}

interface HealthBody {
  status: 'healthy' | 'degraded'
  wallets: PipelineStatus[]
}

interface PositionsBody {
  wallet: string
  lastReconciledAt: number | null
  positions: Position[]
}

async function get<T>(url: string): Promise<{ status: number; body: T }> {
  const response = await fetch(url)
  const body: T = JSON.parse(await response.text())
  return { status: response.status, body }
}

function status(wallet: string, state: PipelineStatus['state']): PipelineStatus {
  return { wallet, state, reconnectAttempt: 0, lastReconcileAt: null, lastError: null }
}

describe('status API', () => {
  let server: Server
  let baseUrl: string
  let statuses: FixedStatus
  let store: MemoryStore

  beforeEach(async () => {
    statuses = new FixedStatus([status(WALLET, 'LIVE'), status(OTHER_WALLET, 'CATCHING_UP')])
    store = new MemoryStore()
    server = await new Promise<Server>(resolve => {
      const listening = createStatusApp(statuses, store).listen(0, () => resolve(listening))
    })
    const address = server.address()
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port')
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterEach(async () => {
    server.closeAllConnections()
    await new Promise<void>(resolve => server.close(() => resolve()))
  })

  it('reports healthy while every wallet is live or catching up', async () => {
    const { status: code, body } = await get<HealthBody>(`${baseUrl}/api/health`)

    expect(code).toBe(200)
    expect(body.status).toBe('healthy')
    expect(body.wallets.map(w => w.state)).toEqual(['LIVE', 'CATCHING_UP'])
  })

  it('reports degraded when a wallet is reconnecting', async () => {
    statuses.statuses = [status(WALLET, 'LIVE'), status(OTHER_WALLET, 'RECONNECTING')]

    const { status: code, body } = await get<HealthBody>(`${baseUrl}/api/health`)

    expect(code).toBe(503)
    expect(body.status).toBe('degraded')
  })

  it('serves the stored positions of a monitored wallet', async () => {
    await store.put(WALLET, {
      wallet: WALLET,
      positions: new Map([['ETH', position('ETH', 'long', 1.5)]]),
      sequence: 3,
      fetchedAt: 5000
    })

    const { status: code, body } = await get<PositionsBody>(
      `${baseUrl}/api/positions/${WALLET.toUpperCase().replace('0X', '0x')}`
    )

    expect(code).toBe(200)
    expect(body.wallet).toBe(WALLET)
    expect(body.lastReconciledAt).toBe(5000)
    expect(body.positions).toEqual([position('ETH', 'long', 1.5)])
  })

  it('returns an empty view for a monitored wallet without state', async () => {
    const { body } = await get<PositionsBody>(`${baseUrl}/api/positions/${OTHER_WALLET}`)

    expect(body).toEqual({ wallet: OTHER_WALLET, lastReconciledAt: null, positions: [] })
  })

  it('rejects wallets that are not monitored', async () => {
    const { status: code } = await get<{ error: string }>(
      `${baseUrl}/api/positions/0x00000000000000000000000000000000000000cc`
    )

    expect(code).toBe(404)
  })
})
