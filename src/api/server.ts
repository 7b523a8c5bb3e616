import express, { Request, Response } from 'express'
import { errorMessage, PipelineStatus } from '@/models'
import { ReadonlyStateStore } from '@/services/state-store.service'

export interface StatusSource {
  getStatuses(): PipelineStatus[]
  isMonitored(wallet: string): boolean
}

const startedAt = Date.now()

export function createStatusApp(status: StatusSource, store: ReadonlyStateStore): express.Express {
  const app = express()

  app.get('/api/health', (req: Request, res: Response) => {
    const wallets = status.getStatuses()
    const healthy = wallets.every(w => w.state === 'LIVE' || w.state === 'CATCHING_UP')
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      uptimeMs: Date.now() - startedAt,
      timestamp: Date.now(),
      wallets
    })
  })

  app.get('/api/positions/:wallet', async (req: Request, res: Response) => {
    const wallet = req.params.wallet.toLowerCase()
    if (!status.isMonitored(wallet)) {
      res.status(404).json({ error: 'Wallet is not monitored' })
      return
    }

    try {
      const state = await store.get(wallet)
      res.json({
        wallet,
        lastReconciledAt: state?.lastReconciledAt ?? null,
        positions: state ? Array.from(state.positions.values()) : []
      })
    } catch (error) {
      res.status(500).json({ error: `Failed to read state: ${errorMessage(error)}` })
    }
  })

  return app
}
