import { errorMessage, PipelineStatus } from '@/models'
import { shortWallet, sleep as defaultSleep, Sleep, withTimeout } from '@/utils/async.utils'
import { NotificationDispatcherService } from './notification-dispatcher.service'
import { WalletPipelineService } from './wallet-pipeline.service'

export type PipelineFactory = (wallet: string) => WalletPipelineService

export interface CoordinatorOptions {
  restartDelayMs: number
  sleep?: Sleep
}

/**
 * Runs one pipeline per wallet. A pipeline that throws is restarted on its own after a
 * delay; sibling wallets keep running.
 */
export class WalletCoordinatorService {
  private readonly pipelines = new Map<string, WalletPipelineService>()
  private readonly runs = new Map<string, Promise<void>>()
  private readonly restarts = new Map<string, number>()
  private readonly controller = new AbortController()
  private readonly sleep: Sleep

  constructor(
    private readonly wallets: string[],
    private createPipeline: PipelineFactory,
    private dispatcher: NotificationDispatcherService,
    private options: CoordinatorOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep
  }

  start(): void {
    for (const wallet of this.wallets) {
      if (this.pipelines.has(wallet)) continue
      const pipeline = this.createPipeline(wallet)
      this.pipelines.set(wallet, pipeline)
      this.restarts.set(wallet, 0)
      this.runs.set(wallet, this.supervise(pipeline))
      console.log(`✓ [${shortWallet(wallet)}] Pipeline started`)
    }
  }

  private async supervise(pipeline: WalletPipelineService): Promise<void> {
    const label = shortWallet(pipeline.wallet)

    while (!this.controller.signal.aborted && !pipeline.signal.aborted) {
      try {
        await pipeline.run()
        return
      } catch (error) {
        if (this.controller.signal.aborted) return

        const restarts = (this.restarts.get(pipeline.wallet) ?? 0) + 1
        this.restarts.set(pipeline.wallet, restarts)
        const detail = `Pipeline crashed (${errorMessage(error)}), restarting in ${this.options.restartDelayMs / 1000}s`
        console.error(`✗ [${label}] ${detail}`)

        try {
          await this.dispatcher.dispatch({
            type: 'alert',
            wallet: pipeline.wallet,
            kind: 'pipeline_restarted',
            detail,
            retryAttempt: restarts,
            nextRetryInSeconds: this.options.restartDelayMs / 1000,
            raisedAt: Date.now()
          })
        } catch (dispatchError) {
          console.error(`✗ [${label}] ${errorMessage(dispatchError)}`)
        }

        await this.sleep(this.options.restartDelayMs, this.controller.signal)
      }
    }
  }

  getStatuses(): PipelineStatus[] {
    return Array.from(this.pipelines.values()).map(p => p.getStatus())
  }

  getRestartCount(wallet: string): number {
    return this.restarts.get(wallet) ?? 0
  }

  isMonitored(wallet: string): boolean {
    return this.pipelines.has(wallet.toLowerCase())
  }

  async stop(graceMs: number): Promise<void> {
    this.controller.abort()
    await Promise.all(Array.from(this.pipelines.values()).map(p => p.stop(graceMs)))

    try {
      await withTimeout(
        Promise.allSettled(this.runs.values()),
        graceMs,
        () => new Error(`pipelines did not exit within ${graceMs}ms`)
      )
    } catch (error) {
      console.warn(`⚠ Shutdown: ${errorMessage(error)}`)
    }
    console.log('✓ All pipelines stopped')
  }
}
