import {
  AlertKind,
  errorMessage,
  PipelineState,
  PipelineStatus,
  ReconcileTrigger
} from '@/models'
import { ExponentialBackoff } from '@/utils/backoff.utils'
import { shortWallet, sleep as defaultSleep, Sleep, withTimeout } from '@/utils/async.utils'
import { NotificationDispatcherService } from './notification-dispatcher.service'
import { WalletReconcilerService } from './reconciler.service'
import { StreamClient, StreamConnectionHandle } from './websocket-connection.service'

export interface WalletPipelineOptions {
  reconnectBaseDelayMs: number
  reconnectMaxDelayMs: number
  /** 0 disables the timer. */
  safetyPollIntervalMs: number
  fillSettleDelayMs: number
  /** First reconnect attempt that is reported to the sink. */
  alertFromAttempt?: number
  sleep?: Sleep
  now?: () => number
}

/**
 * One wallet's monitor: catch-up reconcile, then a stream loop that reconciles on every
 * activity frame, once subscribed and after every reconnect attempt, plus an independent
 * safety poll.
 *
 * STARTING → CATCHING_UP → LIVE ⇄ RECONNECTING, and STOPPED once stop() is called.
 */
export class WalletPipelineService {
  private state: PipelineState = 'STARTING'
  private readonly controller = new AbortController()
  private readonly backoff: ExponentialBackoff
  private readonly pending = new Set<Promise<void>>()
  private readonly sleep: Sleep
  private readonly now: () => number
  private readonly alertFromAttempt: number
  private readonly label: string
  private settling = false
  private lastReconcileAt: number | null = null
  private lastError: string | null = null

  constructor(
    readonly wallet: string,
    private reconciler: WalletReconcilerService,
    private streamClient: StreamClient,
    private dispatcher: NotificationDispatcherService,
    private options: WalletPipelineOptions
  ) {
    this.backoff = new ExponentialBackoff(options.reconnectBaseDelayMs, options.reconnectMaxDelayMs)
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? Date.now
    this.alertFromAttempt = options.alertFromAttempt ?? 2
    this.label = shortWallet(wallet)
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  getStatus(): PipelineStatus {
    return {
      wallet: this.wallet,
      state: this.state,
      reconnectAttempt: this.backoff.attempts,
      lastReconcileAt: this.lastReconcileAt,
      lastError: this.lastError
    }
  }

  /** Runs until stop() is called. Rejects only on an unexpected internal error. */
  async run(): Promise<void> {
    if (this.signal.aborted) return

    this.transition('STARTING')
    this.transition('CATCHING_UP')
    await this.reconcile('startup')

    const poll = this.startSafetyPoll()
    try {
      await this.streamLoop()
    } finally {
      if (poll) clearInterval(poll)
    }
  }

  async stop(graceMs: number): Promise<void> {
    this.controller.abort()
    try {
      await withTimeout(
        Promise.all([...this.pending, this.reconciler.whenIdle()]),
        graceMs,
        () => new Error(`still busy after ${graceMs}ms`)
      )
    } catch (error) {
      console.warn(`⚠ [${this.label}] Shutdown: ${errorMessage(error)}`)
    }
    this.transition('STOPPED')
  }

  private transition(next: PipelineState): void {
    if (this.state === next || this.state === 'STOPPED') return
    console.log(`  [${this.label}] ${this.state} → ${next}`)
    this.state = next
  }

  private async streamLoop(): Promise<void> {
    while (!this.signal.aborted) {
      const isReconnect = this.backoff.attempts > 0
      let connection: StreamConnectionHandle | null = null

      try {
        connection = await this.streamClient.connect(this.wallet)
      } catch (error) {
        if (this.signal.aborted) return
        this.lastError = errorMessage(error)
      }

      // Fills from before the subscription took effect never arrive as frames.
      if (isReconnect) {
        this.track(this.reconcile('reconnect'))
      } else if (connection) {
        this.track(this.reconcile('subscribed'))
      }

      if (!connection) {
        await this.waitBeforeReconnect()
        continue
      }

      if (isReconnect) this.onReconnected()
      this.transition('LIVE')

      try {
        await connection.run(() => this.onStreamActivity(), this.signal)
      } catch (error) {
        if (this.signal.aborted) return
        this.lastError = errorMessage(error)
        await this.waitBeforeReconnect()
      }
    }
  }

  private async waitBeforeReconnect(): Promise<void> {
    this.transition('RECONNECTING')
    const attempt = this.backoff.attempts + 1
    const delayMs = this.backoff.next()
    const seconds = delayMs / 1000

    console.warn(`⟳ [${this.label}] Stream down (${this.lastError ?? 'unknown'}), reconnect attempt ${attempt} in ${seconds}s`)

    if (attempt >= this.alertFromAttempt) {
      this.track(this.raiseAlert('reconnecting', this.lastError ?? 'connection lost', {
        retryAttempt: attempt,
        nextRetryInSeconds: seconds
      }))
    }

    await this.sleep(delayMs, this.signal)
  }

  private onReconnected(): void {
    const attempts = this.backoff.attempts
    this.backoff.reset()
    this.lastError = null
    console.log(`✓ [${this.label}] Stream reconnected after ${attempts} attempt(s)`)

    if (attempts >= this.alertFromAttempt) {
      this.track(this.raiseAlert('reconnected', `Reconnected after ${attempts} attempts`))
    }
  }

  private onStreamActivity(): void {
    if (this.settling) {
      console.log(`  ⊘ [${this.label}] Activity coalesced into pending reconcile`)
      return
    }

    this.settling = true
    this.track(
      this.sleep(this.options.fillSettleDelayMs, this.signal).then(() => {
        this.settling = false
        return this.reconcile('stream')
      })
    )
  }

  private startSafetyPoll(): NodeJS.Timeout | null {
    if (this.options.safetyPollIntervalMs <= 0) return null
    return setInterval(() => {
      if (!this.reconciler.isRunning()) this.track(this.reconcile('safety_poll'))
    }, this.options.safetyPollIntervalMs)
  }

  private async reconcile(trigger: ReconcileTrigger): Promise<void> {
    if (this.signal.aborted) return
    try {
      const outcome = await this.reconciler.reconcile(trigger)
      if (outcome.status === 'completed') this.lastReconcileAt = this.now()
    } catch (error) {
      console.error(`✗ [${this.label}] Reconcile (${trigger}) crashed: ${errorMessage(error)}`)
    }
  }

  private async raiseAlert(
    kind: AlertKind,
    detail: string,
    extra: { retryAttempt?: number; nextRetryInSeconds?: number } = {}
  ): Promise<void> {
    try {
      await this.dispatcher.dispatch({
        type: 'alert',
        wallet: this.wallet,
        kind,
        detail,
        ...extra,
        raisedAt: this.now()
      })
    } catch (error) {
      console.error(`✗ [${this.label}] ${errorMessage(error)}`)
    }
  }

  private track(task: Promise<void>): void {
    this.pending.add(task)
    task.finally(() => this.pending.delete(task)).catch(error => {
      console.error(`✗ [${this.label}] Background task failed: ${errorMessage(error)}`)
    })
  }
}
