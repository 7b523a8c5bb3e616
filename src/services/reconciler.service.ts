import {
  errorMessage,
  FetchError,
  PositionChangeEvent,
  PositionSnapshot,
  PositionSnapshotProvider,
  ReconcileTrigger,
  StoredState,
  WriteError
} from '@/models'
import { shortWallet } from '@/utils/async.utils'
import { diffPositions, toPositionMap } from '@/utils/position-diff.utils'
import { NotificationDispatcherService } from './notification-dispatcher.service'
import { StateStore } from './state-store.service'

export type ReconcileOutcome =
  | { status: 'completed'; trigger: ReconcileTrigger; events: PositionChangeEvent[]; persisted: boolean }
  | { status: 'coalesced'; trigger: ReconcileTrigger }
  | { status: 'fetch_failed'; trigger: ReconcileTrigger; error: FetchError }
  | { status: 'load_failed'; trigger: ReconcileTrigger; error: Error }

/**
 * Owns one wallet's stored state. A pass fetches a fresh snapshot, diffs it against the
 * stored one, hands every change to the dispatcher in order and only then persists the
 * new snapshot.
 *
 * Triggers never queue. One that arrives before the running pass has its snapshot is
 * covered by that snapshot and dropped. One that arrives after marks the wallet dirty,
 * and a single extra pass runs once the current one is done.
 */
export class WalletReconcilerService {
  private inFlight: Promise<ReconcileOutcome> | null = null
  private snapshotTaken = false
  private dirty = false
  private sequence = 0
  private readonly label: string

  constructor(
    private readonly wallet: string,
    private provider: PositionSnapshotProvider,
    private store: StateStore,
    private dispatcher: NotificationDispatcherService,
    private now: () => number = Date.now
  ) {
    this.label = shortWallet(wallet)
  }

  isRunning(): boolean {
    return this.inFlight !== null
  }

  reconcile(trigger: ReconcileTrigger): Promise<ReconcileOutcome> {
    if (this.inFlight) {
      if (this.snapshotTaken) {
        this.dirty = true
        console.log(`  ⊘ [${this.label}] ${trigger} trigger arrived after the snapshot, another pass will follow`)
      } else {
        console.log(`  ⊘ [${this.label}] ${trigger} trigger coalesced into running reconcile`)
      }
      return Promise.resolve({ status: 'coalesced', trigger })
    }

    const run = this.runPasses(trigger).finally(() => {
      this.inFlight = null
      this.snapshotTaken = false
    })
    this.inFlight = run
    return run
  }

  async whenIdle(): Promise<void> {
    if (this.inFlight) await this.inFlight
  }

  private async runPasses(trigger: ReconcileTrigger): Promise<ReconcileOutcome> {
    let outcome = await this.execute(trigger)
    while (this.dirty) {
      this.dirty = false
      outcome = await this.execute(trigger)
    }
    return outcome
  }

  private async execute(trigger: ReconcileTrigger): Promise<ReconcileOutcome> {
    this.snapshotTaken = false
    let snapshot: PositionSnapshot
    try {
      const positions = await this.provider.fetchPositions(this.wallet)
      this.snapshotTaken = true
      snapshot = {
        wallet: this.wallet,
        positions: toPositionMap(positions),
        sequence: ++this.sequence,
        fetchedAt: this.now()
      }
    } catch (error) {
      const fetchError = error instanceof FetchError
        ? error
        : new FetchError(errorMessage(error), this.wallet, error)
      console.warn(`⚠ [${this.label}] Reconcile (${trigger}) skipped, fetch failed: ${fetchError.message}`)
      return { status: 'fetch_failed', trigger, error: fetchError }
    }

    let previous: StoredState | null
    try {
      previous = await this.store.get(this.wallet)
    } catch (error) {
      console.error(`✗ [${this.label}] Reconcile (${trigger}) skipped, could not read state: ${errorMessage(error)}`)
      return {
        status: 'load_failed',
        trigger,
        error: error instanceof Error ? error : new Error(String(error))
      }
    }

    const changes = diffPositions(this.wallet, previous?.positions ?? new Map(), snapshot.positions, snapshot.fetchedAt)
    const events = await this.attachRealizedPnl(changes, previous)

    if (events.length > 0) {
      console.log(`📣 [${this.label}] ${events.length} change(s) on ${trigger}: ${events.map(e => `${e.type} ${e.coin}`).join(', ')}`)
    }

    for (const event of events) {
      try {
        await this.dispatcher.dispatch(event)
      } catch (error) {
        console.error(`✗ [${this.label}] ${errorMessage(error)}`)
      }
    }

    const persisted = await this.persist(snapshot)
    return { status: 'completed', trigger, events, persisted }
  }

  private async attachRealizedPnl(
    events: PositionChangeEvent[],
    previous: StoredState | null
  ): Promise<PositionChangeEvent[]> {
    if (!previous) return events

    const enriched: PositionChangeEvent[] = []
    for (const event of events) {
      if (event.type === 'closed') {
        let realizedPnl: number | null = null
        try {
          realizedPnl = await this.provider.fetchClosedPnl(this.wallet, event.coin, previous.lastReconciledAt)
        } catch (error) {
          console.warn(`⚠ [${this.label}] Realized PnL for ${event.coin} unavailable: ${errorMessage(error)}`)
        }
        enriched.push({ ...event, realizedPnl })
      } else {
        enriched.push(event)
      }
    }
    return enriched
  }

  private async persist(snapshot: PositionSnapshot): Promise<boolean> {
    try {
      await this.store.put(this.wallet, snapshot)
      return true
    } catch (error) {
      const writeError = error instanceof WriteError
        ? error
        : new WriteError(errorMessage(error), this.wallet, error)
      console.error(`✗ [${this.label}] STATE WRITE FAILED, changes may be announced again: ${writeError.message}`)
      try {
        await this.dispatcher.dispatch({
          type: 'alert',
          wallet: this.wallet,
          kind: 'store_write_failed',
          detail: writeError.message,
          raisedAt: this.now()
        })
      } catch (dispatchError) {
        console.error(`✗ [${this.label}] ${errorMessage(dispatchError)}`)
      }
      return false
    }
  }
}
