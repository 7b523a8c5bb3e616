import { DispatchError, errorMessage, Notification } from '@/models'
import { withTimeout } from '@/utils/async.utils'

export interface NotificationSink {
  deliver(notification: Notification): Promise<void>
}

export interface DispatcherOptions {
  deliveryTimeoutMs: number
}

/**
 * Single outbound channel shared by every wallet. Deliveries run one at a time in the
 * order dispatch() was called; a failed delivery rejects only its own promise.
 *
 * A delivery that times out still holds the queue for up to one more timeout while its
 * send settles. Only a send that hangs past both windows can be overtaken.
 */
export class NotificationDispatcherService {
  private tail: Promise<void> = Promise.resolve()
  private queued = 0
  private closed = false
  private delivered = 0
  private failed = 0

  constructor(
    private sink: NotificationSink,
    private options: DispatcherOptions = { deliveryTimeoutMs: 30000 }
  ) {}

  dispatch(notification: Notification): Promise<void> {
    if (this.closed) {
      return Promise.reject(new DispatchError('Dispatcher is closed', notification.wallet))
    }

    this.queued++
    const delivery = this.tail.then(() => this.deliver(notification))
    this.tail = delivery.then(
      () => {
        this.queued--
        this.delivered++
      },
      () => {
        this.queued--
        this.failed++
      }
    )
    return delivery
  }

  private async deliver(notification: Notification): Promise<void> {
    const { deliveryTimeoutMs } = this.options
    const sending = this.sink.deliver(notification)
    let timedOut = false
    try {
      await withTimeout(sending, deliveryTimeoutMs, () => {
        timedOut = true
        return new Error(`delivery timed out after ${deliveryTimeoutMs}ms`)
      })
    } catch (error) {
      // The next delivery must not overtake a send that is still in flight.
      if (timedOut) await this.awaitLateSend(notification, sending)
      throw new DispatchError(
        `Failed to deliver ${notification.type} notification: ${errorMessage(error)}`,
        notification.wallet,
        error
      )
    }
  }

  private async awaitLateSend(notification: Notification, sending: Promise<void>): Promise<void> {
    try {
      await withTimeout(sending, this.options.deliveryTimeoutMs, () => new Error('still unsettled'))
      console.warn(`⚠ ${notification.type} notification was delivered after its timeout`)
    } catch (error) {
      console.warn(`⚠ Moving on from timed-out ${notification.type} notification: ${errorMessage(error)}`)
    }
  }

  get pending(): number {
    return this.queued
  }

  getStats(): { delivered: number; failed: number; pending: number } {
    return { delivered: this.delivered, failed: this.failed, pending: this.queued }
  }

  /** Stops accepting notifications and waits (bounded) for the queue to empty. */
  async close(graceMs: number): Promise<boolean> {
    this.closed = true
    try {
      await withTimeout(this.tail, graceMs, () => new Error('drain timed out'))
      return true
    } catch (error) {
      console.warn(`⚠ ${this.queued} notification(s) still pending at shutdown: ${errorMessage(error)}`)
      return false
    }
  }
}
