import WebSocket from 'ws'
import { ConnectError, DisconnectError, errorMessage } from '@/models'
import { shortWallet, withTimeout } from '@/utils/async.utils'

/** The slice of a WebSocket the stream client uses; tests substitute an in-process fake. */
export interface FeedSocket {
  send(data: string): void
  close(): void
  onMessage(listener: (data: string) => void): void
  onClose(listener: (reason: string) => void): void
  onError(listener: (error: Error) => void): void
}

/** Opens a socket to `url`. Once `signal` aborts, the socket is torn down whatever state it is in. */
export type SocketFactory = (url: string, signal: AbortSignal) => Promise<FeedSocket>

export interface StreamConnectionHandle {
  /**
   * Reads frames until the connection dies (rejects with DisconnectError) or `signal`
   * aborts (resolves after unsubscribing).
   */
  run(onTrigger: () => void, signal: AbortSignal): Promise<void>
}

export interface StreamClient {
  connect(wallet: string): Promise<StreamConnectionHandle>
}

export interface StreamClientOptions {
  url: string
  pingIntervalMs: number
  connectTimeoutMs: number
  socketFactory?: SocketFactory
}

interface FeedFrame {
  channel?: unknown
  data?: unknown
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
  return Buffer.from(data).toString('utf-8')
}

export const openWebSocket: SocketFactory = (url, signal) => {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url)
    let opened = false

    // Attached for the socket's whole life: ws throws an 'error' event nobody listens to.
    ws.on('error', error => {
      if (!opened) reject(error)
    })

    const onAbort = () => {
      ws.terminate()
      reject(new Error('open aborted'))
    }
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })

    ws.once('open', () => {
      opened = true
      resolve({
        send: data => ws.send(data),
        close: () => ws.close(),
        onMessage: listener => ws.on('message', data => listener(rawToString(data))),
        onClose: listener => ws.on('close', (code, reason) => listener(`code ${code} ${reason.toString()}`.trim())),
        onError: listener => ws.on('error', listener)
      })
    })
  })
}

function parseFrame(raw: string): FeedFrame | null {
  try {
    const parsed: unknown = JSON.parse(raw)
    if (typeof parsed !== 'object' || parsed === null) return null
    return {
      channel: 'channel' in parsed ? parsed.channel : undefined,
      data: 'data' in parsed ? parsed.data : undefined
    }
  } catch {
    return null
  }
}

function hasEntries(value: unknown): boolean {
  return Array.isArray(value) ? value.length > 0 : value !== undefined && value !== null
}

/** userEvents frames that can move a position: fills, liquidations, cancels by the exchange. */
export function isActivityFrame(frame: FeedFrame): boolean {
  if (frame.channel !== 'user' && frame.channel !== 'userEvents') return false
  const data = frame.data
  if (typeof data !== 'object' || data === null) return false
  return (
    ('fills' in data && hasEntries(data.fills)) ||
    ('liquidation' in data && hasEntries(data.liquidation)) ||
    ('nonUserCancel' in data && hasEntries(data.nonUserCancel))
  )
}

interface Expectation {
  step: string
  match: (frame: FeedFrame) => boolean
  resolve: () => void
  reject: (error: Error) => void
}

export class StreamConnection implements StreamConnectionHandle {
  private expectation: Expectation | null = null
  private triggerHandler: (() => void) | null = null
  private terminate: ((error: DisconnectError) => void) | null = null
  private failure: DisconnectError | null = null
  private watchdog: NodeJS.Timeout | null = null
  private readonly label: string

  constructor(
    private readonly wallet: string,
    private socket: FeedSocket,
    private options: StreamClientOptions
  ) {
    this.label = shortWallet(wallet)
    socket.onMessage(raw => this.handleRaw(raw))
    socket.onClose(reason => this.fail(new DisconnectError(wallet, 'closed', `Socket closed (${reason})`)))
    socket.onError(error => this.fail(new DisconnectError(wallet, 'transport_error', error.message, error)))
  }

  private get subscription(): { type: 'userEvents'; user: string } {
    return { type: 'userEvents', user: this.wallet }
  }

  async handshake(): Promise<void> {
    const pong = this.expectFrame('pong', frame => frame.channel === 'pong')
    this.send({ method: 'ping' })
    await pong

    const subscribed = this.expectFrame('subscriptionResponse', frame => frame.channel === 'subscriptionResponse')
    this.send({ method: 'subscribe', subscription: this.subscription })
    await subscribed
  }

  run(onTrigger: () => void, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(this.failure)
        return
      }

      const keepalive = setInterval(() => this.send({ method: 'ping' }), this.options.pingIntervalMs)

      const cleanup = () => {
        clearInterval(keepalive)
        this.disarmWatchdog()
        signal.removeEventListener('abort', onAbort)
        this.triggerHandler = null
        this.terminate = null
      }

      const onAbort = () => {
        cleanup()
        this.shutdown()
        resolve()
      }

      this.terminate = error => {
        cleanup()
        this.socket.close()
        reject(error)
      }

      if (signal.aborted) {
        onAbort()
        return
      }

      this.triggerHandler = onTrigger
      signal.addEventListener('abort', onAbort, { once: true })
      this.armWatchdog()
    })
  }

  close(): void {
    this.disarmWatchdog()
    this.socket.close()
  }

  private shutdown(): void {
    try {
      this.socket.send(JSON.stringify({ method: 'unsubscribe', subscription: this.subscription }))
    } catch (error) {
      console.warn(`⚠ [${this.label}] Unsubscribe failed: ${errorMessage(error)}`)
    }
    this.socket.close()
    console.log(`✓ [${this.label}] Stream closed`)
  }

  private send(message: object): void {
    try {
      this.socket.send(JSON.stringify(message))
    } catch (error) {
      this.fail(new DisconnectError(this.wallet, 'transport_error', `Send failed: ${errorMessage(error)}`, error))
    }
  }

  private expectFrame(step: string, match: (frame: FeedFrame) => boolean): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(new ConnectError(this.failure.message, this.wallet, this.failure))
        return
      }

      const timer = setTimeout(() => {
        this.expectation = null
        reject(new ConnectError(`Timed out waiting for ${step}`, this.wallet))
      }, this.options.connectTimeoutMs)

      this.expectation = {
        step,
        match,
        resolve: () => {
          clearTimeout(timer)
          this.expectation = null
          resolve()
        },
        reject: error => {
          clearTimeout(timer)
          this.expectation = null
          reject(error)
        }
      }
    })
  }

  private armWatchdog(): void {
    this.disarmWatchdog()
    const windowMs = this.options.pingIntervalMs * 2
    this.watchdog = setTimeout(() => {
      this.fail(new DisconnectError(this.wallet, 'liveness_timeout', `No traffic for ${windowMs / 1000}s`))
    }, windowMs)
  }

  private disarmWatchdog(): void {
    if (this.watchdog) {
      clearTimeout(this.watchdog)
      this.watchdog = null
    }
  }

  private handleRaw(raw: string): void {
    if (this.terminate) this.armWatchdog()

    const frame = parseFrame(raw)
    if (!frame) return

    if (this.expectation) {
      if (frame.channel === 'error') {
        this.expectation.reject(new ConnectError(`${this.expectation.step} rejected: ${String(frame.data)}`, this.wallet))
      } else if (this.expectation.match(frame)) {
        this.expectation.resolve()
      }
      return
    }

    if (this.triggerHandler && isActivityFrame(frame)) {
      this.triggerHandler()
    }
  }

  private fail(error: DisconnectError): void {
    if (this.failure) return
    this.failure = error
    this.disarmWatchdog()

    if (this.expectation) {
      this.expectation.reject(new ConnectError(error.message, this.wallet, error))
    }
    if (this.terminate) {
      this.terminate(error)
    }
  }
}

export class WebSocketStreamClient implements StreamClient {
  private readonly socketFactory: SocketFactory

  constructor(private options: StreamClientOptions) {
    this.socketFactory = options.socketFactory ?? openWebSocket
  }

  async connect(wallet: string): Promise<StreamConnection> {
    const opening = new AbortController()
    let socket: FeedSocket
    try {
      socket = await withTimeout(
        this.socketFactory(this.options.url, opening.signal),
        this.options.connectTimeoutMs,
        () => {
          opening.abort()
          return new Error(`open timed out after ${this.options.connectTimeoutMs}ms`)
        }
      )
    } catch (error) {
      throw new ConnectError(`Could not open ${this.options.url}: ${errorMessage(error)}`, wallet, error)
    }

    const connection = new StreamConnection(wallet, socket, this.options)
    try {
      await connection.handshake()
    } catch (error) {
      connection.close()
      throw error instanceof ConnectError ? error : new ConnectError(errorMessage(error), wallet, error)
    }

    console.log(`✓ [${shortWallet(wallet)}] Subscribed to userEvents`)
    return connection
  }
}
