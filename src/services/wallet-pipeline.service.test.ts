import { Sleep } from '@/utils/async.utils'
import {
  FakeConnection,
  FakeProvider,
  MemoryStore,
  position,
  RecordingSink,
  ScriptedStreamClient,
  silenceConsole,
  waitFor,
  WALLET
} from '@/testing/fakes'
import { NotificationDispatcherService } from './notification-dispatcher.service'
import { WalletReconcilerService } from './reconciler.service'
import { WalletPipelineOptions, WalletPipelineService } from './wallet-pipeline.service'

describe('WalletPipelineService', () => {
  let provider: FakeProvider
  let sink: RecordingSink
  let log: string[]
  let delays: number[]

  const recordingSleep: Sleep = ms => {
    delays.push(ms)
    return Promise.resolve()
  }

  function pipelineFor(client: ScriptedStreamClient, overrides: Partial<WalletPipelineOptions> = {}) {
    const dispatcher = new NotificationDispatcherService(sink)
    const reconciler = new WalletReconcilerService(WALLET, provider, new MemoryStore(), dispatcher)
    return new WalletPipelineService(WALLET, reconciler, client, dispatcher, {
      reconnectBaseDelayMs: 1000,
      reconnectMaxDelayMs: 3000,
      safetyPollIntervalMs: 0,
      fillSettleDelayMs: 250,
      sleep: recordingSleep,
      ...overrides
    })
  }

  beforeEach(() => {
    silenceConsole()
    provider = new FakeProvider()
    log = []
    sink = new RecordingSink(log)
    delays = []
  })

  afterEach(() => {
    jest.restoreAllMocks()
    jest.useRealTimers()
  })

  it('catches up on startup before going live', async () => {
    provider.positions = [position('ETH', 'long', 1)]
    const pipeline = pipelineFor(new ScriptedStreamClient())

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')

    expect(provider.fetchCalls).toBe(2)
    expect(sink.changes.map(e => `${e.type}:${e.coin}`)).toEqual(['opened:ETH'])
    expect(pipeline.getStatus().lastReconcileAt).not.toBeNull()

    await pipeline.stop(1000)
    await running
    expect(pipeline.getStatus().state).toBe('STOPPED')
  })

  it('reconciles once subscribed to pick up fills since the catch-up fetch', async () => {
    const client = new ScriptedStreamClient()
    const connect = client.connect.bind(client)
    jest.spyOn(client, 'connect').mockImplementation(wallet => {
      provider.positions = [position('SOL', 'long', 3)]
      return connect(wallet)
    })
    const pipeline = pipelineFor(client)

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')
    await pipeline.stop(1000)
    await running

    expect(provider.fetchCalls).toBe(2)
    expect(sink.changes.map(e => `${e.type}:${e.coin}`)).toEqual(['opened:SOL'])
  })

  it('reaches the reconciler with activity that arrives during a pass', async () => {
    const client = new ScriptedStreamClient()
    const pipeline = pipelineFor(client)

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')

    let release: () => void = () => undefined
    sink.gate = new Promise<void>(resolve => {
      release = resolve
    })
    provider.positions = [position('ETH', 'long', 1)]
    client.connections[0].onTrigger?.()
    await waitFor(() => log.includes('deliver:opened'))
    expect(provider.fetchCalls).toBe(3)

    provider.positions = [position('ETH', 'long', 1), position('BTC', 'short', 0.5)]
    client.connections[0].onTrigger?.()
    release()

    await waitFor(() => sink.changes.length === 2)
    await pipeline.stop(1000)
    await running

    expect(provider.fetchCalls).toBe(4)
    expect(sink.changes.map(e => `${e.type}:${e.coin}`)).toEqual(['opened:ETH', 'opened:BTC'])
  })

  it('backs off exponentially and alerts from the second attempt on', async () => {
    const client = new ScriptedStreamClient(['refuse', 'refuse', 'refuse'])
    const pipeline = pipelineFor(client)

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')
    await pipeline.stop(1000)
    await running

    expect(client.connects).toBe(4)
    expect(delays).toEqual([1000, 2000, 3000])
    expect(sink.alerts.map(a => [a.kind, a.retryAttempt, a.nextRetryInSeconds])).toEqual([
      ['reconnecting', 2, 2],
      ['reconnecting', 3, 3],
      ['reconnected', undefined, undefined]
    ])
    expect(sink.alerts[0].detail).toBe('connection refused')
  })

  it('stays quiet when a single reconnect succeeds', async () => {
    const first = new FakeConnection()
    const client = new ScriptedStreamClient([first])
    const pipeline = pipelineFor(client)

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')
    first.drop()
    await waitFor(() => client.connects === 2 && pipeline.getStatus().state === 'LIVE')
    expect(pipeline.getStatus().reconnectAttempt).toBe(0)

    await pipeline.stop(1000)
    await running

    expect(delays).toEqual([1000])
    expect(sink.alerts).toEqual([])
  })

  it('reconciles after a reconnect to pick up changes made while the stream was down', async () => {
    provider.positions = [position('ETH', 'long', 1)]
    const first = new FakeConnection()
    const client = new ScriptedStreamClient([first])
    const pipeline = pipelineFor(client)

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')

    provider.positions = [position('ETH', 'long', 2)]
    first.drop()
    await waitFor(() => client.connects === 2 && pipeline.getStatus().state === 'LIVE')
    await pipeline.stop(1000)
    await running

    expect(provider.fetchCalls).toBe(3)
    expect(sink.changes.map(e => `${e.type}:${e.coin}`)).toEqual(['opened:ETH', 'increased:ETH'])
  })

  it('waits for fills to settle and folds a burst of activity into one reconcile', async () => {
    const client = new ScriptedStreamClient()
    const pipeline = pipelineFor(client)

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')

    provider.positions = [position('BTC', 'short', 0.5)]
    const trigger = client.connections[0].onTrigger
    expect(trigger).not.toBeNull()
    trigger?.()
    trigger?.()
    trigger?.()

    await waitFor(() => sink.changes.length === 1)
    await pipeline.stop(1000)
    await running

    expect(delays).toEqual([250])
    expect(provider.fetchCalls).toBe(3)
    expect(sink.changes.map(e => `${e.type}:${e.coin}`)).toEqual(['opened:BTC'])
  })

  it('runs the safety poll while the stream is quiet', async () => {
    jest.useFakeTimers({ doNotFake: ['setImmediate'] })
    const pipeline = pipelineFor(new ScriptedStreamClient(), { safetyPollIntervalMs: 60_000 })

    const running = pipeline.run()
    await waitFor(() => pipeline.getStatus().state === 'LIVE')
    expect(provider.fetchCalls).toBe(2)

    jest.advanceTimersByTime(60_000)
    await waitFor(() => provider.fetchCalls === 3)

    jest.advanceTimersByTime(60_000)
    await waitFor(() => provider.fetchCalls === 4)

    await pipeline.stop(1000)
    await running
    expect(pipeline.getStatus().state).toBe('STOPPED')
  })

  it('does nothing when stopped before it starts', async () => {
    const client = new ScriptedStreamClient()
    const pipeline = pipelineFor(client)

    await pipeline.stop(1000)
    await pipeline.run()

    expect(client.connects).toBe(0)
    expect(provider.fetchCalls).toBe(0)
    expect(pipeline.getStatus().state).toBe('STOPPED')
  })
})
