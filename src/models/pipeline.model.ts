export type PipelineState = 'STARTING' | 'CATCHING_UP' | 'LIVE' | 'RECONNECTING' | 'STOPPED'

export type ReconcileTrigger = 'startup' | 'subscribed' | 'stream' | 'reconnect' | 'safety_poll'

export interface PipelineStatus {
  wallet: string
  state: PipelineState
  reconnectAttempt: number
  lastReconcileAt: number | null
  lastError: string | null
}
