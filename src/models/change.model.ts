import type { Position } from './position.model'

interface ChangeBase {
  readonly wallet: string
  readonly coin: string
  readonly detectedAt: number
}

export interface PositionOpened extends ChangeBase {
  readonly type: 'opened'
  readonly position: Position
}

export interface PositionClosed extends ChangeBase {
  readonly type: 'closed'
  readonly previous: Position
  /** Sum of closedPnl over the fills since the last reconcile, null when unknown. */
  readonly realizedPnl: number | null
}

export interface PositionIncreased extends ChangeBase {
  readonly type: 'increased'
  readonly previous: Position
  readonly position: Position
}

export interface PositionDecreased extends ChangeBase {
  readonly type: 'decreased'
  readonly previous: Position
  readonly position: Position
}

export interface LeverageChanged extends ChangeBase {
  readonly type: 'leverage_changed'
  readonly previous: Position
  readonly position: Position
}

export type PositionChangeEvent =
  | PositionOpened
  | PositionClosed
  | PositionIncreased
  | PositionDecreased
  | LeverageChanged

export type PositionChangeType = PositionChangeEvent['type']

export type AlertKind =
  | 'reconnecting'
  | 'reconnected'
  | 'store_write_failed'
  | 'pipeline_restarted'

export interface OperationalAlert {
  readonly type: 'alert'
  readonly wallet: string
  readonly kind: AlertKind
  readonly detail: string
  readonly retryAttempt?: number
  readonly nextRetryInSeconds?: number
  readonly raisedAt: number
}

export type Notification = PositionChangeEvent | OperationalAlert
