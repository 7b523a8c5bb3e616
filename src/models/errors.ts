export class MonitorError extends Error {
  constructor(
    message: string,
    readonly wallet: string | null = null,
    readonly cause?: unknown
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class ConnectError extends MonitorError {}

export type DisconnectReason = 'closed' | 'liveness_timeout' | 'transport_error'

export class DisconnectError extends MonitorError {
  constructor(
    wallet: string,
    readonly reason: DisconnectReason,
    message: string,
    cause?: unknown
  ) {
    super(message, wallet, cause)
  }
}

export class FetchError extends MonitorError {}

export class WriteError extends MonitorError {}

export class DispatchError extends MonitorError {}

export class ConfigError extends MonitorError {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
