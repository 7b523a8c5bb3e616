export interface TelegramConfig {
  botToken: string
  chatId: string
  polling: boolean
}

export interface AppConfig {
  wallets: string[]
  isTestnet: boolean
  telegram: TelegramConfig
  stateDir: string
  pingIntervalMs: number
  connectTimeoutMs: number
  reconnectBaseDelayMs: number
  reconnectMaxDelayMs: number
  /** 0 disables the periodic safety poll. */
  safetyPollIntervalMs: number
  fillSettleDelayMs: number
  shutdownGraceMs: number
  statusPort: number | null
}
