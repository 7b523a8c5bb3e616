import dotenv from 'dotenv'
import path from 'path'
import { AppConfig } from './config.model'
import { ConfigError } from '@/models'

dotenv.config({ path: path.resolve(__dirname, '../../.env') })

export type Env = Record<string, string | undefined>

const WALLET_PATTERN = /^0x[0-9a-fA-F]{40}$/
const PLACEHOLDERS = new Set(['your_bot_token_here', 'your_chat_id_here'])
const DEFAULT_STATE_DIR = 'data/state'
// Largest delay setTimeout honours; anything above fires after 1ms.
const MAX_TIMER_MS = 2_147_483_647
const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_MS / 1000)

class EnvReader {
  readonly problems: string[] = []

  constructor(private env: Env) {}

  string(key: string): string | null {
    const value = this.env[key]?.trim()
    return value ? value : null
  }

  required(key: string): string {
    const value = this.string(key)
    if (!value || PLACEHOLDERS.has(value)) {
      this.problems.push(`${key} is not set`)
      return ''
    }
    return value
  }

  boolean(key: string, defaultValue: boolean): boolean {
    const value = this.string(key)
    if (!value) return defaultValue
    return value.toLowerCase() === 'true'
  }

  number(key: string, defaultValue: number, options: { allowZero?: boolean; max?: number } = {}): number {
    const value = this.string(key)
    if (!value) return defaultValue
    const parsed = Number(value)
    if (!Number.isFinite(parsed) || parsed < 0 || (parsed === 0 && !options.allowZero)) {
      this.problems.push(`${key} must be a ${options.allowZero ? 'non-negative' : 'positive'} number, got "${value}"`)
      return defaultValue
    }
    if (options.max !== undefined && parsed > options.max) {
      this.problems.push(`${key} must be at most ${options.max}, got "${value}"`)
      return defaultValue
    }
    return parsed
  }

  seconds(key: string, defaultValue: number, options: { allowZero?: boolean } = {}): number {
    return this.number(key, defaultValue, { ...options, max: MAX_TIMER_SECONDS })
  }
}

function readWallets(reader: EnvReader): string[] {
  const list = reader.string('WALLET_ADDRESSES')
  const single = reader.string('WALLET_ADDRESS')
  const raw = list ? list.split(',') : single ? [single] : []

  const wallets: string[] = []
  for (const entry of raw.map(w => w.trim()).filter(w => w)) {
    if (!WALLET_PATTERN.test(entry)) {
      reader.problems.push(`"${entry}" is not a valid wallet address`)
      continue
    }
    const normalized = entry.toLowerCase()
    if (!wallets.includes(normalized)) wallets.push(normalized)
  }

  if (raw.every(entry => !entry.trim())) {
    reader.problems.push('WALLET_ADDRESS or WALLET_ADDRESSES is not set')
  }
  return wallets
}

export function resolveStateDir(env: Env = process.env): string {
  return path.resolve(process.cwd(), env.STATE_DIR?.trim() || DEFAULT_STATE_DIR)
}

/** Reads and validates the whole configuration once; every problem found is reported together. */
export function loadConfig(env: Env = process.env): AppConfig {
  const reader = new EnvReader(env)

  const wallets = readWallets(reader)
  const botToken = reader.required('TELEGRAM_BOT_TOKEN')
  const chatId = reader.required('TELEGRAM_CHAT_ID')
  const pingInterval = reader.seconds('PING_INTERVAL', 50)
  const connectTimeout = reader.seconds('CONNECT_TIMEOUT', 15)
  const baseDelay = reader.seconds('RECONNECT_BASE_DELAY', 5)
  const maxDelay = reader.seconds('RECONNECT_MAX_DELAY', 300)
  const safetyPoll = reader.seconds('SAFETY_POLL_INTERVAL', 60, { allowZero: true })
  const settleDelay = reader.number('FILL_SETTLE_DELAY', 1000, { allowZero: true, max: MAX_TIMER_MS })
  const shutdownGrace = reader.seconds('SHUTDOWN_GRACE', 10)
  const statusPortRaw = reader.string('STATUS_PORT')

  if (maxDelay < baseDelay) {
    reader.problems.push('RECONNECT_MAX_DELAY must not be lower than RECONNECT_BASE_DELAY')
  }

  let statusPort: number | null = null
  if (statusPortRaw) {
    const port = Number(statusPortRaw)
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      reader.problems.push(`STATUS_PORT must be a port number, got "${statusPortRaw}"`)
    } else {
      statusPort = port
    }
  }

  if (reader.problems.length > 0) {
    throw new ConfigError(reader.problems)
  }

  return {
    wallets,
    isTestnet: reader.boolean('IS_TESTNET', false),
    telegram: {
      botToken,
      chatId,
      polling: reader.boolean('TELEGRAM_POLLING', true)
    },
    stateDir: resolveStateDir(env),
    pingIntervalMs: pingInterval * 1000,
    connectTimeoutMs: connectTimeout * 1000,
    reconnectBaseDelayMs: baseDelay * 1000,
    reconnectMaxDelayMs: maxDelay * 1000,
    safetyPollIntervalMs: safetyPoll * 1000,
    fillSettleDelayMs: settleDelay,
    shutdownGraceMs: shutdownGrace * 1000,
    statusPort
  }
}
