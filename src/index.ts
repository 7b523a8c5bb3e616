import TelegramBot from 'node-telegram-bot-api'
import { Server } from 'http'
import { loadConfig } from '@/config'
import { AppConfig } from '@/config/config.model'
import { ConfigError, errorMessage } from '@/models'
import { createStatusApp } from '@/api/server'
import { HyperliquidService, hyperliquidWsUrl } from '@/services/hyperliquid.service'
import { JsonStateStoreService } from '@/services/state-store.service'
import { NotificationDispatcherService } from '@/services/notification-dispatcher.service'
import { TelegramService } from '@/services/telegram.service'
import { WalletReconcilerService } from '@/services/reconciler.service'
import { WalletPipelineService } from '@/services/wallet-pipeline.service'
import { WalletCoordinatorService } from '@/services/wallet-coordinator.service'
import { WebSocketStreamClient } from '@/services/websocket-connection.service'
import { shortWallet } from '@/utils/async.utils'

function readConfig(): AppConfig {
  try {
    return loadConfig()
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const problem of error.problems) {
        console.error(`✗ ${problem}`)
      }
      console.error('\nRefusing to start with an invalid configuration. See .env.example.\n')
      process.exit(1)
    }
    throw error
  }
}

async function main(): Promise<void> {
  console.log('\n🚀 Position Monitor starting...\n')

  const config = readConfig()

  console.log('📝 Configuration:')
  console.log(`   Network: ${config.isTestnet ? 'TESTNET' : 'MAINNET'}`)
  console.log(`   Wallets: ${config.wallets.map(shortWallet).join(', ')}`)
  console.log(`   State dir: ${config.stateDir}`)
  console.log(`   Ping interval: ${config.pingIntervalMs / 1000}s`)
  console.log(`   Reconnect backoff: ${config.reconnectBaseDelayMs / 1000}s → ${config.reconnectMaxDelayMs / 1000}s`)
  console.log(`   Safety poll: ${config.safetyPollIntervalMs > 0 ? `${config.safetyPollIntervalMs / 1000}s` : 'off'}`)
  console.log('')

  const store = new JsonStateStoreService(config.stateDir)
  const hyperliquid = new HyperliquidService({ isTestnet: config.isTestnet })
  const bot = new TelegramBot(config.telegram.botToken, { polling: config.telegram.polling })
  const telegram = new TelegramService(bot, config.telegram, {
    store,
    balances: hyperliquid,
    wallets: config.wallets
  })
  const dispatcher = new NotificationDispatcherService(telegram)
  const streamClient = new WebSocketStreamClient({
    url: hyperliquidWsUrl(config.isTestnet),
    pingIntervalMs: config.pingIntervalMs,
    connectTimeoutMs: config.connectTimeoutMs
  })

  const coordinator = new WalletCoordinatorService(
    config.wallets,
    wallet => new WalletPipelineService(
      wallet,
      new WalletReconcilerService(wallet, hyperliquid, store, dispatcher),
      streamClient,
      dispatcher,
      {
        reconnectBaseDelayMs: config.reconnectBaseDelayMs,
        reconnectMaxDelayMs: config.reconnectMaxDelayMs,
        safetyPollIntervalMs: config.safetyPollIntervalMs,
        fillSettleDelayMs: config.fillSettleDelayMs
      }
    ),
    dispatcher,
    { restartDelayMs: config.reconnectBaseDelayMs }
  )

  coordinator.start()

  let server: Server | null = null
  if (config.statusPort !== null) {
    const port = config.statusPort
    server = createStatusApp(coordinator, store).listen(port, () => {
      console.log(`✓ Status API listening on :${port}`)
    })
  }

  try {
    await telegram.sendStartup()
  } catch (error) {
    console.error('Failed to send startup message:', errorMessage(error))
  }

  let shuttingDown = false
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    console.log(`\n🛑 ${signal} received, shutting down...`)

    await coordinator.stop(config.shutdownGraceMs)
    await dispatcher.close(config.shutdownGraceMs)
    await telegram.stop()
    server?.close()

    console.log('✓ Shutdown complete')
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(error => {
        console.error('Shutdown failed:', errorMessage(error))
        process.exit(1)
      })
    })
  }
}

main().catch(error => {
  console.error('\n❌ Fatal error:', errorMessage(error))
  process.exit(1)
})
