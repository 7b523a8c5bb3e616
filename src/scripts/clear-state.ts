import { resolveStateDir } from '@/config'
import { JsonStateStoreService } from '@/services/state-store.service'

async function main(): Promise<void> {
  const wallet = process.argv[2]?.trim().toLowerCase()
  if (!wallet) {
    console.error('Usage: npm run state:clear -- <wallet>')
    process.exit(1)
  }

  const store = new JsonStateStoreService(resolveStateDir())
  const removed = await store.clear(wallet)
  console.log(removed ? `✓ Cleared stored state for ${wallet}` : `No stored state for ${wallet}`)
}

main().catch(error => {
  console.error('✗ Failed to clear state:', error instanceof Error ? error.message : error)
  process.exit(1)
})
