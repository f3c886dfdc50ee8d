import { parseConfig } from './config'
import { InMemoryLedger } from './ledger'
import { createLogger } from './logger'
import { PairRegistry } from './registry'
import { OrderSide } from './types'
import { UINT64_MAX } from './uint64'
import { accountName, randomOrders } from './workload'

function parseArgs(argv: string[]) {
  const out: Record<string, string> = {}
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (a.startsWith('--')) {
      const [k, v] = a.includes('=') ? a.split('=') : [a, argv[i + 1]]
      const key = k.replace(/^--/, '')
      if (v !== undefined && !v.startsWith('--')) {
        out[key] = v
        if (!a.includes('=')) i++
      } else {
        out[key] = 'true'
      }
    }
  }
  return out
}

const args = parseArgs(process.argv.slice(2))
const durationSec = Number(args['duration'] ?? 10)
const numAccounts = Math.max(1, Number(args['accounts'] ?? 64))
const maxQuantity = Math.max(1, Number(args['max-qty'] ?? args['maxQty'] ?? 1000))
const seed = Number(args['seed'] ?? Date.now())

const BASE = 'BASE'
const QUOTE = 'QUOTE'

// Every account can cover any order it places
const ledger = new InMemoryLedger()
for (let i = 0; i < numAccounts; i++) {
  ledger.mint(BASE, accountName(i), UINT64_MAX >> 8n)
  ledger.mint(QUOTE, accountName(i), UINT64_MAX >> 8n)
}

const registry = new PairRegistry({
  ledger,
  config: parseConfig({ timePriority: args['time-priority'] ?? false }),
  logger: createLogger('error'),
})
const pair = registry.createPair({ base: BASE, quote: QUOTE })

let bidCount = 0
let askCount = 0
let tradeCount = 0
pair.on('trade', () => tradeCount++)

const orders = randomOrders({ seed, accounts: numAccounts, minPrice: 90n, maxPrice: 110n, maxQuantity })

console.log(`Running pair benchmark for ${durationSec}s (seed=${seed}, accounts=${numAccounts})`)

const startTime = process.hrtime.bigint()
const deadline = startTime + BigInt(Math.round(durationSec * 1_000_000_000))

// Check the clock once per batch to keep the timer out of the hot path
while (process.hrtime.bigint() < deadline) {
  for (let n = 0; n < 1000; n++) {
    const { value } = orders.next()
    if (value.side === OrderSide.Bid) {
      pair.submitBid(value.request)
      bidCount++
    } else {
      pair.submitAsk(value.request)
      askCount++
    }
  }
}

const actualDuration = Number(process.hrtime.bigint() - startTime) / 1_000_000_000
const totalOrders = bidCount + askCount

pair.checkInvariants()

console.log(`Orders: ${totalOrders} (bids ${bidCount}, asks ${askCount})`)
console.log(`Trades: ${tradeCount}`)
console.log(`Resting: bids ${pair.bids.size}, asks ${pair.asks.size}`)
console.log(`Escrow: base ${pair.baseEscrowed}, quote ${pair.quoteEscrowed}`)
console.log(`Throughput: ${Math.round(totalOrders / actualDuration).toLocaleString()} orders/s`)
