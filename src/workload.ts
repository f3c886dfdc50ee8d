import { OrderSide, type OrderRequest, type Price, type Quantity } from './types'

// Simple fast seeded RNG (Mulberry32)
export function mulberry32(seed: number) {
  let t = seed >>> 0
  return function () {
    t += 0x6D2B79F5
    let r = Math.imul(t ^ (t >>> 15), 1 | t)
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r)
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296
  }
}

export interface WorkloadOptions {
  seed: number
  accounts: number
  minPrice: Price
  maxPrice: Price
  maxQuantity: number
}

export interface WorkloadOrder {
  side: OrderSide
  request: OrderRequest
}

export const accountName = (index: number) => `trader-${index}`

/**
 * Endless stream of random bids and asks around a shared price band,
 * so a good share of them cross.
 */
export function* randomOrders(options: WorkloadOptions): Generator<WorkloadOrder, never> {
  const rnd = mulberry32(options.seed)
  const span = Number(options.maxPrice - options.minPrice) + 1

  while (true) {
    const side = rnd() < 0.5 ? OrderSide.Bid : OrderSide.Ask
    const price: Price = options.minPrice + BigInt(Math.floor(rnd() * span))
    const quantity: Quantity = BigInt(Math.floor(rnd() * options.maxQuantity) + 1)
    const beneficiary = accountName(Math.floor(rnd() * options.accounts))
    yield { side, request: { price, quantity, beneficiary } }
  }
}
