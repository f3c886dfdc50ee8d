/**
 * Property tests for the book invariants: whatever sequence of orders arrives,
 * escrow matches resting quantity, nothing rests empty and nothing crosses.
 */

import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { Pair } from '../src/pair'
import { PriorityQueue } from '../src/heap'
import { InMemoryLedger } from '../src/ledger'
import { parseConfig } from '../src/config'
import { createLogger } from '../src/logger'
import { ZeroQuantityError } from '../src/errors'
import { OrderSide, type Fill } from '../src/types'
import { accountName, randomOrders } from '../src/workload'

const BASE = 'BASE'
const QUOTE = 'QUOTE'
const ACCOUNTS = ['alice', 'bob', 'carol', 'dave']
const FUNDS = 1_000_000_000n

const quiet = createLogger('error')

const orderArb = fc.record({
  isBid: fc.boolean(),
  price: fc.bigInt({ min: 1n, max: 20n }),
  quantity: fc.bigInt({ min: 1n, max: 1000n }),
  account: fc.constantFrom(...ACCOUNTS),
})

type GeneratedOrder = { isBid: boolean; price: bigint; quantity: bigint; account: string }

function freshBook(timePriority = false) {
  const ledger = new InMemoryLedger()
  for (const account of ACCOUNTS) {
    ledger.mint(BASE, account, FUNDS)
    ledger.mint(QUOTE, account, FUNDS)
  }
  const pair = new Pair({
    id: 'pair-1',
    assets: { base: BASE, quote: QUOTE },
    ledger,
    config: parseConfig({ timePriority }),
    logger: quiet,
  })
  return { ledger, pair }
}

function submit(pair: Pair, order: GeneratedOrder): Fill[] {
  const request = { price: order.price, quantity: order.quantity, beneficiary: order.account }
  return order.isBid ? pair.submitBid(request) : pair.submitAsk(request)
}

function expectBookInvariants(pair: Pair) {
  const bids = pair.bids.inPriorityOrder()
  const asks = pair.asks.inPriorityOrder()

  expect(bids.reduce((sum, r) => sum + r.offer.quantity, 0n)).toBe(pair.baseEscrowed)
  expect(asks.reduce((sum, r) => sum + r.offer.quantity, 0n)).toBe(pair.quoteEscrowed)
  expect([...bids, ...asks].every((r) => r.offer.quantity > 0n)).toBe(true)
  if (bids.length > 0 && asks.length > 0) {
    expect(bids[0].price < asks[0].price).toBe(true)
  }
}

describe('book invariants', () => {
  it('hold after every submission', () => {
    fc.assert(
      fc.property(fc.array(orderArb, { maxLength: 60 }), fc.boolean(), (orders, timePriority) => {
        const { pair } = freshBook(timePriority)
        for (const order of orders) {
          submit(pair, order)
          expectBookInvariants(pair)
          pair.checkInvariants()
        }
      }),
    )
  })

  it('conserve every unit between accounts and custody', () => {
    fc.assert(
      fc.property(fc.array(orderArb, { maxLength: 60 }), (orders) => {
        const { ledger, pair } = freshBook()
        for (const order of orders) submit(pair, order)

        for (const asset of [BASE, QUOTE]) {
          const held = ACCOUNTS.reduce((sum, account) => sum + ledger.balanceOf(asset, account), 0n)
          expect(held + ledger.custodyOf(asset)).toBe(FUNDS * BigInt(ACCOUNTS.length))
        }
        expect(ledger.custodyOf(BASE)).toBe(pair.baseEscrowed)
        expect(ledger.custodyOf(QUOTE)).toBe(pair.quoteEscrowed)
      }),
    )
  })

  it('settle every fill at the ask price with the floored base leg', () => {
    fc.assert(
      fc.property(fc.array(orderArb, { maxLength: 60 }), (orders) => {
        const { pair } = freshBook()
        for (const order of orders) {
          for (const fill of submit(pair, order)) {
            expect(fill.baseAmount).toBe(fill.quoteAmount / fill.price)
            expect(fill.dust).toBe(fill.quoteAmount % fill.price)
            expect(fill.quoteAmount > 0n).toBe(true)
          }
        }
      }),
    )
  })

  it('leave the book untouched on a zero quantity', () => {
    fc.assert(
      fc.property(fc.array(orderArb, { maxLength: 30 }), orderArb, (orders, extra) => {
        const { ledger, pair } = freshBook()
        for (const order of orders) submit(pair, order)
        const depth = pair.depth()
        const balance = ledger.balanceOf(extra.isBid ? BASE : QUOTE, extra.account)

        expect(() => submit(pair, { ...extra, quantity: 0n })).toThrow(ZeroQuantityError)
        expect(pair.depth()).toEqual(depth)
        expect(ledger.balanceOf(extra.isBid ? BASE : QUOTE, extra.account)).toBe(balance)
      }),
    )
  })

  it('extract bids high to low and asks low to high', () => {
    fc.assert(
      fc.property(fc.array(orderArb, { maxLength: 60 }), (orders) => {
        const { pair } = freshBook()
        for (const order of orders) submit(pair, order)

        const bidPrices = pair.bids.inPriorityOrder().map((r) => r.price)
        const askPrices = pair.asks.inPriorityOrder().map((r) => r.price)
        for (let i = 1; i < bidPrices.length; i++) expect(bidPrices[i] <= bidPrices[i - 1]).toBe(true)
        for (let i = 1; i < askPrices.length; i++) expect(askPrices[i] >= askPrices[i - 1]).toBe(true)
      }),
    )
  })
})

describe('PriorityQueue ordering', () => {
  it('drains any insertion order in non-increasing priority', () => {
    fc.assert(
      fc.property(fc.array(fc.bigUintN(64)), (priorities) => {
        const queue = new PriorityQueue<number>()
        priorities.forEach((p, i) => queue.insert(p, i))

        const drained: bigint[] = []
        while (!queue.isEmpty()) drained.push(queue.extractMax().priority)
        expect(drained).toEqual([...priorities].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0)))
      }),
    )
  })
})

describe('seeded workload', () => {
  it('keeps the book consistent over a long random run', () => {
    const ledger = new InMemoryLedger()
    for (let i = 0; i < 8; i++) {
      ledger.mint(BASE, accountName(i), FUNDS)
      ledger.mint(QUOTE, accountName(i), FUNDS)
    }
    const pair = new Pair({ id: 'pair-1', assets: { base: BASE, quote: QUOTE }, ledger, logger: quiet })
    let trades = 0
    pair.on('trade', () => trades++)

    const orders = randomOrders({ seed: 42, accounts: 8, minPrice: 95n, maxPrice: 105n, maxQuantity: 50 })
    for (let n = 0; n < 2000; n++) {
      const { value } = orders.next()
      if (value.side === OrderSide.Bid) pair.submitBid(value.request)
      else pair.submitAsk(value.request)
    }

    expect(trades).toBeGreaterThan(0)
    expect(() => pair.checkInvariants()).not.toThrow()
    expect(ledger.custodyOf(BASE)).toBe(pair.baseEscrowed)
    expect(ledger.custodyOf(QUOTE)).toBe(pair.quoteEscrowed)
  })
})
