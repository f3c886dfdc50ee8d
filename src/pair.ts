import { EventEmitter } from 'events'
import { parseConfig, type EngineConfig } from './config'
import { matchBook, type MatchingBook } from './engine'
import { InvariantViolationError, MatchingError, ZeroPriceError, ZeroQuantityError } from './errors'
import { EscrowPool } from './escrow'
import { PriorityQueue, type HeapEntry } from './heap'
import type { Ledger } from './ledger'
import { createLogger, type Logger } from './logger'
import {
  OrderSide,
  type DepthLevel,
  type Fill,
  type Offer,
  type OrderRequest,
  type PairAssets,
  type PairId,
  type Quantity,
  type RestingOffer,
} from './types'
import { assertUint64, highestFirst, lowestFirst, type PriceOrdering } from './uint64'

export interface PairOptions {
  id: PairId
  assets: PairAssets
  ledger: Ledger
  config?: EngineConfig
  logger?: Logger
}

// Queues are journaled separately; only the counters are copied
interface PairSnapshot {
  base: Quantity
  quote: Quantity
  sequence: number
}

const bySequence = (a: Offer, b: Offer) => a.sequence - b.sequence

/**
 * Read-only window onto one side of the book. Prices come back as submitted,
 * whatever key the queue stores them under.
 */
export class QueueView {
  public constructor(
    private readonly queue: PriorityQueue<Offer>,
    private readonly ordering: PriceOrdering,
  ) {}

  get size(): number {
    return this.queue.size
  }

  isEmpty = () => this.queue.isEmpty()

  peekAt = (index: number): RestingOffer => this.toResting(this.queue.peekAt(index))

  best = (): RestingOffer | undefined => {
    const top = this.queue.peek()
    return top && this.toResting(top)
  }

  // Drains a copy, so the live queue is untouched
  inPriorityOrder = (): RestingOffer[] => {
    const copy = new PriorityQueue<Offer>(bySequence)
    copy.restore(this.queue.snapshot())
    const out: RestingOffer[] = []
    while (!copy.isEmpty()) out.push(this.toResting(copy.extractMax()))
    return out
  }

  totalQuantity = (): Quantity => {
    let total = 0n
    for (const entry of this.queue) total += entry.payload.quantity
    return total
  }

  // Copies the offer so callers cannot reach the queued one
  private toResting(entry: HeapEntry<Offer>): RestingOffer {
    return { price: this.ordering.fromPriority(entry.priority), offer: { ...entry.payload } }
  }
}

/**
 * Order book and escrow for one base/quote relationship.
 *
 * Every submission locks the order's quantity through the ledger, rests it on
 * its side and then matches until nothing crosses. A submission that fails at
 * any point leaves the book, the pools and the ledger as they were.
 *
 * Emits `trade` with each {@link Fill} once the submission has committed.
 */
export class Pair extends EventEmitter {
  public readonly id: PairId
  public readonly assets: PairAssets
  public readonly bids: QueueView
  public readonly asks: QueueView
  public readonly logger: Logger

  private readonly book: MatchingBook
  private readonly ledger: Ledger
  private sequence = 0

  public constructor(options: PairOptions) {
    super()
    const config = options.config ?? parseConfig()
    const tieBreaker = config.timePriority ? bySequence : undefined

    this.id = options.id
    this.assets = options.assets
    this.ledger = options.ledger
    this.logger = options.logger ?? createLogger(config.logLevel)
    this.book = {
      id: options.id,
      assets: options.assets,
      bidQueue: new PriorityQueue<Offer>(tieBreaker),
      askQueue: new PriorityQueue<Offer>(tieBreaker),
      baseEscrow: new EscrowPool(options.assets.base),
      quoteEscrow: new EscrowPool(options.assets.quote),
    }
    this.bids = new QueueView(this.book.bidQueue, highestFirst)
    this.asks = new QueueView(this.book.askQueue, lowestFirst)
  }

  get baseEscrowed(): Quantity {
    return this.book.baseEscrow.balance
  }

  get quoteEscrowed(): Quantity {
    return this.book.quoteEscrow.balance
  }

  /** Buy the quote asset, paying with `quantity` units of the base asset. */
  submitBid = (order: OrderRequest): Fill[] => this.submit(OrderSide.Bid, order)

  /** Sell `quantity` units of the quote asset for the base asset. */
  submitAsk = (order: OrderRequest): Fill[] => this.submit(OrderSide.Ask, order)

  depth = (): { bids: DepthLevel[]; asks: DepthLevel[] } => ({
    bids: aggregate(this.bids.inPriorityOrder()),
    asks: aggregate(this.asks.inPriorityOrder()),
  })

  checkInvariants = (): void => {
    const sides = [
      { name: 'bid', view: this.bids, pool: this.book.baseEscrow },
      { name: 'ask', view: this.asks, pool: this.book.quoteEscrow },
    ]
    for (const { name, view, pool } of sides) {
      const total = view.totalQuantity()
      if (total !== pool.balance) {
        throw new InvariantViolationError(`${name} escrow does not match resting quantity`, {
          pairId: this.id,
          escrow: pool.balance.toString(),
          resting: total.toString(),
        })
      }
      for (let i = 0; i < view.size; i++) {
        if (view.peekAt(i).offer.quantity <= 0n) {
          throw new InvariantViolationError(`${name} offer resting with no quantity`, { pairId: this.id, index: i })
        }
      }
    }

    const bestBid = this.bids.best()
    const bestAsk = this.asks.best()
    if (bestBid && bestAsk && bestBid.price >= bestAsk.price) {
      throw new InvariantViolationError('crossing offers left resting', {
        pairId: this.id,
        bid: bestBid.price.toString(),
        ask: bestAsk.price.toString(),
      })
    }
  }

  private submit(side: OrderSide, order: OrderRequest): Fill[] {
    const label = side === OrderSide.Bid ? 'bid' : 'ask'
    this.validate(side, label, order)

    const saved = this.begin()
    let fills: Fill[]
    try {
      fills = this.ledger.transaction(() => this.place(side, order))
      this.commit()
    } catch (err) {
      this.rollback(saved)
      this.logger.warn('order rejected', {
        pairId: this.id,
        side: label,
        price: order.price,
        quantity: order.quantity,
        code: err instanceof MatchingError ? err.code : 'UNKNOWN',
        error: err instanceof Error ? err.message : String(err),
      })
      throw err
    }

    this.logger.info('order accepted', {
      pairId: this.id,
      side: label,
      price: order.price,
      quantity: order.quantity,
      fills: fills.length,
    })
    for (const fill of fills) this.emit('trade', fill)
    return fills
  }

  private validate(side: OrderSide, label: string, order: OrderRequest): void {
    if (order.quantity === 0n) {
      this.logger.warn('order rejected', { pairId: this.id, side: label, code: 'ZERO_QUANTITY' })
      throw new ZeroQuantityError(label)
    }
    assertUint64('price', order.price)
    assertUint64('quantity', order.quantity)
    // the settlement divides by the ask price; a zero bid rests and never crosses
    if (side === OrderSide.Ask && order.price === 0n) {
      this.logger.warn('order rejected', { pairId: this.id, side: label, code: 'ZERO_PRICE' })
      throw new ZeroPriceError(label)
    }
  }

  private place(side: OrderSide, order: OrderRequest): Fill[] {
    const { book } = this
    const isBid = side === OrderSide.Bid
    const asset = isBid ? this.assets.base : this.assets.quote
    const escrow = isBid ? book.baseEscrow : book.quoteEscrow
    const queue = isBid ? book.bidQueue : book.askQueue
    const ordering = isBid ? highestFirst : lowestFirst

    this.ledger.lock(asset, order.payer ?? order.beneficiary, order.quantity)
    escrow.lock(order.quantity)
    queue.insert(ordering.toPriority(order.price), {
      beneficiary: order.beneficiary,
      quantity: order.quantity,
      sequence: this.sequence++,
    })

    return matchBook(book, this.ledger, this.logger)
  }

  private begin(): PairSnapshot {
    this.book.bidQueue.begin()
    this.book.askQueue.begin()
    return {
      base: this.book.baseEscrow.balance,
      quote: this.book.quoteEscrow.balance,
      sequence: this.sequence,
    }
  }

  private commit(): void {
    this.book.bidQueue.commit()
    this.book.askQueue.commit()
  }

  private rollback(saved: PairSnapshot): void {
    this.book.bidQueue.rollback()
    this.book.askQueue.rollback()
    this.book.baseEscrow.reset(saved.base)
    this.book.quoteEscrow.reset(saved.quote)
    this.sequence = saved.sequence
  }
}

function aggregate(resting: RestingOffer[]): DepthLevel[] {
  const levels: DepthLevel[] = []
  for (const { price, offer } of resting) {
    const last = levels[levels.length - 1]
    if (last !== undefined && last.price === price) {
      last.quantity += offer.quantity
      last.offers++
    } else {
      levels.push({ price, quantity: offer.quantity, offers: 1 })
    }
  }
  return levels
}
