import type { EscrowPool } from './escrow'
import type { PriorityQueue } from './heap'
import type { Ledger } from './ledger'
import type { Logger } from './logger'
import type { Fill, Offer, PairAssets, PairId, Price } from './types'
import { checkedMul, checkedSub, highestFirst, lowestFirst, minOf } from './uint64'

/**
 * The state the matching loop works on. Bids escrow the base asset,
 * asks escrow the quote asset.
 */
export interface MatchingBook {
  readonly id: PairId
  readonly assets: PairAssets
  readonly bidQueue: PriorityQueue<Offer>
  readonly askQueue: PriorityQueue<Offer>
  readonly baseEscrow: EscrowPool
  readonly quoteEscrow: EscrowPool
}

/**
 * Matches the book until no crossing pair remains.
 *
 * Algorithm:
 * 1. Extract the best ask (lowest price) and the best bid (highest price)
 * 2. If they do not cross, put both back and stop; no other pair can cross either
 * 3. Otherwise settle at the resting ask's price: the bid's base quantity is valued
 *    in quote terms, the smaller side bounds the trade, and the base leg is the
 *    quote leg divided by the price (floored)
 * 4. Deliver both legs out of escrow and put back whatever is left of either offer
 *
 * Every crossing round empties at least one of the two offers, so the loop halts.
 *
 * @returns fills in execution order
 */
export function matchBook(book: MatchingBook, ledger: Ledger, logger: Logger): Fill[] {
  const { bidQueue, askQueue } = book
  const fills: Fill[] = []

  while (!bidQueue.isEmpty() && !askQueue.isEmpty()) {
    const askEntry = askQueue.extractMax()
    const bidEntry = bidQueue.extractMax()
    const askPrice = lowestFirst.fromPriority(askEntry.priority)
    const bidPrice = highestFirst.fromPriority(bidEntry.priority)
    const ask = askEntry.payload
    const bid = bidEntry.payload

    if (bidPrice < askPrice) {
      askQueue.insert(askEntry.priority, ask)
      bidQueue.insert(bidEntry.priority, bid)
      break
    }

    const fill = settle(book, ledger, bid, ask, askPrice)
    fills.push(fill)
    logger.debug('offers matched', {
      pairId: book.id,
      bidPrice,
      askPrice,
      baseAmount: fill.baseAmount,
      quoteAmount: fill.quoteAmount,
      dust: fill.dust,
    })

    const bidLeft = checkedSub(bid.quantity, fill.baseAmount)
    const askLeft = checkedSub(ask.quantity, fill.quoteAmount)
    if (bidLeft > 0n) bidQueue.insert(bidEntry.priority, { ...bid, quantity: bidLeft })
    if (askLeft > 0n) askQueue.insert(askEntry.priority, { ...ask, quantity: askLeft })
  }

  return fills
}

function settle(book: MatchingBook, ledger: Ledger, bid: Offer, ask: Offer, price: Price): Fill {
  const bidValueInQuote = checkedMul(bid.quantity, price)
  const quoteAmount = minOf(bidValueInQuote, ask.quantity)
  const baseAmount = quoteAmount / price

  ledger.deliver(book.assets.base, ask.beneficiary, book.baseEscrow.release(baseAmount))
  ledger.deliver(book.assets.quote, bid.beneficiary, book.quoteEscrow.release(quoteAmount))

  return {
    pairId: book.id,
    price,
    bidBeneficiary: bid.beneficiary,
    askBeneficiary: ask.beneficiary,
    baseAmount,
    quoteAmount,
    // quote delivered with no whole base unit behind it
    dust: quoteAmount - baseAmount * price,
  }
}
