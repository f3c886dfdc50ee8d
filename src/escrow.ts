import { InsufficientEscrowError } from './errors'
import type { AssetId, Quantity } from './types'
import { checkedAdd } from './uint64'

/**
 * Units of one asset held in custody for a pair's resting orders.
 * The pair keeps `balance` equal to the summed quantity of the offers on the side it backs.
 */
export class EscrowPool {
  private locked: Quantity = 0n

  public constructor(public readonly asset: AssetId) {}

  get balance(): Quantity {
    return this.locked
  }

  lock = (amount: Quantity): void => {
    this.locked = checkedAdd(this.locked, amount)
  }

  release = (amount: Quantity): Quantity => {
    if (amount > this.locked) {
      throw new InsufficientEscrowError(this.asset, amount, this.locked)
    }
    this.locked -= amount
    return amount
  }

  // rollback only
  reset = (balance: Quantity): void => {
    this.locked = balance
  }
}
