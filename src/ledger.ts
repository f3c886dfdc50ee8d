import { InsufficientFundsError, InvalidArgumentError } from './errors'
import type { AccountId, AssetId, Quantity } from './types'
import { checkedAdd } from './uint64'

/**
 * Custody layer the pair settles through.
 * `transaction` must undo every lock and delivery made inside `work` when it throws.
 */
export interface Ledger {
  lock(asset: AssetId, owner: AccountId, amount: Quantity): void
  deliver(asset: AssetId, beneficiary: AccountId, amount: Quantity): void
  transaction<R>(work: () => R): R
}

// A prior value of one account balance, or of the custody balance when `account` is absent
interface UndoRecord {
  asset: AssetId
  account?: AccountId
  previous: Quantity | undefined
}

/**
 * Ledger held in process memory. Locked units move into a per-asset custody
 * balance and leave it on delivery.
 */
export class InMemoryLedger implements Ledger {
  private readonly balances = new Map<AssetId, Map<AccountId, Quantity>>()
  private readonly custody = new Map<AssetId, Quantity>()
  private journal: UndoRecord[] | undefined

  mint = (asset: AssetId, account: AccountId, amount: Quantity): void => {
    if (amount < 0n) throw new InvalidArgumentError('mint amount must not be negative', { asset, account })
    this.credit(asset, account, amount)
  }

  balanceOf = (asset: AssetId, account: AccountId): Quantity => {
    return this.balances.get(asset)?.get(account) ?? 0n
  }

  custodyOf = (asset: AssetId): Quantity => this.custody.get(asset) ?? 0n

  lock = (asset: AssetId, owner: AccountId, amount: Quantity): void => {
    const available = this.balanceOf(asset, owner)
    if (available < amount) {
      throw new InsufficientFundsError(asset, owner, amount, available)
    }
    const custody = checkedAdd(this.custodyOf(asset), amount)
    this.setBalance(asset, owner, available - amount)
    this.setCustody(asset, custody)
  }

  deliver = (asset: AssetId, beneficiary: AccountId, amount: Quantity): void => {
    const held = this.custodyOf(asset)
    if (held < amount) {
      throw new InsufficientFundsError(asset, 'custody', amount, held)
    }
    this.setCustody(asset, held - amount)
    this.credit(asset, beneficiary, amount)
  }

  /** Nested calls join the outermost transaction. */
  transaction = <R>(work: () => R): R => {
    if (this.journal !== undefined) return work()

    const journal: UndoRecord[] = []
    this.journal = journal
    try {
      return work()
    } catch (err) {
      this.undo(journal)
      throw err
    } finally {
      this.journal = undefined
    }
  }

  private undo(journal: UndoRecord[]): void {
    for (let i = journal.length - 1; i >= 0; i--) {
      const { asset, account, previous } = journal[i]
      const target = account === undefined ? this.custody : this.accountsOf(asset)
      const key = account === undefined ? asset : account
      if (previous === undefined) target.delete(key)
      else target.set(key, previous)
    }
  }

  private credit(asset: AssetId, account: AccountId, amount: Quantity): void {
    this.setBalance(asset, account, checkedAdd(this.balanceOf(asset, account), amount))
  }

  private setBalance(asset: AssetId, account: AccountId, amount: Quantity): void {
    const accounts = this.accountsOf(asset)
    this.journal?.push({ asset, account, previous: accounts.get(account) })
    accounts.set(account, amount)
  }

  private setCustody(asset: AssetId, amount: Quantity): void {
    this.journal?.push({ asset, previous: this.custody.get(asset) })
    this.custody.set(asset, amount)
  }

  private accountsOf(asset: AssetId): Map<AccountId, Quantity> {
    let accounts = this.balances.get(asset)
    if (accounts === undefined) {
      accounts = new Map()
      this.balances.set(asset, accounts)
    }
    return accounts
  }
}
