import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryLedger, InvalidArgumentError, PairRegistry, createLogger, parseConfig, type Pair } from '../src'

describe('PairRegistry', () => {
  let ledger: InMemoryLedger
  let registry: PairRegistry

  beforeEach(() => {
    ledger = new InMemoryLedger()
    registry = new PairRegistry({ ledger, logger: createLogger('error') })
  })

  it('creates empty pairs with sequential ids', () => {
    const first = registry.createPair({ base: 'BASE', quote: 'QUOTE' })
    const second = registry.createPair({ base: 'GOLD', quote: 'QUOTE' })

    expect(first.id).toBe('pair-1')
    expect(second.id).toBe('pair-2')
    expect(first.bids.size).toBe(0)
    expect(first.asks.size).toBe(0)
    expect(first.baseEscrowed).toBe(0n)
    expect(first.quoteEscrowed).toBe(0n)
    expect(registry.get('pair-2')).toBe(second)
    expect(registry.get('pair-3')).toBeUndefined()
    expect(registry.list()).toEqual([first, second])
  })

  it('announces new pairs', () => {
    const created: Pair[] = []
    registry.on('pairCreated', (pair: Pair) => created.push(pair))

    const pair = registry.createPair({ base: 'BASE', quote: 'QUOTE' })

    expect(created).toEqual([pair])
  })

  it('keeps independent pairs for the same assets', () => {
    const first = registry.createPair({ base: 'BASE', quote: 'QUOTE' })
    const second = registry.createPair({ base: 'BASE', quote: 'QUOTE' })
    ledger.mint('BASE', 'alice', 10n)

    first.submitBid({ price: 3n, quantity: 10n, beneficiary: 'alice' })

    expect(registry.findByAssets('BASE', 'QUOTE')).toEqual([first, second])
    expect(registry.findByAssets('QUOTE', 'BASE')).toEqual([])
    expect(first.bids.size).toBe(1)
    expect(second.bids.size).toBe(0)
  })

  it('rejects degenerate asset pairs', () => {
    expect(() => registry.createPair({ base: 'BASE', quote: 'BASE' })).toThrow(InvalidArgumentError)
    expect(() => registry.createPair({ base: '', quote: 'QUOTE' })).toThrow(InvalidArgumentError)
    expect(registry.list()).toEqual([])
  })

  it('logs at the configured level when no logger is given', () => {
    const configured = new PairRegistry({ ledger, config: parseConfig({ logLevel: 'debug' }) })
    const pair = configured.createPair({ base: 'BASE', quote: 'QUOTE' })

    expect(configured.logger.level).toBe('debug')
    expect(pair.logger.level).toBe('debug')
  })

  it('hands an injected logger to its pairs', () => {
    const pair = registry.createPair({ base: 'BASE', quote: 'QUOTE' })

    expect(pair.logger).toBe(registry.logger)
    expect(pair.logger.level).toBe('error')
  })
})
