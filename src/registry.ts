import { EventEmitter } from 'events'
import { parseConfig, type EngineConfig } from './config'
import { InvalidArgumentError } from './errors'
import type { Ledger } from './ledger'
import { createLogger, type Logger } from './logger'
import { Pair } from './pair'
import type { AssetId, PairAssets, PairId } from './types'

export interface RegistryOptions {
  ledger: Ledger
  config?: EngineConfig
  logger?: Logger
}

/**
 * Keyed store of the pairs a host trades. Creating a pair for an asset
 * combination that already has one yields a second, independent pair.
 */
export class PairRegistry extends EventEmitter {
  private nextId = 1
  private pairs = new Map<PairId, Pair>()
  private readonly config: EngineConfig
  public readonly logger: Logger

  public constructor(private readonly options: RegistryOptions) {
    super()
    this.config = options.config ?? parseConfig()
    this.logger = options.logger ?? createLogger(this.config.logLevel)
  }

  createPair = (assets: PairAssets): Pair => {
    if (!assets.base || !assets.quote) {
      throw new InvalidArgumentError('pair assets must be non-empty identifiers', { base: assets.base, quote: assets.quote })
    }
    if (assets.base === assets.quote) {
      throw new InvalidArgumentError('pair assets must differ', { base: assets.base, quote: assets.quote })
    }

    const id = `pair-${this.nextId++}`
    const pair = new Pair({
      id,
      assets: { ...assets },
      ledger: this.options.ledger,
      config: this.config,
      logger: this.logger,
    })
    this.pairs.set(id, pair)

    this.logger.info('pair created', { pairId: id, base: assets.base, quote: assets.quote })
    this.emit('pairCreated', pair)
    return pair
  }

  get = (id: PairId): Pair | undefined => this.pairs.get(id)

  list = (): Pair[] => Array.from(this.pairs.values())

  findByAssets = (base: AssetId, quote: AssetId): Pair[] => {
    return this.list().filter((pair) => pair.assets.base === base && pair.assets.quote === quote)
  }
}
