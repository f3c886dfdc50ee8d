export { Pair, QueueView, type PairOptions } from './pair'
export { PairRegistry, type RegistryOptions } from './registry'
export { matchBook, type MatchingBook } from './engine'
export { PriorityQueue, type HeapEntry, type TieBreaker } from './heap'
export { EscrowPool } from './escrow'
export { InMemoryLedger, type Ledger } from './ledger'
export { engineConfigSchema, loadConfig, parseConfig, type EngineConfig, type EngineConfigInput } from './config'
export { createLogger, logger, type Logger } from './logger'
export * from './errors'
export * from './types'
export {
  UINT64_MAX,
  checkedAdd,
  checkedMul,
  checkedSub,
  highestFirst,
  lowestFirst,
  type PriceOrdering,
} from './uint64'
