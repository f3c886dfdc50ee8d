import { ArithmeticOverflowError, InvalidArgumentError } from './errors'

export const UINT64_MAX = (1n << 64n) - 1n

export const isUint64 = (value: bigint) => value >= 0n && value <= UINT64_MAX

export function assertUint64(name: string, value: bigint): void {
  if (!isUint64(value)) {
    throw new InvalidArgumentError(`${name} must be an unsigned 64-bit integer`, { [name]: value.toString() })
  }
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b
  if (!isUint64(sum)) throw new ArithmeticOverflowError('addition', a, b)
  return sum
}

export function checkedSub(a: bigint, b: bigint): bigint {
  const diff = a - b
  if (!isUint64(diff)) throw new ArithmeticOverflowError('subtraction', a, b)
  return diff
}

// quantity * price can exceed 64 bits for large orders; settle must never wrap
export function checkedMul(a: bigint, b: bigint): bigint {
  const product = a * b
  if (!isUint64(product)) throw new ArithmeticOverflowError('multiplication', a, b)
  return product
}

export const minOf = (a: bigint, b: bigint) => (a < b ? a : b)

/**
 * Maps a submitted price onto a max-heap priority and back.
 * Both directions are the same function for each ordering.
 */
export interface PriceOrdering {
  readonly name: string
  toPriority(price: bigint): bigint
  fromPriority(priority: bigint): bigint
}

export const highestFirst: PriceOrdering = {
  name: 'highest-first',
  toPriority: (price) => price,
  fromPriority: (priority) => priority,
}

// complement keeps the lowest price on top of a max-heap
export const lowestFirst: PriceOrdering = {
  name: 'lowest-first',
  toPriority: (price) => UINT64_MAX - price,
  fromPriority: (priority) => UINT64_MAX - priority,
}
