export type ErrorCode =
  | 'ZERO_QUANTITY'
  | 'ZERO_PRICE'
  | 'EMPTY_QUEUE'
  | 'INDEX_OUT_OF_RANGE'
  | 'ARITHMETIC_OVERFLOW'
  | 'INSUFFICIENT_FUNDS'
  | 'INSUFFICIENT_ESCROW'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_ARGUMENT'
  | 'INVALID_CONFIG'

export type ErrorDetails = Record<string, string | number | boolean>

/**
 * Base class for everything the engine throws.
 * Callers branch on `code`; `details` carries bigints rendered as strings.
 */
export class MatchingError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
  ) {
    super(message)
    this.name = 'MatchingError'
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

export class ZeroQuantityError extends MatchingError {
  constructor(side: string) {
    super('ZERO_QUANTITY', `${side} quantity must be greater than zero`, { side })
    this.name = 'ZeroQuantityError'
  }
}

export class ZeroPriceError extends MatchingError {
  constructor(side: string) {
    super('ZERO_PRICE', `${side} price must be greater than zero`, { side })
    this.name = 'ZeroPriceError'
  }
}

export class EmptyQueueError extends MatchingError {
  constructor() {
    super('EMPTY_QUEUE', 'cannot extract from an empty queue')
    this.name = 'EmptyQueueError'
  }
}

export class IndexOutOfRangeError extends MatchingError {
  constructor(index: number, size: number) {
    super('INDEX_OUT_OF_RANGE', `index ${index} out of range for queue of size ${size}`, { index, size })
    this.name = 'IndexOutOfRangeError'
  }
}

export class ArithmeticOverflowError extends MatchingError {
  constructor(operation: string, left: bigint, right: bigint) {
    super('ARITHMETIC_OVERFLOW', `${operation} of ${left} and ${right} leaves the uint64 range`, {
      operation,
      left: left.toString(),
      right: right.toString(),
    })
    this.name = 'ArithmeticOverflowError'
  }
}

export class InsufficientFundsError extends MatchingError {
  constructor(asset: string, account: string, requested: bigint, available: bigint) {
    super('INSUFFICIENT_FUNDS', `${account} holds ${available} ${asset}, needs ${requested}`, {
      asset,
      account,
      requested: requested.toString(),
      available: available.toString(),
    })
    this.name = 'InsufficientFundsError'
  }
}

export class InsufficientEscrowError extends MatchingError {
  constructor(asset: string, requested: bigint, available: bigint) {
    super('INSUFFICIENT_ESCROW', `escrow pool for ${asset} holds ${available}, cannot release ${requested}`, {
      asset,
      requested: requested.toString(),
      available: available.toString(),
    })
    this.name = 'InsufficientEscrowError'
  }
}

export class InvariantViolationError extends MatchingError {
  constructor(message: string, details?: ErrorDetails) {
    super('INVARIANT_VIOLATION', message, details)
    this.name = 'InvariantViolationError'
  }
}

export class InvalidArgumentError extends MatchingError {
  constructor(message: string, details?: ErrorDetails) {
    super('INVALID_ARGUMENT', message, details)
    this.name = 'InvalidArgumentError'
  }
}

export class InvalidConfigError extends MatchingError {
  constructor(public readonly issues: string[]) {
    super('INVALID_CONFIG', `invalid engine configuration: ${issues.join('; ')}`, { issues: issues.length })
    this.name = 'InvalidConfigError'
  }
}
