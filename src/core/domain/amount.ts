import { Decimal, isU64, U64_MAX } from '../utils/decimal.js'
import { ValidationError } from '../errors/validation-error.js'

export type AmountLike = Amount | Decimal | string | number | bigint

/**
 * Unsigned 64-bit quantity of currency. Instances are always whole numbers
 * in [0, 2^64 - 1]; arithmetic that would leave that range throws.
 */
export class Amount {
  readonly value: Decimal

  private constructor(value: Decimal) {
    this.value = value
  }

  static of(value: AmountLike, field = 'amount'): Amount {
    if (value instanceof Amount) {
      return value
    }

    let decimal: Decimal
    try {
      decimal = value instanceof Decimal ? value : new Decimal(value.toString())
    } catch {
      throw new ValidationError(`Invalid ${field}: ${String(value)}`, field, value)
    }

    if (!isU64(decimal)) {
      throw new ValidationError(
        `${field} must be an unsigned 64-bit integer, got ${decimal.toString()}`,
        field,
        value
      )
    }
    return new Amount(decimal)
  }

  static zero(): Amount {
    return ZERO
  }

  static max(): Amount {
    return MAX
  }

  isZero(): boolean {
    return this.value.isZero()
  }

  wouldOverflow(other: Amount): boolean {
    return this.value.plus(other.value).greaterThan(U64_MAX)
  }

  plus(other: Amount): Amount {
    if (this.wouldOverflow(other)) {
      throw new RangeError(`Amount overflow: ${this.toString()} + ${other.toString()}`)
    }
    return new Amount(this.value.plus(other.value))
  }

  minus(other: Amount): Amount {
    if (other.greaterThan(this)) {
      throw new RangeError(`Amount underflow: ${this.toString()} - ${other.toString()}`)
    }
    return new Amount(this.value.minus(other.value))
  }

  greaterThan(other: Amount): boolean {
    return this.value.greaterThan(other.value)
  }

  lessThan(other: Amount): boolean {
    return this.value.lessThan(other.value)
  }

  greaterThanOrEqual(other: Amount): boolean {
    return this.value.greaterThanOrEqualTo(other.value)
  }

  equals(other: Amount): boolean {
    return this.value.equals(other.value)
  }

  toBigInt(): bigint {
    return BigInt(this.value.toFixed(0))
  }

  toString(): string {
    return this.value.toFixed(0)
  }

  toJSON(): string {
    return this.toString()
  }
}

const ZERO = Amount.of(0)
const MAX = Amount.of(U64_MAX)
