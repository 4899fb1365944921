import { Decimal } from 'decimal.js'

// Wide enough that sums of many u64 values stay exact
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_DOWN
})

export { Decimal }

export const U64_MAX = new Decimal('18446744073709551615')

export function isU64(value: Decimal): boolean {
  return value.isInteger() && !value.isNegative() && value.lessThanOrEqualTo(U64_MAX)
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, val) => acc.plus(val), new Decimal(0))
}
